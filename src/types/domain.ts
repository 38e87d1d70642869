export enum NotificationType {
  UNREAD = "UNREAD",
  ARCHIVE = "ARCHIVE",
}

export enum NotificationImportance {
  INFO = "INFO",
  WARNING = "WARNING",
  ALERT = "ALERT",
}

export interface Share {
  id: string;
  name: string | null;
  free: number | null;
  used: number | null;
  size: number | null;
  include: string[] | null;
  exclude: string[] | null;
  cache: boolean | null;
  nameOrig: string | null;
  comment: string | null;
  allocator: string | null;
  splitLevel: string | null;
  floor: string | null;
  cow: string | null;
  color: string | null;
  luksStatus: string | null;
}

export interface NotificationCounts {
  info: number;
  warning: number;
  alert: number;
  total: number;
}

export interface NotificationOverview {
  unread: NotificationCounts;
  archive: NotificationCounts;
}

export interface Notification {
  id: string;
  title: string | null;
  subject: string | null;
  description: string | null;
  importance: NotificationImportance | null;
  link: string | null;
  type: NotificationType | null;
  timestamp: string | null;
  formattedTimestamp: string | null;
}

export interface LogFile {
  name: string;
  path: string;
  size: number | null;
  modifiedAt: string | null;
}

export interface LogFileContent {
  path: string;
  content: string;
  totalLines: number | null;
  startLine: number | null;
}

export interface DiskPartition {
  name: string | null;
  size: number | string | null;
  type: string | null;
  fsType: string | null;
}

export interface Disk {
  id: string;
  device: string | null;
  name: string | null;
  serialNum?: string | null;
  size?: number | string | null;
  temperature?: number | null;
  interfaceType?: string | null;
  smartStatus?: string | null;
  isSpinning?: boolean | null;
  partitions?: DiskPartition[] | null;
}

export interface DiskSummary {
  disk_id: string;
  device: string | null;
  name: string | null;
  serial_number: string | null;
  size_formatted: string;
  temperature: string;
  interface_type: string | null;
  smart_status: string | null;
  is_spinning: boolean | null;
  partition_count: number;
  total_partition_size: string;
}

export interface RCloneRemote {
  name: string;
  type: string;
  parameters: unknown;
  config?: unknown;
}

export interface RCloneConfigForm {
  id: string;
  dataSchema: unknown;
  uiSchema: unknown;
}
