import {
  GET_DISK_DETAILS,
  GET_LOG_CONTENT,
  GET_NOTIFICATIONS_OVERVIEW,
  GET_SHARES_INFO,
  LIST_LOG_FILES,
  LIST_NOTIFICATIONS,
  LIST_PHYSICAL_DISKS,
} from "../graphql/queries.js";
import { ResourceNotFoundError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import { formatBytes } from "../utils/index.js";
import type {
  Disk,
  DiskPartition,
  DiskSummary,
  GetDiskDetailsParams,
  GetLogsParams,
  ListNotificationsParams,
  LogFile,
  LogFileContent,
  Notification,
  NotificationOverview,
  Share,
} from "../types/index.js";
import type { ToolContext } from "./context.js";

const logger = getLogger("tools:storage");

function requestOptions(context: ToolContext): { requestId?: string } {
  return context.requestId !== undefined ? { requestId: context.requestId } : {};
}

export async function executeGetSharesInfo(context: ToolContext): Promise<Share[]> {
  const result = await context.client.query<{ shares: Share[] | null }>(
    GET_SHARES_INFO,
    requestOptions(context)
  );
  return result.shares ?? [];
}

export async function executeGetNotificationsOverview(
  context: ToolContext
): Promise<NotificationOverview | Record<string, never>> {
  const result = await context.client.query<{
    notifications: { overview: NotificationOverview | null } | null;
  }>(GET_NOTIFICATIONS_OVERVIEW, requestOptions(context));
  return result.notifications?.overview ?? {};
}

export interface NotificationFilter {
  type: string;
  offset: number;
  limit: number;
  importance?: string;
}

export function buildNotificationFilter(params: ListNotificationsParams): NotificationFilter {
  return {
    type: params.notification_type.toUpperCase(),
    offset: params.offset,
    limit: params.limit,
    ...(params.importance !== undefined &&
      params.importance !== "" && { importance: params.importance.toUpperCase() }),
  };
}

export async function executeListNotifications(
  params: ListNotificationsParams,
  context: ToolContext
): Promise<Notification[]> {
  const filter = buildNotificationFilter(params);
  logger.info({ filter }, "Listing notifications");

  const result = await context.client.query<{
    notifications: { list: Notification[] | null } | null;
  }>(LIST_NOTIFICATIONS, { variables: { filter }, ...requestOptions(context) });

  const list = result.notifications?.list;
  return Array.isArray(list) ? list : [];
}

export async function executeListLogFiles(context: ToolContext): Promise<LogFile[]> {
  const result = await context.client.query<{ logFiles: LogFile[] | null }>(
    LIST_LOG_FILES,
    requestOptions(context)
  );
  return Array.isArray(result.logFiles) ? result.logFiles : [];
}

export async function executeGetLogs(
  params: GetLogsParams,
  context: ToolContext
): Promise<LogFileContent | Record<string, never>> {
  logger.info({ path: params.log_file_path, lines: params.tail_lines }, "Reading log file");

  const result = await context.client.query<{ logFile: LogFileContent | null }>(GET_LOG_CONTENT, {
    variables: { path: params.log_file_path, lines: params.tail_lines },
    ...requestOptions(context),
  });
  return result.logFile ?? {};
}

export async function executeListPhysicalDisks(context: ToolContext): Promise<Disk[]> {
  const result = await context.client.query<{ disks: Disk[] | null }>(LIST_PHYSICAL_DISKS, {
    timeoutMs: context.diskTimeout,
    ...requestOptions(context),
  });
  return Array.isArray(result.disks) ? result.disks : [];
}

function partitionBytes(partition: DiskPartition): number {
  const size = typeof partition.size === "string" ? Number(partition.size) : partition.size;
  return typeof size === "number" && Number.isFinite(size) ? Math.trunc(size) : 0;
}

export function summarizeDisk(disk: Disk): DiskSummary {
  const partitions = disk.partitions ?? [];
  const totalPartitionBytes = partitions.reduce((sum, p) => sum + partitionBytes(p), 0);

  return {
    disk_id: disk.id,
    device: disk.device,
    name: disk.name,
    serial_number: disk.serialNum ?? null,
    size_formatted: formatBytes(disk.size),
    temperature: disk.temperature ? `${disk.temperature}°C` : "N/A",
    interface_type: disk.interfaceType ?? null,
    smart_status: disk.smartStatus ?? null,
    is_spinning: disk.isSpinning ?? null,
    partition_count: partitions.length,
    total_partition_size: formatBytes(totalPartitionBytes),
  };
}

export interface DiskDetails {
  summary: DiskSummary;
  partitions: DiskPartition[];
  details: Disk;
}

export async function executeGetDiskDetails(
  params: GetDiskDetailsParams,
  context: ToolContext
): Promise<DiskDetails> {
  logger.info({ diskId: params.disk_id }, "Fetching disk details");

  const result = await context.client.query<{ disk: Disk | null }>(GET_DISK_DETAILS, {
    variables: { id: params.disk_id },
    timeoutMs: context.diskTimeout,
    ...requestOptions(context),
  });

  if (!result.disk) {
    throw new ResourceNotFoundError("Disk", params.disk_id);
  }

  return {
    summary: summarizeDisk(result.disk),
    partitions: result.disk.partitions ?? [],
    details: result.disk,
  };
}
