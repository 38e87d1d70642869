import { LOG_FILE_UPDATES, NOTIFICATION_ADDED } from "../graphql/subscriptions.js";
import { InvalidParametersError } from "../errors/index.js";
import type { SubscriptionRequest } from "./types.js";

/** A named live stream: how to subscribe to it and how to read one payload. */
export interface StreamSource<R> {
  readonly name: string;
  readonly request: SubscriptionRequest;
  decode(data: Record<string, unknown>): R | null;
}

export interface LogChunk {
  path: string;
  content: string;
  totalLines: number | null;
}

export interface NotificationRecord {
  id: string;
  title: string | null;
  subject: string | null;
  description: string | null;
  importance: string | null;
  link: string | null;
  type: string | null;
  timestamp: string | null;
}

function field(data: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const value = data[key];
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function logFileSource(path: string): StreamSource<LogChunk> {
  if (path.trim().length === 0) {
    throw new InvalidParametersError("path", "log file path is required");
  }

  return {
    name: `logFile:${path}`,
    request: {
      query: LOG_FILE_UPDATES,
      variables: { path },
      operationName: "LogFileUpdates",
    },
    decode(data) {
      const logFile = field(data, "logFile");
      const content = logFile?.["content"];
      if (!logFile || typeof content !== "string") {
        return null;
      }
      const totalLines = logFile["totalLines"];
      return {
        path: stringOrNull(logFile["path"]) ?? path,
        content,
        totalLines: typeof totalLines === "number" ? totalLines : null,
      };
    },
  };
}

export function notificationSource(): StreamSource<NotificationRecord> {
  return {
    name: "notifications",
    request: {
      query: NOTIFICATION_ADDED,
      operationName: "NotificationAdded",
    },
    decode(data) {
      const notification = field(data, "notificationAdded");
      const id = notification?.["id"];
      if (!notification || typeof id !== "string") {
        return null;
      }
      return {
        id,
        title: stringOrNull(notification["title"]),
        subject: stringOrNull(notification["subject"]),
        description: stringOrNull(notification["description"]),
        importance: stringOrNull(notification["importance"]),
        link: stringOrNull(notification["link"]),
        type: stringOrNull(notification["type"]),
        timestamp: stringOrNull(notification["timestamp"]),
      };
    },
  };
}
