import type { Resource, ResourceTemplate } from "@modelcontextprotocol/sdk/types.js";
import { InvalidResourceUriError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import {
  logFileSource,
  notificationSource,
  type CollectResult,
  type ConnectionStatus,
  type ResourceBridge,
} from "../subscriptions/index.js";
import {
  RESOURCE_URI_PATTERNS,
  buildResourceUri,
  parseResourceUri,
  type UnraidResponse,
} from "../types/index.js";

const logger = getLogger("resources");

export interface ResourceContext {
  bridge: Pick<ResourceBridge, "read">;
  getConnectionHealth(): ConnectionStatus;
}

export interface ResourceContents {
  uri: string;
  mimeType: "application/json";
  text: string;
}

export const staticResources: Resource[] = [
  {
    uri: buildResourceUri.notifications(),
    name: "Live Notifications",
    description: "Notifications raised while the read window is open",
    mimeType: "application/json",
  },
  {
    uri: buildResourceUri.subscriptionStatus(),
    name: "Subscription Status",
    description: "State of the WebSocket subscription connection",
    mimeType: "application/json",
  },
];

export const resourceTemplates: ResourceTemplate[] = [
  {
    uriTemplate: RESOURCE_URI_PATTERNS.LOGS,
    name: "Live Log Tail",
    description: "Lines appended to a log file while the read window is open; the path is URL-encoded",
    mimeType: "application/json",
  },
];

function streamResponse<R>(result: CollectResult<R>): UnraidResponse<CollectResult<R>["records"]> {
  return {
    data: result.records,
    metadata: {
      timestamp: new Date().toISOString(),
      source: result.source,
      totalCount: result.records.length,
      droppedRecords: result.droppedRecords,
      endReason: result.end?.reason ?? null,
      ...(result.end?.error && { error: result.end.error.message }),
    },
  };
}

/** Reads a resource URI into its JSON text content. Live sources collect for one read window. */
export async function readResource(uri: string, context: ResourceContext): Promise<ResourceContents> {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    throw new InvalidResourceUriError(uri);
  }

  logger.debug({ uri, type: parsed.type }, "Reading resource");

  let response: UnraidResponse<unknown>;

  if (parsed.type === "logs") {
    response = streamResponse(await context.bridge.read(logFileSource(parsed.path)));
  } else if (parsed.type === "notifications") {
    response = streamResponse(await context.bridge.read(notificationSource()));
  } else {
    response = {
      data: context.getConnectionHealth(),
      metadata: { timestamp: new Date().toISOString() },
    };
  }

  return {
    uri,
    mimeType: "application/json",
    text: JSON.stringify(response, null, 2),
  };
}
