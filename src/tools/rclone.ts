import {
  CREATE_RCLONE_REMOTE,
  DELETE_RCLONE_REMOTE,
  GET_RCLONE_CONFIG_FORM,
  LIST_RCLONE_REMOTES,
} from "../graphql/queries.js";
import { GraphQLQueryError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import type {
  CreateRCloneRemoteParams,
  DeleteRCloneRemoteParams,
  GetRCloneConfigFormParams,
  RCloneConfigForm,
  RCloneRemote,
} from "../types/index.js";
import type { ToolContext } from "./context.js";

const logger = getLogger("tools:rclone");

export async function executeListRCloneRemotes(context: ToolContext): Promise<RCloneRemote[]> {
  const result = await context.client.query<{ rclone: { remotes: RCloneRemote[] | null } | null }>(
    LIST_RCLONE_REMOTES
  );
  const remotes = result.rclone?.remotes;
  return Array.isArray(remotes) ? remotes : [];
}

/** Leading and trailing slashes are rejected by the API as a URL path. */
export function cleanProviderType(providerType: string): string {
  return providerType.replace(/^\/+|\/+$/g, "");
}

export async function executeGetRCloneConfigForm(
  params: GetRCloneConfigFormParams,
  context: ToolContext
): Promise<RCloneConfigForm> {
  const providerType = params.provider_type ? cleanProviderType(params.provider_type) : "";

  const result = await context.client.query<{
    rclone: { configForm: RCloneConfigForm | null } | null;
  }>(GET_RCLONE_CONFIG_FORM, {
    ...(providerType !== "" && { variables: { formOptions: { providerType } } }),
  });

  if (!result.rclone) {
    throw new GraphQLQueryError("No RClone data received from API");
  }
  if (!result.rclone.configForm) {
    throw new GraphQLQueryError("No RClone config form data received");
  }

  logger.info({ providerType: providerType || "general" }, "Retrieved RClone config form");
  return result.rclone.configForm;
}

export interface CreateRemoteResult {
  success: true;
  message: string;
  remote: RCloneRemote;
}

export async function executeCreateRCloneRemote(
  params: CreateRCloneRemoteParams,
  context: ToolContext
): Promise<CreateRemoteResult> {
  const result = await context.client.query<{
    rclone: { createRCloneRemote: RCloneRemote | null } | null;
  }>(CREATE_RCLONE_REMOTE, {
    variables: {
      input: { name: params.name, type: params.provider_type, config: params.config_data },
    },
  });

  const remote = result.rclone?.createRCloneRemote;
  if (!remote) {
    throw new GraphQLQueryError(`Failed to create RClone remote '${params.name}'`);
  }

  logger.info({ name: params.name, type: params.provider_type }, "Created RClone remote");
  return {
    success: true,
    message: `RClone remote '${params.name}' created successfully`,
    remote,
  };
}

export async function executeDeleteRCloneRemote(
  params: DeleteRCloneRemoteParams,
  context: ToolContext
): Promise<{ success: true; message: string }> {
  const result = await context.client.query<{
    rclone: { deleteRCloneRemote: boolean | null } | null;
  }>(DELETE_RCLONE_REMOTE, { variables: { input: { name: params.name } } });

  if (!result.rclone?.deleteRCloneRemote) {
    throw new GraphQLQueryError(`Failed to delete RClone remote '${params.name}'`);
  }

  logger.info({ name: params.name }, "Deleted RClone remote");
  return { success: true, message: `RClone remote '${params.name}' deleted successfully` };
}
