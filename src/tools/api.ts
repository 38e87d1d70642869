import { INTROSPECT_ROOT_FIELDS, INTROSPECT_TYPE } from "../graphql/queries.js";
import { isMutation } from "../graphql/index.js";
import {
  InvalidParametersError,
  MutationNotAllowedError,
  ResourceNotFoundError,
} from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import { nestingDepth } from "../utils/index.js";
import type { IntrospectSchemaParams, QueryUnraidApiParams } from "../types/index.js";
import type { ToolContext } from "./context.js";

const logger = getLogger("tools:api");

export const MAX_VARIABLE_DEPTH = 10;

interface FieldSummary {
  name: string;
  description: string | null;
}

interface RootType {
  fields: FieldSummary[] | null;
}

interface IntrospectRootResponse {
  __schema: {
    queryType: RootType | null;
    mutationType: RootType | null;
    subscriptionType: RootType | null;
  } | null;
}

interface IntrospectTypeResponse {
  __type: Record<string, unknown> | null;
}

export interface RootFields {
  queries?: FieldSummary[];
  mutations?: FieldSummary[];
  subscriptions?: FieldSummary[];
}

function nonEmpty(type: RootType | null | undefined): FieldSummary[] | undefined {
  const fields = type?.fields;
  return fields && fields.length > 0 ? fields : undefined;
}

export async function executeIntrospectSchema(
  params: IntrospectSchemaParams,
  context: ToolContext
): Promise<Record<string, unknown> | RootFields> {
  const { client, requestId } = context;

  if (params.type_name !== undefined) {
    logger.info({ typeName: params.type_name }, "Introspecting schema type");
    const result = await client.query<IntrospectTypeResponse>(INTROSPECT_TYPE, {
      variables: { name: params.type_name },
      ...(requestId !== undefined && { requestId }),
    });
    if (!result.__type) {
      throw new ResourceNotFoundError("GraphQL type", params.type_name);
    }
    return result.__type;
  }

  logger.info("Introspecting root schema fields");
  const result = await client.query<IntrospectRootResponse>(INTROSPECT_ROOT_FIELDS, {
    ...(requestId !== undefined && { requestId }),
  });

  const queries = nonEmpty(result.__schema?.queryType);
  const mutations = nonEmpty(result.__schema?.mutationType);
  const subscriptions = nonEmpty(result.__schema?.subscriptionType);

  return {
    ...(queries && { queries }),
    ...(mutations && { mutations }),
    ...(subscriptions && { subscriptions }),
  };
}

export function validateVariables(
  variables: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (variables === undefined) {
    return undefined;
  }

  if (nestingDepth(variables) > MAX_VARIABLE_DEPTH) {
    throw new InvalidParametersError(
      "variables",
      `nesting depth exceeds maximum ${MAX_VARIABLE_DEPTH}`
    );
  }

  try {
    JSON.stringify(variables);
  } catch (error) {
    throw new InvalidParametersError(
      "variables",
      `not JSON serializable: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return variables;
}

export async function executeQueryUnraidApi(
  params: QueryUnraidApiParams,
  context: ToolContext
): Promise<Record<string, unknown>> {
  if (isMutation(params.graphql_query)) {
    logger.warn("Refused mutation through query_unraid_api");
    throw new MutationNotAllowedError("query_unraid_api");
  }

  const variables = validateVariables(params.variables);

  logger.info("Executing raw GraphQL query");
  return context.client.query<Record<string, unknown>>(params.graphql_query, {
    ...(variables && { variables }),
    ...(context.requestId !== undefined && { requestId: context.requestId }),
  });
}
