import { GraphQLError, Kind, OperationTypeNode, parse } from "graphql";
import type { DocumentNode } from "graphql";
import { InvalidQueryError } from "../errors/index.js";

export function parseDocument(query: string): DocumentNode {
  if (query.trim().length === 0) {
    throw new InvalidQueryError("GraphQL document is empty");
  }

  try {
    return parse(query);
  } catch (error) {
    if (error instanceof GraphQLError) {
      throw new InvalidQueryError(`GraphQL syntax error: ${error.message}`, {
        locations: error.locations,
      });
    }
    throw error;
  }
}

export function getOperationTypes(document: DocumentNode): OperationTypeNode[] {
  const operations: OperationTypeNode[] = [];
  for (const definition of document.definitions) {
    if (definition.kind === Kind.OPERATION_DEFINITION) {
      operations.push(definition.operation);
    }
  }
  return operations;
}

export function isMutation(query: string): boolean {
  return getOperationTypes(parseDocument(query)).includes(OperationTypeNode.MUTATION);
}

export function assertSubscriptionDocument(query: string): void {
  const operations = getOperationTypes(parseDocument(query));

  if (operations.length === 0) {
    throw new InvalidQueryError("GraphQL document contains no operation");
  }
  if (!operations.every((operation) => operation === OperationTypeNode.SUBSCRIPTION)) {
    throw new InvalidQueryError("Only subscription operations can be streamed", {
      operations,
    });
  }
}
