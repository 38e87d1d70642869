export {
  UnraidGraphQLClient,
  getGraphQLClient,
  resetGraphQLClient,
  type GraphQLRequester,
  type UnraidClientConfig,
  type QueryOptions,
  type Variables,
} from "./client.js";

export { queries } from "./queries.js";

export { subscriptions } from "./subscriptions.js";

export {
  parseDocument,
  getOperationTypes,
  isMutation,
  assertSubscriptionDocument,
} from "./documents.js";
