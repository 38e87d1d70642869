import { gql } from "graphql-request";

import { NOTIFICATION_FIELDS } from "./queries.js";

export const LOG_FILE_UPDATES = gql`
  subscription LogFileUpdates($path: String!) {
    logFile(path: $path) {
      path
      content
      totalLines
    }
  }
`;

export const NOTIFICATION_ADDED = gql`
  ${NOTIFICATION_FIELDS}
  subscription NotificationAdded {
    notificationAdded {
      ...NotificationFields
    }
  }
`;

export const CPU_METRICS = gql`
  subscription SubscriptionHealthCheck {
    systemMetricsCpu {
      id
      percentTotal
    }
  }
`;

export const subscriptions = {
  LOG_FILE_UPDATES,
  NOTIFICATION_ADDED,
  CPU_METRICS,
} as const;
