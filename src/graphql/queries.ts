import { gql } from "graphql-request";

export const NOTIFICATION_FIELDS = gql`
  fragment NotificationFields on Notification {
    id
    title
    subject
    description
    importance
    link
    type
    timestamp
    formattedTimestamp
  }
`;

export const NOTIFICATION_COUNT_FIELDS = gql`
  fragment NotificationCountFields on NotificationCounts {
    info
    warning
    alert
    total
  }
`;

export const TYPE_REF_FIELDS = gql`
  fragment TypeRefFields on __Type {
    name
    kind
    ofType {
      name
      kind
      ofType {
        name
        kind
        ofType {
          name
          kind
        }
      }
    }
  }
`;

export const INTROSPECT_TYPE = gql`
  ${TYPE_REF_FIELDS}
  query IntrospectType($name: String!) {
    __type(name: $name) {
      name
      kind
      description
      fields {
        name
        description
        type {
          ...TypeRefFields
        }
        args {
          name
          type {
            ...TypeRefFields
          }
          defaultValue
        }
      }
      inputFields {
        name
        type {
          ...TypeRefFields
        }
        defaultValue
      }
      enumValues {
        name
        description
      }
    }
  }
`;

export const INTROSPECT_ROOT_FIELDS = gql`
  query IntrospectRootFields {
    __schema {
      queryType {
        fields {
          name
          description
        }
      }
      mutationType {
        fields {
          name
          description
        }
      }
      subscriptionType {
        fields {
          name
          description
        }
      }
    }
  }
`;

export const GET_SHARES_INFO = gql`
  query GetSharesInfo {
    shares {
      id
      name
      free
      used
      size
      include
      exclude
      cache
      nameOrig
      comment
      allocator
      splitLevel
      floor
      cow
      color
      luksStatus
    }
  }
`;

export const GET_NOTIFICATIONS_OVERVIEW = gql`
  ${NOTIFICATION_COUNT_FIELDS}
  query GetNotificationsOverview {
    notifications {
      overview {
        unread {
          ...NotificationCountFields
        }
        archive {
          ...NotificationCountFields
        }
      }
    }
  }
`;

export const LIST_NOTIFICATIONS = gql`
  ${NOTIFICATION_FIELDS}
  query ListNotifications($filter: NotificationFilter!) {
    notifications {
      list(filter: $filter) {
        ...NotificationFields
      }
    }
  }
`;

export const LIST_LOG_FILES = gql`
  query ListLogFiles {
    logFiles {
      name
      path
      size
      modifiedAt
    }
  }
`;

export const GET_LOG_CONTENT = gql`
  query GetLogContent($path: String!, $lines: Int) {
    logFile(path: $path, lines: $lines) {
      path
      content
      totalLines
      startLine
    }
  }
`;

export const LIST_PHYSICAL_DISKS = gql`
  query ListPhysicalDisks {
    disks {
      id
      device
      name
    }
  }
`;

export const GET_DISK_DETAILS = gql`
  query GetDiskDetails($id: PrefixedID!) {
    disk(id: $id) {
      id
      device
      name
      serialNum
      size
      temperature
      interfaceType
      smartStatus
      isSpinning
      partitions {
        name
        size
        type
        fsType
      }
    }
  }
`;

export const LIST_RCLONE_REMOTES = gql`
  query ListRCloneRemotes {
    rclone {
      remotes {
        name
        type
        parameters
        config
      }
    }
  }
`;

export const GET_RCLONE_CONFIG_FORM = gql`
  query GetRCloneConfigForm($formOptions: RCloneConfigFormInput) {
    rclone {
      configForm(formOptions: $formOptions) {
        id
        dataSchema
        uiSchema
      }
    }
  }
`;

export const CREATE_RCLONE_REMOTE = gql`
  mutation CreateRCloneRemote($input: CreateRCloneRemoteInput!) {
    rclone {
      createRCloneRemote(input: $input) {
        name
        type
        parameters
      }
    }
  }
`;

export const DELETE_RCLONE_REMOTE = gql`
  mutation DeleteRCloneRemote($input: DeleteRCloneRemoteInput!) {
    rclone {
      deleteRCloneRemote(input: $input)
    }
  }
`;

export const queries = {
  INTROSPECT_TYPE,
  INTROSPECT_ROOT_FIELDS,
  GET_SHARES_INFO,
  GET_NOTIFICATIONS_OVERVIEW,
  LIST_NOTIFICATIONS,
  LIST_LOG_FILES,
  GET_LOG_CONTENT,
  LIST_PHYSICAL_DISKS,
  GET_DISK_DETAILS,
  LIST_RCLONE_REMOTES,
  GET_RCLONE_CONFIG_FORM,
  CREATE_RCLONE_REMOTE,
  DELETE_RCLONE_REMOTE,
} as const;
