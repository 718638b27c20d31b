// Phabricator object types that carry a renderer
export const ObjectType = {
  TASK: "TASK",
  DIFF: "DREV",
  COMMIT: "CMIT",
  PROJECT: "PROJ",
  REPOSITORY: "REPO",
} as const;

export type ObjectType = (typeof ObjectType)[keyof typeof ObjectType];

// Transaction subtypes, one set per object type
export const TaskTransactionType = {
  CREATE: "task-create",
  ADD_COMMENT: "task-add-comment",
  CLAIM: "task-claim",
  ASSIGN: "task-assign",
  CHANGE_STATUS: "task-change-status",
  CHANGE_PRIORITY: "task-change-priority",
} as const;

export type TaskTransactionType =
  (typeof TaskTransactionType)[keyof typeof TaskTransactionType];

export const DiffTransactionType = {
  CREATE: "diff-create",
  UPDATE: "diff-update",
  ABANDON: "diff-abandon",
  RECLAIM: "diff-reclaim",
  ADD_COMMENT: "diff-add-comment",
  ACCEPT: "diff-accept",
  REQUEST_CHANGES: "diff-request-changes",
  COMMANDEER: "diff-commandeer",
} as const;

export type DiffTransactionType =
  (typeof DiffTransactionType)[keyof typeof DiffTransactionType];

export const CommitTransactionType = {
  ADD_COMMENT: "commit-add-comment",
} as const;

export type CommitTransactionType =
  (typeof CommitTransactionType)[keyof typeof CommitTransactionType];

export const ProjectTransactionType = {
  CREATE: "proj-create",
} as const;

export type ProjectTransactionType =
  (typeof ProjectTransactionType)[keyof typeof ProjectTransactionType];

export const RepositoryTransactionType = {
  CREATE: "repo-create",
} as const;

export type RepositoryTransactionType =
  (typeof RepositoryTransactionType)[keyof typeof RepositoryTransactionType];

// Presentation category of a Slack notification
export const Severity = {
  NONE: "none",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  SUCCESS: "success",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

// Only the error report may use the error severity
export type RenderSeverity = Exclude<Severity, "error">;

// Reserved keys of the channel map
export const DEFAULT_CHANNEL_KEY = "__default__";
export const DEBUG_CHANNEL_KEY = "__debug__";

export type ChannelMap = Record<string, string>;

// Inbound firehose payload, after validation
export type WebhookPayload = {
  object: { type: string; phid: string };
  transactions: Array<{ phid: string }>;
};

// Transaction as returned by the enrichment call
export type EnrichedTransaction = {
  type: string;
  author: string;
  task?: string;
  diff?: string;
  commit?: string;
  project?: string;
  repository?: string;
  repo?: string | null;
  comment?: string;
  assignee?: string | null;
  old?: string;
  new?: string;
};

export type ResolvedUser = {
  displayName: string;
  mention?: string;
};

export type RenderedMessage = {
  text: string;
  channel?: string;
  severity: RenderSeverity;
};

export type OutgoingMessage = {
  text: string;
  channel?: string;
  severity?: Severity;
};

export type RenderResult =
  | { kind: "message"; message: RenderedMessage }
  | { kind: "skip" }
  | { kind: "unresolved"; identity: string };

export type TrackerUser = {
  phid: string;
  username: string;
  realName: string;
};

// Collaborator contracts
export interface TrackerClient {
  getTransactions(
    objectType: string,
    objectPhid: string,
    transactionPhids: string[]
  ): Promise<EnrichedTransaction[]>;
  getLink(phid: string): Promise<string>;
  getOwner(phid: string): Promise<string | undefined>;
  getUsers(): Promise<TrackerUser[]>;
}

export interface Notifier {
  sendMessage(message: OutgoingMessage): Promise<void>;
  sendDebug(text: string): Promise<void>;
}

export interface ChatDirectorySource {
  // real name -> chat user id
  getUsers(): Promise<Map<string, string>>;
}
