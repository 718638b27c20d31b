import { z } from "zod";
import type { MentionResolver } from "../lib/mentions.js";
import type { ChannelRouter } from "../services/channel-router.js";
import type { UserDirectory } from "../services/user-directory.js";
import {
  CommitTransactionType,
  DiffTransactionType,
  ObjectType,
  ProjectTransactionType,
  RepositoryTransactionType,
  Severity,
  TaskTransactionType,
  type EnrichedTransaction,
  type RenderResult,
  type ResolvedUser,
  type TrackerClient,
} from "../types.js";

export type RenderContext = {
  tracker: Pick<TrackerClient, "getLink" | "getOwner">;
  users: Pick<UserDirectory, "get" | "getMention">;
  mentions: MentionResolver;
  channels: Pick<ChannelRouter, "channelFor">;
};

export type Renderer = (
  transaction: EnrichedTransaction,
  context: RenderContext
) => Promise<RenderResult>;

// Transaction shapes each renderer expects
const baseSchema = z.object({
  type: z.string(),
  author: z.string().min(1),
});

const taskSchema = baseSchema.extend({
  task: z.string().min(1),
  comment: z.string().optional(),
  assignee: z.string().nullable().optional(),
  old: z.string().optional(),
  new: z.string().optional(),
});

const diffSchema = baseSchema.extend({
  diff: z.string().min(1),
  repo: z.string().nullable().optional(),
  comment: z.string().optional(),
});

const commitSchema = baseSchema.extend({
  commit: z.string().min(1),
  repo: z.string().nullable().optional(),
  comment: z.string().optional(),
});

const projectSchema = baseSchema.extend({
  project: z.string().min(1),
});

const repositorySchema = baseSchema.extend({
  repository: z.string().min(1),
});

type TaskTransaction = z.infer<typeof taskSchema>;
type DiffTransaction = z.infer<typeof diffSchema>;

const SKIP: RenderResult = { kind: "skip" };

function message(text: string, channel?: string): RenderResult {
  return {
    kind: "message",
    message: channel
      ? { text, channel, severity: Severity.NONE }
      : { text, severity: Severity.NONE },
  };
}

function unresolved(identity: string): RenderResult {
  return { kind: "unresolved", identity };
}

// Users without a Slack account are written by name
function mentionOf(user: ResolvedUser): string {
  return user.mention ?? user.displayName;
}

function hasRule<K extends string>(
  rules: Readonly<Record<K, unknown>>,
  type: string
): type is K {
  return Object.hasOwn(rules, type);
}

// --- Task ---------------------------------------------------------------

type TaskScope = {
  transaction: TaskTransaction;
  link: string;
  author: ResolvedUser;
  owner: ResolvedUser | undefined;
  context: RenderContext;
};

type TaskRule = (scope: TaskScope) => string;

// Prefix the owner's mention unless the owner is the author or there is no owner
function notifyOwner(scope: TaskScope, text: string): string {
  const { owner, author } = scope;
  if (owner && owner.displayName !== author.displayName) {
    return `${mentionOf(owner)} ${text}`;
  }
  return text;
}

function describeAssignee(
  assignee: string | null | undefined,
  users: RenderContext["users"]
): string {
  if (!assignee) {
    return "nobody";
  }
  const user = users.get(assignee);
  return user ? mentionOf(user) : assignee;
}

const taskRules = Object.freeze({
  [TaskTransactionType.CREATE]: ({ author, link }) =>
    `User ${author.displayName} created task ${link}`,

  [TaskTransactionType.ADD_COMMENT]: (scope) => {
    const comment = scope.context.mentions.resolve(
      scope.transaction.comment ?? ""
    );
    return notifyOwner(
      scope,
      `User ${scope.author.displayName} commented on task ${scope.link} with: ${comment}`
    );
  },

  [TaskTransactionType.CLAIM]: ({ author, link }) =>
    `User ${author.displayName} claimed task ${link}`,

  [TaskTransactionType.ASSIGN]: ({ author, link, transaction, context }) =>
    `User ${author.displayName} assigned ${describeAssignee(transaction.assignee, context.users)} to task ${link}`,

  [TaskTransactionType.CHANGE_STATUS]: (scope) =>
    notifyOwner(
      scope,
      `User ${scope.author.displayName} changed the status of task ${scope.link} from ${scope.transaction.old} to ${scope.transaction.new}`
    ),

  [TaskTransactionType.CHANGE_PRIORITY]: (scope) =>
    notifyOwner(
      scope,
      `User ${scope.author.displayName} changed the priority of task ${scope.link} from ${scope.transaction.old} to ${scope.transaction.new}`
    ),
} satisfies Record<TaskTransactionType, TaskRule>);

export const renderTask: Renderer = async (raw, context) => {
  const transaction = taskSchema.parse(raw);
  const link = await context.tracker.getLink(transaction.task);

  const ownerPhid = await context.tracker.getOwner(transaction.task);
  let owner: ResolvedUser | undefined;
  if (ownerPhid) {
    owner = context.users.get(ownerPhid);
    if (!owner) {
      return unresolved(ownerPhid);
    }
  }

  const author = context.users.get(transaction.author);
  if (!author) {
    return unresolved(transaction.author);
  }

  if (!hasRule(taskRules, transaction.type)) {
    return SKIP;
  }
  const rule = taskRules[transaction.type];
  return message(rule({ transaction, link, author, owner, context }));
};

// --- Diff ---------------------------------------------------------------

type DiffScope = {
  transaction: DiffTransaction;
  link: string;
  author: ResolvedUser;
  owner: ResolvedUser;
  context: RenderContext;
};

type DiffRule = (scope: DiffScope) => string;

function diffVerb(verb: string): DiffRule {
  return ({ author, link }) => `User ${author.displayName} ${verb} diff ${link}`;
}

// Reviewer actions always notify the revision author
function diffReview(verb: string): DiffRule {
  return ({ author, owner, link }) =>
    `${mentionOf(owner)} User ${author.displayName} ${verb} diff ${link}`;
}

const diffRules = Object.freeze({
  [DiffTransactionType.CREATE]: diffVerb("created"),
  [DiffTransactionType.UPDATE]: diffVerb("updated"),
  [DiffTransactionType.ABANDON]: diffVerb("abandoned"),
  [DiffTransactionType.RECLAIM]: diffVerb("reclaimed"),

  [DiffTransactionType.ADD_COMMENT]: ({ transaction, author, owner, link, context }) => {
    const comment = context.mentions.resolve(transaction.comment ?? "");
    const text = `User ${author.displayName} commented on diff ${link} with ${comment}`;
    return author.displayName !== owner.displayName
      ? `${mentionOf(owner)} ${text}`
      : text;
  },

  [DiffTransactionType.ACCEPT]: diffReview("accepted"),
  [DiffTransactionType.REQUEST_CHANGES]: diffReview("requested changes to"),
  [DiffTransactionType.COMMANDEER]: diffReview("took command of"),
} satisfies Record<DiffTransactionType, DiffRule>);

export const renderDiff: Renderer = async (raw, context) => {
  const transaction = diffSchema.parse(raw);
  const link = await context.tracker.getLink(transaction.diff);

  const ownerPhid = await context.tracker.getOwner(transaction.diff);
  if (!ownerPhid) {
    return unresolved(`owner of ${transaction.diff}`);
  }
  const owner = context.users.get(ownerPhid);
  if (!owner) {
    return unresolved(ownerPhid);
  }

  const author = context.users.get(transaction.author);
  if (!author) {
    return unresolved(transaction.author);
  }

  const channel = context.channels.channelFor(transaction.repo);

  if (!hasRule(diffRules, transaction.type)) {
    return SKIP;
  }
  const rule = diffRules[transaction.type];
  return message(rule({ transaction, link, author, owner, context }), channel);
};

// --- Commit, project, repository ----------------------------------------

export const renderCommit: Renderer = async (raw, context) => {
  const transaction = commitSchema.parse(raw);
  const link = await context.tracker.getLink(transaction.commit);

  const author = context.users.get(transaction.author);
  if (!author) {
    return unresolved(transaction.author);
  }

  const channel = context.channels.channelFor(transaction.repo);

  switch (transaction.type) {
    case CommitTransactionType.ADD_COMMENT:
      return message(
        `User ${author.displayName} created commit ${link} on repository ${transaction.repo ?? "unknown"}`,
        channel
      );
    default:
      return SKIP;
  }
};

export const renderProject: Renderer = async (raw, context) => {
  const transaction = projectSchema.parse(raw);
  const link = await context.tracker.getLink(transaction.project);

  const author = context.users.get(transaction.author);
  if (!author) {
    return unresolved(transaction.author);
  }

  switch (transaction.type) {
    case ProjectTransactionType.CREATE:
      return message(`User ${author.displayName} created project ${link}`);
    default:
      return SKIP;
  }
};

export const renderRepository: Renderer = async (raw, context) => {
  const transaction = repositorySchema.parse(raw);
  const link = await context.tracker.getLink(transaction.repository);

  const author = context.users.get(transaction.author);
  if (!author) {
    return unresolved(transaction.author);
  }

  switch (transaction.type) {
    case RepositoryTransactionType.CREATE:
      return message(`User ${author.displayName} created repository ${link}`);
    default:
      return SKIP;
  }
};

const renderers = Object.freeze({
  [ObjectType.TASK]: renderTask,
  [ObjectType.DIFF]: renderDiff,
  [ObjectType.COMMIT]: renderCommit,
  [ObjectType.PROJECT]: renderProject,
  [ObjectType.REPOSITORY]: renderRepository,
} satisfies Record<ObjectType, Renderer>);

function isObjectType(value: string): value is ObjectType {
  return Object.hasOwn(renderers, value);
}

/**
 * Renderer registered for an object type, if any
 */
export function rendererFor(objectType: string): Renderer | undefined {
  return isObjectType(objectType) ? renderers[objectType] : undefined;
}
