import { z } from "zod";
import { ConduitError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import {
  CommitTransactionType,
  DiffTransactionType,
  ObjectType,
  ProjectTransactionType,
  RepositoryTransactionType,
  TaskTransactionType,
  type EnrichedTransaction,
  type TrackerClient,
  type TrackerUser,
} from "../types.js";

const conduitResponseSchema = z.object({
  result: z.unknown(),
  error_code: z.string().nullable().optional(),
  error_info: z.string().nullable().optional(),
});

const cursorSchema = z.object({ after: z.string().nullable().optional() });

const transactionSearchSchema = z.object({
  data: z.array(
    z.object({
      phid: z.string(),
      type: z.string().nullable(),
      authorPHID: z.string(),
      objectPHID: z.string(),
      comments: z
        .array(z.object({ content: z.object({ raw: z.string() }) }))
        .default([]),
      fields: z.record(z.unknown()).or(z.array(z.unknown())).default({}),
    })
  ),
});

type ConduitTransaction = z.infer<typeof transactionSearchSchema>["data"][number];

const searchSchema = z.object({
  data: z.array(
    z.object({
      phid: z.string(),
      fields: z.record(z.unknown()),
    })
  ),
  cursor: cursorSchema.optional(),
});

const userSearchSchema = z.object({
  data: z.array(
    z.object({
      phid: z.string(),
      fields: z.object({
        username: z.string(),
        realName: z.string().default(""),
      }),
    })
  ),
  cursor: cursorSchema.optional(),
});

// phid.query answers [] instead of {} when nothing matches
const phidHandleSchema = z.object({ uri: z.string(), fullName: z.string() });

const phidQuerySchema = z
  .record(phidHandleSchema)
  .or(
    z
      .array(z.unknown())
      .transform((): Record<string, z.infer<typeof phidHandleSchema>> => ({}))
  );

// Conduit types that keep their name on diffs
const DIFF_TYPES: ReadonlySet<string> = new Set([
  "create",
  "update",
  "abandon",
  "reclaim",
  "accept",
  "request-changes",
  "commandeer",
]);

const PREFIXES: Readonly<Record<string, string>> = Object.freeze({
  [ObjectType.TASK]: "task",
  [ObjectType.DIFF]: "diff",
  [ObjectType.COMMIT]: "commit",
  [ObjectType.PROJECT]: "proj",
  [ObjectType.REPOSITORY]: "repo",
});

// Transaction field values are strings, PHIDs or {value, name} pairs
function fieldText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (value && typeof value === "object" && "name" in value) {
    return fieldText(value.name);
  }
  return undefined;
}

function fieldOf(transaction: ConduitTransaction, key: string): unknown {
  const { fields } = transaction;
  return Array.isArray(fields) ? undefined : fields[key];
}

export type FetchFn = typeof fetch;

/**
 * Phabricator Conduit API client
 */
export class PhabricatorService implements TrackerClient {
  private baseUrl: string;
  private token: string;
  private logger: Logger;
  private fetchFn: FetchFn;

  constructor(params: {
    baseUrl: string;
    token: string;
    logger: Logger;
    fetchFn?: FetchFn;
  }) {
    this.baseUrl = params.baseUrl.replace(/\/+$/, "");
    this.token = params.token;
    this.logger = params.logger;
    this.fetchFn = params.fetchFn ?? fetch;
  }

  /**
   * Call a Conduit method and return its `result`
   */
  async call<T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const body = new URLSearchParams({
      params: JSON.stringify({ ...params, __conduit__: { token: this.token } }),
      output: "json",
      __conduit__: "1",
    });

    this.logger.debug(`Conduit ${method} ${JSON.stringify(params)}`);

    const response = await this.fetchFn(`${this.baseUrl}/api/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body,
    });

    if (!response.ok) {
      throw new ConduitError(
        method,
        null,
        `HTTP ${response.status} ${response.statusText}`
      );
    }

    const parsed = conduitResponseSchema.parse(await response.json());
    if (parsed.error_code) {
      throw new ConduitError(
        method,
        parsed.error_code,
        parsed.error_info ?? parsed.error_code
      );
    }

    return schema.parse(parsed.result);
  }

  /**
   * Fetch the given transactions of an object and reduce them to the
   * fields the renderers use. Order follows the Conduit answer.
   */
  async getTransactions(
    objectType: string,
    objectPhid: string,
    transactionPhids: string[]
  ): Promise<EnrichedTransaction[]> {
    const { data } = await this.call(
      "transaction.search",
      {
        objectIdentifier: objectPhid,
        constraints: { phids: transactionPhids },
      },
      transactionSearchSchema
    );

    const repo = await this.getRepositoryName(objectType, objectPhid);

    return data.map((transaction) =>
      this.enrich(objectType, transaction, repo)
    );
  }

  /**
   * Slack link to an object: `<uri|full name>`
   */
  async getLink(phid: string): Promise<string> {
    const result = await this.call("phid.query", { phids: [phid] }, phidQuerySchema);
    const handle = result[phid];
    if (!handle) {
      throw new ConduitError("phid.query", null, `unknown object ${phid}`);
    }
    return `<${handle.uri}|${handle.fullName}>`;
  }

  /**
   * Task owner or revision author
   */
  async getOwner(phid: string): Promise<string | undefined> {
    if (phid.startsWith("PHID-TASK-")) {
      const task = await this.searchOne("maniphest.search", phid);
      return fieldText(task?.fields.ownerPHID);
    }
    if (phid.startsWith("PHID-DREV-")) {
      const revision = await this.searchOne("differential.revision.search", phid);
      return fieldText(revision?.fields.authorPHID);
    }
    return undefined;
  }

  async getUsers(): Promise<TrackerUser[]> {
    this.logger.info("Getting list of users from Phabricator...");

    const users: TrackerUser[] = [];
    let after: string | null | undefined;

    do {
      const result = await this.call(
        "user.search",
        after ? { after } : {},
        userSearchSchema
      );
      for (const user of result.data) {
        users.push({
          phid: user.phid,
          username: user.fields.username,
          realName: user.fields.realName,
        });
      }
      after = result.cursor?.after;
    } while (after);

    return users;
  }

  private async searchOne(method: string, phid: string) {
    const { data } = await this.call(
      method,
      { constraints: { phids: [phid] } },
      searchSchema
    );
    return data[0];
  }

  private async getRepositoryName(
    objectType: string,
    objectPhid: string
  ): Promise<string | null> {
    let repositoryPhid: string | undefined;
    if (objectType === ObjectType.DIFF) {
      const revision = await this.searchOne("differential.revision.search", objectPhid);
      repositoryPhid = fieldText(revision?.fields.repositoryPHID);
    } else if (objectType === ObjectType.COMMIT) {
      const commit = await this.searchOne("diffusion.commit.search", objectPhid);
      repositoryPhid = fieldText(commit?.fields.repositoryPHID);
    }
    if (!repositoryPhid) {
      return null;
    }

    const repository = await this.searchOne("diffusion.repository.search", repositoryPhid);
    if (!repository) {
      return null;
    }
    return (
      fieldText(repository.fields.shortName) ??
      fieldText(repository.fields.name) ??
      null
    );
  }

  private enrich(
    objectType: string,
    transaction: ConduitTransaction,
    repo: string | null
  ): EnrichedTransaction {
    const author = transaction.authorPHID;
    const object = transaction.objectPHID;
    const kind = transaction.type ?? "unknown";
    const comment = transaction.comments[0]?.content.raw;
    const prefix = PREFIXES[objectType] ?? "object";
    const fallback = `${prefix}-${kind}`;

    switch (objectType) {
      case ObjectType.TASK: {
        const base = { author, task: object };
        switch (kind) {
          case "create":
            return { ...base, type: TaskTransactionType.CREATE };
          case "comment":
            return { ...base, type: TaskTransactionType.ADD_COMMENT, comment };
          case "owner": {
            const assignee = fieldText(fieldOf(transaction, "new")) ?? null;
            return assignee === author
              ? { ...base, type: TaskTransactionType.CLAIM }
              : { ...base, type: TaskTransactionType.ASSIGN, assignee };
          }
          case "status":
            return {
              ...base,
              type: TaskTransactionType.CHANGE_STATUS,
              old: fieldText(fieldOf(transaction, "old")),
              new: fieldText(fieldOf(transaction, "new")),
            };
          case "priority":
            return {
              ...base,
              type: TaskTransactionType.CHANGE_PRIORITY,
              old: fieldText(fieldOf(transaction, "old")),
              new: fieldText(fieldOf(transaction, "new")),
            };
          default:
            return { ...base, type: fallback };
        }
      }

      case ObjectType.DIFF: {
        const base = { author, diff: object, repo };
        if (kind === "comment") {
          return { ...base, type: DiffTransactionType.ADD_COMMENT, comment };
        }
        return {
          ...base,
          type: DIFF_TYPES.has(kind) ? `diff-${kind}` : fallback,
        };
      }

      case ObjectType.COMMIT:
        return {
          author,
          commit: object,
          repo,
          comment,
          type: kind === "comment" ? CommitTransactionType.ADD_COMMENT : fallback,
        };

      case ObjectType.PROJECT:
        return {
          author,
          project: object,
          type: kind === "create" ? ProjectTransactionType.CREATE : fallback,
        };

      case ObjectType.REPOSITORY:
        return {
          author,
          repository: object,
          type: kind === "create" ? RepositoryTransactionType.CREATE : fallback,
        };

      default:
        return { author, type: fallback };
    }
  }
}
