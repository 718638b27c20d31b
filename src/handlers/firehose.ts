import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { ConduitError, UnresolvableIdentityError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { MentionResolver } from "../lib/mentions.js";
import type { ChannelRouter } from "../services/channel-router.js";
import type { UserDirectory } from "../services/user-directory.js";
import type {
  EnrichedTransaction,
  Notifier,
  TrackerClient,
  WebhookPayload,
} from "../types.js";
import { buildErrorReport } from "./error-report.js";
import { rendererFor, type RenderContext } from "./renderers.js";

// Firehose sends `phid`; `id` is accepted as an alias
const identifier = {
  phid: z.string().min(1).optional(),
  id: z.string().min(1).optional(),
};

function requirePhid(
  ref: { phid?: string; id?: string },
  ctx: z.RefinementCtx
): string {
  const phid = ref.phid ?? ref.id;
  if (!phid) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "phid is required" });
    return z.NEVER;
  }
  return phid;
}

const payloadSchema = z.object({
  object: z
    .object({ type: z.string().min(1), ...identifier })
    .transform((ref, ctx) => ({ type: ref.type, phid: requirePhid(ref, ctx) })),
  transactions: z.array(
    z.object(identifier).transform((ref, ctx) => ({ phid: requirePhid(ref, ctx) }))
  ),
});

/**
 * Validate an incoming firehose request
 */
export function parsePayload(body: unknown): WebhookPayload {
  return payloadSchema.parse(body);
}

export interface FirehoseHandlerDeps {
  tracker: TrackerClient;
  notifier: Notifier;
  users: Pick<UserDirectory, "get" | "getMention">;
  channels: Pick<ChannelRouter, "channelFor">;
  logger: Logger;
}

/**
 * Turns one firehose request into Slack notifications
 */
function failureContext(error: unknown): string {
  if (error instanceof ConduitError) {
    return ` (Conduit ${error.method}, ${error.code ?? "no error code"})`;
  }
  if (error instanceof UnresolvableIdentityError) {
    return ` (identity ${error.identity})`;
  }
  return "";
}

export class FirehoseHandler {
  private readonly tracker: TrackerClient;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly context: RenderContext;

  constructor(deps: FirehoseHandlerDeps) {
    this.tracker = deps.tracker;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.context = {
      tracker: deps.tracker,
      users: deps.users,
      mentions: new MentionResolver(deps.users),
      channels: deps.channels,
    };
  }

  /**
   * Handle a single firehose request. Never rejects: any failure is
   * reported to Slack as one error message and the rest of the batch is dropped.
   */
  async handle(body: unknown): Promise<void> {
    const requestId = uuidv4();

    try {
      this.logger.debug(
        `[${requestId}] Incoming message:\n${JSON.stringify(body, null, 4)}`
      );

      const payload = parsePayload(body);
      const transactions = await this.tracker.getTransactions(
        payload.object.type,
        payload.object.phid,
        payload.transactions.map((t) => t.phid)
      );

      await this.handleTransactions(payload.object.type, transactions);
    } catch (error) {
      await this.reportError(error, body, requestId);
    }
  }

  private async handleTransactions(
    objectType: string,
    transactions: EnrichedTransaction[]
  ): Promise<void> {
    for (const transaction of transactions) {
      const renderer = rendererFor(objectType);
      if (!renderer) {
        await this.skip(transaction);
        continue;
      }

      const result = await renderer(transaction, this.context);
      switch (result.kind) {
        case "message":
          this.logger.debug(`Message: ${JSON.stringify(result.message)}`);
          await this.notifier.sendMessage(result.message);
          break;
        case "skip":
          await this.skip(transaction);
          break;
        case "unresolved":
          throw new UnresolvableIdentityError(result.identity);
      }
    }
  }

  private async skip(transaction: EnrichedTransaction): Promise<void> {
    const note = `No message will be generated for: ${JSON.stringify(transaction, null, 4)}`;
    this.logger.debug(note);
    await this.notifier.sendDebug(note);
  }

  private async reportError(
    error: unknown,
    body: unknown,
    requestId: string
  ): Promise<void> {
    this.logger.error(
      `[${requestId}] Failed to handle firehose request${failureContext(error)}:`,
      error
    );
    try {
      await this.notifier.sendMessage(buildErrorReport(error, body, requestId));
    } catch (reportError) {
      this.logger.error(`[${requestId}] Failed to report error:`, reportError);
    }
  }
}
