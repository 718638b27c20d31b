import { WebClient } from "@slack/web-api";
import type { LogLevel, Logger } from "../lib/logger.js";
import {
  Severity,
  type ChatDirectorySource,
  type Notifier,
  type OutgoingMessage,
} from "../types.js";
import type { ChannelRouter } from "./channel-router.js";

// Attachment colour per severity
export const SEVERITY_COLORS: Readonly<Record<Severity, string>> = Object.freeze({
  [Severity.NONE]: "#F0F0F0",
  [Severity.INFO]: "#28D7E5",
  [Severity.WARN]: "warning",
  [Severity.ERROR]: "danger",
  [Severity.SUCCESS]: "good",
});

// The part of the Web API this service calls
export type SlackApi = {
  chat: Pick<WebClient["chat"], "postMessage">;
  users: Pick<WebClient["users"], "list">;
};

/**
 * Web API client that fails on the first error. Rate-limited calls are
 * rejected instead of waited out, so a failing Slack never holds a request.
 */
export function createSlackClient(
  token: string,
  logger: Logger,
  logLevel: LogLevel
): WebClient {
  return new WebClient(token, {
    logger,
    logLevel,
    retryConfig: { retries: 0 },
    rejectRateLimitedCalls: true,
  });
}

export class SlackService implements Notifier, ChatDirectorySource {
  private client: SlackApi;
  private channels: Pick<ChannelRouter, "defaultChannel" | "debugChannel">;
  private logger: Logger;

  constructor(
    client: SlackApi,
    channels: Pick<ChannelRouter, "defaultChannel" | "debugChannel">,
    logger: Logger
  ) {
    this.client = client;
    this.channels = channels;
    this.logger = logger;
  }

  /**
   * Post a message as a single coloured attachment.
   * Requires the chat:write scope. Failures are logged and the message is dropped.
   */
  async sendMessage(message: OutgoingMessage): Promise<void> {
    const channel = message.channel ?? this.channels.defaultChannel;
    const color = SEVERITY_COLORS[message.severity ?? Severity.NONE];

    try {
      await this.client.chat.postMessage({
        channel,
        attachments: [{ color, text: message.text, fallback: message.text }],
      });
    } catch (error) {
      this.logger.error(
        `Couldn't send message to Slack because '${error instanceof Error ? error.message : String(error)}', dropping: ${JSON.stringify(message)}`
      );
    }
  }

  /**
   * Post a note to the debug channel, when one is configured
   */
  async sendDebug(text: string): Promise<void> {
    const channel = this.channels.debugChannel;
    if (!channel) {
      return;
    }
    await this.sendMessage({ channel, text, severity: Severity.INFO });
  }

  /**
   * Active human members as real name -> Slack user id.
   * Requires the users:read scope.
   */
  async getUsers(): Promise<Map<string, string>> {
    this.logger.info("Getting list of users from Slack...");

    const users = new Map<string, string>();
    let cursor: string | undefined;

    do {
      const response = await this.client.users.list({ cursor, limit: 200 });
      for (const member of response.members ?? []) {
        if (
          member.is_bot === false &&
          member.deleted === false &&
          member.real_name &&
          member.id
        ) {
          users.set(member.real_name, member.id);
        }
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return users;
  }
}
