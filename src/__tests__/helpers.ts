import { vi } from "vitest";
import { LogLevel, type Logger } from "../lib/logger.js";
import { MentionResolver } from "../lib/mentions.js";
import type { RenderContext } from "../handlers/renderers.js";
import { ChannelRouter } from "../services/channel-router.js";
import { UserDirectory } from "../services/user-directory.js";
import type {
  EnrichedTransaction,
  Notifier,
  OutgoingMessage,
  TrackerClient,
  TrackerUser,
} from "../types.js";

export const ALICE = "PHID-USER-alice";
export const BOB = "PHID-USER-bob";
export const CAROL = "PHID-USER-carol";
export const DAVE = "PHID-USER-dave";
export const GHOST = "PHID-USER-ghost";

// carol has no Slack account
export function createDirectory(): UserDirectory {
  return new UserDirectory([
    { phid: ALICE, username: "alice", chatUserId: "U1" },
    { phid: BOB, username: "bob", chatUserId: "U2" },
    { phid: CAROL, username: "carol" },
    { phid: DAVE, username: "dave", chatUserId: "U4" },
    { phid: "PHID-USER-jane", username: "jane-doe", chatUserId: "U5" },
  ]);
}

export function createChannels(): ChannelRouter {
  return new ChannelRouter({
    __default__: "#general",
    backend: "#backend",
  });
}

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn(() => LogLevel.ERROR),
    setName: vi.fn(),
  };
}

export class FakeTracker implements TrackerClient {
  transactions: EnrichedTransaction[] = [];
  links = new Map<string, string>();
  owners = new Map<string, string>();
  users: TrackerUser[] = [];

  getTransactions = vi.fn(
    async (
      _objectType: string,
      _objectPhid: string,
      _transactionPhids: string[]
    ): Promise<EnrichedTransaction[]> => this.transactions
  );

  async getLink(phid: string): Promise<string> {
    return this.links.get(phid) ?? `<${phid}>`;
  }

  async getOwner(phid: string): Promise<string | undefined> {
    return this.owners.get(phid);
  }

  async getUsers(): Promise<TrackerUser[]> {
    return this.users;
  }
}

export class FakeNotifier implements Notifier {
  messages: OutgoingMessage[] = [];
  debugNotes: string[] = [];

  async sendMessage(message: OutgoingMessage): Promise<void> {
    this.messages.push(message);
  }

  async sendDebug(text: string): Promise<void> {
    this.debugNotes.push(text);
  }
}

export function createRenderContext(tracker: FakeTracker): RenderContext {
  const users = createDirectory();
  return {
    tracker,
    users,
    mentions: new MentionResolver(users),
    channels: createChannels(),
  };
}
