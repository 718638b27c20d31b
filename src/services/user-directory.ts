import type { Logger } from "../lib/logger.js";
import type {
  ChatDirectorySource,
  ResolvedUser,
  TrackerClient,
  TrackerUser,
} from "../types.js";

export type DirectoryEntry = {
  phid: string;
  username: string;
  chatUserId?: string;
};

/**
 * Phabricator identity -> Slack identity lookup.
 * Built once at startup and read-only afterwards.
 */
export class UserDirectory {
  private readonly byPhid: ReadonlyMap<string, DirectoryEntry>;
  private readonly byUsername: ReadonlyMap<string, DirectoryEntry>;

  constructor(entries: DirectoryEntry[]) {
    this.byPhid = new Map(entries.map((entry) => [entry.phid, entry]));
    this.byUsername = new Map(entries.map((entry) => [entry.username, entry]));
  }

  /**
   * Fetch both user lists and join them on the real name
   */
  static async build(
    tracker: Pick<TrackerClient, "getUsers">,
    chat: ChatDirectorySource,
    logger?: Logger
  ): Promise<UserDirectory> {
    const [trackerUsers, chatUsers] = await Promise.all([
      tracker.getUsers(),
      chat.getUsers(),
    ]);

    const entries = trackerUsers.map((user: TrackerUser) => ({
      phid: user.phid,
      username: user.username,
      chatUserId: chatUsers.get(user.realName),
    }));

    const directory = new UserDirectory(entries);
    const unmatched = entries.filter((entry) => !entry.chatUserId);
    logger?.info(
      `User directory built: ${directory.size} Phabricator users, ${unmatched.length} without a Slack account`
    );
    if (unmatched.length > 0) {
      logger?.debug(
        `No Slack account for: ${unmatched.map((entry) => entry.username).join(", ")}`
      );
    }

    return directory;
  }

  /**
   * Look up a user by PHID or username
   */
  get(identity: string): ResolvedUser | undefined {
    const entry = this.find(identity);
    if (!entry) {
      return undefined;
    }
    return {
      displayName: entry.username,
      mention: entry.chatUserId ? `<@${entry.chatUserId}>` : undefined,
    };
  }

  getMention(identity: string): string | undefined {
    return this.get(identity)?.mention;
  }

  get size(): number {
    return this.byPhid.size;
  }

  private find(identity: string): DirectoryEntry | undefined {
    return this.byPhid.get(identity) ?? this.byUsername.get(identity);
  }
}
