import { ConfigurationError } from "../lib/errors.js";
import {
  DEBUG_CHANNEL_KEY,
  DEFAULT_CHANNEL_KEY,
  type ChannelMap,
} from "../types.js";

/**
 * Maps repository names to Slack channels
 */
export class ChannelRouter {
  private readonly channels: ReadonlyMap<string, string>;
  readonly defaultChannel: string;
  readonly debugChannel: string | undefined;

  constructor(channelMap: ChannelMap) {
    const defaultChannel = channelMap[DEFAULT_CHANNEL_KEY];
    if (!defaultChannel) {
      throw new ConfigurationError(
        `Channel map has no ${DEFAULT_CHANNEL_KEY} entry`
      );
    }

    this.defaultChannel = defaultChannel;
    this.debugChannel = channelMap[DEBUG_CHANNEL_KEY] || undefined;
    this.channels = new Map(Object.entries(channelMap));
  }

  /**
   * Channel for a repository, or the default one when it has no entry
   */
  channelFor(repoName: string | null | undefined): string {
    if (!repoName) {
      return this.defaultChannel;
    }
    return this.channels.get(repoName) ?? this.defaultChannel;
  }
}
