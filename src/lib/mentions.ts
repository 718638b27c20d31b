import type { UserDirectory } from "../services/user-directory.js";

const MENTION_PATTERN = /@([\w-]+)/g;

/**
 * Replace inline Phabricator mentions (`@username`) with Slack mentions.
 *
 * Only the matched `@username` span is rewritten, and only when the whole
 * token resolves: `@bobby` is left alone even if `bob` is a known user.
 * Tokens that do not resolve are kept as written.
 */
export class MentionResolver {
  constructor(private readonly users: Pick<UserDirectory, "getMention">) {}

  resolve(text: string): string {
    const cache = new Map<string, string | undefined>();

    return text.replace(MENTION_PATTERN, (token: string, username: string) => {
      if (!cache.has(username)) {
        cache.set(username, this.users.getMention(username));
      }
      return cache.get(username) ?? token;
    });
  }
}
