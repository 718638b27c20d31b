import { describe, expect, test, vi } from "vitest";
import { MentionResolver } from "../lib/mentions.js";
import { createDirectory } from "./helpers.js";

describe("MentionResolver", () => {
  const resolver = new MentionResolver(createDirectory());

  test("should replace a known mention with the Slack mention", () => {
    const result = resolver.resolve("hey @bob check this");

    expect(result).toBe("hey <@U2> check this");
    expect(result).not.toContain("bob");
  });

  test("should keep unknown mentions as written", () => {
    expect(resolver.resolve("ping @ghost please")).toBe("ping @ghost please");
  });

  test("should keep mentions of users without a Slack account", () => {
    expect(resolver.resolve("thanks @carol")).toBe("thanks @carol");
  });

  test("should only replace whole tokens", () => {
    expect(resolver.resolve("@bobby and @bob")).toBe("@bobby and <@U2>");
  });

  test("should replace every occurrence and look each name up once", () => {
    const directory = createDirectory();
    const getMention = vi.spyOn(directory, "getMention");
    const spied = new MentionResolver(directory);

    expect(spied.resolve("@bob, @alice and @bob again")).toBe(
      "<@U2>, <@U1> and <@U2> again"
    );
    expect(getMention).toHaveBeenCalledTimes(2);
  });

  test("should match names with hyphens and underscores", () => {
    expect(resolver.resolve("cc @jane-doe.")).toBe("cc <@U5>.");
  });

  test("should be a no-op on already resolved text", () => {
    const once = resolver.resolve("@alice asked @bob about @ghost");

    expect(once).toBe("<@U1> asked <@U2> about @ghost");
    expect(resolver.resolve(once)).toBe(once);
  });

  test("should leave text without mentions untouched", () => {
    expect(resolver.resolve("mail bob at bob@example.com")).toBe(
      "mail bob at bob@example.com"
    );
  });
});
