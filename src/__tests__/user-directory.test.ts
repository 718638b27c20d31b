import { describe, expect, test } from "vitest";
import { UserDirectory } from "../services/user-directory.js";
import { ALICE, CAROL, createDirectory, silentLogger } from "./helpers.js";

describe("UserDirectory", () => {
  test("should resolve users by PHID", () => {
    expect(createDirectory().get(ALICE)).toEqual({
      displayName: "alice",
      mention: "<@U1>",
    });
  });

  test("should resolve users by username", () => {
    expect(createDirectory().getMention("bob")).toBe("<@U2>");
  });

  test("should return a user without mention when there is no Slack account", () => {
    const directory = createDirectory();

    expect(directory.get(CAROL)).toEqual({ displayName: "carol", mention: undefined });
    expect(directory.getMention("carol")).toBeUndefined();
  });

  test("should return undefined for unknown identities", () => {
    const directory = createDirectory();

    expect(directory.get("PHID-USER-ghost")).toBeUndefined();
    expect(directory.getMention("ghost")).toBeUndefined();
  });

  test("should join Phabricator and Slack users on the real name", async () => {
    const logger = silentLogger();
    const directory = await UserDirectory.build(
      {
        getUsers: async () => [
          { phid: "PHID-USER-1", username: "ana", realName: "Ana Lima" },
          { phid: "PHID-USER-2", username: "ben", realName: "Ben Stone" },
        ],
      },
      { getUsers: async () => new Map([["Ana Lima", "UANA"]]) },
      logger
    );

    expect(directory.size).toBe(2);
    expect(directory.get("PHID-USER-1")).toEqual({
      displayName: "ana",
      mention: "<@UANA>",
    });
    expect(directory.get("ben")).toEqual({ displayName: "ben", mention: undefined });
    expect(logger.info).toHaveBeenCalledWith(
      "User directory built: 2 Phabricator users, 1 without a Slack account"
    );
  });
});
