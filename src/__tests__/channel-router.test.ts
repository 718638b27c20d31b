import { describe, expect, test } from "vitest";
import { ChannelRouter } from "../services/channel-router.js";
import { ConfigurationError } from "../lib/errors.js";

describe("ChannelRouter", () => {
  const router = new ChannelRouter({
    __default__: "#general",
    __debug__: "#debug",
    foo: "#foo-team",
  });

  test("should fall back to the default channel for unmapped repositories", () => {
    expect(router.channelFor("bar")).toBe("#general");
  });

  test("should prefer an explicit mapping over the default", () => {
    expect(router.channelFor("foo")).toBe("#foo-team");
  });

  test("should use the default channel when there is no repository", () => {
    expect(router.channelFor(null)).toBe("#general");
    expect(router.channelFor(undefined)).toBe("#general");
  });

  test("should expose the default and debug channels", () => {
    expect(router.defaultChannel).toBe("#general");
    expect(router.debugChannel).toBe("#debug");
  });

  test("should leave the debug channel unset when not configured", () => {
    expect(new ChannelRouter({ __default__: "#general" }).debugChannel).toBeUndefined();
  });

  test("should reject a channel map without __default__", () => {
    expect(() => new ChannelRouter({ foo: "#foo-team" })).toThrow(ConfigurationError);
    expect(() => new ChannelRouter({ foo: "#foo-team" })).toThrow(
      "Channel map has no __default__ entry"
    );
  });
});
