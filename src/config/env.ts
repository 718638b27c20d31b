/**
 * Environment loading and validation
 */

import { z } from "zod";
import { ConfigurationError } from "../lib/errors.js";
import { parseLogLevel, type LogLevel } from "../lib/logger.js";
import { DEFAULT_CHANNEL_KEY, type ChannelMap } from "../types.js";

export interface EnvConfig {
  port: number;
  logLevel: LogLevel;

  // Slack Configuration
  slackToken: string;
  channels: ChannelMap;

  // Phabricator Configuration
  phabricatorUrl: string;
  phabricatorToken: string;
}

const channelMapSchema = z
  .record(z.string().min(1))
  .refine((map) => DEFAULT_CHANNEL_KEY in map, {
    message: `channel map must define ${DEFAULT_CHANNEL_KEY}`,
  });

/**
 * Parse the CHANNELS variable (a JSON object of repository -> channel)
 */
export function parseChannelMap(raw: string): ChannelMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `CHANNELS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = channelMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid CHANNELS: ${result.error.issues.map((issue) => issue.message).join(", ")}`
    );
  }
  return result.data;
}

/**
 * Read the environment and throw when a required variable is missing
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const requiredEnvVars = [
    "SLACK_TOKEN",
    "PHABRICATOR_URL",
    "PHABRICATOR_TOKEN",
    "CHANNELS",
  ] as const;

  const missingVars: string[] = [];
  const values: Partial<Record<(typeof requiredEnvVars)[number], string>> = {};

  for (const varName of requiredEnvVars) {
    const value = env[varName];
    if (!value) {
      missingVars.push(varName);
    } else {
      values[varName] = value;
    }
  }

  const { SLACK_TOKEN, PHABRICATOR_URL, PHABRICATOR_TOKEN, CHANNELS } = values;
  if (
    missingVars.length > 0 ||
    !SLACK_TOKEN ||
    !PHABRICATOR_URL ||
    !PHABRICATOR_TOKEN ||
    !CHANNELS
  ) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missingVars.join(", ")}\n` +
        `Please check your .env file and ensure all required variables are set.`
    );
  }

  const port = parseInt(env.PORT || "5000", 10);
  if (Number.isNaN(port)) {
    throw new ConfigurationError(`PORT is not a number: ${env.PORT}`);
  }

  return {
    port,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    slackToken: SLACK_TOKEN,
    channels: parseChannelMap(CHANNELS),
    phabricatorUrl: PHABRICATOR_URL.replace(/\/+$/, ""),
    phabricatorToken: PHABRICATOR_TOKEN,
  };
}
