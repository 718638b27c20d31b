#!/usr/bin/env node
import "dotenv/config";
import express from "express";
import { loadEnv } from "./config/env.js";
import { FirehoseHandler } from "./handlers/firehose.js";
import { createLogger } from "./lib/logger.js";
import { createFirehoseRouter } from "./routes/firehose.js";
import { ChannelRouter } from "./services/channel-router.js";
import { PhabricatorService } from "./services/phabricator.js";
import { SlackService, createSlackClient } from "./services/slack.js";
import { UserDirectory } from "./services/user-directory.js";
import { Severity } from "./types.js";

const logger = createLogger("firehose-notifier");

async function main() {
  const env = loadEnv();
  logger.setLevel(env.logLevel);

  // Collaborators are created once and passed down explicitly
  const channels = new ChannelRouter(env.channels);
  const slackLogger = createLogger("SlackService", env.logLevel);
  const slackService = new SlackService(
    createSlackClient(env.slackToken, slackLogger, env.logLevel),
    channels,
    slackLogger
  );
  const phabricator = new PhabricatorService({
    baseUrl: env.phabricatorUrl,
    token: env.phabricatorToken,
    logger: createLogger("PhabricatorService", env.logLevel),
  });
  const users = await UserDirectory.build(
    phabricator,
    slackService,
    createLogger("UserDirectory", env.logLevel)
  );

  const handler = new FirehoseHandler({
    tracker: phabricator,
    notifier: slackService,
    users,
    channels,
    logger: createLogger("FirehoseHandler", env.logLevel),
  });

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(createFirehoseRouter({ handler }));
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  const message = "Firehose notifier started running.";
  logger.info(message);
  await slackService.sendMessage({ text: message, severity: Severity.INFO });

  app.listen(env.port, () => {
    logger.info(`Server is running on port ${env.port}`);
    logger.info(`Health check: http://localhost:${env.port}/health`);
    logger.info(`Firehose webhook: http://localhost:${env.port}/firehose`);
  });
}

main().catch((error) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
