import { Request, Response, Router } from "express";
import type { FirehoseHandler } from "../handlers/firehose.js";

/**
 * POST /firehose handler. Answers OK whatever happens while the
 * request is processed, so Phabricator never retries a batch.
 */
export function handleFirehoseRequest(
  handler: Pick<FirehoseHandler, "handle">
): (req: Request, res: Response) => Promise<void> {
  return async (req: Request, res: Response) => {
    const payload: unknown = req.body;
    if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
      res.status(400).json({ error: "Bad request" });
      return;
    }

    await handler.handle(payload);
    res.status(200).send("OK\n");
  };
}

export function createFirehoseRouter(params: {
  handler: Pick<FirehoseHandler, "handle">;
}): Router {
  const { handler } = params;
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.send("Hello, World!");
  });

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  /**
   * Phabricator firehose webhook endpoint
   */
  router.post("/firehose", handleFirehoseRequest(handler));

  return router;
}
