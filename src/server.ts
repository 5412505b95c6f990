import express, { NextFunction, Request, Response } from "express";
import { ApiContext, HandlerResult, getLocation, getLocations, postCurves, postDesign, postProcess, postState } from "./api/handlers.js";
import { logger } from "./utils/logger.js";

function send<B>(res: Response, result: HandlerResult<B>) {
  res.status(result.status).json(result.body);
}

// body-parser marks malformed JSON with a 400 status.
function isBadBody(err: unknown): boolean {
  return typeof err === "object" && err !== null && "status" in err && err.status === 400;
}

export function createApp(ctx: ApiContext) {
  const app = express();
  app.use(express.json({ limit: "256kb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, locations: ctx.conditions.locations.size });
  });

  app.post("/api/state", (req, res) => send(res, postState(req.body)));
  app.post("/api/curves", (req, res) => send(res, postCurves(req.body)));
  app.post("/api/process", (req, res) => send(res, postProcess(req.body)));
  app.post("/api/design", (req, res) => send(res, postDesign(req.body, ctx)));
  app.get("/api/design-conditions", (_req, res) => send(res, getLocations(ctx)));
  app.get("/api/design-conditions/:location", (req, res) => send(res, getLocation(req.params.location, ctx)));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBadBody(err)) {
      res.status(400).json({ ok: false, error: "ValidationError", message: "request body is not valid JSON" });
      return;
    }
    logger.error({ err }, "Request failed");
    res.status(500).json({ ok: false, error: "internal error" });
  });

  return app;
}

export function startServer(params: { port: number; context: ApiContext }) {
  const app = createApp(params.context);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
