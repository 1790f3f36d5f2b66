import type { Server } from "node:http";
import express from "express";
import { z } from "zod";
import type { AdapterKind } from "./adapters/lightIo.js";
import type { ReconciliationEngine } from "./engine/reconcile.js";
import { computeStats } from "./engine/stats.js";
import { InvalidInputError, errorMessage } from "./errors.js";
import { buildChartHistory } from "./history/chartHistory.js";
import type { RandomSource } from "./types.js";
import { logger } from "./utils/logger.js";
import { formatClock } from "./utils/time.js";

export interface ServerDeps {
  engine: ReconciliationEngine;
  adapterKind: AdapterKind;
  apiToken: string;
  currentWarningThresholdA: number;
  timezone: string;
  random?: RandomSource;
  now?: () => Date;
}

const ControlBodySchema = z.object({
  light_id: z.union([z.number(), z.string().regex(/^\s*\d+\s*$/).transform(Number)]),
  action: z.string().optional()
});

function requireToken(expected: string) {
  return (req: express.Request, res: express.Response, next: express.NextFunction) => {
    const header = req.headers.authorization;
    if (!header || !header.toLowerCase().startsWith("bearer ")) {
      res.status(401).json({ success: false, error: "Unauthorized" });
      return;
    }
    const token = header.slice("bearer ".length);
    if (token !== expected) {
      res.status(401).json({ success: false, error: "Unauthorized" });
      return;
    }
    next();
  };
}

export function buildApp(deps: ServerDeps): express.Express {
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());
  const lightCount = deps.engine.lightCount;

  const app = express();
  app.use(express.json({ limit: "16kb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, adapter: deps.adapterKind, lights: lightCount });
  });

  const auth = requireToken(deps.apiToken);

  app.get("/api/data", auth, (_req, res) => {
    const lights = deps.engine.reconcileAll();
    const stats = computeStats(lights, { currentWarningThresholdA: deps.currentWarningThresholdA });
    const at = now();
    res.json({
      success: true,
      lights,
      stats,
      charts: buildChartHistory({ now: at, timezone: deps.timezone, random }),
      time: formatClock(at, deps.timezone),
      last_updated_utc: at.toISOString()
    });
  });

  app.post("/control", auth, (req, res) => {
    const body = ControlBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ success: false, message: "Invalid JSON payload" });
      return;
    }
    try {
      const light = deps.engine.setManual(body.data.light_id, body.data.action ?? "");
      res.json({ success: true, message: `Light ${light.id} turned ${light.relay_state}`, light });
    } catch (e) {
      if (e instanceof InvalidInputError) {
        res.status(400).json({ success: false, message: e.message });
        return;
      }
      throw e;
    }
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    // Malformed JSON bodies surface here from express.json().
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, message: "Invalid JSON payload" });
      return;
    }
    logger.error({ err }, "Request failed");
    res.status(500).json({ success: false, message: errorMessage(err) });
  });

  return app;
}

export function startServer(params: ServerDeps & { port: number }): Server {
  const app = buildApp(params);
  const server = app.listen(params.port, () => {
    logger.info({ port: params.port, adapter: params.adapterKind }, "HTTP server listening");
  });
  return server;
}
