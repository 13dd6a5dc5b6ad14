// Probes for load balancers and orchestrators:
// - GET /health -> service + database status (503 when the database is down)
// - GET /ready  -> 200 once the database answers
// - GET /live   -> 200 while the process runs

import { Router } from "express";
import type { DataSource } from "typeorm";
import { log } from "../logger";
import { asyncHandler } from "./asyncHandler";

type DatabaseStatus = "healthy" | "unhealthy" | "unavailable";

async function probeDatabase(dataSource: DataSource): Promise<DatabaseStatus> {
  if (!dataSource.isInitialized) return "unavailable";
  try {
    await dataSource.query("SELECT 1");
    return "healthy";
  } catch (err) {
    log.warn({ err }, "database probe failed");
    return "unhealthy";
  }
}

export function healthRouter(dataSource: DataSource, version: string): Router {
  const r = Router();

  r.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const database = await probeDatabase(dataSource);
      const ok = database === "healthy";
      res.status(ok ? 200 : 503).json({
        status: ok ? "ok" : "degraded",
        timestamp: new Date().toISOString(),
        database,
        version,
      });
    })
  );

  r.get(
    "/ready",
    asyncHandler(async (_req, res) => {
      const database = await probeDatabase(dataSource);
      if (database === "healthy") {
        res.json({ status: "ready", timestamp: new Date().toISOString() });
        return;
      }
      res.status(503).json({
        status: "not ready",
        reason: database === "unavailable" ? "database connection failed" : "database query failed",
      });
    })
  );

  r.get("/live", (_req, res) => {
    res.json({ status: "alive", timestamp: new Date().toISOString() });
  });

  return r;
}
