import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import { z } from "zod";
import { renderDashboard } from "./html.js";
import { logger } from "./logger.js";
import type { DashboardSnapshot } from "./types.js";

/** What the HTTP layer may do with the coordinator: read the snapshot, acknowledge an issue. */
export interface DashboardBackend {
  getSnapshot(): DashboardSnapshot;
  markSeen(identity: string): DashboardSnapshot;
}

const SeenRequestSchema = z.object({ identity: z.string().min(1) });

export function createDashboardRoutes(backend: DashboardBackend): Hono {
  const app = new Hono();

  app.get("/", async (c) => c.html(await renderDashboard(backend.getSnapshot())));

  app.get("/api/snapshot", (c) => c.json(backend.getSnapshot()));

  app.post("/api/seen", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "request body must be JSON" }, 400);
    }
    const parsed = SeenRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "expected { identity: string }" }, 400);
    }
    logger.debug("marked seen", { identity: parsed.data.identity });
    const snapshot = backend.markSeen(parsed.data.identity);
    return c.json({ ok: true, snapshot });
  });

  app.get("/healthz", (c) => c.json({ status: "ok" }));

  return app;
}

export function serveDashboard(app: Hono, host: string, port: number): ServerType {
  return serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    logger.success(`Dashboard listening on http://${host}:${info.port}`);
  });
}
