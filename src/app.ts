import { Hono } from "hono";
import { z } from "zod";

import type { IndexWatchService } from "./service/index-watch-service";

const TriggerBody = z.object({ chart: z.boolean().optional() });

export function createApp(service: IndexWatchService, triggerToken?: string) {
  const app = new Hono();

  app.get("/health", (c) => c.json({ ok: true, ...service.snapshot() }));

  app.get("/test-discord", async (c) => {
    const results = await service.sendTestMessage();
    return c.json({ ok: true, results });
  });

  app.post("/trigger-update", async (c) => {
    const token = c.req.header("x-trigger-token");
    if (!token || !triggerToken || token !== triggerToken) {
      return c.text("Unauthorized", 401);
    }

    // optional body: { chart?: boolean }
    const raw: unknown = await c.req.json().catch(() => ({}));
    const body = TriggerBody.safeParse(raw);
    const chart = body.success ? Boolean(body.data.chart) : false;

    await service.runPriceUpdate();
    if (chart) await service.runChartUpdate();

    return c.json({ ok: true, chart, ...service.snapshot() });
  });

  return app;
}
