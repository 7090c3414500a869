import "dotenv/config";

import { serve } from "@hono/node-server";

import { MoexClient } from "./api/fetch-data-moex";
import { createApp } from "./app";
import type { Settings } from "./model/config-env";
import { IndexWatchService } from "./service/index-watch-service";
import { renderChart } from "./utils/chart";
import { loadSettings } from "./utils/config";
import { SettingsError } from "./utils/errors";
import { DiscordMessenger } from "./utils/send-discord";
import { StateStorage } from "./utils/state-storage";

function readSettings(): Settings {
  try {
    return loadSettings(process.env);
  } catch (err) {
    if (err instanceof SettingsError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const settings = readSettings();

  const storage = new StateStorage(settings.statePath);
  await storage.load();

  const title = `${settings.indexName} over the last ${settings.chartLookbackMs / 3_600_000} hours`;
  const service = new IndexWatchService({
    settings,
    storage,
    source: new MoexClient(settings.board, settings.security),
    messenger: new DiscordMessenger(),
    renderChart: (points, summary) => renderChart(points, summary, { title }),
  });

  await service.start();

  const app = createApp(service, settings.triggerToken);
  const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
    console.info(`[http] listening on :${info.port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.info(`[init] ${signal} received, shutting down`);
    server.close();
    await service.stop();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("[init] shutdown failed", err);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("[init] fatal", err);
  process.exit(1);
});
