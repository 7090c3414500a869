import { z } from "zod";

import { Destination, Env, Settings } from "../model/config-env";
import { DESTINATION_ID, SINGLE_DESTINATION_ID } from "../model/state-model";
import { SettingsError } from "./errors";

const positive = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v === undefined || v === "" ? fallback : Number(v)))
    .pipe(z.number().finite().positive());

const text = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : fallback));

const EnvSchema = z.object({
  DISCORD_WEBHOOK_URL: z.string().trim().optional(),
  DISCORD_DESTINATIONS: z.string().trim().optional(),
  MOEX_BOARD: text("SNDX"),
  MOEX_SECURITY: text("IMOEX2"),
  INDEX_NAME: text("IMOEX2 (all sessions)"),
  STATE_PATH: text("bot_state.json"),
  PRICE_UPDATE_INTERVAL_SECONDS: positive(1),
  CHART_UPDATE_INTERVAL_SECONDS: positive(300),
  ALERT_THRESHOLD: positive(15),
  ALERT_WINDOW_SECONDS: positive(60),
  ALERT_RETENTION_MINUTES: positive(60),
  HISTORY_RETENTION_HOURS: positive(6),
  CHART_LOOKBACK_HOURS: positive(5),
  PORT: positive(8787).pipe(z.number().int().max(65535)),
  TRIGGER_TOKEN: z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined)),
});

const WebhookUrl = z
  .string()
  .url()
  .refine((u) => u.startsWith("https://") || u.startsWith("http://"), "must be an http(s) URL");

/**
 * Parses `main=https://discord.com/api/webhooks/1/aaa;ops=https://...`.
 * Malformed entries raise a SettingsError.
 */
export function parseDestinations(input: string): Destination[] {
  const out: Destination[] = [];
  if (!input || input.trim() === "") return out;

  for (const chunk of input.split(";")) {
    const part = chunk.trim();
    if (!part) continue;

    const eq = part.indexOf("=");
    const id = eq > 0 ? part.slice(0, eq).trim() : "";
    const url = eq > 0 ? part.slice(eq + 1).trim() : "";
    if (!DESTINATION_ID.test(id)) {
      throw new SettingsError(`DISCORD_DESTINATIONS: bad destination id in "${part}"`);
    }
    if (!WebhookUrl.safeParse(url).success) {
      throw new SettingsError(`DISCORD_DESTINATIONS: bad webhook URL for "${id}"`);
    }
    if (out.some((d) => d.id === id)) {
      throw new SettingsError(`DISCORD_DESTINATIONS: duplicate destination "${id}"`);
    }
    out.push({ id, webhookUrl: url });
  }

  return out;
}

export function loadSettings(env: Env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new SettingsError(`Invalid configuration: ${problems}`);
  }
  const cfg = parsed.data;

  const destinations = parseDestinations(cfg.DISCORD_DESTINATIONS ?? "");
  if (cfg.DISCORD_WEBHOOK_URL) {
    if (!WebhookUrl.safeParse(cfg.DISCORD_WEBHOOK_URL).success) {
      throw new SettingsError("DISCORD_WEBHOOK_URL is not a valid URL");
    }
    if (!destinations.some((d) => d.id === SINGLE_DESTINATION_ID)) {
      destinations.unshift({ id: SINGLE_DESTINATION_ID, webhookUrl: cfg.DISCORD_WEBHOOK_URL });
    }
  }
  if (destinations.length === 0) {
    throw new SettingsError(
      "No destination configured. Set DISCORD_WEBHOOK_URL or DISCORD_DESTINATIONS.",
    );
  }

  return {
    destinations,
    board: cfg.MOEX_BOARD,
    security: cfg.MOEX_SECURITY,
    indexName: cfg.INDEX_NAME,
    statePath: cfg.STATE_PATH,
    priceUpdateIntervalMs: cfg.PRICE_UPDATE_INTERVAL_SECONDS * 1000,
    chartUpdateIntervalMs: cfg.CHART_UPDATE_INTERVAL_SECONDS * 1000,
    alertThreshold: cfg.ALERT_THRESHOLD,
    alertWindowMs: cfg.ALERT_WINDOW_SECONDS * 1000,
    alertRetentionMs: cfg.ALERT_RETENTION_MINUTES * 60_000,
    historyRetentionMs: cfg.HISTORY_RETENTION_HOURS * 3_600_000,
    chartLookbackMs: cfg.CHART_LOOKBACK_HOURS * 3_600_000,
    port: cfg.PORT,
    triggerToken: cfg.TRIGGER_TOKEN,
  };
}
