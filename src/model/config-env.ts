export interface Env {
  DISCORD_WEBHOOK_URL?: string;
  DISCORD_DESTINATIONS?: string;

  MOEX_BOARD?: string;
  MOEX_SECURITY?: string;
  INDEX_NAME?: string;

  STATE_PATH?: string;

  PRICE_UPDATE_INTERVAL_SECONDS?: string;
  CHART_UPDATE_INTERVAL_SECONDS?: string;
  ALERT_THRESHOLD?: string;
  ALERT_WINDOW_SECONDS?: string;
  ALERT_RETENTION_MINUTES?: string;
  HISTORY_RETENTION_HOURS?: string;
  CHART_LOOKBACK_HOURS?: string;

  PORT?: string;
  TRIGGER_TOKEN?: string;
}

export type Destination = {
  id: string;
  webhookUrl: string;
};

export type Settings = {
  destinations: Destination[];
  board: string;
  security: string;
  indexName: string;
  statePath: string;
  priceUpdateIntervalMs: number;
  chartUpdateIntervalMs: number;
  alertThreshold: number;
  alertWindowMs: number;
  alertRetentionMs: number;
  historyRetentionMs: number;
  chartLookbackMs: number;
  port: number;
  triggerToken?: string;
};
