import { Mutex } from "async-mutex";

import { AlertPayload } from "../model/alert-model";
import { Destination, Settings } from "../model/config-env";
import { Messenger, RemoteResult } from "../model/delivery-model";
import { ChartRenderer, DaySummary, MetricSource, Sample } from "../model/history-model";
import { AlertDetector } from "../utils/alert-detector";
import { placeholderPoints, selectChartWindow } from "../utils/chart";
import { describeError } from "../utils/errors";
import {
  formatAlertMessage,
  formatChartCaption,
  formatPriceMessage,
  PLACEHOLDER_CAPTION,
  PLACEHOLDER_TEXT,
} from "../utils/format";
import { OutputReconciler } from "../utils/reconciler";
import { PersistedState, StateStorage } from "../utils/state-storage";
import { TaskGroup } from "../utils/task-group";

export type ServiceDeps = {
  settings: Settings;
  storage: StateStorage;
  source: MetricSource;
  messenger: Messenger;
  renderChart: ChartRenderer;
  now?: () => Date;
  tasks?: TaskGroup;
};

export type ServiceSnapshot = {
  points: number;
  lastPoint: { timestamp: string; value: number } | null;
  destinations: string[];
};

const TEST_MESSAGE = "✅ Discord webhook works! (index-watch)";

function isValidSample(sample: Sample): boolean {
  return Number.isFinite(sample.timestamp.getTime()) && Number.isFinite(sample.value);
}

/**
 * Drives the price (fast) and chart (slow) cycles.
 *
 * `lock` serializes every history/state mutation together with the reconciliation
 * that reads it. The alert window has its own lock inside AlertDetector.
 */
export class IndexWatchService {
  private readonly settings: Settings;
  private readonly storage: StateStorage;
  private readonly source: MetricSource;
  private readonly messenger: Messenger;
  private readonly renderChart: ChartRenderer;
  private readonly now: () => Date;
  private readonly tasks: TaskGroup;

  private readonly lock = new Mutex();
  private readonly reconciler: OutputReconciler;
  private readonly detector: AlertDetector;

  constructor(deps: ServiceDeps) {
    this.settings = deps.settings;
    this.storage = deps.storage;
    this.source = deps.source;
    this.messenger = deps.messenger;
    this.renderChart = deps.renderChart;
    this.now = deps.now ?? (() => new Date());
    this.tasks = deps.tasks ?? new TaskGroup();

    this.reconciler = new OutputReconciler(deps.messenger);
    this.detector = new AlertDetector({
      windowMs: deps.settings.alertWindowMs,
      threshold: deps.settings.alertThreshold,
    });
  }

  private get state(): PersistedState {
    return this.storage.state;
  }

  private get destinations(): Destination[] {
    return this.settings.destinations;
  }

  async start(): Promise<void> {
    await this.initialize();

    this.tasks.spawnRepeating(
      "price-updater",
      () => this.runPriceUpdate(),
      this.settings.priceUpdateIntervalMs,
    );
    this.tasks.spawnRepeating(
      "chart-updater",
      () => this.runChartUpdate(),
      this.settings.chartUpdateIntervalMs,
      { initialDelayMs: this.settings.chartUpdateIntervalMs },
    );
    console.info(
      `[init] tracking ${this.settings.security} for ${this.destinations.length} destination(s)`,
    );
  }

  async stop(): Promise<void> {
    await this.tasks.close();
    await this.lock.runExclusive(() => this.storage.save());
    console.info("[init] stopped, state saved");
  }

  async initialize(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.prepareHistory();

      const known = new Set(this.destinations.map((d) => d.id));
      const orphaned = [...this.state.targets.keys()].filter((id) => !known.has(id));
      if (orphaned.length > 0) {
        console.warn(`[init] stored targets without a configured destination: ${orphaned.join(", ")}`);
      }

      let placeholder: Uint8Array | null = null;
      try {
        placeholder = await this.renderChart(placeholderPoints(this.state.series, this.now()));
      } catch (err) {
        console.error("[init] failed to render placeholder chart", err);
      }

      for (const destination of this.destinations) {
        await this.ensurePlaceholders(destination, placeholder);
      }
      await this.storage.save();
    });

    await this.lock.runExclusive(async () => {
      const last = this.state.series.lastPoint();
      if (last) await this.reconcileTextAll(this.priceText(last));
    });
    await this.runChartUpdate({ placeholderWhenEmpty: true });
  }

  async runPriceUpdate(): Promise<void> {
    let sample: Sample;
    try {
      sample = await this.source.fetchCurrent();
    } catch (err) {
      console.error("[price] failed to fetch last value", err);
      return;
    }
    if (!isValidSample(sample)) {
      console.error(`[price] rejected malformed sample (${String(sample.value)})`);
      return;
    }

    await this.lock.runExclusive(async () => {
      const series = this.state.series;
      series.append(sample.timestamp, sample.value);
      series.prune(this.settings.historyRetentionMs, this.now());
      await this.storage.save();

      await this.reconcileTextAll(this.priceText(sample));
      await this.handleAlert(sample);
    });
  }

  async runChartUpdate(opts?: { placeholderWhenEmpty?: boolean }): Promise<void> {
    await this.lock.runExclusive(async () => {
      const now = this.now();
      let points = selectChartWindow(this.state.series, this.settings.chartLookbackMs, now);
      if (points.length === 0) {
        if (!opts?.placeholderWhenEmpty) return;
        points = placeholderPoints(this.state.series, now);
      }

      let summary: DaySummary | null = null;
      try {
        summary = await this.source.fetchDaySummary();
      } catch (err) {
        console.warn(`[chart] day summary unavailable: ${describeError(err)}`);
      }

      let image: Uint8Array;
      try {
        image = await this.renderChart(points, summary);
      } catch (err) {
        console.error("[chart] failed to render chart", err);
        return;
      }

      const caption = formatChartCaption(points);
      let changed = false;
      for (const destination of this.destinations) {
        const target = this.state.ensureTarget(destination.id);
        try {
          const outcome = await this.reconciler.reconcileImage(destination, target, image, caption);
          changed = changed || outcome.handleChanged;
        } catch (err) {
          console.error(`[chart] failed to update chart for ${destination.id}`, err);
        }
      }
      if (changed) await this.storage.save();
    });
  }

  snapshot(): ServiceSnapshot {
    const last = this.state.series.lastPoint();
    return {
      points: this.state.series.size,
      lastPoint: last ? { timestamp: last.timestamp.toISOString(), value: last.value } : null,
      destinations: this.destinations.map((d) => d.id),
    };
  }

  async sendTestMessage(): Promise<Record<string, RemoteResult<string>["kind"]>> {
    const out: Record<string, RemoteResult<string>["kind"]> = {};
    for (const destination of this.destinations) {
      const res = await this.messenger.createText(destination, TEST_MESSAGE);
      if (res.kind !== "ok") {
        console.warn(`[http] test message to ${destination.id} failed: ${res.detail}`);
      }
      out[destination.id] = res.kind;
    }
    return out;
  }

  private priceText(sample: Sample): string {
    return formatPriceMessage(
      this.settings.indexName,
      sample,
      this.state.series,
      this.settings.alertWindowMs,
    );
  }

  private async prepareHistory(): Promise<void> {
    const series = this.state.series;
    const now = this.now();
    series.prune(this.settings.historyRetentionMs, now);
    if (series.size > 0) {
      console.info(`[init] loaded ${series.size} history points from state`);
      return;
    }

    const start = new Date(now.getTime() - this.settings.chartLookbackMs);
    let candles: Sample[];
    try {
      candles = await this.source.fetchCandles(start, now, 1);
    } catch (err) {
      console.error("[init] failed to fetch initial candle history", err);
      return;
    }

    for (const candle of candles) {
      if (isValidSample(candle)) series.append(candle.timestamp, candle.value);
    }
    await this.storage.save();
    console.info(`[init] fetched ${candles.length} historical candles`);
  }

  private async ensurePlaceholders(
    destination: Destination,
    chart: Uint8Array | null,
  ): Promise<void> {
    const target = this.state.ensureTarget(destination.id);

    try {
      const text = await this.reconciler.reconcileText(destination, target, PLACEHOLDER_TEXT, {
        force: true,
      });
      if (text.handleChanged && target.textHandle) {
        await this.pin(destination, target.textHandle);
      }
    } catch (err) {
      console.error(`[init] failed to place text placeholder for ${destination.id}`, err);
    }

    if (!chart) return;
    try {
      const image = await this.reconciler.reconcileImage(
        destination,
        target,
        chart,
        PLACEHOLDER_CAPTION,
      );
      if (image.handleChanged && target.imageHandle) {
        await this.pin(destination, target.imageHandle);
      }
    } catch (err) {
      console.error(`[init] failed to place chart placeholder for ${destination.id}`, err);
    }
  }

  private async pin(destination: Destination, handle: string): Promise<void> {
    const res = await this.messenger.pin(destination, handle);
    if (res.kind !== "ok") {
      console.warn(`[init] could not pin ${handle} in ${destination.id}: ${res.detail}`);
    }
  }

  private async reconcileTextAll(text: string): Promise<void> {
    let changed = false;
    for (const destination of this.destinations) {
      const target = this.state.ensureTarget(destination.id);
      try {
        const outcome = await this.reconciler.reconcileText(destination, target, text);
        changed = changed || outcome.handleChanged;
      } catch (err) {
        console.error(`[price] failed to update price message for ${destination.id}`, err);
      }
    }
    if (changed) await this.storage.save();
  }

  private async handleAlert(sample: Sample): Promise<void> {
    const alert = await this.detector.evaluateExclusive(sample);
    if (!alert) return;

    console.info(
      `[alert] ${alert.direction} ${alert.diff.toFixed(2)} since ${alert.windowStart.toISOString()}`,
    );
    await this.deliverAlert(alert);
  }

  private async deliverAlert(alert: AlertPayload): Promise<void> {
    const text = formatAlertMessage(alert, this.settings.alertWindowMs);

    for (const destination of this.destinations) {
      let res: RemoteResult<string>;
      try {
        res = await this.messenger.createText(destination, text);
      } catch (err) {
        console.error(`[alert] failed to send alert to ${destination.id}`, err);
        continue;
      }
      if (res.kind !== "ok") {
        console.error(`[alert] failed to send alert to ${destination.id}: ${res.detail}`);
        continue;
      }
      this.scheduleDeletion(destination, res.value);
    }
  }

  private scheduleDeletion(destination: Destination, handle: string): void {
    this.tasks.spawnDelayed(
      `delete-alert-${destination.id}-${handle}`,
      async () => {
        const res = await this.messenger.deleteMessage(destination, handle);
        if (res.kind !== "ok") {
          console.warn(
            `[alert] failed to delete alert message ${handle} in ${destination.id}: ${res.detail}`,
          );
        }
      },
      this.settings.alertRetentionMs,
    );
  }
}
