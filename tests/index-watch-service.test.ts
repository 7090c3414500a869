import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Settings } from "../src/model/config-env";
import { DaySummary, Sample } from "../src/model/history-model";
import { SerializedState } from "../src/model/state-model";
import { IndexWatchService } from "../src/service/index-watch-service";
import { PLACEHOLDER_CAPTION, PLACEHOLDER_TEXT } from "../src/utils/format";
import { StateStorage } from "../src/utils/state-storage";
import { TaskGroup } from "../src/utils/task-group";
import {
  at,
  FakeMessenger,
  FakeSource,
  HOUR,
  MAIN,
  makeSettings,
  MIN,
  OPS,
  SEC,
  T0,
  tempStatePath,
} from "./helpers";

type Harness = {
  service: IndexWatchService;
  storage: StateStorage;
  statePath: string;
  source: FakeSource;
  messenger: FakeMessenger;
  render: ReturnType<typeof makeRenderer>;
  tasks: TaskGroup;
};

function makeRenderer() {
  return vi.fn(async (_points: Sample[], _summary?: DaySummary | null): Promise<Uint8Array> => new Uint8Array([1]));
}

async function harness(opts?: {
  settings?: Partial<Settings>;
  now?: Date;
  state?: unknown;
}): Promise<Harness> {
  const statePath = await tempStatePath();
  const storage = new StateStorage(statePath);
  if (opts?.state !== undefined) {
    await writeFile(statePath, JSON.stringify(opts.state), "utf-8");
    await storage.load();
  }
  const source = new FakeSource();
  const messenger = new FakeMessenger();
  const render = makeRenderer();
  const tasks = new TaskGroup();
  const now = opts?.now ?? T0;
  const service = new IndexWatchService({
    settings: makeSettings(opts?.settings),
    storage,
    source,
    messenger,
    renderChart: render,
    now: () => now,
    tasks,
  });
  return { service, storage, statePath, source, messenger, render, tasks };
}

async function readState(statePath: string): Promise<SerializedState> {
  return JSON.parse(await readFile(statePath, "utf-8"));
}

describe("IndexWatchService price cycle", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates the price message, then edits it only when the text changes", async () => {
    const h = await harness();
    h.source.current.push(at(0, 100), at(0, 100), at(SEC, 101));

    await h.service.runPriceUpdate();
    await h.service.runPriceUpdate();
    await h.service.runPriceUpdate();

    expect(h.messenger.calls).toEqual([
      {
        method: "createText",
        destination: "main",
        content: "**IMOEX2**\nCurrent value: **100.00**\nUpdated: 06.05.2024 10:00:00 MSK",
      },
      {
        method: "editText",
        destination: "main",
        handle: "m101",
        content: "**IMOEX2**\nCurrent value: **101.00**\nUpdated: 06.05.2024 10:00:01 MSK",
      },
    ]);

    const saved = await readState(h.statePath);
    expect(saved.history).toEqual([
      ["2024-05-06T10:00:00.000+03:00", 100],
      ["2024-05-06T10:00:01.000+03:00", 101],
    ]);
    expect(saved.targets).toEqual({ main: { textHandle: "m101", imageHandle: null } });
  });

  it("does nothing when the source fails", async () => {
    const h = await harness();

    await h.service.runPriceUpdate();

    expect(h.messenger.calls).toEqual([]);
    expect(h.storage.state.series.size).toBe(0);
    expect(existsSync(h.statePath)).toBe(false);
  });

  it("rejects a malformed sample without touching the history", async () => {
    const h = await harness();
    h.source.current.push({ timestamp: new Date(Number.NaN), value: 1 });

    await h.service.runPriceUpdate();

    expect(h.messenger.calls).toEqual([]);
    expect(h.storage.state.series.size).toBe(0);
  });

  it("replaces a deleted price message and persists the new handle", async () => {
    const h = await harness();
    h.storage.state.ensureTarget("main").textHandle = "old";
    h.messenger.missing.add("old");
    h.source.current.push(at(0, 100));

    await h.service.runPriceUpdate();

    expect(h.messenger.callsFor("main")).toEqual(["editText", "createText"]);
    const saved = await readState(h.statePath);
    expect(saved.targets.main.textHandle).toBe("m101");
  });

  it("keeps serving other destinations when one of them fails", async () => {
    const h = await harness({ settings: { destinations: [MAIN, OPS] } });
    h.messenger.failingDestinations.add("main");
    h.source.current.push(at(0, 100));

    await h.service.runPriceUpdate();

    expect(h.messenger.callsFor("ops")).toEqual(["createText"]);
    expect(h.storage.state.targets.get("ops")?.textHandle).toBe("m101");
    expect(h.storage.state.targets.get("main")?.textHandle).toBeNull();
  });

  it("posts an alert on a big move and deletes it after the retention period", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const h = await harness();
    h.source.current.push(at(0, 100), at(30 * SEC, 118));

    await h.service.runPriceUpdate();
    await h.service.runPriceUpdate();

    expect(h.messenger.calls.at(-1)).toEqual({
      method: "createText",
      destination: "main",
      content: "🚀 Rise of +18.00 points over 1 min!\nCurrent value: 118.00",
    });
    expect(h.tasks.size).toBe(1);

    await vi.advanceTimersByTimeAsync(HOUR - SEC);
    expect(h.messenger.count("deleteMessage")).toBe(0);

    await vi.advanceTimersByTimeAsync(SEC);
    await h.tasks.close();
    expect(h.messenger.calls.at(-1)).toEqual({
      method: "deleteMessage",
      destination: "main",
      handle: "m102",
    });
  });

  it("abandons pending alert deletions on stop", async () => {
    const h = await harness();
    h.source.current.push(at(0, 100), at(30 * SEC, 80));

    await h.service.runPriceUpdate();
    await h.service.runPriceUpdate();
    expect(h.messenger.calls.at(-1)?.content).toBe(
      "📉 Drop of -20.00 points over 1 min!\nCurrent value: 80.00",
    );

    await h.service.stop();

    expect(h.tasks.size).toBe(0);
    expect(h.messenger.count("deleteMessage")).toBe(0);
    expect(existsSync(h.statePath)).toBe(true);
  });
});

describe("IndexWatchService chart cycle", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("renders the lookback window with the day summary", async () => {
    const h = await harness({ now: new Date(T0.getTime() + SEC) });
    const series = h.storage.state.series;
    series.append(new Date(T0.getTime() - 2 * HOUR), 100);
    series.append(new Date(T0.getTime() - HOUR), 105);
    series.append(T0, 110);

    await h.service.runChartUpdate();

    expect(h.render).toHaveBeenCalledTimes(1);
    const [points, summary] = h.render.mock.calls[0];
    expect(points.map((p) => p.value)).toEqual([100, 105, 110]);
    expect(summary).toEqual({ open: 100, high: 120, low: 95, close: 110 });
    expect(h.messenger.calls).toEqual([
      {
        method: "createImage",
        destination: "main",
        content: "Range: 06.05 08:00 – 06.05 10:00 (MSK)\nPoints: 3",
      },
    ]);
    expect((await readState(h.statePath)).targets.main.imageHandle).toBe("m101");
  });

  it("renders without the summary when it cannot be fetched", async () => {
    const h = await harness();
    h.storage.state.series.append(T0, 110);
    h.source.summary = new Error("ISS down");

    await h.service.runChartUpdate();

    expect(h.render.mock.calls[0][1]).toBeNull();
    expect(h.messenger.count("createImage")).toBe(1);
  });

  it("falls back to the last two samples when nothing is recent", async () => {
    const h = await harness();
    const series = h.storage.state.series;
    series.append(new Date(T0.getTime() - 5 * HOUR - 20 * MIN), 99);
    series.append(new Date(T0.getTime() - 5 * HOUR - 10 * MIN), 100);
    series.append(new Date(T0.getTime() - 5 * HOUR - 5 * MIN), 101);

    await h.service.runChartUpdate();

    expect(h.render.mock.calls[0][0].map((p) => p.value)).toEqual([100, 101]);
  });

  it("holds the price cycle back while a chart pass is running", async () => {
    const h = await harness();
    h.storage.state.series.append(T0, 110);
    h.source.current.push(at(SEC, 111));
    let release: (png: Uint8Array) => void = () => {};
    h.render.mockImplementationOnce(
      () =>
        new Promise<Uint8Array>((resolve) => {
          release = resolve;
        }),
    );

    const chart = h.service.runChartUpdate();
    await vi.waitFor(() => expect(h.render).toHaveBeenCalledTimes(1));
    const price = h.service.runPriceUpdate();
    for (let i = 0; i < 5; i++) await new Promise((resolve) => setImmediate(resolve));

    expect(h.messenger.calls).toEqual([]);
    expect(h.storage.state.series.size).toBe(1);

    release(new Uint8Array([1]));
    await Promise.all([chart, price]);

    expect(h.messenger.calls.map((c) => c.method)).toEqual(["createImage", "createText"]);
    expect(h.storage.state.series.size).toBe(2);
  });

  it("skips the cycle on empty history", async () => {
    const h = await harness();

    await h.service.runChartUpdate();

    expect(h.render).not.toHaveBeenCalled();
    expect(h.messenger.calls).toEqual([]);
  });

  it("skips delivery when rendering fails", async () => {
    const h = await harness();
    h.storage.state.series.append(T0, 110);
    h.render.mockRejectedValueOnce(new Error("no fonts"));

    await h.service.runChartUpdate();

    expect(h.messenger.calls).toEqual([]);
  });
});

describe("IndexWatchService startup", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("backfills history and places pinned placeholders on a cold start", async () => {
    const h = await harness();
    h.source.candles = [at(-3 * MIN, 100), at(-2 * MIN, 101), at(-MIN, 102)];

    await h.service.initialize();

    expect(h.source.candleCalls).toEqual([
      { start: new Date(T0.getTime() - 5 * HOUR), end: T0, intervalMinutes: 1 },
    ]);
    expect(h.messenger.callsFor("main")).toEqual([
      "createText",
      "pin",
      "createImage",
      "pin",
      "editText",
      "editImage",
    ]);
    expect(h.messenger.calls.map((c) => c.content)).toEqual([
      PLACEHOLDER_TEXT,
      undefined,
      PLACEHOLDER_CAPTION,
      undefined,
      "**IMOEX2**\nCurrent value: **102.00**\nUpdated: 06.05.2024 09:59:00 MSK\n⬆️ Change over 1 min: +1.00",
      "Range: 06.05 09:57 – 06.05 09:59 (MSK)\nPoints: 3",
    ]);

    const saved = await readState(h.statePath);
    expect(saved.history).toHaveLength(3);
    expect(saved.targets).toEqual({ main: { textHandle: "m101", imageHandle: "m102" } });
  });

  it("draws a flat placeholder chart when there is no data at all", async () => {
    const h = await harness();

    await h.service.initialize();

    expect(h.messenger.callsFor("main")).toEqual([
      "createText",
      "pin",
      "createImage",
      "pin",
      "editImage",
    ]);
    const placeholder = h.render.mock.calls[0][0];
    expect(placeholder.map((p) => [p.timestamp.toISOString(), p.value])).toEqual([
      ["2024-05-06T06:55:00.000Z", 0],
      ["2024-05-06T07:00:00.000Z", 0],
    ]);
    expect(h.messenger.calls.at(-1)?.content).toBe(
      "Range: 06.05 09:55 – 06.05 10:00 (MSK)\nPoints: 2",
    );
  });

  it("reuses stored messages on a warm start", async () => {
    const h = await harness({
      state: {
        history: [
          ["2024-05-06T09:58:00+03:00", 100],
          ["2024-05-06T09:59:00+03:00", 101],
        ],
        targets: {
          main: { textHandle: "t1", imageHandle: "i1" },
          gone: { textHandle: "x", imageHandle: null },
        },
      },
    });

    await h.service.initialize();

    expect(h.source.candleCalls).toEqual([]);
    expect(h.messenger.calls.map((c) => [c.method, c.handle])).toEqual([
      ["editText", "t1"],
      ["editImage", "i1"],
      ["editText", "t1"],
      ["editImage", "i1"],
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "[init] stored targets without a configured destination: gone",
    );
  });

  it("starts both cycles and stops them", async () => {
    const h = await harness();

    await h.service.start();
    expect(h.tasks.size).toBe(2);

    await h.service.stop();
    expect(h.tasks.size).toBe(0);
    expect(h.tasks.closed).toBe(true);
  });
});
