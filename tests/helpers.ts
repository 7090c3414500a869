import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { Destination, Settings } from "../src/model/config-env";
import { Messenger, PinResult, RemoteResult } from "../src/model/delivery-model";
import { DaySummary, MetricSource, Sample } from "../src/model/history-model";
import { DataUnavailableError } from "../src/utils/errors";
import { makeSample } from "../src/utils/history-store";

export const T0 = new Date("2024-05-06T07:00:00Z"); // 10:00 MSK

export function at(offsetMs: number, value: number): Sample {
  return makeSample(new Date(T0.getTime() + offsetMs), value);
}

export const SEC = 1000;
export const MIN = 60 * SEC;
export const HOUR = 60 * MIN;

export const MAIN: Destination = { id: "main", webhookUrl: "https://discord.test/api/webhooks/1/aaa" };
export const OPS: Destination = { id: "ops", webhookUrl: "https://discord.test/api/webhooks/2/bbb" };

export function makeSettings(overrides?: Partial<Settings>): Settings {
  return {
    destinations: [MAIN],
    board: "SNDX",
    security: "IMOEX2",
    indexName: "IMOEX2",
    statePath: "unused.json",
    priceUpdateIntervalMs: SEC,
    chartUpdateIntervalMs: 5 * MIN,
    alertThreshold: 15,
    alertWindowMs: MIN,
    alertRetentionMs: HOUR,
    historyRetentionMs: 6 * HOUR,
    chartLookbackMs: 5 * HOUR,
    port: 8787,
    ...overrides,
  };
}

export async function tempStatePath(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "index-watch-"));
  return path.join(dir, "state.json");
}

export type MessengerCall = {
  method: keyof Messenger;
  destination: string;
  handle?: string;
  content?: string;
};

/** In-memory stand-in for a messaging channel. Handles are "m101", "m102", ... */
export class FakeMessenger implements Messenger {
  readonly calls: MessengerCall[] = [];
  readonly missing = new Set<string>();
  readonly failingDestinations = new Set<string>();
  transientEdits = false;
  failCreates = false;
  private seq = 100;

  callsFor(destinationId: string): Array<keyof Messenger> {
    return this.calls.filter((c) => c.destination === destinationId).map((c) => c.method);
  }

  count(method: keyof Messenger): number {
    return this.calls.filter((c) => c.method === method).length;
  }

  async createText(destination: Destination, content: string): Promise<RemoteResult<string>> {
    this.calls.push({ method: "createText", destination: destination.id, content });
    return this.created(destination);
  }

  async editText(
    destination: Destination,
    handle: string,
    content: string,
  ): Promise<RemoteResult<void>> {
    this.calls.push({ method: "editText", destination: destination.id, handle, content });
    return this.edited(destination, handle);
  }

  async createImage(
    destination: Destination,
    _image: Uint8Array,
    caption: string,
  ): Promise<RemoteResult<string>> {
    this.calls.push({ method: "createImage", destination: destination.id, content: caption });
    return this.created(destination);
  }

  async editImage(
    destination: Destination,
    handle: string,
    _image: Uint8Array,
    caption: string,
  ): Promise<RemoteResult<void>> {
    this.calls.push({ method: "editImage", destination: destination.id, handle, content: caption });
    return this.edited(destination, handle);
  }

  async deleteMessage(destination: Destination, handle: string): Promise<RemoteResult<void>> {
    this.calls.push({ method: "deleteMessage", destination: destination.id, handle });
    if (this.missing.has(handle)) return { kind: "notFound", detail: "404" };
    this.missing.add(handle);
    return { kind: "ok", value: undefined };
  }

  async pin(destination: Destination, handle: string): Promise<RemoteResult<PinResult>> {
    this.calls.push({ method: "pin", destination: destination.id, handle });
    return { kind: "ok", value: "pinned" };
  }

  private created(destination: Destination): RemoteResult<string> {
    if (this.failingDestinations.has(destination.id) || this.failCreates) {
      return { kind: "transientError", detail: "network down" };
    }
    this.seq += 1;
    return { kind: "ok", value: `m${this.seq}` };
  }

  private edited(destination: Destination, handle: string): RemoteResult<void> {
    if (this.failingDestinations.has(destination.id) || this.transientEdits) {
      return { kind: "transientError", detail: "network down" };
    }
    if (this.missing.has(handle)) return { kind: "notFound", detail: "404 Unknown Message" };
    return { kind: "ok", value: undefined };
  }
}

export class FakeSource implements MetricSource {
  current: Array<Sample | Error> = [];
  candles: Sample[] | Error = [];
  summary: DaySummary | Error = { open: 100, high: 120, low: 95, close: 110 };
  readonly candleCalls: Array<{ start: Date; end: Date; intervalMinutes: number }> = [];

  async fetchCurrent(): Promise<Sample> {
    const next = this.current.shift();
    if (!next) throw new DataUnavailableError("no sample queued");
    if (next instanceof Error) throw next;
    return next;
  }

  async fetchDaySummary(): Promise<DaySummary> {
    if (this.summary instanceof Error) throw this.summary;
    return this.summary;
  }

  async fetchCandles(start: Date, end: Date, intervalMinutes: number): Promise<Sample[]> {
    this.candleCalls.push({ start, end, intervalMinutes });
    if (this.candles instanceof Error) throw this.candles;
    return this.candles;
  }
}
