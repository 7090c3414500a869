import { z } from "zod";

import { DaySummary, MetricSource, Sample } from "../model/history-model";
import { IssCandlesResponse, IssMarketdataResponse } from "../model/moex-model";
import { DataUnavailableError } from "../utils/errors";
import { makeSample } from "../utils/history-store";
import { formatMoscow, parseTimestamp } from "../utils/time";

const BASE_URL = "https://iss.moex.com/iss";
const CANDLE_PAGE_SIZE = 100;

const VALUE_COLUMNS = ["CURRENTVALUE", "LAST", "LASTVALUE", "LASTPRICE", "VALUE"];
const TIME_COLUMNS = ["SYSTIME", "TIME", "UPDATETIME", "DATETIME", "LASTCHANGE"];
const OPEN_COLUMNS = ["OPEN", "OPENVALUE", "OPENVALUE_RUR", "FIRST"];
const HIGH_COLUMNS = ["HIGH", "HIGHVALUE", "HIGHPRICE"];
const LOW_COLUMNS = ["LOW", "LOWVALUE", "LOWPRICE"];

type FetchLike = typeof fetch;

function findColumn(columns: string[], candidates: string[]): number | null {
  for (const name of candidates) {
    const idx = columns.indexOf(name);
    if (idx >= 0) return idx;
  }
  return null;
}

function requireColumn(columns: string[], candidates: string[]): number {
  const idx = findColumn(columns, candidates);
  if (idx == null) {
    throw new DataUnavailableError(
      `Unexpected ISS response: missing columns ${candidates.join(", ")}`,
    );
  }
  return idx;
}

function toNumber(raw: unknown): number | null {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw === "string" && raw.trim() !== "") {
    const num = Number(raw);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

export class MoexClient implements MetricSource {
  constructor(
    private readonly board: string,
    private readonly security: string,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async fetchCurrent(): Promise<Sample> {
    const { columns, row } = await this.fetchMarketRow();
    const valueIdx = requireColumn(columns, VALUE_COLUMNS);
    const timeIdx = findColumn(columns, TIME_COLUMNS);

    const value = toNumber(row[valueIdx]);
    if (value == null) {
      throw new DataUnavailableError(`${columns[valueIdx]} value is missing in ISS response`);
    }

    const rawTime = timeIdx == null ? null : row[timeIdx];
    const timestamp =
      (typeof rawTime === "string" ? parseTimestamp(rawTime) : null) ?? this.now();

    return makeSample(timestamp, value);
  }

  async fetchDaySummary(): Promise<DaySummary> {
    const { columns, row } = await this.fetchMarketRow();
    const closeIdx = requireColumn(columns, VALUE_COLUMNS);
    const close = toNumber(row[closeIdx]);
    if (close == null) {
      throw new DataUnavailableError(`${columns[closeIdx]} value is missing in ISS response`);
    }

    const pick = (candidates: string[]): number => {
      const idx = findColumn(columns, candidates);
      return (idx == null ? null : toNumber(row[idx])) ?? close;
    };

    return {
      open: pick(OPEN_COLUMNS),
      high: pick(HIGH_COLUMNS),
      low: pick(LOW_COLUMNS),
      close,
    };
  }

  async fetchCandles(start: Date, end: Date, intervalMinutes = 1): Promise<Sample[]> {
    const url = new URL(
      `${BASE_URL}/engines/stock/markets/index/securities/${this.security}/candles.json`,
    );
    url.searchParams.set("from", formatMoscow(start, "yyyy-MM-dd HH:mm:ss"));
    url.searchParams.set("till", formatMoscow(end, "yyyy-MM-dd HH:mm:ss"));
    url.searchParams.set("interval", String(intervalMinutes));
    url.searchParams.set("iss.meta", "off");

    const samples: Sample[] = [];
    let offset = 0;
    for (;;) {
      url.searchParams.set("start", String(offset));
      const { candles: table } = await this.getJson(url, IssCandlesResponse);
      if (table.data.length === 0) break;

      const beginIdx = requireColumn(table.columns, ["begin"]);
      const closeIdx = requireColumn(table.columns, ["close"]);
      for (const row of table.data) {
        const begin = row[beginIdx];
        const timestamp = typeof begin === "string" ? parseTimestamp(begin) : null;
        const close = toNumber(row[closeIdx]);
        if (!timestamp || close == null) {
          throw new DataUnavailableError("Unexpected candle row in ISS response");
        }
        samples.push(makeSample(timestamp, close));
      }

      if (table.data.length < CANDLE_PAGE_SIZE) break;
      offset += table.data.length;
    }

    const upper = end.getTime() + intervalMinutes * 60_000;
    return samples
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .filter(
        (s) => s.timestamp.getTime() >= start.getTime() && s.timestamp.getTime() <= upper,
      );
  }

  private async fetchMarketRow(): Promise<{ columns: string[]; row: unknown[] }> {
    const url = new URL(
      `${BASE_URL}/engines/stock/markets/index/boards/${this.board}/securities.json`,
    );
    url.searchParams.set("securities", this.security);
    url.searchParams.set("iss.meta", "off");

    const { marketdata: table } = await this.getJson(url, IssMarketdataResponse);
    if (table.data.length === 0) {
      throw new DataUnavailableError("No market data received from MOEX ISS");
    }

    const secIdx = requireColumn(table.columns, ["SECID"]);
    const row = table.data.find((r) => r[secIdx] === this.security);
    if (!row) {
      throw new DataUnavailableError(`Security ${this.security} not found in response`);
    }
    return { columns: table.columns, row };
  }

  private async getJson<T>(url: URL, schema: z.ZodType<T>): Promise<T> {
    const res = await this.fetchImpl(url.toString(), {
      headers: { accept: "application/json", "user-agent": "index-watch/0.1" },
      signal: AbortSignal.timeout(10_000),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`MOEX ISS error ${res.status}: ${text}`);
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new DataUnavailableError(
        `Unexpected ISS response structure: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return parsed.data;
  }
}
