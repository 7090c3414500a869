import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import {
  DESTINATION_ID,
  OutputTarget,
  SerializedState,
  SINGLE_DESTINATION_ID,
} from "../model/state-model";
import { describeError } from "./errors";
import { HistoryStore } from "./history-store";
import { parseTimestamp, toCanonicalIso } from "./time";

const NumericValue = z.union([
  z.number(),
  z
    .string()
    .trim()
    .min(1)
    .transform((s) => Number(s)),
]);

const HistoryEntry = z.tuple([z.string(), NumericValue]);

const Handle = z
  .union([z.string().min(1), z.number().int()])
  .transform((v) => String(v));

const OptionalHandle = Handle.nullish().catch(null);

const TargetEntry = z.object({
  textHandle: OptionalHandle,
  imageHandle: OptionalHandle,
  price_message_id: OptionalHandle,
  chart_message_id: OptionalHandle,
});

const StateFile = z.object({
  history: z.array(z.unknown()).catch([]),
  targets: z.record(z.unknown()).optional().catch(undefined),
  chats: z.record(z.unknown()).optional().catch(undefined),
  textHandle: z.unknown(),
  imageHandle: z.unknown(),
});

export class PersistedState {
  readonly series = new HistoryStore();
  readonly targets = new Map<string, OutputTarget>();

  ensureTarget(destinationId: string): OutputTarget {
    let target = this.targets.get(destinationId);
    if (!target) {
      target = { textHandle: null, imageHandle: null };
      this.targets.set(destinationId, target);
    }
    return target;
  }
}

function readHandles(raw: unknown): OutputTarget | null {
  const parsed = TargetEntry.safeParse(raw);
  if (!parsed.success) return null;
  const entry = parsed.data;
  return {
    textHandle: entry.textHandle ?? entry.price_message_id ?? null,
    imageHandle: entry.imageHandle ?? entry.chart_message_id ?? null,
  };
}

/**
 * Builds a state from whatever JSON was on disk. Bad entries are dropped one by one.
 */
export function parseState(raw: unknown): PersistedState {
  const state = new PersistedState();
  const file = StateFile.safeParse(raw);
  if (!file.success) return state;
  const record = file.data;

  const entries: Array<{ timestamp: Date; value: number }> = [];
  for (const item of record.history) {
    const parsed = HistoryEntry.safeParse(item);
    if (!parsed.success) continue;
    const [ts, value] = parsed.data;
    const timestamp = parseTimestamp(ts);
    if (!timestamp || !Number.isFinite(value)) continue;
    entries.push({ timestamp, value });
  }
  entries
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
    .forEach((e) => state.series.append(e.timestamp, e.value));

  const mapping = record.targets ?? record.chats;
  if (mapping) {
    for (const [key, payload] of Object.entries(mapping)) {
      if (!DESTINATION_ID.test(key)) continue;
      const target = readHandles(payload);
      if (target) state.targets.set(key, target);
    }
  } else if (record.textHandle !== undefined || record.imageHandle !== undefined) {
    const target = readHandles({
      textHandle: record.textHandle,
      imageHandle: record.imageHandle,
    });
    if (target) state.targets.set(SINGLE_DESTINATION_ID, target);
  }

  return state;
}

export function serializeState(state: PersistedState): SerializedState {
  const targets: Record<string, OutputTarget> = {};
  for (const [id, target] of state.targets) {
    targets[id] = {
      textHandle: target.textHandle,
      imageHandle: target.imageHandle,
    };
  }
  return {
    history: state.series
      .points()
      .map((s): [string, number] => [toCanonicalIso(s.timestamp), s.value]),
    targets,
  };
}

export class StateStorage {
  private current = new PersistedState();

  constructor(private readonly filePath: string) {}

  get state(): PersistedState {
    return this.current;
  }

  async load(): Promise<PersistedState> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        console.info(`[state] no state file at ${this.filePath}, starting empty`);
      } else {
        console.warn(`[state] cannot read ${this.filePath}, starting empty`, err);
      }
      this.current = new PersistedState();
      return this.current;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      console.warn(`[state] malformed state file ${this.filePath}: ${describeError(err)}`);
      raw = {};
    }

    this.current = parseState(raw);
    console.info(
      `[state] loaded ${this.current.series.size} points, ${this.current.targets.size} targets`,
    );
    return this.current;
  }

  async save(): Promise<boolean> {
    const payload = JSON.stringify(serializeState(this.current), null, 2);
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, payload, "utf-8");
      await rename(tmpPath, this.filePath);
      return true;
    } catch (err) {
      console.error(`[state] failed to save ${this.filePath}`, err);
      return false;
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
