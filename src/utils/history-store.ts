import { Sample } from "../model/history-model";
import { InvariantError } from "./errors";

export function makeSample(timestamp: Date, value: number): Sample {
  const ms = timestamp.getTime();
  if (!Number.isFinite(ms)) {
    throw new InvariantError("sample timestamp is not a valid date");
  }
  if (!Number.isFinite(value)) {
    throw new InvariantError(`sample value must be finite, got ${value}`);
  }
  return Object.freeze({ timestamp: new Date(ms), value });
}

/**
 * Time-ordered samples, one per instant. Only `prune` removes entries.
 */
export class HistoryStore {
  private samples: Sample[] = [];

  get size(): number {
    return this.samples.length;
  }

  append(timestamp: Date, value: number): Sample {
    const sample = makeSample(timestamp, value);
    const last = this.samples.at(-1);

    if (last && last.timestamp.getTime() === sample.timestamp.getTime()) {
      this.samples[this.samples.length - 1] = sample;
      return sample;
    }
    if (last && last.timestamp.getTime() > sample.timestamp.getTime()) {
      // out-of-order arrival: keep the series sorted
      const idx = this.samples.findIndex(
        (s) => s.timestamp.getTime() >= sample.timestamp.getTime(),
      );
      if (this.samples[idx].timestamp.getTime() === sample.timestamp.getTime()) {
        this.samples[idx] = sample;
      } else {
        this.samples.splice(idx, 0, sample);
      }
      return sample;
    }

    this.samples.push(sample);
    return sample;
  }

  prune(maxAgeMs: number, now: Date = new Date()): number {
    const cutoff = now.getTime() - maxAgeMs;
    let drop = 0;
    while (
      drop < this.samples.length &&
      this.samples[drop].timestamp.getTime() < cutoff
    ) {
      drop++;
    }
    if (drop > 0) this.samples.splice(0, drop);
    return drop;
  }

  lastPoint(): Sample | null {
    return this.samples.at(-1) ?? null;
  }

  *pointsSince(cutoff: Date): Generator<Sample> {
    const cutoffMs = cutoff.getTime();
    for (const sample of this.samples) {
      if (sample.timestamp.getTime() >= cutoffMs) yield sample;
    }
  }

  /** Newest sample not later than `instant`. */
  latestAtOrBefore(instant: Date): Sample | null {
    const ms = instant.getTime();
    for (let i = this.samples.length - 1; i >= 0; i--) {
      if (this.samples[i].timestamp.getTime() <= ms) return this.samples[i];
    }
    return null;
  }

  points(): Sample[] {
    return [...this.samples];
  }

  tail(count: number): Sample[] {
    if (count <= 0) return [];
    return this.samples.slice(-count);
  }
}
