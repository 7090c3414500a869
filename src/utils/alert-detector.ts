import { Mutex } from "async-mutex";

import { AlertPayload } from "../model/alert-model";
import { Sample } from "../model/history-model";

export type AlertDetectorOptions = {
  windowMs: number;
  threshold: number;
};

/**
 * Compares each new sample with the oldest one still inside the window.
 * A fired alert empties the window, so the same move cannot fire twice.
 */
export class AlertDetector {
  private window: Sample[] = [];
  private readonly lock = new Mutex();

  constructor(private readonly opts: AlertDetectorOptions) {}

  get windowSize(): number {
    return this.window.length;
  }

  evaluate(sample: Sample): AlertPayload | null {
    this.window.push(sample);

    const cutoff = sample.timestamp.getTime() - this.opts.windowMs;
    let drop = 0;
    while (drop < this.window.length && this.window[drop].timestamp.getTime() < cutoff) {
      drop++;
    }
    if (drop > 0) this.window.splice(0, drop);

    const oldest = this.window[0];
    if (!oldest) return null;

    const diff = sample.value - oldest.value;
    if (Math.abs(diff) < this.opts.threshold) return null;

    this.window = [];
    return {
      direction: diff > 0 ? "up" : "down",
      diff,
      value: sample.value,
      timestamp: sample.timestamp,
      windowStart: oldest.timestamp,
    };
  }

  evaluateExclusive(sample: Sample): Promise<AlertPayload | null> {
    return this.lock.runExclusive(() => this.evaluate(sample));
  }
}
