import { CancelledError, InvariantError } from "./errors";

export type Job = (signal: AbortSignal) => Promise<void>;

export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function crash(err: InvariantError): void {
  // thrown outside the promise chain so the process dies loudly
  setImmediate(() => {
    throw err;
  });
}

/**
 * Owns background jobs. `close()` cancels every child and waits for it;
 * a failing child is logged and dropped, the group keeps running.
 */
export class TaskGroup {
  private readonly controller = new AbortController();
  private readonly tasks = new Map<string, Promise<void>>();
  private seq = 0;

  constructor(private readonly onFatal: (err: InvariantError) => void = crash) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get size(): number {
    return this.tasks.size;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Runs `job`, then waits `intervalMs`, forever (fixed delay between runs). */
  spawnRepeating(
    name: string,
    job: Job,
    intervalMs: number,
    opts?: { initialDelayMs?: number },
  ): void {
    this.spawn(name, async (signal) => {
      if (opts?.initialDelayMs) await sleep(opts.initialDelayMs, signal);
      while (!signal.aborted) {
        try {
          await job(signal);
        } catch (err) {
          if (err instanceof CancelledError || err instanceof InvariantError) throw err;
          console.error(`[task] ${name} tick failed`, err);
        }
        await sleep(intervalMs, signal);
      }
    });
  }

  spawnDelayed(name: string, job: Job, delayMs: number): void {
    this.spawn(name, async (signal) => {
      await sleep(delayMs, signal);
      await job(signal);
    });
  }

  async close(): Promise<void> {
    this.controller.abort();
    await Promise.all(this.tasks.values());
  }

  private spawn(name: string, body: Job): void {
    if (this.closed) {
      console.warn(`[task] group closed, not starting ${name}`);
      return;
    }
    const key = `${name}#${++this.seq}`;
    const task = body(this.signal)
      .catch((err: unknown) => {
        if (err instanceof CancelledError) return;
        if (err instanceof InvariantError) {
          console.error(`[task] ${name} broke an invariant, aborting`, err);
          this.controller.abort();
          this.onFatal(err);
          return;
        }
        console.error(`[task] ${name} failed`, err);
      })
      .finally(() => {
        this.tasks.delete(key);
      });
    this.tasks.set(key, task);
  }
}
