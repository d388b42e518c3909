/**
 * RunScheduler - serializes validation runs for watch mode.
 *
 * Triggers are debounced. A trigger that lands while a run is in flight bumps
 * the generation counter; the in-flight result is then discarded and the run
 * starts again, so only a run that saw no newer trigger is delivered.
 *
 * Usage:
 *   const scheduler = new RunScheduler({
 *     run: () => runCheck(request),
 *     onResult: (result) => render(result),
 *     onError: (err) => console.error(err),
 *   });
 *   watcher.on("change", () => scheduler.trigger());
 */

export const DEFAULT_DEBOUNCE_MS = 150;

export interface RunSchedulerOptions<T> {
  run: () => Promise<T>;
  onResult: (result: T) => void;
  onError: (err: unknown) => void;
  debounceMs?: number;
}

export class RunScheduler<T> {
  private generation = 0;
  private settledGeneration = -1;
  private inFlight: Promise<void> | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;
  private readonly debounceMs: number;

  constructor(private readonly options: RunSchedulerOptions<T>) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  /** Number of runs whose result was thrown away because a newer trigger arrived. */
  discarded = 0;

  get running(): boolean {
    return this.inFlight !== null;
  }

  trigger(): void {
    if (this.stopped) return;
    this.generation++;
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.start();
    }, this.debounceMs);
  }

  // run immediately, skipping the debounce (initial pass)
  runNow(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    this.generation++;
    this.start();
    return this.idle();
  }

  /** Resolves once no run is in flight and no trigger is pending. */
  async idle(): Promise<void> {
    while (this.inFlight) await this.inFlight;
  }

  stop(): void {
    this.stopped = true;
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = null;
  }

  private start(): void {
    // an in-flight run notices the newer generation when it finishes
    if (this.inFlight || this.stopped) return;
    if (this.generation === this.settledGeneration) return;
    this.inFlight = this.loop().finally(() => {
      this.inFlight = null;
    });
  }

  private async loop(): Promise<void> {
    while (!this.stopped) {
      const seen = this.generation;
      let outcome: { ok: true; value: T } | { ok: false; error: unknown };
      try {
        outcome = { ok: true, value: await this.options.run() };
      } catch (error) {
        outcome = { ok: false, error };
      }

      if (this.stopped) return;
      if (seen !== this.generation) {
        this.discarded++;
        continue;
      }

      this.settledGeneration = seen;
      if (outcome.ok) this.options.onResult(outcome.value);
      else this.options.onError(outcome.error);
      return;
    }
  }
}
