/** Longest delay a single timer accepts; longer ones fire at once. */
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Stop signal for a single run. The controller creates one per run and hands
 * it to the engine, so a finished run's signal never leaks into the next one.
 */
export class RunSignal {
  private controller = new AbortController();

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  stop(): void {
    this.controller.abort();
  }

  /** Wait `seconds`, returning early as soon as the signal is stopped. */
  sleep(seconds: number): Promise<void> {
    const signal = this.controller.signal;
    const deadline = Date.now() + Math.max(0, seconds * 1000);
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      let timer: ReturnType<typeof setTimeout> | undefined;
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const wait = () => {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          done();
          return;
        }
        timer = setTimeout(wait, Math.min(remaining, MAX_TIMER_MS));
      };
      signal.addEventListener('abort', done, { once: true });
      wait();
    });
  }
}
