import { BehaviorSubject, Observable, firstValueFrom, merge, timer } from "rxjs";
import { filter, map, take } from "rxjs/operators";

/**
 * Shared cooperative cancellation token for the long-running workers.
 * Stopping is terminal.
 */
export class StopSignal {
  private readonly stopped$ = new BehaviorSubject<boolean>(false);

  get isStopped(): boolean {
    return this.stopped$.value;
  }

  stop(): void {
    if (!this.stopped$.value) {
      this.stopped$.next(true);
    }
  }

  /**
   * Emits once, when stop() is called (immediately if it already was)
   */
  onStop(): Observable<void> {
    return this.stopped$.pipe(
      filter((stopped) => stopped),
      take(1),
      map(() => undefined)
    );
  }

  /**
   * Waits for the given time unless a stop arrives first.
   * Resolves true when the full interval elapsed, false when interrupted.
   */
  sleep(ms: number): Promise<boolean> {
    if (this.isStopped) {
      return Promise.resolve(false);
    }

    return firstValueFrom(
      merge(
        timer(ms).pipe(map(() => true)),
        this.onStop().pipe(map(() => false))
      )
    );
  }
}
