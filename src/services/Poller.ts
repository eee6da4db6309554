import {
  ConnectError,
  CustomError,
  describeError,
  ReadError,
} from '../errors/CustomError';
import { DataPointId, failedReading, okReading, Reading } from '../types/telemetry';
import { Clock, systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import type { ProtocolClient } from './ProtocolClient';
import type { SessionManager } from './SessionManager';

export interface PollerOptions {
  dataPointId: DataPointId;
  intervalMs: number;
  readTimeoutMs: number;
  clock?: Clock;
}

/**
 * Fixed-interval read loop for one data point.
 *
 * Ticks sit on the grid `origin + k * intervalMs`, so fast reads never make the
 * schedule drift. A read that overruns the next slot makes the next tick fire
 * immediately on the latest passed slot; missed slots are not replayed.
 *
 * Every tick yields exactly one Reading. Failed reads become FAILED readings and
 * the loop carries on; only a fatal ConnectError ends it with an error.
 * A Poller runs once; restart by constructing a new one.
 */
export class Poller<H> {
  private started = false;
  private readonly clock: Clock;

  constructor(
    private readonly sessions: SessionManager<H>,
    private readonly client: ProtocolClient<H>,
    private readonly options: PollerOptions,
  ) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be > 0 (got ${options.intervalMs})`);
    }
    this.clock = options.clock ?? systemClock;
  }

  async *run(signal: AbortSignal): AsyncGenerator<Reading, void, undefined> {
    if (this.started) {
      throw new Error('Poller already started; construct a new Poller to restart');
    }
    this.started = true;

    const { intervalMs } = this.options;
    const origin = this.clock.now();
    let tick = 0;

    while (!signal.aborted) {
      // an in-flight read always completes and is handed over
      yield await this.readOnce(new Date(this.clock.now()));
      if (signal.aborted) break;

      const now = this.clock.now();
      const nextDue = origin + (tick + 1) * intervalMs;
      if (now < nextDue) {
        await this.clock.sleep(nextDue - now, signal);
        tick += 1;
      } else {
        tick = Math.floor((now - origin) / intervalMs);
      }
    }
  }

  private async readOnce(timestamp: Date): Promise<Reading> {
    const { dataPointId, readTimeoutMs } = this.options;
    try {
      const { value, unit } = await this.sessions.borrow(handle =>
        withTimeout(
          this.client.readValue(handle, dataPointId),
          readTimeoutMs,
          () => new ReadError('timeout'),
        ),
      );
      return okReading(timestamp, value, unit);
    } catch (err) {
      if (err instanceof ConnectError && err.kind === 'fatal') throw err;

      const transientRead =
        (err instanceof ReadError && err.kind === 'transient') ||
        !(err instanceof CustomError);
      if (transientRead) {
        this.sessions.invalidate(`read failed: ${describeError(err)}`);
      }
      const reason = describeError(err);
      console.warn(`[Poller] Read of ${dataPointId} failed: ${reason}`);
      return failedReading(timestamp, reason);
    }
  }
}
