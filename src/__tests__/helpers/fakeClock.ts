import type { Clock } from '../../utils/clock';

/**
 * Virtual clock: sleep() advances time instantly, so schedules can be
 * asserted to the millisecond without waiting.
 */
export class FakeClock implements Clock {
  public sleeps: number[] = [];

  constructor(public current: number = Date.UTC(2025, 1, 12, 11, 28, 13)) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += ms;
  }
}
