import { EventEmitter } from 'node:events';
import { ConnectError, describeError } from '../errors/CustomError';
import type {
  Endpoint,
  Session,
  SessionState,
  SessionStateChange,
} from '../types/telemetry';
import { Clock, systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import type { ProtocolClient } from './ProtocolClient';

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
}

export interface SessionManagerOptions {
  connectTimeoutMs: number;
  backoff?: BackoffPolicy;
  clock?: Clock;
  /** [0, 1) source for jitter */
  random?: () => number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 1000, capMs: 30000 };

/**
 * Full-jitter exponential backoff: uniform in [0, min(cap, base * 2^attempt)).
 * `attempt` is zero-based (0 for the delay after the first failure).
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(policy.capMs, policy.baseMs * 2 ** Math.min(attempt, 30));
  return Math.floor(random() * ceiling);
}

export interface SessionManager<H> {
  on(event: 'state', listener: (change: SessionStateChange) => void): this;
  off(event: 'state', listener: (change: SessionStateChange) => void): this;
  emit(event: 'state', change: SessionStateChange): boolean;
}

/**
 * Owns the single connection to one endpoint.
 *
 * - connect(): startup path, retries transient failures with backoff until it
 *   succeeds, hits a fatal error or the signal aborts.
 * - ensureConnected(): polling path, at most one attempt per call and only once
 *   the backoff window of the previous failure has passed.
 * - borrow(): serialised access to the handle for one operation.
 *
 * Holds no business data; state transitions are emitted as 'state' events.
 */
export class SessionManager<H> extends EventEmitter {
  private current: Session<H> | null = null;
  private _state: SessionState = 'disconnected';
  private pendingConnect: Promise<Session<H>> | null = null;
  private consecutiveFailures = 0;
  private nextAttemptAt = 0;
  private sessionSeq = 0;
  private lock: Promise<unknown> = Promise.resolve();
  private readonly pendingCloses = new Set<Promise<void>>();

  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly backoff: BackoffPolicy;

  constructor(
    private readonly client: ProtocolClient<H>,
    public readonly endpoint: Endpoint,
    private readonly options: SessionManagerOptions,
  ) {
    super();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
  }

  get state(): SessionState {
    return this._state;
  }

  get session(): Session<H> | null {
    return this.current;
  }

  /** Number of failed connect attempts since the last successful one. */
  get failures(): number {
    return this.consecutiveFailures;
  }

  async connect(signal?: AbortSignal): Promise<Session<H>> {
    for (;;) {
      if (signal?.aborted) {
        throw new ConnectError('connect cancelled');
      }
      const live = this.liveSession();
      if (live) return live;
      try {
        return await this.attempt();
      } catch (err) {
        if (err instanceof ConnectError && err.kind === 'fatal') throw err;
        const delay = Math.max(0, this.nextAttemptAt - this.clock.now());
        console.warn(
          `[Session] Connect attempt ${this.consecutiveFailures} to ${this.endpoint.address} failed (${describeError(err)}) - retry in ${delay}ms`,
        );
        await this.clock.sleep(delay, signal);
      }
    }
  }

  async ensureConnected(): Promise<Session<H>> {
    const live = this.liveSession();
    if (live) return live;
    if (this.pendingConnect) return this.pendingConnect;
    const wait = this.nextAttemptAt - this.clock.now();
    if (wait > 0) {
      throw new ConnectError(`reconnect backoff (next attempt in ${wait}ms)`);
    }
    return this.attempt();
  }

  /**
   * Runs `fn` against the ensured session. Calls are queued so no two
   * operations ever share the session concurrently.
   */
  borrow<T>(fn: (handle: H, session: Session<H>) => Promise<T>): Promise<T> {
    const run = this.lock.then(async () => {
      const session = await this.ensureConnected();
      return fn(session.handle, session);
    });
    this.lock = run.catch(() => undefined);
    return run;
  }

  /** Drops the current session so the next ensureConnected() reconnects. */
  invalidate(reason: string): void {
    const session = this.current;
    if (!session) return;
    this.current = null;
    this.transition('disconnected', reason);
    this.closeInBackground(session.handle);
  }

  /** Closes the current session and waits for every close still running in the background. */
  async disconnect(): Promise<void> {
    if (this.pendingConnect) {
      // let an in-flight attempt settle so its handle is not leaked
      await this.pendingConnect.catch(() => undefined);
    }
    const session = this.current;
    if (session) {
      this.current = null;
      this.transition('closing', 'disconnect');
      await this.closeQuietly(session.handle);
    }
    await Promise.all(this.pendingCloses);
    if (this._state !== 'disconnected') this.transition('disconnected', 'disconnect');
  }

  private liveSession(): Session<H> | null {
    const session = this.current;
    if (!session) return null;
    if (this.client.isAlive && !this.client.isAlive(session.handle)) {
      this.invalidate('connection lost');
      return null;
    }
    return session;
  }

  private attempt(): Promise<Session<H>> {
    if (!this.pendingConnect) {
      this.pendingConnect = this.doAttempt().finally(() => {
        this.pendingConnect = null;
      });
    }
    return this.pendingConnect;
  }

  private async doAttempt(): Promise<Session<H>> {
    this.transition('connecting');
    const pending = this.client.connect(this.endpoint);
    let timedOut = false;
    let handle: H;
    try {
      handle = await withTimeout(pending, this.options.connectTimeoutMs, () => {
        timedOut = true;
        return new ConnectError('timeout');
      });
    } catch (err) {
      const error =
        err instanceof ConnectError ? err : new ConnectError(describeError(err));
      if (timedOut) {
        // the connect may still complete later; do not leak that handle
        void pending.then(
          late => this.closeInBackground(late),
          () => undefined,
        );
      }
      this.consecutiveFailures += 1;
      this.nextAttemptAt =
        this.clock.now() +
        computeBackoffDelay(this.consecutiveFailures - 1, this.backoff, this.random);
      this.transition('disconnected', error.message);
      throw error;
    }

    this.consecutiveFailures = 0;
    this.nextAttemptAt = 0;
    this.sessionSeq += 1;
    const session: Session<H> = Object.freeze({
      id: this.sessionSeq,
      endpoint: this.endpoint,
      handle,
      connectedAt: new Date(this.clock.now()),
    });
    this.current = session;
    this.transition('connected');
    return session;
  }

  private closeInBackground(handle: H): void {
    const closing = this.closeQuietly(handle).finally(() => {
      this.pendingCloses.delete(closing);
    });
    this.pendingCloses.add(closing);
  }

  private async closeQuietly(handle: H): Promise<void> {
    try {
      await withTimeout(
        this.client.close(handle),
        this.options.connectTimeoutMs,
        () => new ConnectError('close timeout'),
      );
    } catch (err) {
      console.warn(`[Session] Close failed: ${describeError(err)}`);
    }
  }

  private transition(to: SessionState, reason?: string): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    this.emit('state', reason === undefined ? { from, to } : { from, to, reason });
  }
}
