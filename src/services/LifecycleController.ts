import { EventEmitter } from 'node:events';
import {
  BrowseError,
  ConnectError,
  describeError,
  WriteError,
} from '../errors/CustomError';
import type { DataPointId, Reading, SessionStateChange } from '../types/telemetry';
import type { Clock } from '../utils/clock';
import { DurableLogger } from './DurableLogger';
import { filterCatalog, formatCatalog, NodeCatalogBrowser } from './NodeCatalogBrowser';
import { Poller } from './Poller';
import type { ProtocolClient } from './ProtocolClient';
import { formatRecord } from './RecordCodec';
import type { SessionManager } from './SessionManager';

export const ExitCode = {
  Clean: 0,
  Unexpected: 1,
  ConnectFatal: 2,
  WriteFatal: 3,
  BrowseFailed: 4,
  InvalidConfig: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface LifecycleSettings {
  dataPointId: DataPointId;
  pollIntervalMs: number;
  readTimeoutMs: number;
  maxBrowseDepth: number;
  browseRootId?: DataPointId;
}

export interface LifecycleDeps<H> {
  sessions: SessionManager<H>;
  client: ProtocolClient<H>;
  logger: DurableLogger;
  settings: LifecycleSettings;
  clock?: Clock;
  /** Browse listing sink, console.log by default. */
  print?: (line: string) => void;
}

export interface LifecycleController<H> {
  on(event: 'reading', listener: (reading: Reading) => void): this;
  emit(event: 'reading', reading: Reading): boolean;
}

/**
 * Wires session manager, poller and durable logger into one pipeline and owns
 * the cancellation signal. The signal is aborted at most once, either by
 * requestShutdown() (operator interrupt) or by a fatal error.
 *
 * Shutdown order: no new ticks (an in-flight read completes and is logged),
 * logger drained and closed, session closed.
 */
export class LifecycleController<H> extends EventEmitter {
  private readonly abort = new AbortController();
  private shutdownReason: string | null = null;
  private readonly print: (line: string) => void;

  constructor(private readonly deps: LifecycleDeps<H>) {
    super();
    this.print = deps.print ?? (line => console.log(line));
    deps.sessions.on('state', this.logState);
  }

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  /** Sets the cancellation flag; later calls are ignored. */
  requestShutdown(reason: string): void {
    if (this.abort.signal.aborted) return;
    this.shutdownReason = reason;
    console.log(`[Lifecycle] Shutdown requested: ${reason}`);
    this.abort.abort(reason);
  }

  async run(): Promise<ExitCode> {
    const { sessions, client, logger, settings } = this.deps;
    const signal = this.abort.signal;
    let exitCode: ExitCode = ExitCode.Clean;

    try {
      await sessions.connect(signal);
      if (signal.aborted) return ExitCode.Clean;

      console.log(
        `[Lifecycle] Logging ${settings.dataPointId} every ${settings.pollIntervalMs}ms to ${logger.filePath}`,
      );
      const poller = new Poller(sessions, client, {
        dataPointId: settings.dataPointId,
        intervalMs: settings.pollIntervalMs,
        readTimeoutMs: settings.readTimeoutMs,
        clock: this.deps.clock,
      });

      for await (const reading of poller.run(signal)) {
        await logger.append(reading);
        console.log(`[Logger] ${formatRecord(reading)}`);
        this.emit('reading', reading);
      }
    } catch (err) {
      exitCode = this.classifyFailure(err);
    } finally {
      await this.closeAll();
    }
    if (exitCode === ExitCode.Clean) {
      console.log(
        `[Lifecycle] Stopped (${this.shutdownReason ?? 'done'}), ${logger.recordsWritten} records written`,
      );
    }
    return exitCode;
  }

  /** Connects, prints the flattened catalog (optionally filtered) and disconnects. */
  async browse(filter?: string): Promise<ExitCode> {
    const { sessions, client, settings } = this.deps;
    const signal = this.abort.signal;
    const browser = new NodeCatalogBrowser(sessions, client);
    const show = (entries: Parameters<typeof formatCatalog>[0]) =>
      formatCatalog(filter ? filterCatalog(entries, filter) : entries).forEach(line =>
        this.print(line),
      );

    try {
      await sessions.connect(signal);
      if (signal.aborted) return ExitCode.Clean;
      const { entries } = await browser.browse({
        rootId: settings.browseRootId,
        maxDepth: settings.maxBrowseDepth,
        stepTimeoutMs: settings.readTimeoutMs,
        signal,
      });
      show(entries);
      console.log(`[Browse] ${entries.length} nodes below ${settings.browseRootId ?? client.rootId}`);
      return ExitCode.Clean;
    } catch (err) {
      if (err instanceof BrowseError && signal.aborted) {
        show(err.partial);
        console.log(`[Browse] Interrupted after ${err.partial.length} nodes`);
        return ExitCode.Clean;
      }
      if (err instanceof BrowseError) {
        show(err.partial);
        console.error(
          `[Browse] Browse failed (${err.code}): ${err.message}; listed ${err.partial.length} nodes before the failure`,
        );
        return ExitCode.BrowseFailed;
      }
      return this.classifyFailure(err);
    } finally {
      await sessions.disconnect();
      sessions.off('state', this.logState);
    }
  }

  private classifyFailure(err: unknown): ExitCode {
    if (this.abort.signal.aborted && err instanceof ConnectError && err.kind !== 'fatal') {
      // startup retry loop interrupted by the operator
      return ExitCode.Clean;
    }
    this.requestShutdown(`fatal: ${describeError(err)}`);
    if (err instanceof ConnectError) {
      console.error(`[Lifecycle] Fatal connect error (${err.code}): ${err.message}`);
      return ExitCode.ConnectFatal;
    }
    if (err instanceof WriteError) {
      console.error(
        `[Lifecycle] Fatal write error (${err.errno ?? err.code}): ${err.message}`,
      );
      return ExitCode.WriteFatal;
    }
    console.error('[Lifecycle] Unexpected error:', err);
    return ExitCode.Unexpected;
  }

  private async closeAll(): Promise<void> {
    try {
      await this.deps.logger.close();
    } finally {
      await this.deps.sessions.disconnect();
      this.deps.sessions.off('state', this.logState);
    }
  }

  private readonly logState = (change: SessionStateChange): void => {
    const line = `[Session] ${change.from} -> ${change.to}${change.reason ? ` (${change.reason})` : ''}`;
    if (change.to === 'disconnected' && change.from === 'connected') console.warn(line);
    else console.log(line);
  };
}
