import fs from 'fs-extra';
import path from 'node:path';
import { describeError, WriteError } from '../errors/CustomError';
import type { Reading } from '../types/telemetry';
import { formatRecord } from './RecordCodec';

const NEWLINE = 0x0a;
const TAIL_CHUNK = 4096;

const errnoOf = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;

/**
 * Append-only record store writer.
 *
 * Every append opens the file for append (creating it), writes the whole
 * record and its '\n' boundary in one buffer, fsyncs and closes. Appends are
 * queued and run one at a time in call order.
 *
 * The first append also truncates a torn final line left by an earlier crash,
 * so new records never follow a partial one.
 *
 * A failed write is fatal: the WriteError is kept and returned for every
 * later append.
 */
export class DurableLogger {
  private queue: Promise<void> = Promise.resolve();
  private failure: WriteError | null = null;
  private prepared = false;
  private closed = false;
  private written = 0;

  constructor(public readonly filePath: string) {}

  get recordsWritten(): number {
    return this.written;
  }

  append(reading: Reading): Promise<void> {
    if (this.closed) {
      return Promise.reject(new WriteError(`record store ${this.filePath} is closed`));
    }
    const run = this.queue.then(() => this.write(reading));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Waits for queued appends; later appends are rejected. */
  async close(): Promise<void> {
    this.closed = true;
    await this.queue;
  }

  private async write(reading: Reading): Promise<void> {
    if (this.failure) throw this.failure;
    const record = Buffer.from(`${formatRecord(reading)}\n`, 'utf8');
    try {
      if (!this.prepared) {
        await fs.ensureDir(path.dirname(path.resolve(this.filePath)));
        await this.repairTail();
        this.prepared = true;
      }
      const fd = await fs.open(this.filePath, 'a');
      try {
        let offset = 0;
        while (offset < record.length) {
          const { bytesWritten } = await fs.write(fd, record, offset, record.length - offset);
          offset += bytesWritten;
        }
        await fs.fsync(fd);
      } finally {
        await fs.close(fd);
      }
    } catch (err) {
      const errno = errnoOf(err);
      this.failure = new WriteError(
        `cannot append to ${this.filePath}: ${describeError(err)}`,
        errno,
      );
      console.error(`[Logger] ${this.failure.message}`);
      throw this.failure;
    }
    this.written += 1;
  }

  private async repairTail(): Promise<void> {
    if (!(await fs.pathExists(this.filePath))) return;
    const { size } = await fs.stat(this.filePath);
    if (size === 0) return;

    const fd = await fs.open(this.filePath, 'r');
    let keep = -1;
    try {
      const chunk = Buffer.alloc(TAIL_CHUNK);
      await fs.read(fd, chunk, 0, 1, size - 1);
      if (chunk[0] === NEWLINE) return;
      keep = 0;
      let end = size;
      while (end > 0) {
        const start = Math.max(0, end - TAIL_CHUNK);
        const length = end - start;
        await fs.read(fd, chunk, 0, length, start);
        const idx = chunk.subarray(0, length).lastIndexOf(NEWLINE);
        if (idx !== -1) {
          keep = start + idx + 1;
          break;
        }
        end = start;
      }
    } finally {
      await fs.close(fd);
    }

    if (keep >= 0) {
      await fs.truncate(this.filePath, keep);
      console.warn(
        `[Logger] Dropped ${size - keep} bytes of a partial record at the end of ${this.filePath}`,
      );
    }
  }
}
