import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { WriteError } from '../errors/CustomError';
import { DurableLogger } from '../services/DurableLogger';
import { failedReading, okReading } from '../types/telemetry';

const T0 = Date.UTC(2025, 1, 12, 11, 28, 13);
const at = (offsetMs: number) => new Date(T0 + offsetMs);

describe('DurableLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'records-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('appends one line per reading in call order', async () => {
    const file = path.join(dir, 'pressure_log.txt');
    const logger = new DurableLogger(file);

    await logger.append(okReading(at(0), 1.99e-9, 'mbar'));
    await logger.append(failedReading(at(1000), 'timeout'));
    await logger.close();

    expect(await fs.readFile(file, 'utf8')).toBe(
      '2025-02-12 11:28:13.000Z, 1.99e-9 mbar\n' +
        '2025-02-12 11:28:14.000Z, FAILED: timeout\n',
    );
    expect(logger.recordsWritten).toBe(2);
  });

  it('keeps call order for concurrent appends', async () => {
    const file = path.join(dir, 'log.txt');
    const logger = new DurableLogger(file);

    await Promise.all([0, 1, 2, 3, 4].map(i => logger.append(okReading(at(i * 1000), i, 'V'))));

    const lines = (await fs.readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines).toEqual([
      '2025-02-12 11:28:13.000Z, 0 V',
      '2025-02-12 11:28:14.000Z, 1 V',
      '2025-02-12 11:28:15.000Z, 2 V',
      '2025-02-12 11:28:16.000Z, 3 V',
      '2025-02-12 11:28:17.000Z, 4 V',
    ]);
  });

  it('creates missing parent directories', async () => {
    const file = path.join(dir, 'nested', 'deeper', 'log.txt');
    const logger = new DurableLogger(file);
    await logger.append(okReading(at(0), 5, 'mbar'));
    expect(await fs.readFile(file, 'utf8')).toBe('2025-02-12 11:28:13.000Z, 5 mbar\n');
  });

  it('continues an existing store after its last complete record', async () => {
    const file = path.join(dir, 'log.txt');
    await fs.writeFile(file, '2025-02-12 11:28:12.000Z, 4 mbar\n');
    const logger = new DurableLogger(file);
    await logger.append(okReading(at(0), 5, 'mbar'));
    expect(await fs.readFile(file, 'utf8')).toBe(
      '2025-02-12 11:28:12.000Z, 4 mbar\n2025-02-12 11:28:13.000Z, 5 mbar\n',
    );
  });

  it('drops a torn final record before the first append', async () => {
    const file = path.join(dir, 'log.txt');
    await fs.writeFile(file, '2025-02-12 11:28:12.000Z, 4 mbar\n2025-02-12 11:28:1');
    const logger = new DurableLogger(file);
    await logger.append(okReading(at(0), 5, 'mbar'));
    expect(await fs.readFile(file, 'utf8')).toBe(
      '2025-02-12 11:28:12.000Z, 4 mbar\n2025-02-12 11:28:13.000Z, 5 mbar\n',
    );
  });

  it('drops a store that holds only a torn record', async () => {
    const file = path.join(dir, 'log.txt');
    await fs.writeFile(file, '2025-02-12 11:2');
    const logger = new DurableLogger(file);
    await logger.append(okReading(at(0), 5, 'mbar'));
    expect(await fs.readFile(file, 'utf8')).toBe('2025-02-12 11:28:13.000Z, 5 mbar\n');
  });

  it('fails with a sticky WriteError when the path cannot be written', async () => {
    const target = path.join(dir, 'is-a-directory');
    await fs.ensureDir(target);
    const logger = new DurableLogger(target);

    const first = logger.append(okReading(at(0), 1, 'mbar'));
    await expect(first).rejects.toBeInstanceOf(WriteError);
    const error = await first.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(WriteError);
    if (error instanceof WriteError) {
      expect(error.code).toBe('WRITE_FATAL');
      expect(error.errno).toBe('EISDIR');
    }

    await expect(logger.append(okReading(at(1000), 2, 'mbar'))).rejects.toBe(error);
    expect(logger.recordsWritten).toBe(0);
  });

  it('waits for queued appends on close and rejects later ones', async () => {
    const file = path.join(dir, 'log.txt');
    const logger = new DurableLogger(file);
    const pending = logger.append(okReading(at(0), 1, 'mbar'));
    await logger.close();
    await pending;

    expect(logger.recordsWritten).toBe(1);
    await expect(logger.append(okReading(at(1000), 2, 'mbar'))).rejects.toThrow(
      `record store ${file} is closed`,
    );
  });
});
