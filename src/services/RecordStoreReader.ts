import fs from 'fs-extra';
import type { Reading } from '../types/telemetry';
import { parseRecord } from './RecordCodec';

export interface RecordStoreContents {
  records: Reading[];
  /** 1-based line numbers that did not parse */
  invalidLines: number[];
  /** true when the file ends inside a record (no final '\n') */
  tornTail: boolean;
}

/**
 * Reads a record store back. A final line without '\n' is a torn record and is
 * reported via `tornTail` instead of being parsed.
 */
export async function readRecordStore(filePath: string): Promise<RecordStoreContents> {
  const text = await fs.readFile(filePath, 'utf8');
  const lines = text.split('\n');
  const last = lines.pop() ?? '';
  const tornTail = last.length > 0;

  const records: Reading[] = [];
  const invalidLines: number[] = [];
  lines.forEach((line, i) => {
    if (line.trim() === '') return;
    const reading = parseRecord(line);
    if (reading) records.push(reading);
    else invalidLines.push(i + 1);
  });
  return { records, invalidLines, tornTail };
}
