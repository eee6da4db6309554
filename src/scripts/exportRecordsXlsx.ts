/*
 Export a record store (the logger's text file) to a single Excel workbook
 with sheets: Readings, Meta. Handy for sharing a run or charting it elsewhere.
 Usage: ts-node ./src/scripts/exportRecordsXlsx.ts <log file> [out.xlsx]
*/
import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'node:path';
import { describeError } from '../errors/CustomError';
import { readRecordStore } from '../services/RecordStoreReader';

export interface ExportSummary {
  outPath: string;
  okCount: number;
  failedCount: number;
  invalidLines: number[];
  tornTail: boolean;
}

export async function exportRecordsToXlsx(
  logFilePath: string,
  outPath: string = `${logFilePath}.xlsx`,
): Promise<ExportSummary> {
  if (!(await fs.pathExists(logFilePath))) {
    throw new Error(`Record store not found: ${logFilePath}`);
  }
  const { records, invalidLines, tornTail } = await readRecordStore(logFilePath);

  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'Telemetry Record Exporter';
  workbook.created = new Date();

  let okCount = 0;
  let failedCount = 0;

  // Readings sheet
  {
    const ws = workbook.addWorksheet('Readings');
    ws.columns = [
      { header: 'Timestamp (UTC)', key: 'ts', width: 26 },
      { header: 'Value', key: 'value', width: 24 },
      { header: 'Unit', key: 'unit', width: 10 },
      { header: 'Status', key: 'status', width: 10 },
      { header: 'Reason', key: 'reason', width: 40 },
    ];
    for (const r of records) {
      if (r.status.kind === 'ok') {
        okCount++;
        ws.addRow({
          ts: r.timestamp,
          value: Number.isFinite(r.value) ? r.value : String(r.value),
          unit: r.unit,
          status: 'OK',
          reason: '',
        });
      } else {
        failedCount++;
        ws.addRow({
          ts: r.timestamp,
          value: '',
          unit: '',
          status: 'FAILED',
          reason: r.status.reason,
        });
      }
    }
    ws.getColumn('ts').numFmt = 'yyyy-mm-dd hh:mm:ss.000';
  }

  // Meta sheet
  {
    const ws = workbook.addWorksheet('Meta');
    ws.columns = [
      { header: 'Key', key: 'k', width: 24 },
      { header: 'Value', key: 'v', width: 60 },
    ];
    ws.addRow({ k: 'Source', v: path.resolve(logFilePath) });
    ws.addRow({ k: 'OK readings', v: okCount });
    ws.addRow({ k: 'Failed readings', v: failedCount });
    ws.addRow({ k: 'Skipped lines', v: invalidLines.join(', ') });
    ws.addRow({ k: 'Torn final record', v: tornTail ? 'yes' : 'no' });
  }

  await fs.ensureDir(path.dirname(path.resolve(outPath)));
  await workbook.xlsx.writeFile(outPath);
  console.log(`[Export] Saved ${okCount + failedCount} readings to ${outPath}`);
  return { outPath, okCount, failedCount, invalidLines, tornTail };
}

if (require.main === module) {
  const [logFile, out] = process.argv.slice(2);
  if (!logFile) {
    console.error('Usage: exportRecordsXlsx <log file> [out.xlsx]');
    process.exit(1);
  }
  exportRecordsToXlsx(logFile, out).catch(err => {
    console.error('[Export] XLSX export failed:', describeError(err));
    process.exit(1);
  });
}
