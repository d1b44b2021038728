import { existsSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { DESIRED_COLUMNS, RAW_ID_COLUMNS } from '../config/static-config.js';
import type { AwardSink, ClassifiedAward } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

const RAW_IDS: readonly string[] = RAW_ID_COLUMNS;

export const AWARD_SHEET_COLUMNS: string[] = [
  ...DESIRED_COLUMNS.filter(column => !RAW_IDS.includes(column)),
  'piid_or_fain',
];

export function buildAwardsWorkbook(records: readonly ClassifiedAward[], lastUpdated: Date): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const awardsSheet = XLSX.utils.json_to_sheet([...records], { header: AWARD_SHEET_COLUMNS });
  XLSX.utils.book_append_sheet(workbook, awardsSheet, 'Awards');

  const metadataSheet = XLSX.utils.aoa_to_sheet([
    ['Last Updated', lastUpdated.toISOString()],
    ['Record Count', records.length],
  ]);
  XLSX.utils.book_append_sheet(workbook, metadataSheet, 'Metadata');

  return workbook;
}

export function writeAwardsWorkbook(records: readonly ClassifiedAward[], lastUpdated: Date): Buffer {
  const workbook = buildAwardsWorkbook(records, lastUpdated);
  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return output;
}

/**
 * Writes the filtered awards to an .xlsx file, replacing the previous one.
 */
export class XlsxWorkbookSink implements AwardSink {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async publish(records: ClassifiedAward[], lastUpdated: Date): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

    writeFileSync(this.filePath, writeAwardsWorkbook(records, lastUpdated));
    this.logger.info(`Wrote ${records.length} awards to ${this.filePath}`, {
      lastUpdated: lastUpdated.toISOString(),
    });
  }
}
