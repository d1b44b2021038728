/**
 * Download a finished award export and read its first CSV entry
 */

import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import type { AwardRow } from '../types/index.js';
import { ensureOk } from './http.js';
import type { HttpDeps } from './http.js';

const TABULAR_SUFFIX = '.csv';

function toCell(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Parse CSV text into rows keyed by header.
 * Values are kept as text; empty cells come back as ''.
 */
export function parseCsv(csvContent: string): AwardRow[] {
  if (!csvContent.trim()) return [];

  const workbook = XLSX.read(csvContent, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
  return rows.map(row => {
    const record: AwardRow = {};
    for (const [key, value] of Object.entries(row)) {
      record[key] = toCell(value);
    }
    return record;
  });
}

/**
 * Read the first entry, in archive order, whose name ends in .csv.
 * Returns null when the archive holds no CSV entry.
 */
export async function extractFirstCsv(archive: ArrayBuffer | Uint8Array): Promise<AwardRow[] | null> {
  const zip = await JSZip.loadAsync(archive);

  const entry = Object.values(zip.files).find(file =>
    !file.dir && file.name.toLowerCase().endsWith(TABULAR_SUFFIX)
  );
  if (!entry) return null;

  const csvContent = await entry.async('string');
  return parseCsv(csvContent);
}

export async function fetchAndExtract(url: string, deps: HttpDeps, signal?: AbortSignal): Promise<AwardRow[]> {
  const response = await deps.fetch(url, { method: 'GET', headers: { ...deps.headers }, signal });
  await ensureOk(response, 'GET', url);

  const archive = await response.arrayBuffer();
  deps.logger.info(`Downloaded archive (${archive.byteLength} bytes)`, { url });

  const rows = await extractFirstCsv(archive);
  if (rows === null) {
    deps.logger.warn('No CSV file found in archive', { url });
    return [];
  }

  deps.logger.info(`Parsed ${rows.length} rows from archive`);
  return rows;
}
