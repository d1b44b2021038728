/**
 * Award Classifier
 * Labels each downloaded row as contract, contract_idv or grant, keeps only
 * awards whose relevant end date is still ahead, then applies the keyword filter.
 */

import type { AwardRow, AwardType, ClassifiedAward } from '../types/index.js';

export const DESCRIPTION_FIELD = 'prime_award_base_transaction_description';

export const END_DATE_FIELDS: Record<AwardType, string> = {
  contract: 'period_of_performance_potential_end_date',
  grant: 'period_of_performance_current_end_date',
  contract_idv: 'ordering_period_end_date',
};

const DATE_FIELDS = [
  END_DATE_FIELDS.contract,
  END_DATE_FIELDS.grant,
  END_DATE_FIELDS.contract_idv,
];

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const US_DATE = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/;

function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Date.UTC rolls 2024-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse a date cell, returning null for anything empty or unreadable.
 * Values without a zone are read as UTC.
 */
export function parseTolerantDate(value: string | undefined): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const iso = trimmed.match(ISO_DATE);
  if (iso) {
    const [, year, month, day, hours, minutes, seconds] = iso;
    return utcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0),
    );
  }

  const us = trimmed.match(US_DATE);
  if (us) {
    const [, month, day, year] = us;
    return utcDate(Number(year), Number(month), Number(day));
  }

  const timestamp = Date.parse(trimmed);
  return isNaN(timestamp) ? null : new Date(timestamp);
}

export function formatIsoDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : '';
}

export function classifyAward(row: AwardRow): AwardType {
  const flag = (row.award_or_idv_flag ?? '').trim().toUpperCase();
  const hasPiid = (row.award_id_piid ?? '').trim().length > 0;

  if (flag === 'IDV' && hasPiid) return 'contract_idv';
  if (flag === 'AWARD' && hasPiid) return 'contract';
  return 'grant';
}

/**
 * True when the end date that matters for this award type is strictly after `now`.
 */
export function isLive(row: AwardRow, awardType: AwardType, now: Date): boolean {
  const endDate = parseTolerantDate(row[END_DATE_FIELDS[awardType]]);
  return endDate !== null && endDate.getTime() > now.getTime();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive "contains any keyword" pattern, or null when there is nothing to match.
 */
export function buildKeywordPattern(keywords: readonly string[]): RegExp | null {
  const terms = keywords.map(k => k.trim()).filter(k => k.length > 0);
  if (terms.length === 0) return null;
  return new RegExp(terms.map(escapeRegExp).join('|'), 'i');
}

export function matchesKeywords(description: string | undefined, keywords: readonly string[]): boolean {
  const pattern = buildKeywordPattern(keywords);
  if (!pattern) return true;
  return pattern.test(description ?? '');
}

export function combineIdentifier(row: AwardRow): string {
  return `${(row.award_id_piid ?? '').trim()}${(row.award_id_fain ?? '').trim()}`;
}

function toClassifiedAward(row: AwardRow, awardType: AwardType): ClassifiedAward {
  const { award_id_piid: _piid, award_id_fain: _fain, ...rest } = row;
  const award: ClassifiedAward = {
    ...rest,
    award_type: awardType,
    piid_or_fain: combineIdentifier(row),
  };
  for (const field of DATE_FIELDS) {
    if (field in row) {
      award[field] = formatIsoDate(parseTolerantDate(row[field]));
    }
  }
  return award;
}

/**
 * Classify, keep live awards, keep keyword matches, then fold the two id
 * columns into piid_or_fain. Row order is preserved.
 */
export function classifyAndFilter(
  rows: readonly AwardRow[],
  keywords: readonly string[],
  now: Date,
): ClassifiedAward[] {
  const pattern = buildKeywordPattern(keywords);
  const results: ClassifiedAward[] = [];

  for (const row of rows) {
    const awardType = classifyAward(row);
    if (!isLive(row, awardType, now)) continue;
    if (pattern && !pattern.test(row[DESCRIPTION_FIELD] ?? '')) continue;
    results.push(toClassifiedAward(row, awardType));
  }

  return results;
}
