import { describe, expect, it } from 'vitest';
import type { AwardRow } from '../types/index.js';
import {
  buildKeywordPattern,
  classifyAndFilter,
  classifyAward,
  combineIdentifier,
  isLive,
  matchesKeywords,
  parseTolerantDate,
} from './award-classifier.js';

const NOW = new Date('2025-01-01T00:00:00Z');

function row(overrides: AwardRow): AwardRow {
  return {
    award_id_piid: '',
    award_id_fain: '',
    award_or_idv_flag: '',
    award_type: '',
    prime_award_base_transaction_description: '',
    period_of_performance_current_end_date: '',
    period_of_performance_potential_end_date: '',
    ordering_period_end_date: '',
    ...overrides,
  };
}

describe('classifyAward', () => {
  it('labels an IDV with a PIID as contract_idv', () => {
    expect(classifyAward(row({ award_or_idv_flag: 'IDV', award_id_piid: 'IDV-1' }))).toBe('contract_idv');
    expect(classifyAward(row({ award_or_idv_flag: 'idv', award_id_piid: 'IDV-1' }))).toBe('contract_idv');
  });

  it('labels an IDV without a PIID as grant', () => {
    expect(classifyAward(row({ award_or_idv_flag: 'IDV', award_id_piid: '' }))).toBe('grant');
    expect(classifyAward(row({ award_or_idv_flag: 'IDV', award_id_piid: '   ' }))).toBe('grant');
  });

  it('labels an AWARD with a PIID as contract', () => {
    expect(classifyAward(row({ award_or_idv_flag: 'Award', award_id_piid: 'C-1' }))).toBe('contract');
  });

  it('falls back to grant for anything else', () => {
    expect(classifyAward(row({ award_id_fain: 'FAIN-1' }))).toBe('grant');
    expect(classifyAward({})).toBe('grant');
  });
});

describe('parseTolerantDate', () => {
  it('reads date-only values as UTC midnight', () => {
    expect(parseTolerantDate('2025-06-01')?.toISOString()).toBe('2025-06-01T00:00:00.000Z');
    expect(parseTolerantDate('6/1/2025')?.toISOString()).toBe('2025-06-01T00:00:00.000Z');
    expect(parseTolerantDate('06-01-2025')?.toISOString()).toBe('2025-06-01T00:00:00.000Z');
  });

  it('keeps the time of day when one is given', () => {
    expect(parseTolerantDate('2025-06-01 13:45:10')?.toISOString()).toBe('2025-06-01T13:45:10.000Z');
  });

  it('falls back to the platform parser for zoned timestamps', () => {
    expect(parseTolerantDate('2025-06-01T12:00:00+02:00')?.toISOString()).toBe('2025-06-01T10:00:00.000Z');
  });

  it('returns null for empty, impossible or unreadable values', () => {
    expect(parseTolerantDate(undefined)).toBeNull();
    expect(parseTolerantDate('')).toBeNull();
    expect(parseTolerantDate('2024-02-30')).toBeNull();
    expect(parseTolerantDate('not a date')).toBeNull();
  });
});

describe('isLive', () => {
  it('uses the current end date for grants', () => {
    expect(isLive(row({ period_of_performance_current_end_date: '2024-12-31' }), 'grant', NOW)).toBe(false);
    expect(isLive(row({ period_of_performance_current_end_date: '2025-06-01' }), 'grant', NOW)).toBe(true);
  });

  it('uses the potential end date for contracts', () => {
    const award = row({
      period_of_performance_current_end_date: '2024-06-30',
      period_of_performance_potential_end_date: '2026-06-30',
    });
    expect(isLive(award, 'contract', NOW)).toBe(true);
    expect(isLive(award, 'grant', NOW)).toBe(false);
  });

  it('uses the ordering period end date for IDVs', () => {
    expect(isLive(row({ ordering_period_end_date: '2025-01-02' }), 'contract_idv', NOW)).toBe(true);
  });

  it('requires the end date to be strictly after now', () => {
    expect(isLive(row({ period_of_performance_current_end_date: '2025-01-01' }), 'grant', NOW)).toBe(false);
  });

  it('treats a missing date as not live', () => {
    expect(isLive(row({ period_of_performance_current_end_date: 'TBD' }), 'grant', NOW)).toBe(false);
  });
});

describe('keyword matching', () => {
  it('matches a case-insensitive substring', () => {
    expect(matchesKeywords('Alpha Project', ['alpha'])).toBe(true);
    expect(matchesKeywords('Beta Project', ['alpha'])).toBe(false);
  });

  it('matches keywords literally', () => {
    expect(matchesKeywords('Cost (plus) fee', ['(plus)'])).toBe(true);
    expect(matchesKeywords('Cost plus fee', ['(plus)'])).toBe(false);
    expect(matchesKeywords('version 1x2', ['1.2'])).toBe(false);
  });

  it('keeps everything when no keyword is given', () => {
    expect(buildKeywordPattern([])).toBeNull();
    expect(buildKeywordPattern(['  ', ''])).toBeNull();
    expect(matchesKeywords(undefined, [])).toBe(true);
  });
});

describe('combineIdentifier', () => {
  it('concatenates whichever id is present', () => {
    expect(combineIdentifier(row({ award_id_piid: 'C-1' }))).toBe('C-1');
    expect(combineIdentifier(row({ award_id_fain: 'FAIN-1' }))).toBe('FAIN-1');
    expect(combineIdentifier(row({ award_id_piid: 'C-1', award_id_fain: 'FAIN-1' }))).toBe('C-1FAIN-1');
  });
});

describe('classifyAndFilter', () => {
  const rows: AwardRow[] = [
    row({
      award_id_piid: 'C-1',
      award_or_idv_flag: 'AWARD',
      prime_award_base_transaction_description: 'Alpha Project',
      period_of_performance_potential_end_date: '2026-01-15',
    }),
    row({
      award_id_piid: 'C-2',
      award_or_idv_flag: 'AWARD',
      prime_award_base_transaction_description: 'Alpha support',
      period_of_performance_potential_end_date: '2024-03-01',
    }),
    row({
      award_id_fain: 'G-1',
      prime_award_base_transaction_description: 'Beta outreach',
      period_of_performance_current_end_date: '2025-06-01',
    }),
    row({
      award_id_piid: 'IDV-1',
      award_or_idv_flag: 'IDV',
      prime_award_base_transaction_description: 'ALPHA vehicle',
      ordering_period_end_date: '12/31/2027',
    }),
  ];

  it('keeps live awards whose description matches a keyword', () => {
    const awards = classifyAndFilter(rows, ['alpha'], NOW);

    expect(awards.map(a => [a.piid_or_fain, a.award_type])).toEqual([
      ['C-1', 'contract'],
      ['IDV-1', 'contract_idv'],
    ]);
  });

  it('skips the keyword filter for an empty keyword list', () => {
    const awards = classifyAndFilter(rows, [], NOW);

    expect(awards.map(a => a.piid_or_fain)).toEqual(['C-1', 'G-1', 'IDV-1']);
  });

  it('drops the raw id columns and normalizes end dates', () => {
    const [idv] = classifyAndFilter(rows.slice(3), [], NOW);

    expect(idv).toEqual({
      award_or_idv_flag: 'IDV',
      award_type: 'contract_idv',
      prime_award_base_transaction_description: 'ALPHA vehicle',
      period_of_performance_current_end_date: '',
      period_of_performance_potential_end_date: '',
      ordering_period_end_date: '2027-12-31',
      piid_or_fain: 'IDV-1',
    });
  });
});
