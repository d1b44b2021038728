/**
 * Static award-download configuration
 *
 * Filter constants, award-type groupings, the output column allowlist and the
 * download payload template. Built once by createStaticConfig() and handed to
 * the fetcher and classifier; nothing here is read as module state elsewhere.
 */

import type {
  AwardTypeGroup,
  DownloadPayloadTemplate,
  TimePeriod,
} from '../types/index.js';

export const DEFAULT_KEYWORDS = ['child care', 'early childhood', 'head start'];

export const TIME_PERIOD: TimePeriod = {
  start_date: '2007-10-01',
  end_date: '2025-09-30',
};

export const AWARD_TYPE_GROUPS: AwardTypeGroup[] = [
  { name: 'contract', codes: ['A', 'B', 'C', 'D'] },
  {
    name: 'contract_idv',
    codes: ['IDV_A', 'IDV_B', 'IDV_B_A', 'IDV_B_B', 'IDV_B_C', 'IDV_C', 'IDV_D', 'IDV_E'],
  },
  { name: 'grant', codes: ['02', '03', '04', '05'] },
];

// Columns kept from the download CSV, plus fetched_at stamped at run time.
export const DESIRED_COLUMNS = [
  'award_id_piid',
  'award_id_fain',
  'parent_award_id_piid',
  'award_or_idv_flag',
  'contract_award_unique_key',
  'assistance_award_unique_key',
  'award_type_code',
  'award_type',
  'prime_award_base_transaction_description',
  'recipient_name',
  'recipient_uei',
  'recipient_parent_name',
  'recipient_city_name',
  'recipient_state_code',
  'total_obligated_amount',
  'total_outlayed_amount',
  'current_total_value_of_award',
  'potential_total_value_of_award',
  'award_base_action_date',
  'period_of_performance_start_date',
  'period_of_performance_current_end_date',
  'period_of_performance_potential_end_date',
  'ordering_period_end_date',
  'awarding_agency_name',
  'awarding_sub_agency_name',
  'awarding_office_name',
  'funding_agency_name',
  'funding_sub_agency_name',
  'funding_office_name',
  'primary_place_of_performance_state_code',
  'naics_code',
  'naics_description',
  'product_or_service_code_description',
  'cfda_number',
  'cfda_title',
  'usaspending_permalink',
  'fetched_at',
] as const;

export const RAW_ID_COLUMNS = ['award_id_piid', 'award_id_fain'] as const;

export const DOWNLOAD_PAYLOAD_TEMPLATE: DownloadPayloadTemplate = {
  page: 1,
  limit: 100,
  sort: 'total_obligated_amount',
  order: 'desc',
  auditTrail: 'Award Download',
  fields: [],
  subawards: false,
};

export const STATIC_HEADERS: Record<string, string> = {
  'Content-Type': 'application/json',
  'Accept': 'application/json',
  'User-Agent': 'usaspending-award-tracker',
};

export interface PollBackoff {
  initialDelaySeconds: number;
  maxDelaySeconds: number;
}

export const POLL_BACKOFF: PollBackoff = {
  initialDelaySeconds: 1,
  maxDelaySeconds: 30,
};

export interface StaticConfig {
  readonly keywords: readonly string[];
  readonly timePeriod: Readonly<TimePeriod>;
  readonly groups: readonly Readonly<AwardTypeGroup>[];
  readonly desiredColumns: readonly string[];
  readonly payloadTemplate: Readonly<DownloadPayloadTemplate>;
  readonly headers: Readonly<Record<string, string>>;
  readonly backoff: Readonly<PollBackoff>;
}

/**
 * Build the frozen configuration for one process.
 * Keywords are the only part a caller may override.
 */
export function createStaticConfig(keywords: string[] = DEFAULT_KEYWORDS): StaticConfig {
  return Object.freeze({
    keywords: Object.freeze([...keywords]),
    timePeriod: Object.freeze({ ...TIME_PERIOD }),
    groups: Object.freeze(
      AWARD_TYPE_GROUPS.map(group =>
        Object.freeze({ name: group.name, codes: Object.freeze([...group.codes]) })
      )
    ),
    desiredColumns: Object.freeze([...DESIRED_COLUMNS]),
    payloadTemplate: Object.freeze({
      ...DOWNLOAD_PAYLOAD_TEMPLATE,
      fields: [...DOWNLOAD_PAYLOAD_TEMPLATE.fields],
    }),
    headers: Object.freeze({ ...STATIC_HEADERS }),
    backoff: Object.freeze({ ...POLL_BACKOFF }),
  });
}
