// Types for the USAspending award tracker

export type AwardType = 'contract' | 'contract_idv' | 'grant';

/** One parsed CSV row from an award download, every cell as text. */
export type AwardRow = Record<string, string>;

/** Row after classification: raw id columns dropped, derived fields added. */
export type ClassifiedAward = AwardRow & {
  award_type: AwardType;
  piid_or_fain: string;
};

export interface TimePeriod {
  start_date: string;
  end_date: string;
}

export interface DownloadFilters {
  // Left out when there are no keywords
  keywords?: string[];
  time_period: TimePeriod[];
  award_type_codes: string[];
}

export interface DownloadJobRequest {
  filters: DownloadFilters;
  page: number;
  limit: number;
  sort: string;
  order: 'asc' | 'desc';
  auditTrail: string;
  fields: string[];
  subawards: boolean;
}

export type DownloadPayloadTemplate = Omit<DownloadJobRequest, 'filters'>;

export interface DownloadJobHandle {
  jobId: string;
  statusUrl: string;
}

export interface DownloadJobStatus {
  status: string;
  url?: string | null;
  file_url?: string | null;
  message?: string | null;
}

export interface AwardTypeGroup {
  name: AwardType;
  codes: readonly string[];
}

export interface GroupOutcome {
  group: AwardType;
  codes: string[];
  rowCount: number;
  error?: string;
}

export interface AwardRunReport {
  evaluatedAt: string;
  keywords: string[];
  awards: ClassifiedAward[];
  groups: GroupOutcome[];
  warnings: string[];
}

/** Collaborator that receives the filtered table, e.g. a spreadsheet. */
export interface AwardSink {
  publish(records: ClassifiedAward[], lastUpdated: Date): Promise<void>;
}
