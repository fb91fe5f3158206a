export type RansomwareMode = 'All' | 'Known' | 'Unknown';

export const RANSOMWARE_MODES: readonly RansomwareMode[] = ['All', 'Known', 'Unknown'];

// One CSV row as d3-dsv hands it over. Column names follow the CISA KEV feed.
export interface KevRecordRaw {
  cveID?: string | undefined;
  vendorProject?: string | undefined;
  product?: string | undefined;
  vulnerabilityName?: string | undefined;
  dateAdded?: string | undefined;
  knownRansomwareCampaignUse?: string | undefined;
  cwes?: string | undefined;
}

export interface KevRecord {
  cveId: string;
  dateAdded: string; // YYYY-MM-DD
  vendorProject?: string | undefined;
  product?: string | undefined;
  vulnerabilityName?: string | undefined;
  cwes: string; // raw comma-separated text, '' when missing
  knownRansomwareCampaignUse: string; // trimmed, lower-case
}

export type KevDataset = readonly KevRecord[];

export interface FilterSelection {
  years: Set<number>;
  vendors: Set<string>;
  cwes: Set<string>;
  ransomware: RansomwareMode;
}

export interface MonthlyCount {
  month: string; // YYYY-MM
  count: number;
}

export interface FilterOptions {
  years: number[];
  vendors: string[];
  cwes: string[];
  ransomware: RansomwareMode[];
}

export interface DatasetSummary {
  total: number;
  knownRansomware: number;
  firstMonth?: string | undefined;
  lastMonth?: string | undefined;
}

export interface Preferences {
  darkMode: boolean;
}
