import { RANSOMWARE_MODES, type DatasetSummary, type FilterOptions, type KevDataset } from '../types/kev';
import { yearOf } from './normalize';

export function splitCwes(raw: string): string[] {
  return raw
    .split(',')
    .map((c) => c.trim())
    .filter(Boolean);
}

// Computed once per load to populate the filter controls
export function deriveFilterOptions(dataset: KevDataset): FilterOptions {
  const years = new Set<number>();
  const vendors = new Set<string>();
  const cwes = new Set<string>();
  for (const r of dataset) {
    years.add(yearOf(r.dateAdded));
    if (r.vendorProject) vendors.add(r.vendorProject);
    for (const c of splitCwes(r.cwes)) cwes.add(c);
  }
  return {
    years: Array.from(years).sort((a, b) => a - b),
    vendors: Array.from(vendors).sort((a, b) => a.localeCompare(b)),
    cwes: Array.from(cwes).sort((a, b) => a.localeCompare(b)),
    ransomware: [...RANSOMWARE_MODES],
  };
}

export function summarizeDataset(dataset: KevDataset): DatasetSummary {
  let knownRansomware = 0;
  let firstMonth: string | undefined;
  let lastMonth: string | undefined;
  for (const r of dataset) {
    if (r.knownRansomwareCampaignUse === 'known') knownRansomware++;
    const mk = r.dateAdded.slice(0, 7);
    if (firstMonth === undefined || mk < firstMonth) firstMonth = mk;
    if (lastMonth === undefined || mk > lastMonth) lastMonth = mk;
  }
  return { total: dataset.length, knownRansomware, firstMonth, lastMonth };
}
