import type { FilterSelection, KevDataset, KevRecord, MonthlyCount } from '@/types/kev';
import { yearOf } from './normalize';

/**
 * True when the record passes every active restriction of the selection.
 * CWE fragments match anywhere in the unsplit `cwes` text, so `CWE-7`
 * also selects `CWE-79`.
 */
export function matchesSelection(r: KevRecord, s: FilterSelection): boolean {
  if (s.years.size && !s.years.has(yearOf(r.dateAdded))) return false;
  if (s.vendors.size && (r.vendorProject === undefined || !s.vendors.has(r.vendorProject))) return false;
  if (s.cwes.size) {
    let hit = false;
    for (const frag of s.cwes) {
      if (r.cwes.includes(frag)) {
        hit = true;
        break;
      }
    }
    if (!hit) return false;
  }
  const known = r.knownRansomwareCampaignUse === 'known';
  if (s.ransomware === 'Known' && !known) return false;
  if (s.ransomware === 'Unknown' && known) return false;
  return true;
}

export function countMatching(dataset: KevDataset, selection: FilterSelection): number {
  let n = 0;
  for (const r of dataset) if (matchesSelection(r, selection)) n++;
  return n;
}

/** Monthly count of matching records, ascending by month, empty months omitted. */
export function aggregate(dataset: KevDataset, selection: FilterSelection): MonthlyCount[] {
  const byMonth = new Map<string, number>();
  for (const r of dataset) {
    if (!matchesSelection(r, selection)) continue;
    // dateAdded is always YYYY-MM-DD once normalized
    const mk = r.dateAdded.slice(0, 7);
    byMonth.set(mk, (byMonth.get(mk) ?? 0) + 1);
  }
  return Array.from(byMonth, ([month, count]) => ({ month, count })).sort((a, b) =>
    a.month.localeCompare(b.month)
  );
}
