import { csvParse } from 'd3-dsv';
import type { KevDataset, KevRecord } from '@/types/kev';
import { normalizeKev } from './normalize';

/**
 * Parses a KEV CSV export into an immutable dataset. Rows whose `dateAdded`
 * does not parse are dropped without being reported.
 */
export function parseKevCsv(text: string): KevDataset {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const out: KevRecord[] = [];
  for (const row of csvParse(body)) {
    const rec = normalizeKev({
      cveID: row.cveID,
      vendorProject: row.vendorProject,
      product: row.product,
      vulnerabilityName: row.vulnerabilityName,
      dateAdded: row.dateAdded,
      knownRansomwareCampaignUse: row.knownRansomwareCampaignUse,
      cwes: row.cwes,
    });
    if (rec) out.push(Object.freeze(rec));
  }
  return Object.freeze(out);
}
