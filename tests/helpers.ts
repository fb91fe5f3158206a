import type { FilterSelection, KevRecord } from '../src/types/kev'
import { emptySelection } from '../src/utils/filters'

export function rec(dateAdded: string, vendorProject: string | undefined, cwes: string, ransomware: string): KevRecord {
  return {
    cveId: `CVE-TEST-${dateAdded}`,
    dateAdded,
    vendorProject,
    cwes,
    knownRansomwareCampaignUse: ransomware
  }
}

export function select(partial: Partial<FilterSelection> = {}): FilterSelection {
  return { ...emptySelection(), ...partial }
}
