import type { KevRecord, KevRecordRaw } from '@/types/kev';

// Optional time part: hh:mm[:ss[.fff]] with an optional Z or ±hh[:]mm offset
const ISO_DATE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function toIsoDate(y: number, m: number, d: number): string | undefined {
  const t = new Date(Date.UTC(y, m - 1, d));
  // Date.UTC rolls 2023-02-30 over into March; reject anything that moved
  if (t.getUTCFullYear() !== y || t.getUTCMonth() !== m - 1 || t.getUTCDate() !== d) return undefined;
  return `${y}-${pad2(m)}-${pad2(d)}`;
}

function validTime(h: number, m: number, s: number): boolean {
  return h < 24 && m < 60 && s < 60;
}

/** Parses a KEV `dateAdded` cell into `YYYY-MM-DD`, or `undefined` when it is not a real date. */
export function parseDateAdded(value?: string | null): string | undefined {
  if (!value) return undefined;
  const s = value.trim();
  const iso = ISO_DATE.exec(s);
  if (iso) {
    if (iso[4] !== undefined && !validTime(Number(iso[4]), Number(iso[5]), Number(iso[6] ?? 0))) return undefined;
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  const us = US_DATE.exec(s);
  if (us) return toIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  return undefined;
}

export function normalizeRansomware(value?: string | null): string {
  return String(value ?? '').trim().toLowerCase();
}

function text(value?: string): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function normalizeKev(raw: KevRecordRaw): KevRecord | null {
  const dateAdded = parseDateAdded(raw.dateAdded);
  if (!dateAdded) return null;

  return {
    cveId: text(raw.cveID) ?? '',
    dateAdded,
    vendorProject: text(raw.vendorProject),
    product: text(raw.product),
    vulnerabilityName: text(raw.vulnerabilityName),
    cwes: raw.cwes ?? '',
    knownRansomwareCampaignUse: normalizeRansomware(raw.knownRansomwareCampaignUse),
  };
}

export function monthKey(iso?: string): string | undefined {
  const d = parseDateAdded(iso);
  return d ? d.slice(0, 7) : undefined;
}

export function yearOf(iso: string): number {
  return Number(iso.slice(0, 4));
}
