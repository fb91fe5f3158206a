import { RANSOMWARE_MODES, type FilterSelection, type RansomwareMode } from '../types/kev';

export function toggleSet<T>(set: Set<T>, value: T): Set<T> {
  const s = new Set(set);
  if (s.has(value)) s.delete(value);
  else s.add(value);
  return s;
}

export function emptySelection(): FilterSelection {
  return { years: new Set(), vendors: new Set(), cwes: new Set(), ransomware: 'All' };
}

export function cloneSelection(s: FilterSelection): FilterSelection {
  return {
    ...s,
    years: new Set(s.years),
    vendors: new Set(s.vendors),
    cwes: new Set(s.cwes),
  };
}

export function isEmptySelection(s: FilterSelection): boolean {
  return !s.years.size && !s.vendors.size && !s.cwes.size && s.ransomware === 'All';
}

export function isRansomwareMode(value: string): value is RansomwareMode {
  return (RANSOMWARE_MODES as readonly string[]).includes(value);
}

export function isYearParam(value: string): boolean {
  return /^\s*\d{1,4}\s*$/.test(value);
}

// Repeated keys rather than comma joins: vendor names may contain commas
export function selectionToParams(s: FilterSelection): URLSearchParams {
  const p = new URLSearchParams();
  for (const y of Array.from(s.years).sort((a, b) => a - b)) p.append('year', String(y));
  for (const v of Array.from(s.vendors).sort()) p.append('vendor', v);
  for (const c of Array.from(s.cwes).sort()) p.append('cwe', c);
  if (s.ransomware !== 'All') p.set('ransomware', s.ransomware);
  return p;
}

export function selectionFromParams(p: URLSearchParams): FilterSelection {
  const years = new Set<number>();
  for (const raw of p.getAll('year')) if (isYearParam(raw)) years.add(Number(raw));
  const ransomware = p.get('ransomware') ?? 'All';
  return {
    years,
    vendors: new Set(p.getAll('vendor').filter((v) => v.trim())),
    cwes: new Set(p.getAll('cwe').filter((c) => c.trim())),
    ransomware: isRansomwareMode(ransomware) ? ransomware : 'All',
  };
}
