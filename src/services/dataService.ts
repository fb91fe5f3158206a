// Utilities for locating and loading the KEV feed
import type { KevDataset } from '@/types/kev';
import { parseKevCsv } from '@/data/csv';

export function toFetchableUrl(url: string): string {
  try {
    const u = new URL(url);
    if (u.hostname === 'github.com' && u.pathname.includes('/blob/')) {
      const parts = u.pathname.split('/').filter(Boolean);
      const owner = parts[0];
      const repo = parts[1];
      const branch = parts[3];
      const rest = parts.slice(4).join('/');
      return `https://raw.githubusercontent.com/${owner}/${repo}/${branch}/${rest}`;
    }
    return url;
  } catch {
    // relative URLs are fetched as given
    return url;
  }
}

/** True when the source points at a CSV file rather than an API base. */
export function isCsvSource(url: string): boolean {
  const path = url.split(/[?#]/)[0] ?? '';
  return path.toLowerCase().endsWith('.csv');
}

export async function fetchKevCsv(url: string, signal?: AbortSignal): Promise<KevDataset> {
  const safe = toFetchableUrl(url);
  const res = await fetch(safe, signal ? { signal } : {});
  if (!res.ok) throw new Error(`Failed to fetch from ${safe}: ${res.statusText || `status ${res.status}`}`);
  return parseKevCsv(await res.text());
}

export async function readKevFile(file: Blob): Promise<KevDataset> {
  return parseKevCsv(await file.text());
}

export function getDefaultApiBase(): string {
  // Allows overriding via VITE_API_URL, defaults to the dev server endpoint
  return import.meta.env.VITE_API_URL || '/api/v1';
}

export function getDefaultCsvUrl(): string {
  return import.meta.env.VITE_KEV_CSV_URL || '/known_exploited_vulnerabilities.csv';
}
