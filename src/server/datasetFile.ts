import fs from 'node:fs';
import type { KevDataset } from '@/types/kev';
import { parseKevCsv } from '../data/csv';

const cache = new Map<string, KevDataset>();

/**
 * Reads and parses the CSV at `path` once. A missing or unreadable file
 * yields an empty dataset so the API keeps answering.
 */
export function loadDatasetFile(path: string): KevDataset {
  const hit = cache.get(path);
  if (hit) return hit;
  let data: KevDataset = [];
  if (!fs.existsSync(path)) {
    console.error(`[server] Data file ${path} not found; serving an empty dataset`);
  } else {
    try {
      data = parseKevCsv(fs.readFileSync(path, 'utf8'));
      console.info(`[server] Loaded ${data.length} records from ${path}`);
    } catch (e) {
      console.error(`[server] Failed to read data file ${path}:`, e);
    }
  }
  cache.set(path, data);
  return data;
}

export function clearDatasetCache() {
  cache.clear();
}
