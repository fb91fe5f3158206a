import type { DatasetSummary, FilterOptions, FilterSelection, KevDataset, MonthlyCount } from '@/types/kev';
import type { ErrorResponse, SeriesResponse } from '@/types/ingest';
import { selectionToParams } from '@/utils/filters';
import { aggregate } from './aggregate';
import { deriveFilterOptions, summarizeDataset } from './options';

export interface SeriesResult {
  total: number;
  series: MonthlyCount[];
}

export interface KevRepository {
  options(signal?: AbortSignal): Promise<FilterOptions>;
  summarize(signal?: AbortSignal): Promise<DatasetSummary>;
  series(selection: FilterSelection, signal?: AbortSignal): Promise<SeriesResult>;
}

// Holds a dataset that was parsed in the browser (CSV URL or local file)
export class MemoryRepository implements KevRepository {
  private readonly opts: FilterOptions;
  private readonly summary: DatasetSummary;

  constructor(private readonly data: KevDataset) {
    this.opts = deriveFilterOptions(data);
    this.summary = summarizeDataset(data);
  }

  async options(_signal?: AbortSignal) {
    return this.opts;
  }

  async summarize(_signal?: AbortSignal) {
    return this.summary;
  }

  async series(selection: FilterSelection, _signal?: AbortSignal) {
    const series = aggregate(this.data, selection);
    return { total: series.reduce((n, m) => n + m.count, 0), series };
  }
}

// Remote repository backed by the /api/v1 endpoints
export class RemoteRepository implements KevRepository {
  constructor(private base: string = '/api/v1') {}

  private async _fetch(url: string, signal?: AbortSignal): Promise<Response> {
    const res = await fetch(url, signal ? { signal } : {});
    if (!res.ok) {
      const errorBody: ErrorResponse = await res.json().catch(() => ({}));
      const errorMessage =
        errorBody.error || errorBody.message || res.statusText || `HTTP error! status: ${res.status}`;
      throw new Error(`Failed to fetch from ${url}: ${errorMessage}`);
    }
    return res;
  }

  private async _json<T>(res: Response, url: string): Promise<T> {
    try {
      return (await res.json()) as T;
    } catch (err) {
      throw new Error(`Failed to parse JSON from ${url}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private url(path: string) {
    return this.base.replace(/\/$/, '') + path;
  }

  async options(signal?: AbortSignal): Promise<FilterOptions> {
    const url = this.url('/options');
    return this._json<FilterOptions>(await this._fetch(url, signal), url);
  }

  async summarize(signal?: AbortSignal): Promise<DatasetSummary> {
    const url = this.url('/summary');
    return this._json<DatasetSummary>(await this._fetch(url, signal), url);
  }

  async series(selection: FilterSelection, signal?: AbortSignal): Promise<SeriesResult> {
    const qs = selectionToParams(selection).toString();
    const url = this.url('/series') + (qs ? `?${qs}` : '');
    const json = await this._json<SeriesResponse>(await this._fetch(url, signal), url);
    return {
      total: Number(json.total ?? 0),
      series: Array.isArray(json.series) ? json.series : [],
    };
  }
}

export function isAbortError(e: unknown): boolean {
  return e instanceof DOMException && e.name === 'AbortError';
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export interface OpenedRepository {
  repo: KevRepository;
  summary: DatasetSummary;
  options: FilterOptions;
}

/**
 * Builds a repository and reads what the page needs up front. Resolves `null`
 * once `signal` is aborted so a superseded load never reaches the page.
 */
export async function openRepository(
  build: (signal: AbortSignal) => Promise<KevRepository>,
  signal: AbortSignal
): Promise<OpenedRepository | null> {
  try {
    const repo = await build(signal);
    if (signal.aborted) return null;
    const [summary, options] = await Promise.all([repo.summarize(signal), repo.options(signal)]);
    return signal.aborted ? null : { repo, summary, options };
  } catch (e) {
    if (signal.aborted || isAbortError(e)) return null;
    throw e;
  }
}

export type SeriesOutcome =
  | { kind: 'ok'; result: SeriesResult }
  | { kind: 'error'; message: string }
  | { kind: 'aborted' };

export async function querySeries(
  repo: KevRepository,
  selection: FilterSelection,
  signal: AbortSignal
): Promise<SeriesOutcome> {
  try {
    const result = await repo.series(selection, signal);
    return signal.aborted ? { kind: 'aborted' } : { kind: 'ok', result };
  } catch (e) {
    if (signal.aborted || isAbortError(e)) return { kind: 'aborted' };
    return { kind: 'error', message: errorMessage(e) };
  }
}

// Hands out one signal per load; starting a new load aborts the previous one
export function createLatestGate() {
  let current: AbortController | null = null;
  return {
    start(): AbortSignal {
      current?.abort();
      current = new AbortController();
      return current.signal;
    },
  };
}
