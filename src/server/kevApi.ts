import { aggregate } from '../data/aggregate';
import { deriveFilterOptions, summarizeDataset } from '../data/options';
import { isRansomwareMode, isYearParam, selectionFromParams } from '../utils/filters';
import { RANSOMWARE_MODES, type KevDataset } from '../types/kev';

// The slice of connect's request/response the handler touches
export interface ApiRequest {
  url?: string | undefined;
  originalUrl?: string | undefined;
  method?: string | undefined;
}

export interface ApiResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export type ApiMiddleware = (req: ApiRequest, res: ApiResponse, next: () => void) => void;

function send(res: ApiResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

/**
 * JSON endpoints over a dataset loaded on demand:
 * `/options`, `/summary` and `/series` under `prefix`.
 */
export function createKevApi(loadDataset: () => KevDataset, prefix = '/api/v1'): ApiMiddleware {
  return (req, res, next) => {
    const url = new URL(req.originalUrl || req.url || '/', 'http://localhost');
    if (url.pathname !== prefix && !url.pathname.startsWith(prefix + '/')) return next();
    if (req.method && req.method !== 'GET') {
      send(res, 405, { error: 'method not allowed' });
      return;
    }

    const route = url.pathname.slice(prefix.length).replace(/\/$/, '');
    switch (route) {
      case '/options':
        send(res, 200, deriveFilterOptions(loadDataset()));
        return;
      case '/summary':
        send(res, 200, summarizeDataset(loadDataset()));
        return;
      case '/series': {
        const mode = url.searchParams.get('ransomware');
        if (mode !== null && !isRansomwareMode(mode)) {
          send(res, 400, { error: 'invalid ransomware', allowed: [...RANSOMWARE_MODES] });
          return;
        }
        const badYear = url.searchParams.getAll('year').find((y) => !isYearParam(y));
        if (badYear !== undefined) {
          send(res, 400, { error: 'invalid year', value: badYear });
          return;
        }
        const series = aggregate(loadDataset(), selectionFromParams(url.searchParams));
        send(res, 200, { total: series.reduce((n, m) => n + m.count, 0), series });
        return;
      }
      default:
        send(res, 404, { error: 'not found' });
    }
  };
}
