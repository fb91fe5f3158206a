// Response bodies of the /api/v1 endpoints
import type { MonthlyCount } from './kev';

export interface SeriesResponse {
  total: number;
  series: MonthlyCount[];
}

export interface ErrorResponse {
  error?: string;
  message?: string;
  allowed?: string[];
}
