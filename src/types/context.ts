import type { DatasetSummary, FilterOptions, FilterSelection, MonthlyCount, Preferences } from './kev';
import type { KevRepository } from '@/data/repository';

export interface DataState {
  repo: KevRepository | null;
  source: string | null;
  summary: DatasetSummary | null;
  options: FilterOptions | null;
  loading: boolean;
  error: string | null;
  selection: FilterSelection;
  series: MonthlyCount[];
  total: number;
  preferences: Preferences;
  loadFromUrl: (url: string) => Promise<void>;
  loadFromFile: (file: File) => Promise<void>;
  setSelection: (updater: (s: FilterSelection) => FilterSelection) => void;
  resetSelection: () => void;
  setPreferences: (updater: (p: Preferences) => Preferences) => void;
}
