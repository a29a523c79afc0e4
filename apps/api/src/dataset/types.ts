// Shared types for the dataset service, its sources and its cache
import type { Dataset, Day } from './dataset';

export interface DatasetSource {
  /** Every publication since 1999. */
  fetchHistory(): Promise<Day[]>;
  /** The last 90 days of publications. */
  fetchRecent(): Promise<Day[]>;
}

export interface DatasetStore {
  read(): Promise<Dataset | null>;
  write(dataset: Dataset): Promise<void>;
}

export interface RefreshResult {
  added: number;
  replaced: boolean;
  lastDate: string | null;
}

export const DATASET_SOURCE = Symbol('DATASET_SOURCE');
export const DATASET_STORE = Symbol('DATASET_STORE');
