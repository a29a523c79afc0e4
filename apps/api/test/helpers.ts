// In-process stand-ins for the ECB feeds and the disk cache, plus small builders.
import { ConfigService } from '@nestjs/config';
import { Env, validateEnv } from '../src/config/env';
import type { Dataset, Day } from '../src/dataset/dataset';
import type { DatasetSource, DatasetStore } from '../src/dataset/types';

export const day = (date: string, rates: Record<string, number>): Day => ({ date, rates: { EUR: 1, ...rates } });

export function configFor(env: Record<string, string> = {}): ConfigService<Env, true> {
  return new ConfigService<Env, true>(validateEnv(env));
}

export class FakeSource implements DatasetSource {
  history: Day[] = [];
  recent: Day[] = [];
  failWith: Error | null = null;
  historyCalls = 0;
  recentCalls = 0;

  async fetchHistory(): Promise<Day[]> {
    this.historyCalls++;
    if (this.failWith) throw this.failWith;
    return this.history;
  }

  async fetchRecent(): Promise<Day[]> {
    this.recentCalls++;
    if (this.failWith) throw this.failWith;
    return this.recent;
  }
}

export class MemoryStore implements DatasetStore {
  writes: Dataset[] = [];

  constructor(public stored: Dataset | null = null) {}

  async read(): Promise<Dataset | null> {
    return this.stored;
  }

  async write(dataset: Dataset): Promise<void> {
    this.writes.push(dataset);
    this.stored = dataset;
  }
}
