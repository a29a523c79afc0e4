// Owns the dataset every request reads. Loads it at boot, refreshes it from the ECB feeds.
import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '@exchangerates/shared';
import type { Env } from '../config/env';
import {
  buildDataset,
  Dataset,
  datasetVersion,
  Day,
  EMPTY_DATASET,
  lastDate,
  mergeDays,
  missesWorkingDay,
} from './dataset';
import { DATASET_SOURCE, DATASET_STORE, DatasetSource, DatasetStore, RefreshResult } from './types';

@Injectable()
export class DatasetService implements OnModuleInit {
  private readonly log = new Logger(DatasetService.name);
  private dataset: Dataset = EMPTY_DATASET;
  private inflight: Promise<RefreshResult> | null = null;
  private readonly maxAgeMs: number;

  constructor(
    @Inject(DATASET_SOURCE) private source: DatasetSource,
    @Inject(DATASET_STORE) private store: DatasetStore,
    cfg: ConfigService<Env, true>,
  ) {
    this.maxAgeMs = cfg.get('DATASET_MAX_AGE_HOURS', { infer: true }) * 3600_000;
  }

  async onModuleInit() {
    await this.load();
  }

  current(): Dataset {
    return this.dataset;
  }

  version(): string {
    return datasetVersion(this.dataset);
  }

  async load(now = new Date()): Promise<Dataset> {
    const cached = await this.store.read();
    if (cached && now.getTime() - Date.parse(cached.fetchedAt) < this.maxAgeMs) {
      this.log.log(`Using cached dataset (${cached.days.length} days, fetched ${cached.fetchedAt})`);
      return this.swap(cached);
    }

    try {
      const days = await this.fetchHistory();
      const fresh = this.swap(buildDataset(days, now));
      await this.store.write(fresh);
      return fresh;
    } catch (e) {
      if (!cached) throw e;
      this.log.warn(`Download failed (${errorMessage(e)}); serving stale cache from ${cached.fetchedAt}`);
      return this.swap(cached);
    }
  }

  /** Pulls new publications. Concurrent callers share one run. */
  refresh(now = new Date()): Promise<RefreshResult> {
    if (!this.inflight) {
      this.inflight = this.doRefresh(now).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async doRefresh(now: Date): Promise<RefreshResult> {
    const recent = await this.source.fetchRecent();
    const last = lastDate(this.dataset);
    const firstRecent = recent.length ? recent[0].date : null;

    // a gap the 90-day feed cannot close means starting over from the full history
    if (last === null || (firstRecent !== null && missesWorkingDay(last, firstRecent))) {
      const replaced = this.swap(buildDataset(await this.fetchHistory(), now));
      await this.store.write(replaced);
      this.log.log(`Replaced dataset, ${replaced.days.length} days up to ${lastDate(replaced)}`);
      return { added: replaced.days.length, replaced: true, lastDate: lastDate(replaced) };
    }

    const { dataset, added } = mergeDays(this.dataset, recent, now);
    if (added) {
      this.swap(dataset);
      await this.store.write(dataset);
      this.log.log(`Added ${added} day(s), now up to ${lastDate(dataset)}`);
    } else {
      this.log.debug(`No new publications after ${last}`);
    }
    return { added, replaced: false, lastDate: lastDate(this.dataset) };
  }

  // an empty history never replaces what we serve
  private async fetchHistory(): Promise<Day[]> {
    const days = await this.source.fetchHistory();
    if (!days.length) throw new Error('DATASET_UNAVAILABLE: empty history');
    return days;
  }

  private swap(next: Dataset): Dataset {
    this.dataset = next;
    return next;
  }
}
