// Keeps the dataset on disk (the /data volume in the container) so restarts skip the download.
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { CurrencyCodeSchema, errorMessage, IsoDateSchema } from '@exchangerates/shared';
import type { Env } from '../config/env';
import { buildDataset, Dataset } from './dataset';
import type { DatasetStore } from './types';

export const CACHE_FILE = 'eurofxref-hist.json';

const CachedDatasetSchema = z.object({
  fetchedAt: z.string().datetime(),
  days: z.array(
    z.object({
      date: IsoDateSchema,
      rates: z.record(CurrencyCodeSchema, z.number().positive()),
    }),
  ),
});

@Injectable()
export class DatasetCache implements DatasetStore {
  private readonly log = new Logger(DatasetCache.name);
  private readonly enabled: boolean;
  readonly file: string;

  constructor(cfg: ConfigService<Env, true>) {
    this.enabled = cfg.get('DATASET_CACHE_ENABLED', { infer: true });
    this.file = join(cfg.get('DATA_DIR', { infer: true }), CACHE_FILE);
  }

  async read(): Promise<Dataset | null> {
    if (!this.enabled) return null;

    let raw: string;
    try {
      raw = await readFile(this.file, 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        this.log.log(`No cached dataset at ${this.file}`);
      } else {
        this.log.warn(`Cannot read ${this.file}: ${errorMessage(e)}`);
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.log.warn(`Ignoring corrupt cache ${this.file}: ${errorMessage(e)}`);
      return null;
    }
    const parsed = CachedDatasetSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn(`Ignoring invalid cache ${this.file}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return null;
    }
    return buildDataset(parsed.data.days, parsed.data.fetchedAt);
  }

  async write(dataset: Dataset): Promise<void> {
    if (!this.enabled) return;
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.file), { recursive: true });
      await writeFile(tmp, JSON.stringify({ fetchedAt: dataset.fetchedAt, days: dataset.days }));
      await rename(tmp, this.file);
      this.log.log(`Cached ${dataset.days.length} days to ${this.file}`);
    } catch (e) {
      // serving goes on from memory; the next start downloads again
      this.log.warn(`Cannot write ${this.file}: ${errorMessage(e)}`);
      await rm(tmp, { force: true }).catch((err: unknown) => {
        this.log.warn(`Cannot remove ${tmp}: ${errorMessage(err)}`);
      });
    }
  }
}
