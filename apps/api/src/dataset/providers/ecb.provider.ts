import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { errorMessage, withRetry } from '@exchangerates/shared';
import type { Env } from '../../config/env';
import type { Day } from '../dataset';
import { parseEcbXml } from '../ecb.parser';
import type { DatasetSource } from '../types';

@Injectable()
export class EcbProvider implements DatasetSource {
  private readonly log = new Logger(EcbProvider.name);

  constructor(private http: HttpService, private cfg: ConfigService<Env, true>) {}

  fetchHistory(): Promise<Day[]> {
    return this.fetch(this.cfg.get('ECB_HIST_URL', { infer: true }));
  }

  fetchRecent(): Promise<Day[]> {
    return this.fetch(this.cfg.get('ECB_RECENT_URL', { infer: true }));
  }

  private async fetch(url: string): Promise<Day[]> {
    const started = Date.now();
    const xml = await withRetry(
      async () => {
        const { data, status } = await firstValueFrom(
          this.http.get<string>(url, {
            responseType: 'text',
            timeout: this.cfg.get('ECB_TIMEOUT_MS', { infer: true }),
            validateStatus: () => true,
          }),
        );
        if (status < 200 || status >= 300) throw Object.assign(new Error(`ECB_HTTP_${status}`), { status });
        return data;
      },
      {
        retries: this.cfg.get('ECB_RETRIES', { infer: true }),
        onRetry: (e, attempt) => this.log.warn(`Retry ${attempt} for ${url}: ${errorMessage(e)}`),
      },
    );
    const days = parseEcbXml(xml);
    this.log.log(`Fetched ${days.length} days from ${url} in ${Date.now() - started}ms`);
    return days;
  }
}
