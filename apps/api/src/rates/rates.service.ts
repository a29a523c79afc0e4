// Rates lookups over the current dataset. Timeframes are memoised per dataset version.
import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import { ConfigService } from '@nestjs/config';
import type { IndexResponse, Rates, TimeframeResponse } from '@exchangerates/shared';
import type { Env } from '../config/env';
import { datasetVersion, indexOnOrBefore, timeframeOf } from '../dataset/dataset';
import { DatasetService } from '../dataset/dataset.service';
import { convertDay, filterRates, resolveConversion } from './conversion';
import { CurrenciesNotFoundException, noRates } from './rates.errors';
import type { RatesRequestDto, TimeframeRequestDto } from './dto/rates-request.dto';

@Injectable()
export class RatesService {
  private ttlMs: number;

  constructor(
    @Inject(CACHE_MANAGER) private cache: Cache,
    private datasets: DatasetService,
    cfg: ConfigService<Env, true>,
  ) {
    this.ttlMs = cfg.get('RATES_CACHE_TTL_SECONDS', { infer: true }) * 1000;
  }

  index(): IndexResponse {
    const ds = this.datasets.current();
    const timeframe = timeframeOf(ds);
    if (!timeframe) throw noRates();
    return { currencies: [...ds.currencies], timeframe };
  }

  rates(req: RatesRequestDto = {}): Rates {
    const ds = this.datasets.current();
    const index = req.date ? indexOnOrBefore(ds.days, req.date) : ds.days.length - 1;
    const day = ds.days[index];
    if (!day) throw noRates();

    const conversion = resolveConversion(req, ds);

    // known to the dataset, but maybe not published on this day
    const converted = convertDay(day, conversion.from, ds.currencies);
    if (!converted) throw new CurrenciesNotFoundException([conversion.from]);

    return { date: day.date, rates: filterRates(converted, conversion.to) };
  }

  async timeframe(req: TimeframeRequestDto): Promise<TimeframeResponse> {
    const ds = this.datasets.current();
    const [start, end] = req.timeframe;
    if (start && end && start > end) {
      throw new BadRequestException(`timeframe start ${start} is after its end ${end}`);
    }
    if (!ds.days.length) throw noRates();

    const conversion = resolveConversion(req, ds);
    const key = this.key(datasetVersion(ds), start, end, conversion.from, conversion.to);
    const hit = this.ttlMs > 0 ? await this.cache.get<TimeframeResponse>(key) : undefined;
    if (hit) return hit;

    const first = start ? indexOnOrBefore(ds.days, start) : 0;
    const last = end ? indexOnOrBefore(ds.days, end) : ds.days.length - 1;

    const rates: Rates[] = [];
    for (const day of ds.days.slice(first, last + 1)) {
      const converted = convertDay(day, conversion.from, ds.currencies);
      if (converted) rates.push({ date: day.date, rates: filterRates(converted, conversion.to) });
    }
    if (!rates.length) throw new CurrenciesNotFoundException([conversion.from]);

    const res: TimeframeResponse = {
      timeframe: [rates[0].date, rates[rates.length - 1].date],
      rates,
    };
    if (this.ttlMs > 0) await this.cache.set(key, res, this.ttlMs);
    return res;
  }

  private key(version: string, start: string | null | undefined, end: string | null | undefined, from: string, to: string[]) {
    return `rates:timeframe:${version}:${start ?? '*'}:${end ?? '*'}:${from}:${[...to].sort().join(',')}`;
  }
}
