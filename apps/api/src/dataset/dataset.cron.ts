import 'dotenv/config';
import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '@exchangerates/shared';
import { refreshSchedule } from '../config/env';
import { DatasetService } from './dataset.service';

// @Cron needs constants: .env is loaded above, ahead of ConfigModule, and checked by the env schema
const REFRESH = refreshSchedule();

@Injectable()
export class DatasetCron {
  private readonly log = new Logger(DatasetCron.name);

  constructor(private readonly datasets: DatasetService) {}

  // ECB publishes around 16:00 CET on working days
  @Cron(REFRESH.cron, { name: 'dataset-refresh', timeZone: REFRESH.timeZone })
  async refreshDataset(): Promise<void> {
    try {
      const r = await this.datasets.refresh();
      if (r.added) this.log.log(`Refresh done: +${r.added} day(s), last=${r.lastDate}${r.replaced ? ' (replaced)' : ''}`);
    } catch (e) {
      // keep serving what we have; the next tick tries again
      this.log.warn(`Refresh failed: ${errorMessage(e)}`);
    }
  }
}
