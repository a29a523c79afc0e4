// Dataset domain: ECB source, disk cache, the in-memory dataset and its refresh job.
import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { EcbProvider } from './providers/ecb.provider';
import { DatasetCache } from './dataset.cache';
import { DatasetService } from './dataset.service';
import { DatasetCron } from './dataset.cron';
import { DATASET_SOURCE, DATASET_STORE } from './types';

@Module({
  // per-request timeouts come from ECB_TIMEOUT_MS
  imports: [HttpModule.register({ maxRedirects: 3 })],
  providers: [
    { provide: DATASET_SOURCE, useClass: EcbProvider },
    { provide: DATASET_STORE, useClass: DatasetCache },
    DatasetService,
    DatasetCron,
  ],
  exports: [DatasetService],
})
export class DatasetModule {}
