// Rates endpoints over the shared dataset.
import { Module } from '@nestjs/common';
import { DatasetModule } from '../dataset/dataset.module';
import { RatesController } from './rates.controller';
import { RatesService } from './rates.service';

@Module({
  imports: [DatasetModule],
  controllers: [RatesController],
  providers: [RatesService],
  exports: [RatesService],
})
export class RatesModule {}
