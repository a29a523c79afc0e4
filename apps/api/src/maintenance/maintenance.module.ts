import { Module } from '@nestjs/common';
import { DatasetModule } from '../dataset/dataset.module';
import { MaintenanceGuard } from '../common/guards/maintenance.guard';
import { MaintenanceController } from './maintenance.controller';

@Module({
  imports: [DatasetModule],
  controllers: [MaintenanceController],
  providers: [MaintenanceGuard],
})
export class MaintenanceModule {}
