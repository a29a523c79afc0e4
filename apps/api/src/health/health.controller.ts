import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { DatasetService } from '../dataset/dataset.service';
import { lastDate } from '../dataset/dataset';

@ApiTags('health')
@Controller()
export class HealthController {
  constructor(private readonly datasets: DatasetService) {}

  @Get('/health')
  health() {
    const ds = this.datasets.current();
    return { status: 'ok', days: ds.days.length, lastDate: lastDate(ds), fetchedAt: ds.fetchedAt };
  }
}
