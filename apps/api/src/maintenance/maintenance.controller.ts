import { Controller, HttpCode, Logger, Post, UseGuards } from '@nestjs/common';
import { ApiForbiddenResponse, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { MaintenanceGuard } from '../common/guards/maintenance.guard';
import { DatasetService } from '../dataset/dataset.service';
import type { RefreshResult } from '../dataset/types';

@ApiTags('maintenance')
@ApiHeader({ name: 'x-admin-token', required: true })
@ApiForbiddenResponse({ description: 'Disabled, bad token or address not allowed' })
@UseGuards(MaintenanceGuard)
@SkipThrottle()
@Controller('maintenance')
export class MaintenanceController {
  private readonly log = new Logger(MaintenanceController.name);

  constructor(private readonly datasets: DatasetService) {}

  @Post('refresh')
  @HttpCode(200)
  @ApiOperation({ summary: 'Pull new ECB publications now' })
  async refresh(): Promise<RefreshResult> {
    this.log.log('Manual dataset refresh');
    return this.datasets.refresh();
  }
}
