// Application wiring: config, schedulers, caches, rate limiting and the feature modules.
import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { Env, validateEnv } from './config/env';
import { DatasetModule } from './dataset/dataset.module';
import { RatesModule } from './rates/rates.module';
import { MaintenanceModule } from './maintenance/maintenance.module';
import { HealthController } from './health/health.controller';

@Module({
  imports: [
    // .env + environment, validated once (global)
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    // in-memory cache for computed responses (global)
    CacheModule.register({ isGlobal: true }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>) => [
        {
          ttl: cfg.get('RATE_LIMIT_TTL_MS', { infer: true }),
          limit: cfg.get('RATE_LIMIT_LIMIT', { infer: true }),
        },
      ],
    }),
    // runs @Cron jobs (dataset refresh)
    ScheduleModule.forRoot(),
    DatasetModule,
    RatesModule,
    MaintenanceModule,
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }],
  controllers: [HealthController],
})
export class AppModule {}
