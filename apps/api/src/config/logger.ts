import type { LogLevel } from '@nestjs/common';
import { LOG_LEVELS } from './env';

// LOG_LEVEL names the most verbose level to print; everything more severe comes along
export function logLevelsFor(level: string | undefined): LogLevel[] {
  const idx = LOG_LEVELS.findIndex(l => l === level);
  const upTo = idx === -1 ? LOG_LEVELS.indexOf('log') : idx;
  return [...LOG_LEVELS.slice(0, upTo + 1)];
}
