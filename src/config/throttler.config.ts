import { ConfigService } from '@nestjs/config';
import { ThrottlerModuleOptions } from '@nestjs/throttler';
import { toInt } from './config.utils';

export const buildThrottlerConfig = (
  configService: ConfigService,
): ThrottlerModuleOptions => [
  {
    ttl: toInt(configService.get<string>('THROTTLE_TTL_MS'), 60_000),
    limit: toInt(configService.get<string>('THROTTLE_LIMIT'), 100),
  },
];
