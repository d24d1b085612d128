import { ConfigService } from '@nestjs/config';
import {
  OutboxOptions,
  validateOutboxOptions,
} from '../modules/outbox/outbox.options';

export type OutboxStoreKind = 'sql' | 'memory';

// unlike toInt elsewhere, garbage is passed through so validation reports it
const toNumber = (value: string | undefined, fallback: number): number =>
  value === undefined || value.trim() === '' ? fallback : Number(value);

export const resolveOutboxStoreKind = (
  value: string | undefined,
): OutboxStoreKind => (value?.toLowerCase() === 'memory' ? 'memory' : 'sql');

export const buildOutboxOptions = (
  configService: ConfigService,
): OutboxOptions => {
  const defaults = new OutboxOptions();
  const envVal = configService.get<string>('OUTBOX_ENABLED');

  return validateOutboxOptions({
    enabled: envVal ? envVal.toLowerCase() !== 'false' : true,
    batchSize: toNumber(
      configService.get<string>('OUTBOX_BATCH_SIZE'),
      defaults.batchSize,
    ),
    pollingIntervalMs: toNumber(
      configService.get<string>('OUTBOX_POLLING_INTERVAL_MS'),
      defaults.pollingIntervalMs,
    ),
    maxRetryAttempts: toNumber(
      configService.get<string>('OUTBOX_MAX_RETRY_ATTEMPTS'),
      defaults.maxRetryAttempts,
    ),
    retryBaseDelayMs: toNumber(
      configService.get<string>('OUTBOX_RETRY_BASE_DELAY_MS'),
      defaults.retryBaseDelayMs,
    ),
  });
};
