import { IsBoolean, IsInt, Max, Min, validateSync } from 'class-validator';
import { OutboxConfigurationError } from './outbox.errors';

export const OUTBOX_OPTIONS = 'OUTBOX_OPTIONS';

export class OutboxOptions {
  /** When false, publishes go straight to the transport and the worker stays off. */
  @IsBoolean()
  enabled = true;

  @IsInt()
  @Min(1)
  @Max(10000)
  batchSize = 100;

  @IsInt()
  @Min(100)
  pollingIntervalMs = 5000;

  @IsInt()
  @Min(1)
  maxRetryAttempts = 3;

  @IsInt()
  @Min(0)
  retryBaseDelayMs = 2000;
}

export const validateOutboxOptions = (
  options: OutboxOptions,
): OutboxOptions => {
  const candidate = Object.assign(new OutboxOptions(), options);
  const errors = validateSync(candidate);

  if (errors.length > 0) {
    throw new OutboxConfigurationError(
      errors.flatMap((error) => Object.values(error.constraints ?? {})),
    );
  }
  return candidate;
};

export const createOutboxOptions = (
  overrides: Partial<OutboxOptions> = {},
): OutboxOptions =>
  validateOutboxOptions(Object.assign(new OutboxOptions(), overrides));
