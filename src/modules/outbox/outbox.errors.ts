import { ConflictException } from '@nestjs/common';

export class DuplicateOutboxMessageException extends ConflictException {
  constructor(readonly messageId: string) {
    super(`Outbox message ${messageId} already exists`);
  }
}

/** Raised at startup, before the worker runs, for invalid outbox options. */
export class OutboxConfigurationError extends Error {
  constructor(readonly violations: string[]) {
    super(`Invalid outbox configuration: ${violations.join('; ')}`);
    this.name = 'OutboxConfigurationError';
  }
}
