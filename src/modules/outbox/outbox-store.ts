import { InvalidArgumentException } from '../messaging/messaging.errors';
import { NewOutboxMessage, OutboxMessage } from './outbox-message';

export const OUTBOX_STORE = 'OUTBOX_STORE';

/**
 * Durable storage for outbox records. Mutations only apply to pending
 * records; on a missing or terminal record they are no-ops. Returned
 * records are snapshots.
 */
export interface OutboxStore {
  store(message: NewOutboxMessage | null | undefined): Promise<OutboxMessage>;
  getPending(batchSize: number): Promise<OutboxMessage[]>;
  getFailed(batchSize: number): Promise<OutboxMessage[]>;
  getById(id: string): Promise<OutboxMessage | null>;
  markAsPublished(id: string): Promise<void>;
  markAsFailed(id: string, errorMessage: string): Promise<void>;
  /** Counts a failed delivery while leaving the record pending. */
  recordFailedAttempt(id: string, errorMessage: string): Promise<void>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const assertBatchSize = (batchSize: number): void => {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new InvalidArgumentException(
      'batchSize',
      `must be a positive integer, got ${batchSize}`,
    );
  }
};
