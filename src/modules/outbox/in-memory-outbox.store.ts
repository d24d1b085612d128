import { randomUUID } from 'crypto';
import { InvalidArgumentException } from '../messaging/messaging.errors';
import {
  cloneOutboxMessage,
  NewOutboxMessage,
  OutboxMessage,
  OutboxStatus,
} from './outbox-message';
import { DuplicateOutboxMessageException } from './outbox.errors';
import {
  assertBatchSize,
  Clock,
  OutboxStore,
  systemClock,
} from './outbox-store';

interface StoredRecord {
  sequence: number;
  message: OutboxMessage;
}

const byCreatedAtThenSequence = (a: StoredRecord, b: StoredRecord): number =>
  a.message.createdAt.getTime() - b.message.createdAt.getTime() ||
  a.sequence - b.sequence;

/** Process-local store; records live as long as the instance. */
export class InMemoryOutboxStore implements OutboxStore {
  private readonly records = new Map<string, StoredRecord>();
  private nextSequence = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async store(
    message: NewOutboxMessage | null | undefined,
  ): Promise<OutboxMessage> {
    if (!message) {
      throw new InvalidArgumentException('message');
    }

    const id = message.id ?? randomUUID();
    if (this.records.has(id)) {
      throw new DuplicateOutboxMessageException(id);
    }

    const record: OutboxMessage = {
      id,
      messageType: message.messageType,
      payload: Buffer.from(message.payload),
      routingKey: message.routingKey ?? null,
      exchange: message.exchange ?? null,
      headers: message.headers ? { ...message.headers } : null,
      status: 'pending',
      createdAt: this.clock(),
      publishedAt: null,
      retryCount: 0,
      lastError: null,
    };
    this.records.set(id, { sequence: this.nextSequence++, message: record });
    return cloneOutboxMessage(record);
  }

  async getPending(batchSize: number): Promise<OutboxMessage[]> {
    return this.listByStatus('pending', batchSize);
  }

  async getFailed(batchSize: number): Promise<OutboxMessage[]> {
    return this.listByStatus('failed', batchSize);
  }

  async getById(id: string): Promise<OutboxMessage | null> {
    const stored = this.records.get(id);
    return stored ? cloneOutboxMessage(stored.message) : null;
  }

  async markAsPublished(id: string): Promise<void> {
    const message = this.findPending(id);
    if (!message) {
      return;
    }
    message.status = 'published';
    message.publishedAt = this.clock();
  }

  async markAsFailed(id: string, errorMessage: string): Promise<void> {
    const message = this.findPending(id);
    if (!message) {
      return;
    }
    message.status = 'failed';
    message.lastError = errorMessage;
    message.retryCount += 1;
  }

  async recordFailedAttempt(id: string, errorMessage: string): Promise<void> {
    const message = this.findPending(id);
    if (!message) {
      return;
    }
    message.lastError = errorMessage;
    message.retryCount += 1;
  }

  private findPending(id: string): OutboxMessage | undefined {
    const message = this.records.get(id)?.message;
    return message?.status === 'pending' ? message : undefined;
  }

  private listByStatus(
    status: OutboxStatus,
    batchSize: number,
  ): OutboxMessage[] {
    assertBatchSize(batchSize);
    return [...this.records.values()]
      .filter((stored) => stored.message.status === status)
      .sort(byCreatedAtThenSequence)
      .slice(0, batchSize)
      .map((stored) => cloneOutboxMessage(stored.message));
  }
}
