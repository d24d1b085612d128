import { randomUUID } from 'crypto';
import { DataSource, QueryFailedError, QueryRunner } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { InvalidArgumentException } from '../messaging/messaging.errors';
import { OutboxMessageEntity } from './entities/outbox-message.entity';
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

// postgres reports 23505; the sqlite drivers only say so in the message
const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  const code =
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError
      ? driverError.code
      : undefined;
  return code === '23505' || /UNIQUE constraint failed/i.test(error.message);
};

/**
 * TypeORM-backed store. Every call runs in its own transaction and every
 * mutation is conditional on `status = 'pending'`, so several relays can
 * share the table.
 */
export class SqlOutboxStore implements OutboxStore {
  constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock = systemClock,
  ) {}

  async store(
    message: NewOutboxMessage | null | undefined,
  ): Promise<OutboxMessage> {
    if (!message) {
      throw new InvalidArgumentException('message');
    }

    const entity = new OutboxMessageEntity();
    entity.id = message.id ?? randomUUID();
    entity.messageType = message.messageType;
    entity.payload = Buffer.from(message.payload);
    entity.routingKey = message.routingKey ?? null;
    entity.exchange = message.exchange ?? null;
    entity.headers = message.headers ? { ...message.headers } : null;
    entity.createdAt = this.clock();

    return this.inTransaction(async (runner) => {
      const existing = await runner.manager.countBy(OutboxMessageEntity, {
        id: entity.id,
      });
      if (existing > 0) {
        throw new DuplicateOutboxMessageException(entity.id);
      }

      try {
        await runner.manager.insert(OutboxMessageEntity, entity);
      } catch (error) {
        // another relay inserted the same id after the count above
        if (isUniqueViolation(error)) {
          throw new DuplicateOutboxMessageException(entity.id);
        }
        throw error;
      }
      return cloneOutboxMessage(entity);
    });
  }

  async getPending(batchSize: number): Promise<OutboxMessage[]> {
    return this.listByStatus('pending', batchSize);
  }

  async getFailed(batchSize: number): Promise<OutboxMessage[]> {
    return this.listByStatus('failed', batchSize);
  }

  async getById(id: string): Promise<OutboxMessage | null> {
    return this.inTransaction(async (runner) => {
      const entity = await runner.manager.findOneBy(OutboxMessageEntity, {
        id,
      });
      return entity ? cloneOutboxMessage(entity) : null;
    });
  }

  async markAsPublished(id: string): Promise<void> {
    await this.updatePending(id, {
      status: 'published',
      publishedAt: this.clock(),
    });
  }

  async markAsFailed(id: string, errorMessage: string): Promise<void> {
    await this.updatePending(id, {
      status: 'failed',
      lastError: errorMessage,
      retryCount: () => '"retryCount" + 1',
    });
  }

  async recordFailedAttempt(id: string, errorMessage: string): Promise<void> {
    await this.updatePending(id, {
      lastError: errorMessage,
      retryCount: () => '"retryCount" + 1',
    });
  }

  private async updatePending(
    id: string,
    changes: QueryDeepPartialEntity<OutboxMessageEntity>,
  ): Promise<void> {
    await this.inTransaction((runner) =>
      runner.manager
        .createQueryBuilder()
        .update(OutboxMessageEntity)
        .set(changes)
        .where('id = :id', { id })
        .andWhere('status = :status', { status: 'pending' })
        .execute(),
    );
  }

  private async listByStatus(
    status: OutboxStatus,
    batchSize: number,
  ): Promise<OutboxMessage[]> {
    assertBatchSize(batchSize);

    const entities = await this.inTransaction((runner) =>
      runner.manager
        .getRepository(OutboxMessageEntity)
        .createQueryBuilder('msg')
        .where('msg.status = :status', { status })
        .orderBy('msg.createdAt', 'ASC')
        .addOrderBy('msg.sequence', 'ASC')
        .limit(batchSize)
        .getMany(),
    );
    return entities.map(cloneOutboxMessage);
  }

  private async inTransaction<T>(
    work: (runner: QueryRunner) => Promise<T>,
  ): Promise<T> {
    const runner = this.dataSource.createQueryRunner();
    await runner.connect();
    await runner.startTransaction();

    try {
      const result = await work(runner);
      await runner.commitTransaction();
      return result;
    } catch (error) {
      await runner.rollbackTransaction();
      throw error;
    } finally {
      await runner.release();
    }
  }
}
