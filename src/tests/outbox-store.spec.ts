import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { InvalidArgumentException } from '../modules/messaging/messaging.errors';
import { OutboxMessageEntity } from '../modules/outbox/entities/outbox-message.entity';
import { InMemoryOutboxStore } from '../modules/outbox/in-memory-outbox.store';
import { NewOutboxMessage } from '../modules/outbox/outbox-message';
import { DuplicateOutboxMessageException } from '../modules/outbox/outbox.errors';
import { Clock, OutboxStore } from '../modules/outbox/outbox-store';
import { SqlOutboxStore } from '../modules/outbox/sql-outbox.store';

interface StoreFixture {
  store: OutboxStore;
  close: () => Promise<void>;
}

const START = Date.parse('2026-01-01T00:00:00.000Z');

// each reading is one second after the previous one
const steppingClock = (): Clock => {
  let ticks = 0;
  return () => new Date(START + ++ticks * 1000);
};

const newMessage = (
  overrides: Partial<NewOutboxMessage> = {},
): NewOutboxMessage => ({
  messageType: 'OrderPlaced',
  payload: Buffer.from('{"orderId":"order-1"}'),
  ...overrides,
});

const createInMemoryFixture = async (clock: Clock): Promise<StoreFixture> => ({
  store: new InMemoryOutboxStore(clock),
  close: async () => undefined,
});

const createSqlFixture = async (clock: Clock): Promise<StoreFixture> => {
  const moduleRef = await Test.createTestingModule({
    imports: [
      TypeOrmModule.forRoot({
        type: 'sqljs',
        autoSave: false,
        dropSchema: true,
        entities: [OutboxMessageEntity],
        synchronize: true,
      }),
      TypeOrmModule.forFeature([OutboxMessageEntity]),
    ],
  }).compile();

  const dataSource = moduleRef.get(DataSource);
  return {
    store: new SqlOutboxStore(dataSource, clock),
    close: async () => {
      await dataSource.destroy();
      await moduleRef.close();
    },
  };
};

describe.each([
  ['InMemoryOutboxStore', createInMemoryFixture],
  ['SqlOutboxStore', createSqlFixture],
])('%s', (_name, createFixture) => {
  let fixture: StoreFixture;
  let store: OutboxStore;

  beforeEach(async () => {
    fixture = await createFixture(steppingClock());
    store = fixture.store;
  });

  afterEach(async () => {
    await fixture.close();
  });

  describe('store', () => {
    it('persists a pending record with a generated id', async () => {
      const stored = await store.store(newMessage());

      expect(stored.id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
      );
      expect(stored.status).toBe('pending');
      expect(stored.retryCount).toBe(0);
      expect(stored.publishedAt).toBeNull();
      expect(stored.lastError).toBeNull();
      expect(stored.createdAt.toISOString()).toBe('2026-01-01T00:00:01.000Z');
    });

    it('keeps a supplied id and the routing fields', async () => {
      await store.store(
        newMessage({
          id: 'msg-1',
          routingKey: 'orders.placed',
          exchange: 'orders',
          headers: { tenant: 'acme', attempt: 1 },
        }),
      );

      const found = await store.getById('msg-1');
      expect(found).not.toBeNull();
      expect(found?.messageType).toBe('OrderPlaced');
      expect(found?.payload.toString('utf8')).toBe('{"orderId":"order-1"}');
      expect(found?.routingKey).toBe('orders.placed');
      expect(found?.exchange).toBe('orders');
      expect(found?.headers).toEqual({ tenant: 'acme', attempt: 1 });
    });

    it('stores absent routing fields as null', async () => {
      const stored = await store.store(newMessage({ id: 'msg-1' }));
      const found = await store.getById(stored.id);

      expect(found?.routingKey).toBeNull();
      expect(found?.exchange).toBeNull();
      expect(found?.headers).toBeNull();
    });

    it('rejects a missing message', async () => {
      await expect(store.store(null)).rejects.toBeInstanceOf(
        InvalidArgumentException,
      );
      await expect(store.store(undefined)).rejects.toMatchObject({
        paramName: 'message',
      });
    });

    it('rejects a duplicate id', async () => {
      await store.store(newMessage({ id: 'msg-1' }));

      await expect(
        store.store(newMessage({ id: 'msg-1', messageType: 'Other' })),
      ).rejects.toBeInstanceOf(DuplicateOutboxMessageException);
      expect((await store.getById('msg-1'))?.messageType).toBe('OrderPlaced');
    });
  });

  describe('getPending', () => {
    it('returns at most batchSize pending records, oldest first', async () => {
      await store.store(newMessage({ id: 'c' }));
      await store.store(newMessage({ id: 'a' }));
      await store.store(newMessage({ id: 'b' }));
      await store.store(newMessage({ id: 'd' }));
      await store.markAsPublished('a');

      const pending = await store.getPending(2);

      expect(pending.map((message) => message.id)).toEqual(['c', 'b']);
    });

    it('returns records created in the same instant in insertion order', async () => {
      const frozen = await createFixture(() => new Date(START));
      try {
        const ids = ['msg-19', 'msg-07', 'msg-13', 'msg-01', 'msg-10'];
        for (const id of ids) {
          await frozen.store.store(newMessage({ id }));
        }
        const generated: string[] = [];
        for (let i = 0; i < 20; i += 1) {
          generated.push((await frozen.store.store(newMessage())).id);
        }

        const pending = await frozen.store.getPending(25);

        expect(pending.map((message) => message.id)).toEqual([
          ...ids,
          ...generated,
        ]);
      } finally {
        await frozen.close();
      }
    });

    it('returns an empty list when nothing is pending', async () => {
      await expect(store.getPending(10)).resolves.toEqual([]);
    });

    it.each([0, -1, 1.5, Number.NaN])(
      'rejects batch size %p',
      async (batchSize) => {
        await expect(store.getPending(batchSize)).rejects.toMatchObject({
          paramName: 'batchSize',
        });
      },
    );
  });

  describe('getFailed', () => {
    it('keeps insertion order for failures created in the same instant', async () => {
      const frozen = await createFixture(() => new Date(START));
      try {
        for (const id of ['b', 'c', 'a']) {
          await frozen.store.store(newMessage({ id }));
          await frozen.store.markAsFailed(id, 'broker unreachable');
        }

        const failed = await frozen.store.getFailed(10);

        expect(failed.map((message) => message.id)).toEqual(['b', 'c', 'a']);
      } finally {
        await frozen.close();
      }
    });
  });

  describe('markAsPublished', () => {
    it('publishes the record and hides it from getPending', async () => {
      await store.store(newMessage({ id: 'msg-1' }));

      await store.markAsPublished('msg-1');

      const found = await store.getById('msg-1');
      expect(found?.status).toBe('published');
      expect(found?.publishedAt?.toISOString()).toBe(
        '2026-01-01T00:00:02.000Z',
      );
      await expect(store.getPending(10)).resolves.toEqual([]);
    });

    it('ignores an unknown id', async () => {
      await expect(store.markAsPublished('missing')).resolves.toBeUndefined();
    });
  });

  describe('markAsFailed', () => {
    it('fails the record, keeps the error and counts the attempt', async () => {
      await store.store(newMessage({ id: 'msg-1' }));

      await store.markAsFailed('msg-1', 'broker unreachable');

      const failed = await store.getFailed(10);
      expect(failed).toHaveLength(1);
      expect(failed[0].id).toBe('msg-1');
      expect(failed[0].status).toBe('failed');
      expect(failed[0].lastError).toBe('broker unreachable');
      expect(failed[0].retryCount).toBe(1);
      await expect(store.getPending(10)).resolves.toEqual([]);
    });

    it('increments the prior retry count by exactly one', async () => {
      await store.store(newMessage({ id: 'msg-1' }));
      await store.recordFailedAttempt('msg-1', 'timeout');

      await store.markAsFailed('msg-1', 'gave up');

      const found = await store.getById('msg-1');
      expect(found?.retryCount).toBe(2);
      expect(found?.lastError).toBe('gave up');
    });

    it('ignores an unknown id', async () => {
      await expect(
        store.markAsFailed('missing', 'broker unreachable'),
      ).resolves.toBeUndefined();
      await expect(store.getFailed(10)).resolves.toEqual([]);
    });
  });

  describe('recordFailedAttempt', () => {
    it('keeps the record pending and increments the retry count', async () => {
      await store.store(newMessage({ id: 'msg-1' }));

      await store.recordFailedAttempt('msg-1', 'timeout');
      await store.recordFailedAttempt('msg-1', 'connection reset');

      const [pending] = await store.getPending(10);
      expect(pending.status).toBe('pending');
      expect(pending.retryCount).toBe(2);
      expect(pending.lastError).toBe('connection reset');
    });
  });

  describe('terminal records', () => {
    it('never leave the published state', async () => {
      await store.store(newMessage({ id: 'msg-1' }));
      await store.markAsPublished('msg-1');

      await store.markAsFailed('msg-1', 'late failure');
      await store.recordFailedAttempt('msg-1', 'late failure');

      const found = await store.getById('msg-1');
      expect(found?.status).toBe('published');
      expect(found?.retryCount).toBe(0);
      expect(found?.lastError).toBeNull();
    });

    it('never leave the failed state', async () => {
      await store.store(newMessage({ id: 'msg-1' }));
      await store.markAsFailed('msg-1', 'broker unreachable');

      await store.markAsPublished('msg-1');
      await store.markAsFailed('msg-1', 'second failure');

      const found = await store.getById('msg-1');
      expect(found?.status).toBe('failed');
      expect(found?.publishedAt).toBeNull();
      expect(found?.retryCount).toBe(1);
      expect(found?.lastError).toBe('broker unreachable');
    });
  });

  it('returns snapshots that do not write back to the store', async () => {
    const stored = await store.store(newMessage({ id: 'msg-1' }));
    stored.status = 'published';
    stored.retryCount = 7;

    const [pending] = await store.getPending(1);
    pending.headers = { mutated: true };

    const found = await store.getById('msg-1');
    expect(found?.status).toBe('pending');
    expect(found?.retryCount).toBe(0);
    expect(found?.headers).toBeNull();
  });

  it('returns null for an unknown id', async () => {
    await expect(store.getById('missing')).resolves.toBeNull();
  });

  it('drains 1000 records without duplicates or omissions', async () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i += 1) {
      ids.add((await store.store(newMessage())).id);
    }

    const drained: string[] = [];
    let batch = await store.getPending(128);
    while (batch.length > 0) {
      for (const message of batch) {
        drained.push(message.id);
        await store.markAsPublished(message.id);
      }
      batch = await store.getPending(128);
    }

    expect(drained).toHaveLength(1000);
    expect(new Set(drained)).toEqual(ids);
  }, 60_000);
});

describe('SqlOutboxStore with a concurrent writer', () => {
  let fixture: StoreFixture;

  beforeEach(async () => {
    fixture = await createSqlFixture(steppingClock());
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fixture.close();
  });

  it('reports an id inserted after its duplicate check as a duplicate', async () => {
    await fixture.store.store(newMessage({ id: 'msg-1' }));
    // the other writer commits between the count and the insert
    jest.spyOn(EntityManager.prototype, 'countBy').mockResolvedValue(0);

    await expect(
      fixture.store.store(newMessage({ id: 'msg-1', messageType: 'Other' })),
    ).rejects.toBeInstanceOf(DuplicateOutboxMessageException);
    expect((await fixture.store.getById('msg-1'))?.messageType).toBe(
      'OrderPlaced',
    );
  });

  it('still stores a new id', async () => {
    jest.spyOn(EntityManager.prototype, 'countBy').mockResolvedValue(0);

    await expect(
      fixture.store.store(newMessage({ id: 'msg-2' })),
    ).resolves.toMatchObject({ id: 'msg-2', status: 'pending' });
  });
});
