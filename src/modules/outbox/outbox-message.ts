export type OutboxStatus = 'pending' | 'published' | 'failed';

export interface OutboxMessage {
  id: string;
  messageType: string;
  payload: Buffer;
  routingKey: string | null;
  exchange: string | null;
  headers: Record<string, unknown> | null;
  status: OutboxStatus;
  createdAt: Date;
  publishedAt: Date | null;
  retryCount: number;
  lastError: string | null;
}

/** What a caller supplies to `OutboxStore.store`; the store fills in the rest. */
export interface NewOutboxMessage {
  id?: string;
  messageType: string;
  payload: Buffer;
  routingKey?: string | null;
  exchange?: string | null;
  headers?: Record<string, unknown> | null;
}

export const cloneOutboxMessage = (message: OutboxMessage): OutboxMessage => ({
  id: message.id,
  messageType: message.messageType,
  payload: Buffer.from(message.payload),
  routingKey: message.routingKey,
  exchange: message.exchange,
  headers: message.headers ? { ...message.headers } : null,
  status: message.status,
  createdAt: new Date(message.createdAt.getTime()),
  publishedAt: message.publishedAt
    ? new Date(message.publishedAt.getTime())
    : null,
  retryCount: message.retryCount,
  lastError: message.lastError,
});
