export const MESSAGE_BROKER = 'MESSAGE_BROKER';
export const MESSAGE_TRANSPORT = 'MESSAGE_TRANSPORT';

export interface PublishOptions {
  /** Logical type name; defaults to the runtime type of the message. */
  messageType?: string;
  messageId?: string;
  routingKey?: string;
  exchange?: string;
  headers?: Record<string, unknown>;
}

export interface SubscriptionOptions {
  messageType?: string;
  routingKey?: string;
  exchange?: string;
  /** Queue to consume from; brokers without queues ignore it. */
  queue?: string;
}

export interface MessageContext {
  messageId?: string;
  messageType?: string;
  routingKey?: string;
  exchange?: string;
  headers: Record<string, unknown>;
  timestamp: Date;
}

export type MessageHandler = (
  message: unknown,
  context: MessageContext,
) => Promise<void>;

/**
 * Pub/sub transport. Implementations own connection management; callers
 * only see publish, subscribe and the consume lifecycle.
 */
export interface MessageBroker {
  publish(message: unknown, options?: PublishOptions): Promise<void>;
  subscribe(
    handler: MessageHandler,
    options?: SubscriptionOptions,
  ): Promise<void>;
  start(): Promise<void>;
  stop(): Promise<void>;
}
