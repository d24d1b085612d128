import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MESSAGE_TRANSPORT,
  MessageBroker,
  MessageHandler,
  PublishOptions,
  SubscriptionOptions,
} from '../messaging/message-broker';
import {
  MESSAGE_SERIALIZER,
  MessageSerializer,
  resolveMessageType,
} from '../messaging/message-serializer';
import { InvalidArgumentException } from '../messaging/messaging.errors';
import { OUTBOX_OPTIONS, OutboxOptions } from './outbox.options';
import { OUTBOX_STORE, OutboxStore } from './outbox-store';

/**
 * Broker facade handed to application code. With the outbox enabled a
 * publish only writes an outbox record; `OutboxWorker` delivers it later
 * through the wrapped transport.
 */
@Injectable()
export class OutboxMessageBrokerDecorator implements MessageBroker {
  private readonly logger = new Logger(OutboxMessageBrokerDecorator.name);

  constructor(
    @Inject(MESSAGE_TRANSPORT) private readonly inner: MessageBroker,
    @Inject(OUTBOX_STORE) private readonly store: OutboxStore,
    @Inject(OUTBOX_OPTIONS) private readonly options: OutboxOptions,
    @Inject(MESSAGE_SERIALIZER) private readonly serializer: MessageSerializer,
  ) {}

  async publish(message: unknown, options: PublishOptions = {}): Promise<void> {
    if (message === null || message === undefined) {
      throw new InvalidArgumentException('message');
    }

    if (!this.options.enabled) {
      this.logger.debug('Outbox disabled, publishing directly');
      await this.inner.publish(message, options);
      return;
    }

    const stored = await this.store.store({
      id: options.messageId,
      messageType: options.messageType ?? resolveMessageType(message),
      payload: this.serializer.serialize(message),
      routingKey: options.routingKey,
      exchange: options.exchange,
      headers: options.headers,
    });
    this.logger.debug(
      `Stored outbox message ${stored.id} (${stored.messageType})`,
    );
  }

  subscribe(
    handler: MessageHandler,
    options?: SubscriptionOptions,
  ): Promise<void> {
    return this.inner.subscribe(handler, options);
  }

  start(): Promise<void> {
    return this.inner.start();
  }

  stop(): Promise<void> {
    return this.inner.stop();
  }
}
