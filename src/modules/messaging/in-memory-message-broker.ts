import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  MessageBroker,
  MessageContext,
  MessageHandler,
  PublishOptions,
  SubscriptionOptions,
} from './message-broker';
import { resolveMessageType } from './message-serializer';
import { InvalidArgumentException } from './messaging.errors';

interface Subscription {
  handler: MessageHandler;
  options: SubscriptionOptions;
}

interface Delivery {
  message: unknown;
  context: MessageContext;
}

const matches = (
  options: SubscriptionOptions,
  context: MessageContext,
): boolean =>
  (options.messageType === undefined ||
    options.messageType === context.messageType) &&
  (options.routingKey === undefined ||
    options.routingKey === context.routingKey) &&
  (options.exchange === undefined || options.exchange === context.exchange);

/**
 * Process-local broker. Deliveries published while stopped are held and
 * dispatched on the next start.
 */
export class InMemoryMessageBroker implements MessageBroker {
  private readonly logger = new Logger(InMemoryMessageBroker.name);
  private readonly subscriptions: Subscription[] = [];
  private readonly held: Delivery[] = [];
  private started = false;

  get isStarted(): boolean {
    return this.started;
  }

  async publish(message: unknown, options: PublishOptions = {}): Promise<void> {
    if (message === null || message === undefined) {
      throw new InvalidArgumentException('message');
    }

    const delivery: Delivery = {
      message,
      context: {
        messageId: options.messageId ?? randomUUID(),
        messageType: options.messageType ?? resolveMessageType(message),
        routingKey: options.routingKey,
        exchange: options.exchange,
        headers: { ...options.headers },
        timestamp: new Date(),
      },
    };

    if (!this.started) {
      this.held.push(delivery);
      return;
    }
    await this.dispatch(delivery);
  }

  async subscribe(
    handler: MessageHandler,
    options: SubscriptionOptions = {},
  ): Promise<void> {
    this.subscriptions.push({ handler, options });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    const backlog = this.held.splice(0, this.held.length);
    for (const delivery of backlog) {
      await this.dispatch(delivery);
    }
    this.logger.log(
      `In-memory broker started (${backlog.length} held deliveries dispatched)`,
    );
  }

  async stop(): Promise<void> {
    this.started = false;
  }

  private async dispatch(delivery: Delivery): Promise<void> {
    const targets = this.subscriptions.filter((subscription) =>
      matches(subscription.options, delivery.context),
    );

    for (const subscription of targets) {
      try {
        await subscription.handler(delivery.message, delivery.context);
      } catch (error) {
        this.logger.error(
          `Handler failed for message ${delivery.context.messageId ?? ''}: ${
            error instanceof Error ? error.message : 'unknown error'
          }`,
        );
      }
    }
  }
}
