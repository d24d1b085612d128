import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { connect, ConsumeMessage, Options } from 'amqplib';
import { delay } from '../../common/delay';
import { AmqpBrokerOptions } from '../../config/rabbitmq.config';
import {
  MessageBroker,
  MessageContext,
  MessageHandler,
  PublishOptions,
  SubscriptionOptions,
} from './message-broker';
import { MessageSerializer, resolveMessageType } from './message-serializer';
import { InvalidArgumentException } from './messaging.errors';
import { ackOnSuccessNackOnError } from './rabbitmq.strategy';

export interface AmqpChannelLike {
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: Options.Publish,
  ): boolean;
  waitForConfirms(): Promise<void>;
  assertExchange(
    exchange: string,
    type: string,
    options?: Options.AssertExchange,
  ): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: ConsumeMessage | null) => void,
  ): Promise<{ consumerTag: string }>;
  ack(message: ConsumeMessage): void;
  nack(message: ConsumeMessage, allUpTo?: boolean, requeue?: boolean): void;
  once(event: string, listener: (...args: unknown[]) => void): unknown;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeListener(
    event: string,
    listener: (...args: unknown[]) => void,
  ): unknown;
  close(): Promise<void>;
}

export interface AmqpConnectionLike {
  createConfirmChannel(): Promise<AmqpChannelLike>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  close(): Promise<void>;
}

export type AmqpConnect = (url: string) => Promise<AmqpConnectionLike>;

interface AmqpSubscription {
  handler: MessageHandler;
  exchange: string;
  bindingKey: string;
  queue: string;
  messageType?: string;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'unknown error';

// settles on drain, rejects when the channel goes away first
const waitForDrain = (channel: AmqpChannelLike): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const settle = (error?: Error): void => {
      channel.removeListener('drain', onDrain);
      channel.removeListener('close', onClose);
      channel.removeListener('error', onError);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };
    const onDrain = (): void => settle();
    const onClose = (): void =>
      settle(new Error('AMQP channel closed while waiting for drain'));
    const onError = (error: unknown): void =>
      settle(
        new Error(
          `AMQP channel failed while waiting for drain: ${describeError(error)}`,
        ),
      );

    channel.once('drain', onDrain);
    channel.once('close', onClose);
    channel.once('error', onError);
  });

/**
 * RabbitMQ broker over a single connection and confirm channel. Messages go
 * to topic exchanges; the routing key defaults to the message type.
 */
export class AmqpMessageBroker implements MessageBroker {
  private readonly logger = new Logger(AmqpMessageBroker.name);
  private connection?: AmqpConnectionLike;
  private channel?: AmqpChannelLike;
  private channelPromise?: Promise<AmqpChannelLike>;
  private readonly assertedExchanges = new Set<string>();
  private readonly subscriptions: AmqpSubscription[] = [];
  private started = false;
  private recovery?: Promise<void>;
  private recoveryAbort?: AbortController;

  constructor(
    private readonly options: AmqpBrokerOptions,
    private readonly serializer: MessageSerializer,
    private readonly connectFn: AmqpConnect = connect,
  ) {}

  async publish(message: unknown, options: PublishOptions = {}): Promise<void> {
    if (message === null || message === undefined) {
      throw new InvalidArgumentException('message');
    }

    const exchange = options.exchange ?? this.options.exchange;
    const messageType = options.messageType ?? resolveMessageType(message);
    const routingKey = options.routingKey ?? messageType;
    const content = this.serializer.serialize(message);

    const channel = await this.getChannel();
    await this.ensureExchange(channel, exchange);

    const published = channel.publish(exchange, routingKey, content, {
      contentType: this.serializer.contentType,
      contentEncoding: 'utf-8',
      persistent: true,
      timestamp: Date.now(),
      messageId: options.messageId ?? randomUUID(),
      type: messageType,
      headers: options.headers,
    });

    if (!published) {
      await waitForDrain(channel);
    }

    await channel.waitForConfirms();
  }

  async subscribe(
    handler: MessageHandler,
    options: SubscriptionOptions = {},
  ): Promise<void> {
    const bindingKey = options.routingKey ?? options.messageType ?? '#';
    const subscription: AmqpSubscription = {
      handler,
      exchange: options.exchange ?? this.options.exchange,
      bindingKey,
      queue:
        options.queue ??
        `${this.options.queuePrefix}.${bindingKey === '#' ? 'all' : bindingKey}`,
      messageType: options.messageType,
    };
    this.subscriptions.push(subscription);

    if (this.started) {
      await this.consume(await this.getChannel(), subscription);
    }
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    await this.startConsumers(await this.getChannel());
    this.logger.log(
      `AMQP broker consuming ${this.subscriptions.length} subscription(s)`,
    );
  }

  async stop(): Promise<void> {
    this.recoveryAbort?.abort();
    await this.recovery;

    const channel = this.channel;
    const connection = this.connection;
    this.started = false;
    this.channel = undefined;
    this.connection = undefined;
    this.assertedExchanges.clear();

    if (channel) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.warn(`Failed to close AMQP channel: ${describeError(error)}`);
      }
    }

    if (connection) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.warn(
          `Failed to close AMQP connection: ${describeError(error)}`,
        );
      }
    }
  }

  private async startConsumers(channel: AmqpChannelLike): Promise<void> {
    await channel.prefetch(this.options.prefetchCount);
    for (const subscription of this.subscriptions) {
      await this.consume(channel, subscription);
    }
    this.started = true;
  }

  private scheduleRecovery(): void {
    if (this.recovery) {
      return;
    }

    const controller = new AbortController();
    this.recoveryAbort = controller;
    this.recovery = this.restoreConsumers(controller.signal)
      .catch((error) =>
        this.logger.error(
          `Restoring AMQP consumers failed: ${describeError(error)}`,
        ),
      )
      .finally(() => {
        this.recovery = undefined;
        this.recoveryAbort = undefined;
      });
  }

  private async restoreConsumers(signal: AbortSignal): Promise<void> {
    for (let attempt = 1; !signal.aborted; attempt += 1) {
      try {
        const channel = await this.getChannel();
        if (signal.aborted) {
          return;
        }
        await this.startConsumers(channel);
        this.logger.log(
          `AMQP consumers restored on attempt ${attempt} (${this.subscriptions.length} subscription(s))`,
        );
        return;
      } catch (error) {
        this.logger.warn(
          `Attempt ${attempt} to restore AMQP consumers failed: ${describeError(error)}`,
        );
      }

      await delay(this.options.reconnectDelayMs, signal);
    }
  }

  private async consume(
    channel: AmqpChannelLike,
    subscription: AmqpSubscription,
  ): Promise<void> {
    await this.ensureExchange(channel, subscription.exchange);
    await channel.assertQueue(subscription.queue, {
      durable: true,
      arguments: this.options.deadLetterExchange
        ? { 'x-dead-letter-exchange': this.options.deadLetterExchange }
        : undefined,
    });
    await channel.bindQueue(
      subscription.queue,
      subscription.exchange,
      subscription.bindingKey,
    );

    await channel.consume(subscription.queue, (delivery) => {
      if (!delivery) {
        this.logger.warn(`Consumer on ${subscription.queue} was cancelled`);
        return;
      }
      this.handleDelivery(channel, subscription, delivery).catch((error) =>
        this.logger.error(
          `Delivery handling failed on ${subscription.queue}: ${describeError(error)}`,
        ),
      );
    });
  }

  private async handleDelivery(
    channel: AmqpChannelLike,
    subscription: AmqpSubscription,
    delivery: ConsumeMessage,
  ): Promise<void> {
    const { fields, properties } = delivery;
    const messageType =
      typeof properties.type === 'string' ? properties.type : undefined;

    if (subscription.messageType && messageType !== subscription.messageType) {
      channel.ack(delivery);
      return;
    }

    const context: MessageContext = {
      messageId:
        typeof properties.messageId === 'string'
          ? properties.messageId
          : undefined,
      messageType,
      routingKey: fields.routingKey,
      exchange: fields.exchange,
      headers: { ...properties.headers },
      timestamp:
        typeof properties.timestamp === 'number'
          ? new Date(properties.timestamp)
          : new Date(),
    };

    await ackOnSuccessNackOnError(
      () =>
        subscription.handler(
          this.serializer.deserialize(delivery.content),
          context,
        ),
      channel,
      delivery,
      this.logger,
    );
  }

  private async ensureExchange(
    channel: AmqpChannelLike,
    exchange: string,
  ): Promise<void> {
    if (this.assertedExchanges.has(exchange)) {
      return;
    }
    await channel.assertExchange(exchange, 'topic', { durable: true });
    this.assertedExchanges.add(exchange);
  }

  private async getChannel(): Promise<AmqpChannelLike> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.channelPromise) {
      this.channelPromise = this.createChannel();
    }

    try {
      return await this.channelPromise;
    } finally {
      this.channelPromise = undefined;
    }
  }

  private async createChannel(): Promise<AmqpChannelLike> {
    const connection = this.connection ?? (await this.connect());
    const channel = await connection.createConfirmChannel();

    channel.on('error', (error: unknown) => {
      this.logger.error(`AMQP channel error: ${describeError(error)}`);
      this.resetChannel();
    });
    channel.on('close', () => {
      this.logger.warn('AMQP channel closed');
      this.resetChannel();
    });

    this.channel = channel;
    return channel;
  }

  private async connect(): Promise<AmqpConnectionLike> {
    const connection = await this.connectFn(this.options.url);

    connection.on('error', (error: unknown) => {
      this.logger.error(`AMQP connection error: ${describeError(error)}`);
      this.resetConnection();
    });
    connection.on('close', () => {
      this.logger.warn('AMQP connection closed');
      this.resetConnection();
    });

    this.connection = connection;
    return connection;
  }

  // consumers die with their channel
  private resetChannel(): void {
    this.channel = undefined;
    this.assertedExchanges.clear();

    if (this.started) {
      this.started = false;
      this.scheduleRecovery();
    }
  }

  private resetConnection(): void {
    this.connection = undefined;
    this.resetChannel();
  }
}
