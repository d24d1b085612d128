import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { delay } from '../../common/delay';
import { MESSAGE_TRANSPORT, MessageBroker } from '../messaging/message-broker';
import {
  MESSAGE_SERIALIZER,
  MessageSerializer,
} from '../messaging/message-serializer';
import { OutboxMessage } from './outbox-message';
import {
  OUTBOX_OPTIONS,
  OutboxOptions,
  validateOutboxOptions,
} from './outbox.options';
import { OUTBOX_STORE, OutboxStore } from './outbox-store';

const MAX_BACKOFF_MS = 60_000;

export type OutboxWorkerState = 'idle' | 'processing' | 'stopped';

/** `skipped`: left pending because the worker was stopping. */
export type OutboxMessageOutcome =
  | 'published'
  | 'retried'
  | 'failed'
  | 'skipped';

export interface OutboxBatchResult {
  fetched: number;
  published: number;
  failed: number;
  retried: number;
  skipped: number;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'unknown error';

@Injectable()
export class OutboxWorker implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboxWorker.name);
  private readonly options: OutboxOptions;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private currentState: OutboxWorkerState = 'stopped';

  constructor(
    @Inject(OUTBOX_STORE) private readonly store: OutboxStore,
    @Inject(MESSAGE_TRANSPORT) private readonly broker: MessageBroker,
    @Inject(OUTBOX_OPTIONS) options: OutboxOptions,
    @Inject(MESSAGE_SERIALIZER) private readonly serializer: MessageSerializer,
  ) {
    this.options = validateOutboxOptions(options);
  }

  get state(): OutboxWorkerState {
    return this.currentState;
  }

  onModuleInit() {
    if (this.options.enabled) {
      this.start();
    } else {
      this.logger.warn('Outbox worker disabled via OUTBOX_ENABLED=false');
    }
  }

  async onModuleDestroy() {
    await this.stop();
  }

  start(): void {
    if (this.loop) {
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.currentState = 'idle';
    this.loop = this.run(controller.signal);
    this.logger.log(
      `Outbox worker started (batch size ${this.options.batchSize}, polling every ${this.options.pollingIntervalMs}ms)`,
    );
  }

  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }

    this.abortController?.abort();
    await this.loop;
    this.loop = null;
    this.abortController = null;
    this.logger.log('Outbox worker stopped');
  }

  async processPendingMessages(
    signal?: AbortSignal,
  ): Promise<OutboxBatchResult> {
    const messages = await this.store.getPending(this.options.batchSize);
    const result: OutboxBatchResult = {
      fetched: messages.length,
      published: 0,
      failed: 0,
      retried: 0,
      skipped: 0,
    };

    for (const [index, message] of messages.entries()) {
      if (signal?.aborted) {
        result.skipped += messages.length - index;
        break;
      }
      const outcome = await this.processMessage(message, signal);
      result[outcome] += 1;
    }

    return result;
  }

  async processMessage(
    message: OutboxMessage,
    signal?: AbortSignal,
  ): Promise<OutboxMessageOutcome> {
    const { maxRetryAttempts } = this.options;

    if (message.retryCount >= maxRetryAttempts) {
      const reason = `Exceeded maximum retry attempts (${maxRetryAttempts})`;
      await this.store.markAsFailed(message.id, reason);
      this.logger.error(`Outbox message ${message.id} failed: ${reason}`);
      return 'failed';
    }

    if (message.retryCount > 0) {
      const elapsed = await delay(
        this.calculateExponentialBackoff(message.retryCount),
        signal,
      );
      if (!elapsed) {
        return 'skipped';
      }
    }

    try {
      await this.broker.publish(this.serializer.deserialize(message.payload), {
        messageType: message.messageType,
        messageId: message.id,
        routingKey: message.routingKey ?? undefined,
        exchange: message.exchange ?? undefined,
        headers: message.headers ?? undefined,
      });
    } catch (error) {
      const errorMessage = describeError(error);
      message.retryCount += 1;

      if (message.retryCount >= maxRetryAttempts) {
        await this.store.markAsFailed(message.id, errorMessage);
        this.logger.error(
          `Outbox message ${message.id} failed after ${message.retryCount} attempts: ${errorMessage}`,
        );
        return 'failed';
      }

      await this.store.recordFailedAttempt(message.id, errorMessage);
      this.logger.warn(
        `Publish failed for outbox message ${message.id} (attempt ${message.retryCount}): ${errorMessage}`,
      );
      return 'retried';
    }

    await this.store.markAsPublished(message.id);
    this.logger.debug(`Published outbox message ${message.id}`);
    return 'published';
  }

  calculateExponentialBackoff(retryCount: number): number {
    const delayMs =
      this.options.retryBaseDelayMs * Math.pow(2, Math.max(0, retryCount - 1));
    return Math.min(delayMs, MAX_BACKOFF_MS);
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.currentState = 'processing';
      await this.safeProcessCycle(signal);

      this.currentState = 'idle';
      await delay(this.options.pollingIntervalMs, signal);
    }
    this.currentState = 'stopped';
  }

  private async safeProcessCycle(signal: AbortSignal): Promise<void> {
    try {
      await this.processPendingMessages(signal);
    } catch (error) {
      this.logger.error(`Outbox poll cycle failed: ${describeError(error)}`);
    }
  }
}
