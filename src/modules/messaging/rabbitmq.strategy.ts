import { Logger } from '@nestjs/common';
import type { ConsumeMessage } from 'amqplib';

export interface AckChannel {
  ack(message: ConsumeMessage): void;
  nack(message: ConsumeMessage, allUpTo?: boolean, requeue?: boolean): void;
}

export const ackOnSuccessNackOnError = async (
  handler: () => Promise<void>,
  channel: AckChannel,
  message: ConsumeMessage,
  logger: Logger,
): Promise<void> => {
  try {
    await handler();
    channel.ack(message);
  } catch (error) {
    logger.error(
      `Failed to process message ${String(message.properties.messageId ?? '')}: ${
        error instanceof Error ? error.message : 'unknown error'
      }`,
    );
    // no requeue: redelivery goes through the queue's dead-letter exchange
    channel.nack(message, false, false);
  }
};
