import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  MESSAGE_TRANSPORT,
  MessageBroker,
} from './modules/messaging/message-broker';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log', 'debug'],
  });
  app.enableShutdownHooks();

  await app.get<MessageBroker>(MESSAGE_TRANSPORT).start();
  Logger.log('Outbox relay worker started', 'Bootstrap');
}

void bootstrap();
