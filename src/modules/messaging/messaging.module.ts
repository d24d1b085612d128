import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { buildAmqpBrokerOptions } from '../../config/rabbitmq.config';
import { AmqpMessageBroker } from './amqp-message-broker';
import { InMemoryMessageBroker } from './in-memory-message-broker';
import { MESSAGE_TRANSPORT, MessageBroker } from './message-broker';
import {
  JsonMessageSerializer,
  MESSAGE_SERIALIZER,
  MessageSerializer,
} from './message-serializer';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    { provide: MESSAGE_SERIALIZER, useClass: JsonMessageSerializer },
    {
      provide: MESSAGE_TRANSPORT,
      inject: [ConfigService, MESSAGE_SERIALIZER],
      useFactory: (
        configService: ConfigService,
        serializer: MessageSerializer,
      ): MessageBroker =>
        configService.get<string>('MESSAGE_BROKER')?.toLowerCase() === 'memory'
          ? new InMemoryMessageBroker()
          : new AmqpMessageBroker(
              buildAmqpBrokerOptions(configService),
              serializer,
            ),
    },
  ],
  exports: [MESSAGE_SERIALIZER, MESSAGE_TRANSPORT],
})
export class MessagingModule implements OnApplicationShutdown {
  private readonly logger = new Logger(MessagingModule.name);

  constructor(
    @Inject(MESSAGE_TRANSPORT) private readonly transport: MessageBroker,
  ) {}

  async onApplicationShutdown(signal?: string) {
    this.logger.log(`Stopping message transport (${signal ?? 'shutdown'})`);
    await this.transport.stop();
  }
}
