import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getDataSourceToken, TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  buildOutboxOptions,
  OutboxStoreKind,
} from '../../config/outbox.config';
import { MESSAGE_BROKER } from '../messaging/message-broker';
import { OutboxMessageEntity } from './entities/outbox-message.entity';
import { InMemoryOutboxStore } from './in-memory-outbox.store';
import { OutboxController } from './outbox.controller';
import { OutboxMessageBrokerDecorator } from './outbox-message-broker.decorator';
import { OUTBOX_OPTIONS } from './outbox.options';
import { OUTBOX_STORE } from './outbox-store';
import { OutboxWorker } from './outbox.worker';
import { SqlOutboxStore } from './sql-outbox.store';

export interface OutboxModuleOptions {
  store: OutboxStoreKind;
}

@Module({})
export class OutboxModule {
  static forRoot({ store }: OutboxModuleOptions): DynamicModule {
    const storeProvider: Provider =
      store === 'sql'
        ? {
            provide: OUTBOX_STORE,
            inject: [getDataSourceToken()],
            useFactory: (dataSource: DataSource) =>
              new SqlOutboxStore(dataSource),
          }
        : { provide: OUTBOX_STORE, useValue: new InMemoryOutboxStore() };

    return {
      module: OutboxModule,
      imports:
        store === 'sql'
          ? [TypeOrmModule.forFeature([OutboxMessageEntity])]
          : [],
      controllers: [OutboxController],
      providers: [
        {
          provide: OUTBOX_OPTIONS,
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            buildOutboxOptions(configService),
        },
        storeProvider,
        OutboxMessageBrokerDecorator,
        { provide: MESSAGE_BROKER, useExisting: OutboxMessageBrokerDecorator },
        OutboxWorker,
      ],
      exports: [MESSAGE_BROKER, OUTBOX_STORE, OUTBOX_OPTIONS, OutboxWorker],
    };
  }
}
