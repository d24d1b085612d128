import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildTypeOrmConfig } from './config/database.config';
import { resolveOutboxStoreKind } from './config/outbox.config';
import { buildThrottlerConfig } from './config/throttler.config';
import { MessagingModule } from './modules/messaging/messaging.module';
import { OutboxModule } from './modules/outbox/outbox.module';

// entry points load .env before this module is evaluated
const outboxStore = resolveOutboxStoreKind(process.env.OUTBOX_STORE);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      expandVariables: true,
      cache: true,
    }),
    ...(outboxStore === 'sql'
      ? [
          TypeOrmModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (configService: ConfigService) =>
              buildTypeOrmConfig(configService),
          }),
        ]
      : []),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) =>
        buildThrottlerConfig(configService),
    }),
    MessagingModule,
    OutboxModule.forRoot({ store: outboxStore }),
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
