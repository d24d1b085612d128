import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { OutboxMessageEntity } from '../modules/outbox/entities/outbox-message.entity';
import { toInt } from './config.utils';

export const buildTypeOrmConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions => {
  const synchronize = configService.get<string>('DATABASE_SYNCHRONIZE');

  return {
    type: 'postgres',
    host: configService.get<string>('DATABASE_HOST') ?? 'localhost',
    port: toInt(configService.get<string>('DATABASE_PORT'), 5432),
    username: configService.get<string>('DATABASE_USER') ?? 'postgres',
    password: configService.get<string>('DATABASE_PASSWORD') ?? 'postgres',
    database: configService.get<string>('DATABASE_NAME') ?? 'postgres',
    entities: [OutboxMessageEntity],
    synchronize: synchronize
      ? synchronize.toLowerCase() === 'true'
      : configService.get<string>('NODE_ENV') !== 'production',
  };
};
