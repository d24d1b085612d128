import {
  Column,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  ValueTransformer,
} from 'typeorm';
import { OutboxMessage, OutboxStatus } from '../outbox-message';

// payload bytes travel as base64 text so the column works on postgres and sqlite alike
const base64Transformer: ValueTransformer = {
  to: (value: Buffer | null | undefined) =>
    Buffer.isBuffer(value) ? value.toString('base64') : value,
  from: (value: string | null) =>
    typeof value === 'string' ? Buffer.from(value, 'base64') : value,
};

@Entity({ name: 'outbox_messages' })
@Index('idx_outbox_status_created', ['status', 'createdAt', 'sequence'])
export class OutboxMessageEntity implements OutboxMessage {
  // insertion order; breaks ties between records created in the same instant
  @PrimaryGeneratedColumn()
  sequence!: number;

  @Index('uq_outbox_message_id', { unique: true })
  @Column({ type: 'varchar', length: 64 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  messageType!: string;

  @Column({ type: 'text', transformer: base64Transformer })
  payload!: Buffer;

  @Column({ type: 'varchar', length: 255, nullable: true })
  routingKey: string | null = null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  exchange: string | null = null;

  @Column({ type: 'simple-json', nullable: true })
  headers: Record<string, unknown> | null = null;

  @Column({ type: 'varchar', length: 16, default: 'pending' })
  status: OutboxStatus = 'pending';

  @Column({ type: Date })
  createdAt!: Date;

  @Column({ type: Date, nullable: true })
  publishedAt: Date | null = null;

  @Column({ type: 'integer', default: 0 })
  retryCount = 0;

  @Column({ type: 'text', nullable: true })
  lastError: string | null = null;
}
