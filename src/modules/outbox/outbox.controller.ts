import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MESSAGE_BROKER, MessageBroker } from '../messaging/message-broker';
import { DEFAULT_LIST_LIMIT, OutboxQueryDto } from './dto/outbox-query.dto';
import { PublishMessageDto } from './dto/publish-message.dto';
import { OutboxMessage } from './outbox-message';
import { OUTBOX_STORE, OutboxStore } from './outbox-store';

export interface OutboxMessageView extends Omit<OutboxMessage, 'payload'> {
  /** base64 */
  payload: string;
}

const toView = (message: OutboxMessage): OutboxMessageView => ({
  ...message,
  payload: message.payload.toString('base64'),
});

@ApiTags('outbox')
@Controller('outbox')
export class OutboxController {
  constructor(
    @Inject(MESSAGE_BROKER) private readonly broker: MessageBroker,
    @Inject(OUTBOX_STORE) private readonly store: OutboxStore,
  ) {}

  @Post('messages')
  @HttpCode(HttpStatus.ACCEPTED)
  async publish(@Body() dto: PublishMessageDto): Promise<{ accepted: true }> {
    await this.broker.publish(dto.payload, {
      messageType: dto.messageType,
      messageId: dto.messageId,
      routingKey: dto.routingKey,
      exchange: dto.exchange,
      headers: dto.headers,
    });
    return { accepted: true };
  }

  @Get('pending')
  async pending(@Query() query: OutboxQueryDto): Promise<OutboxMessageView[]> {
    const messages = await this.store.getPending(
      query.limit ?? DEFAULT_LIST_LIMIT,
    );
    return messages.map(toView);
  }

  @Get('failed')
  async failed(@Query() query: OutboxQueryDto): Promise<OutboxMessageView[]> {
    const messages = await this.store.getFailed(
      query.limit ?? DEFAULT_LIST_LIMIT,
    );
    return messages.map(toView);
  }

  @Get('messages/:id')
  async findOne(@Param('id') id: string): Promise<OutboxMessageView> {
    const message = await this.store.getById(id);
    if (!message) {
      throw new NotFoundException(`Outbox message ${id} not found`);
    }
    return toView(message);
  }
}
