import { ApiProperty } from '@nestjs/swagger';
import {
  IsDefined,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';

export class PublishMessageDto {
  @ApiProperty({ example: 'OrderPlaced' })
  @IsNotEmpty()
  @IsString()
  @MaxLength(255)
  messageType!: string;

  @ApiProperty({
    description: 'Message body, any JSON value',
    example: { orderId: 'order-1' },
  })
  @IsDefined()
  payload!: unknown;

  @ApiProperty({
    description: 'Used as the outbox record id; consumers deduplicate on it',
    required: false,
  })
  @IsOptional()
  @IsUUID()
  messageId?: string;

  @ApiProperty({ required: false, example: 'orders.placed' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  routingKey?: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  exchange?: string;

  @ApiProperty({ required: false })
  @IsOptional()
  @IsObject()
  headers?: Record<string, unknown>;
}
