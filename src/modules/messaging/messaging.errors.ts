import { BadRequestException } from '@nestjs/common';

export class InvalidArgumentException extends BadRequestException {
  constructor(
    readonly paramName: string,
    reason = 'is required',
  ) {
    super(`Argument "${paramName}" ${reason}`);
  }
}

export class MessageSerializationException extends BadRequestException {
  constructor(messageType: string, reason: string) {
    super(`Cannot serialize message of type ${messageType}: ${reason}`);
  }
}
