import { Injectable } from '@nestjs/common';
import { MessageSerializationException } from './messaging.errors';

export const MESSAGE_SERIALIZER = 'MESSAGE_SERIALIZER';

export interface MessageSerializer {
  readonly contentType: string;
  serialize(message: unknown): Buffer;
  deserialize(payload: Buffer): unknown;
}

const PRIMITIVE_TYPE_NAMES: Record<string, string> = {
  string: 'String',
  number: 'Number',
  boolean: 'Boolean',
  bigint: 'BigInt',
  symbol: 'Symbol',
  function: 'Function',
};

/**
 * Runtime type name of a message: the constructor name for class instances,
 * `Object` for plain and prototype-less objects, a boxed name for primitives.
 */
export const resolveMessageType = (message: unknown): string => {
  if (message === null || message === undefined) {
    return String(message);
  }
  if (typeof message === 'object') {
    const ctor: unknown = message.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
  }
  return PRIMITIVE_TYPE_NAMES[typeof message] ?? typeof message;
};

@Injectable()
export class JsonMessageSerializer implements MessageSerializer {
  readonly contentType = 'application/json';

  serialize(message: unknown): Buffer {
    let json: string | undefined;
    try {
      json = JSON.stringify(message);
    } catch (error) {
      throw new MessageSerializationException(
        resolveMessageType(message),
        error instanceof Error ? error.message : 'unknown error',
      );
    }

    // JSON.stringify yields undefined for functions, symbols and undefined
    if (json === undefined) {
      throw new MessageSerializationException(
        resolveMessageType(message),
        'value has no JSON representation',
      );
    }
    return Buffer.from(json, 'utf8');
  }

  deserialize(payload: Buffer): unknown {
    const value: unknown = JSON.parse(payload.toString('utf8'));
    return value;
  }
}
