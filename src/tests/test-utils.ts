import { MessageBroker } from '../modules/messaging/message-broker';

export const waitFor = async (
  condition: () => boolean | Promise<boolean>,
  timeoutMs = 3000,
): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
};

export const createBrokerMock = (): jest.Mocked<MessageBroker> => ({
  publish: jest.fn().mockResolvedValue(undefined),
  subscribe: jest.fn().mockResolvedValue(undefined),
  start: jest.fn().mockResolvedValue(undefined),
  stop: jest.fn().mockResolvedValue(undefined),
});

export class OrderPlaced {
  constructor(readonly orderId: string) {}
}
