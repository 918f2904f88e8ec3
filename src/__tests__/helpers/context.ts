import pino from 'pino';
import { ToolHandlerContext } from '../../mcp/types/sdk-custom';

export function testContext(): ToolHandlerContext {
  return {
    logger: pino({ level: 'silent' }),
    requestId: 'test-request',
    sendProgress: jest.fn(async () => undefined),
  };
}
