/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = (event_type: string, metadata?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => Logger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@knox-integ/logger/mock';
 *
 * const logger = createMockLogger();
 * await submitBatch(plan, channel, { logger });
 *
 * expect(logger.info).toHaveBeenCalledWith('batch_submitted', {
 *   entries: 25,
 *   chunks: 3,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn<(metadata: Record<string, unknown>) => Logger>(),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };

  // Children log into the same spies, so calls made through a child
  // can be asserted on the logger the test created.
  mockLogger.child.mockImplementation(() => mockLogger);

  return mockLogger;
}
