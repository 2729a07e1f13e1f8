/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types';

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
 * import { createMockLogger } from '@tokweave/logger/mock';
 *
 * const logger = createMockLogger();
 * const engine = new Engine(source, rules, { logger });
 *
 * engine.nextToken();
 *
 * expect(logger.debug).toHaveBeenCalledWith('rule_matched', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    child: vi.fn((_metadata: Record<string, unknown>): Logger => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };
}
