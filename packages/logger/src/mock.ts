/** Mock logger for testing */

import { vi } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@fixturekit/logger/mock';
 *
 * const logger = createMockLogger();
 * const comparator = createComparator({ logger });
 *
 * comparator.equal(1, 2);
 *
 * const child = logger.child.mock.results[0].value;
 * expect(child.debug).toHaveBeenCalledWith('mismatch_found', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  const child = vi.fn();
  // child() returns a new mock logger that also has spy functions
  child.mockImplementation(() => createMockLogger());

  return {
    child,
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };
}
