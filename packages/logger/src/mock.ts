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
  flush: ReturnType<typeof vi.fn>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@tokenloom/logger/mock';
 *
 * const logger = createMockLogger();
 * const tokenizer = Tokenizer.withConfig({}, { logger });
 *
 * tokenizer.tokenize('x');
 *
 * expect(logger.debug).toHaveBeenCalledWith('tokenize_completed', {
 *   input_length: 1,
 *   token_count: 1,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a fresh mock that also has spy functions
    child: vi.fn(() => createMockLogger()),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn().mockResolvedValue(undefined),
  };
}
