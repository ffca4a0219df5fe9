/**
 * @fileoverview Jest test setup and global utilities
 *
 * Loads reflect-metadata before any decorated class and provides custom
 * matchers for container errors.
 */

import 'reflect-metadata';

// ============================================================================
// Global Type Declarations
// ============================================================================

type ErrorType = abstract new (...args: never[]) => Error;

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: ErrorType): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => unknown, expected: ErrorType) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },
});
