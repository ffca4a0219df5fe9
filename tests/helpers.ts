/**
 * @fileoverview Shared test helpers
 */

/**
 * Run `action` and return what it threw, or `undefined` if it returned.
 */
export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

/**
 * Async variant of {@link captureError}.
 */
export async function captureRejection(action: () => Promise<unknown>): Promise<unknown> {
  try {
    await action();
  } catch (error) {
    return error;
  }
  return undefined;
}
