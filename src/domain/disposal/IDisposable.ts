/**
 * @fileoverview Disposal contracts
 *
 * @module sinew-di/domain/disposal
 *
 * Components that hold resources implement `dispose()` and/or
 * `disposeAsync()`. Scopes call them in reverse creation order.
 */

export interface IDisposable {
  dispose(): void;
}

export interface IAsyncDisposable {
  disposeAsync(): Promise<void>;
}

export function isDisposable(value: unknown): value is IDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

export function isAsyncDisposable(value: unknown): value is IAsyncDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'disposeAsync' in value &&
    typeof value.disposeAsync === 'function'
  );
}

/**
 * Whether instances of a class will be disposable, judged from its prototype.
 * Used by diagnostics, which never create instances.
 */
export function isDisposableType(type: abstract new (...args: never[]) => unknown): boolean {
  const prototype: unknown = type.prototype;
  return isDisposable(prototype) || isAsyncDisposable(prototype);
}
