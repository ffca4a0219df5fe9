/**
 * @module sinew-di/application/scoping
 */

import {
  IAsyncDisposable,
  IDisposable,
  isAsyncDisposable,
  isDisposable,
} from '../../domain/disposal';
import { ScopeViolationError } from '../../domain/exceptions';

type Disposable = IDisposable | IAsyncDisposable;

function nameOf(instance: Disposable): string {
  return instance.constructor.name || 'object';
}

/**
 * Disposable instances in creation order. Disposal runs in reverse, so a
 * component is always disposed before the dependencies it was built from.
 */
export class DisposalTracker {
  private readonly items: Disposable[] = [];
  private readonly tracked = new Set<Disposable>();

  get size(): number {
    return this.items.length;
  }

  /**
   * Track `instance` if it can be disposed. Tracking the same object twice
   * has no effect.
   */
  track(instance: unknown): void {
    if (!isDisposable(instance) && !isAsyncDisposable(instance)) {
      return;
    }
    if (!this.tracked.has(instance)) {
      this.tracked.add(instance);
      this.items.push(instance);
    }
  }

  /** Whether some tracked instance can only be disposed with `disposeAsync` */
  get hasAsyncOnly(): boolean {
    return this.items.some((item) => !isDisposable(item));
  }

  /**
   * @throws ScopeViolationError when an instance only supports asynchronous
   * disposal
   */
  assertSyncDisposable(owner: string): void {
    const asyncOnly = this.items.find((item) => !isDisposable(item));
    if (asyncOnly) {
      throw new ScopeViolationError(
        `'${nameOf(asyncOnly)}' only supports asynchronous disposal; end ${owner} with disposeAsync()`,
      );
    }
  }

  /**
   * Dispose every tracked instance, newest first.
   *
   * @returns the errors thrown by individual instances
   */
  disposeSync(): unknown[] {
    const errors: unknown[] = [];
    for (const item of this.drain()) {
      try {
        if (isDisposable(item)) {
          item.dispose();
        }
      } catch (error) {
        errors.push(error);
      }
    }
    return errors;
  }

  /**
   * Dispose every tracked instance, newest first, preferring `disposeAsync`.
   *
   * @returns the errors thrown or rejected by individual instances
   */
  async disposeAsync(): Promise<unknown[]> {
    const errors: unknown[] = [];
    for (const item of this.drain()) {
      try {
        if (isAsyncDisposable(item)) {
          await item.disposeAsync();
        } else {
          item.dispose();
        }
      } catch (error) {
        errors.push(error);
      }
    }
    return errors;
  }

  private drain(): Disposable[] {
    const reversed = [...this.items].reverse();
    this.items.length = 0;
    this.tracked.clear();
    return reversed;
  }
}
