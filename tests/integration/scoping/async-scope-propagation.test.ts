/**
 * @file Async Scope Propagation Integration Tests
 * @description Validates that the active scope follows the async call chain
 *
 * WHY THIS MATTERS:
 * - Handlers resolve their unit of work without it being passed to them
 * - Work started inside a scope must keep seeing that scope after awaits,
 *   timers and parallel branches
 *
 * CRITICAL GUARANTEES:
 * ✅ Scope available in Promise.then() chains
 * ✅ Scope available in Promise.all() branches
 * ✅ Scope available in setTimeout/setImmediate callbacks
 * ✅ Scopes isolated between concurrent runs
 * ✅ No scope leaks out of run()
 */

import { describe, it, expect } from '@jest/globals';
import { AsyncScopedLifestyle, Container, ScopeViolationError, silentLogger } from '../../../src/index';

class RequestState {
  readonly id = Math.random().toString(36).slice(2);
}

function createContainer(): Container {
  const container = new Container({ logger: silentLogger, defaultScopedLifestyle: new AsyncScopedLifestyle() });
  container.registerScoped(RequestState);
  return container;
}

describe('Async Scope Propagation', () => {
  // ============================================================================
  // TEST GROUP 1: Promise Propagation
  // ============================================================================

  describe('Promise Propagation', () => {
    it('should keep the scope through a Promise.then() chain', async () => {
      const container = createContainer();

      await AsyncScopedLifestyle.run(container, async () => {
        const state = container.getInstance(RequestState);

        await Promise.resolve()
          .then(() => expect(container.getInstance(RequestState)).toBe(state))
          .then(() => expect(container.getInstance(RequestState)).toBe(state));
      });
    });

    it('should share the scope between Promise.all() branches', async () => {
      const container = createContainer();

      const ids = await AsyncScopedLifestyle.run(container, () =>
        Promise.all(
          [1, 2, 3].map(async (delay) => {
            await new Promise((resolve) => setTimeout(resolve, delay));
            return container.getInstance(RequestState).id;
          }),
        ),
      );

      expect(new Set(ids).size).toBe(1);
    });
  });

  // ============================================================================
  // TEST GROUP 2: Timer Propagation
  // ============================================================================

  describe('Timer Propagation', () => {
    it('should keep the scope in setTimeout callbacks', async () => {
      const container = createContainer();

      await AsyncScopedLifestyle.run(container, async () => {
        const state = container.getInstance(RequestState);
        const fromTimer = await new Promise<RequestState>((resolve) =>
          setTimeout(() => resolve(container.getInstance(RequestState)), 5),
        );

        expect(fromTimer).toBe(state);
      });
    });

    it('should keep the scope in setImmediate callbacks', async () => {
      const container = createContainer();

      await AsyncScopedLifestyle.run(container, async () => {
        const state = container.getInstance(RequestState);
        const fromImmediate = await new Promise<RequestState>((resolve) =>
          setImmediate(() => resolve(container.getInstance(RequestState))),
        );

        expect(fromImmediate).toBe(state);
      });
    });
  });

  // ============================================================================
  // TEST GROUP 3: Isolation
  // ============================================================================

  describe('Isolation', () => {
    it('should isolate concurrent runs', async () => {
      const container = createContainer();

      const ids = await Promise.all(
        Array.from({ length: 5 }, (_, index) =>
          AsyncScopedLifestyle.run(container, async () => {
            const before = container.getInstance(RequestState).id;
            await new Promise((resolve) => setTimeout(resolve, 5 - index));
            expect(container.getInstance(RequestState).id).toBe(before);
            return before;
          }),
        ),
      );

      expect(new Set(ids).size).toBe(5);
    });

    it('should keep scopes of different containers apart', async () => {
      const orders = createContainer();
      const billing = createContainer();

      await AsyncScopedLifestyle.run(orders, async (ordersScope) => {
        await AsyncScopedLifestyle.run(billing, (billingScope) => {
          expect(AsyncScopedLifestyle.getCurrentScope(orders)).toBe(ordersScope);
          expect(AsyncScopedLifestyle.getCurrentScope(billing)).toBe(billingScope);
        });
      });
    });

    it('should not leak the scope out of run', async () => {
      const container = createContainer();

      await AsyncScopedLifestyle.run(container, () => container.getInstance(RequestState));

      expect(() => container.getInstance(RequestState)).toThrow(ScopeViolationError);
    });

    it('should end the scope before callbacks scheduled inside it run', async () => {
      const container = createContainer();
      let late: Promise<unknown> = Promise.resolve();

      await AsyncScopedLifestyle.run(container, () => {
        late = new Promise((resolve, reject) =>
          setTimeout(() => {
            try {
              resolve(container.getInstance(RequestState));
            } catch (error) {
              reject(error);
            }
          }, 5),
        );
      });

      await expect(late).rejects.toThrow('has already ended; instances can no longer be resolved from it');
    });
  });
});
