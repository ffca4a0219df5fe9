/**
 * @fileoverview Scoped Lifestyles - How the Active Scope Is Found
 *
 * @module sinew-di/application/scoping
 *
 * A container is configured with exactly one scoped lifestyle, and scopes of
 * the other kind can never be begun on it:
 *
 * | Lifestyle | Active scope found through | Begun with |
 * |-----------|----------------------------|------------|
 * | {@link AsyncScopedLifestyle} | the async call chain (AsyncLocalStorage) | `AsyncScopedLifestyle.run(container, fn)` |
 * | {@link ExplicitScopedLifestyle} | nothing: the scope object is passed around | `ExplicitScopedLifestyle.beginScope(container)` |
 */

import { AsyncLocalStorage } from 'async_hooks';

import { ScopeViolationError } from '../../domain/exceptions';
import { Scope, ScopeHost } from './Scope';

export abstract class ScopedLifestyle {
  abstract readonly name: string;

  /** Whether the active scope is found without being passed explicitly */
  abstract readonly ambient: boolean;

  abstract getCurrentScope(host: ScopeHost): Scope | undefined;
}

function requireLifestyle<L extends ScopedLifestyle>(
  host: ScopeHost,
  type: abstract new () => L,
  requested: string,
): L {
  const lifestyle = host.scopedLifestyle;
  if (!(lifestyle instanceof type)) {
    const configured = lifestyle ? `the ${lifestyle.name} lifestyle` : 'no scoped lifestyle';
    throw new ScopeViolationError(
      `Container '${host.name}' is configured with ${configured}; ` +
        `an ${requested} scope cannot be used with it`,
    );
  }
  return lifestyle;
}

/**
 * Flow-affine scoping: the scope follows the async call chain.
 *
 * @example
 * ```typescript
 * const container = new Container({ defaultScopedLifestyle: new AsyncScopedLifestyle() });
 * container.registerScoped(IUnitOfWork, UnitOfWork);
 *
 * await AsyncScopedLifestyle.run(container, async () => {
 *   const uow = container.getInstance(IUnitOfWork);
 *   await handler.handle(command);   // sees the same IUnitOfWork
 * });                                // the scope is disposed here
 * ```
 */
export class AsyncScopedLifestyle extends ScopedLifestyle {
  private static readonly storage = new AsyncLocalStorage<ReadonlyMap<ScopeHost, Scope>>();

  readonly name = 'Async Scoped';
  readonly ambient = true;

  getCurrentScope(host: ScopeHost): Scope | undefined {
    return AsyncScopedLifestyle.storage.getStore()?.get(host);
  }

  /**
   * Begin a scope, make it the active scope of `host` for everything `fn`
   * awaits, and dispose it once `fn` settles. A nested `run` shadows the
   * outer scope until it returns.
   *
   * When `fn` fails, that error is rethrown even if disposal fails too; the
   * disposal failure is logged.
   *
   * @throws ScopeViolationError if `host` uses another scoped lifestyle
   */
  static async run<R>(host: ScopeHost, fn: (scope: Scope) => R | Promise<R>): Promise<R> {
    const lifestyle = requireLifestyle(host, AsyncScopedLifestyle, 'async');
    const scope = new Scope(host, lifestyle);

    const store = new Map<ScopeHost, Scope>(AsyncScopedLifestyle.storage.getStore() ?? []);
    store.set(host, scope);

    let result: R;
    try {
      result = await AsyncScopedLifestyle.storage.run(store, () => fn(scope));
    } catch (error) {
      // Rethrow the failure of `fn`; a disposal failure on top of it is only
      // logged.
      await scope.disposeAsync().catch((disposalError: unknown) =>
        host.logger.error(`Ending scope ${scope.id} failed after its work failed`, disposalError),
      );
      throw error;
    }
    await scope.disposeAsync();
    return result;
  }

  /**
   * The scope active for `host` in the current async context.
   */
  static getCurrentScope(host: ScopeHost): Scope | undefined {
    return host.scopedLifestyle instanceof AsyncScopedLifestyle
      ? host.scopedLifestyle.getCurrentScope(host)
      : undefined;
  }
}

/**
 * Owner-affine scoping: the scope is an object its owner passes around and
 * resolves from. There is never an ambient scope, so resolving a scoped
 * service through the container itself always fails.
 *
 * @example
 * ```typescript
 * const container = new Container({ defaultScopedLifestyle: new ExplicitScopedLifestyle() });
 *
 * const scope = ExplicitScopedLifestyle.beginScope(container);
 * try {
 *   scope.getInstance(OrderService).place(order);
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export class ExplicitScopedLifestyle extends ScopedLifestyle {
  readonly name = 'Explicit Scoped';
  readonly ambient = false;

  getCurrentScope(): Scope | undefined {
    return undefined;
  }

  /**
   * @throws ScopeViolationError if `host` uses another scoped lifestyle
   */
  static beginScope(host: ScopeHost): Scope {
    return new Scope(host, requireLifestyle(host, ExplicitScopedLifestyle, 'explicit'));
  }
}
