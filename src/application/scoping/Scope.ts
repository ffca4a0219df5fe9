/**
 * @fileoverview Scope - One Unit of Work
 *
 * @packageDocumentation
 * @module sinew-di/application/scoping
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A scope caches one instance per scoped registration and disposes what it
 * created when it ends. Each (registration, scope) pair moves through
 * `uncreated → created → disposed` exactly once.
 *
 * ```
 * Scope 3f2c…                     disposal order
 *   created: Connection            3. Connection
 *            UnitOfWork            2. UnitOfWork
 *            OrderService          1. OrderService
 * ```
 *
 * Ending a scope first runs the `whenScopeEnds` actions in registration
 * order, then disposes instances newest first. A failing disposal does not
 * stop the others; all failures are raised together as a
 * {@link DisposalError}.
 */

import { v4 as uuidv4 } from 'uuid';

import { ServiceKey } from '../../domain/keys';
import { IAsyncDisposable, IDisposable } from '../../domain/disposal';
import { DisposalError, ScopeViolationError } from '../../domain/exceptions';
import type { LazyCollection } from '../di';
import type { ILogger } from '../logging';
import type { Registration, ScopedInstanceCache } from '../registration';
import { DisposalTracker } from './DisposalTracker';
import type { ScopedLifestyle } from './ScopedLifestyle';

export enum ScopeState {
  Active = 'active',
  Disposing = 'disposing',
  Disposed = 'disposed',
}

/**
 * The container as seen by its scopes.
 */
export interface ScopeHost {
  readonly name: string;
  readonly logger: ILogger;
  readonly scopedLifestyle: ScopedLifestyle | undefined;
  resolveInScope<T>(key: ServiceKey<T>, scope: Scope): T;
  resolveAllInScope<T>(key: ServiceKey<T>, scope: Scope): LazyCollection<T>;
}

export class Scope implements ScopedInstanceCache {
  readonly id: string = uuidv4();

  private currentState = ScopeState.Active;
  private readonly instances = new Map<Registration, unknown>();
  private readonly disposables = new DisposalTracker();
  private readonly endActions: Array<() => void> = [];

  constructor(
    readonly host: ScopeHost,
    readonly lifestyle: ScopedLifestyle,
  ) {
    host.logger.debug(`Scope ${this.id} started (${lifestyle.name})`);
  }

  get state(): ScopeState {
    return this.currentState;
  }

  /** Whether {@link dispose} would refuse because of an async-only instance */
  get requiresAsyncDisposal(): boolean {
    return this.disposables.hasAsyncOnly;
  }

  private get description(): string {
    return `scope ${this.id}`;
  }

  /**
   * Resolve `key` with this scope supplying scoped instances.
   */
  getInstance<T>(key: ServiceKey<T>): T {
    this.assertActive();
    return this.host.resolveInScope(key, this);
  }

  getAllInstances<T>(key: ServiceKey<T>): LazyCollection<T> {
    this.assertActive();
    return this.host.resolveAllInScope(key, this);
  }

  getOrCreate(registration: Registration, create: () => unknown): unknown {
    this.assertActive(registration.displayName);
    if (this.instances.has(registration)) {
      return this.instances.get(registration);
    }
    const instance = create();
    this.instances.set(registration, instance);
    this.disposables.track(instance);
    return instance;
  }

  /**
   * Dispose `disposable` when this scope ends, together with the instances
   * the scope created.
   */
  registerForDisposal(disposable: IDisposable | IAsyncDisposable): void {
    this.assertActive();
    this.disposables.track(disposable);
  }

  /**
   * Run `action` when this scope ends, before any instance is disposed.
   */
  whenScopeEnds(action: () => void): void {
    this.assertActive();
    this.endActions.push(action);
  }

  /**
   * End the scope synchronously. Calling it again has no effect.
   *
   * @throws ScopeViolationError if an instance only supports `disposeAsync`;
   * the scope stays active in that case
   * @throws DisposalError if any action or disposal failed
   */
  dispose(): void {
    if (this.currentState !== ScopeState.Active) {
      return;
    }
    this.disposables.assertSyncDisposable(this.description);
    const errors = this.runEndActions();
    this.disposables.assertSyncDisposable(this.description);

    this.currentState = ScopeState.Disposing;
    errors.push(...this.disposables.disposeSync());
    this.finish(errors);
  }

  /**
   * End the scope, awaiting `disposeAsync` where instances provide it.
   *
   * @throws DisposalError if any action or disposal failed
   */
  async disposeAsync(): Promise<void> {
    if (this.currentState !== ScopeState.Active) {
      return;
    }
    const errors = this.runEndActions();

    this.currentState = ScopeState.Disposing;
    errors.push(...(await this.disposables.disposeAsync()));
    this.finish(errors);
  }

  private runEndActions(): unknown[] {
    const errors: unknown[] = [];
    // Actions may register further actions while running.
    for (let i = 0; i < this.endActions.length; i++) {
      try {
        this.endActions[i]();
      } catch (error) {
        errors.push(error);
      }
    }
    this.endActions.length = 0;
    return errors;
  }

  private finish(errors: unknown[]): void {
    this.currentState = ScopeState.Disposed;
    this.instances.clear();
    this.host.logger.debug(`Scope ${this.id} ended`);

    if (errors.length > 0) {
      errors.forEach((error) =>
        this.host.logger.error(`Disposal failed while ending ${this.description}`, error),
      );
      throw new DisposalError(errors, this.description);
    }
  }

  private assertActive(serviceName?: string): void {
    if (this.currentState !== ScopeState.Active) {
      throw new ScopeViolationError(
        `${this.description} has already ended; instances can no longer be resolved from it`,
        serviceName,
      );
    }
  }
}
