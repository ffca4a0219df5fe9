/**
 * @fileoverview Container - The Public Face of sinew-di
 *
 * @packageDocumentation
 * @module sinew-di/infrastructure/container
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The container ties the registration table, the resolution engine, scopes
 * and diagnostics together. Its life has two phases:
 *
 * ```
 * ┌──────────────────────┐  first resolve / verify   ┌──────────────────────┐
 * │ Registration         │ ────────────────────────> │ Resolution (locked)  │
 * │ register, decorate,  │                           │ getInstance, scopes, │
 * │ collection.*, hooks  │                           │ verify, analyze      │
 * └──────────────────────┘                           └──────────────────────┘
 * ```
 *
 * Nothing can be registered once the first producer is built, so every
 * resolution sees the same configuration.
 *
 * @example
 * ```typescript
 * const container = new Container({ defaultScopedLifestyle: new AsyncScopedLifestyle() });
 *
 * container.registerSingleton(IClock, SystemClock);
 * container.registerScoped(IUnitOfWork, UnitOfWork);
 * container.registerGeneric(ICommandHandler, CreateOrderHandler, {
 *   serves: ICommandHandler.pattern(CreateOrder),
 * });
 * container.registerDecorator(ICommandHandler, TransactionDecorator);
 *
 * container.verify();
 *
 * await AsyncScopedLifestyle.run(container, async () => {
 *   const handler = container.getInstance(ICommandHandler.of(CreateOrder));
 *   await handler.handle(new CreateOrder());
 * });
 * ```
 */

import {
  AbstractConstructor,
  Constructor,
  EMPTY_BINDINGS,
  GenericPattern,
  OpenGeneric,
  ServiceKey,
  conformsTo,
  describeKey,
  isAssignableTo,
} from '../../domain/keys';
import { ServiceLifetime, isServiceLifetime } from '../../domain/lifestyle';
import {
  ConfigurationError,
  DisposalError,
  MissingDependencyError,
  ScopeViolationError,
} from '../../domain/exceptions';
import {
  Dependency,
  DecoratorPredicateContext,
  LazyCollection,
  PredicateContext,
  Resolver,
  ServiceFactory,
  getDeclaredDependencies,
  getInjectableOptions,
} from '../../application/di';
import type { ILogger } from '../../application/logging';
import {
  CollectionElement,
  DecoratorRegistration,
  GenericRegistration,
  Registration,
  RegistrationOwner,
  RegistrationRole,
  RegistrationTable,
  closeDependencies,
  validateDependencies,
} from '../../application/registration';
import {
  InstanceProducer,
  ProducerGraph,
  ResolutionEngine,
  UnregisteredTypeHandler,
} from '../../application/resolution';
import { DisposalTracker, Scope, ScopeHost, ScopedLifestyle } from '../../application/scoping';
import {
  Analyzer,
  DiagnosticResult,
  DiagnosticSeverity,
  DiagnosticSource,
  DiagnosticVerificationError,
} from '../../application/diagnostics';
import { ContainerOptions, VerificationOption, resolveContainerOptions } from './ContainerOptions';

/**
 * Options for open-generic implementations.
 */
export interface GenericRegistrationOptions {
  /**
   * The closures this implementation serves. Defaults to every closure of
   * the open generic.
   */
  serves?: GenericPattern;

  lifetime?: ServiceLifetime;

  /** Extra condition, evaluated per closed key and consumer */
  predicate?: (context: PredicateContext) => boolean;

  /** Dependency list, instead of the one the class declares */
  inject?: readonly Dependency[];
}

export interface DecoratorOptions {
  /**
   * For open generics: the closures this decorator applies to. Defaults to
   * every closure.
   */
  serves?: GenericPattern;

  /** Defaults to the lifetime of the component being decorated */
  lifetime?: ServiceLifetime;

  predicate?: (context: DecoratorPredicateContext) => boolean;

  inject?: readonly Dependency[];
}

/**
 * Registration of collections, reached through `container.collection`.
 */
export interface CollectionRegistrar {
  /**
   * Declare the complete, ordered collection for `key`. Elements are
   * classes (registered with `lifetime`) or registrations created with
   * `container.createRegistration`.
   */
  register<T>(
    key: ServiceKey<T>,
    elements: ReadonlyArray<Constructor<T> | Registration>,
    lifetime?: ServiceLifetime,
  ): void;

  /** Add one class to the collection for `key`. */
  append<T>(key: ServiceKey<T>, implementation: Constructor<T>, lifetime?: ServiceLifetime): Registration;

  /** Add an existing instance, owned by the caller, to the collection for `key`. */
  appendInstance<T>(key: ServiceKey<T>, instance: T): Registration;

  /**
   * Declare open-generic elements: each joins the collection of every closed
   * key its pattern unifies with.
   */
  registerGeneric(
    service: OpenGeneric,
    implementations: readonly Constructor[],
    options?: GenericRegistrationOptions,
  ): void;

  appendGeneric(
    service: OpenGeneric,
    implementation: Constructor,
    options?: GenericRegistrationOptions,
  ): GenericRegistration;
}

export class Container implements RegistrationOwner, ScopeHost, DiagnosticSource, Resolver {
  readonly options: Readonly<ContainerOptions>;

  /** Collection registrations: `container.collection.register(IRule, [A, B])` */
  readonly collection: CollectionRegistrar;

  private readonly table: RegistrationTable;
  private readonly engine: ResolutionEngine;
  private readonly singletons = new DisposalTracker();
  private readonly unregisteredTypeHandlers: UnregisteredTypeHandler[] = [];

  private verified = false;
  private verifying = false;
  private disposed = false;

  constructor(options: Partial<ContainerOptions> = {}) {
    this.options = resolveContainerOptions(options);

    this.table = new RegistrationTable({
      allowOverridingRegistrations: this.options.allowOverridingRegistrations,
      logger: this.options.logger,
    });

    const lifestyle = this.options.defaultScopedLifestyle;
    this.engine = new ResolutionEngine({
      table: this.table,
      owner: this,
      logger: this.options.logger,
      scopes: {
        ambient: lifestyle?.ambient ?? false,
        current: () => this.currentScope(),
      },
      unregisteredTypeHandlers: this.unregisteredTypeHandlers,
      resolveUnregisteredConcreteTypes: this.options.resolveUnregisteredConcreteTypes,
      resolveUnregisteredCollections: this.options.resolveUnregisteredCollections,
      suppressLifestyleMismatchVerification: this.options.suppressLifestyleMismatchVerification,
    });

    this.collection = {
      register: <T>(
        key: ServiceKey<T>,
        elements: ReadonlyArray<Constructor<T> | Registration>,
        lifetime?: ServiceLifetime,
      ): void => {
        const registrations = elements.map((element) =>
          element instanceof Registration
            ? this.adopt(key, element)
            : this.createClassRegistration(key, element, lifetime, 'collection-element'),
        );
        this.table.registerCollection(key, registrations);
      },

      append: <T>(key: ServiceKey<T>, implementation: Constructor<T>, lifetime?: ServiceLifetime): Registration => {
        const registration = this.createClassRegistration(key, implementation, lifetime, 'collection-element');
        this.table.appendToCollection(key, registration);
        return registration;
      },

      appendInstance: <T>(key: ServiceKey<T>, instance: T): Registration => {
        const registration = this.createInstanceRegistration(key, instance, 'collection-element');
        this.table.appendToCollection(key, registration);
        return registration;
      },

      registerGeneric: (
        service: OpenGeneric,
        implementations: readonly Constructor[],
        options: GenericRegistrationOptions = {},
      ): void => {
        const elements: CollectionElement[] = implementations.map((implementation) =>
          this.createGenericRegistration(service, implementation, options, 'collection-element'),
        );
        this.table.registerCollection(service, elements);
      },

      appendGeneric: (
        service: OpenGeneric,
        implementation: Constructor,
        options: GenericRegistrationOptions = {},
      ): GenericRegistration => {
        const registration = this.createGenericRegistration(service, implementation, options, 'collection-element');
        this.table.appendToCollection(service, registration);
        return registration;
      },
    };
  }

  get name(): string {
    return this.options.name;
  }

  get logger(): ILogger {
    return this.options.logger;
  }

  get scopedLifestyle(): ScopedLifestyle | undefined {
    return this.options.defaultScopedLifestyle;
  }

  /** Whether registration is closed because a producer was built. */
  get isLocked(): boolean {
    return this.table.isLocked;
  }

  get isVerified(): boolean {
    return this.verified;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register `implementation` for `key`. Without an implementation the key
   * must be a class and is registered for itself. Give an abstract key an
   * implementation: nothing at run time tells it apart from a concrete one.
   *
   * The lifetime defaults to the class's `@Injectable` lifetime, then to
   * `options.defaultLifetime`.
   *
   * @returns the registration, e.g. to suppress a diagnostic on it
   * @throws ConfigurationError for a duplicate key, a locked container, or
   * dependencies that cannot be determined
   */
  register<T>(key: ServiceKey<T>, implementation?: Constructor<T>, lifetime?: ServiceLifetime): Registration {
    const type = implementation ?? (typeof key === 'function' ? key : undefined);
    if (!type) {
      throw new ConfigurationError(
        `'${describeKey(key)}' is not a class; an implementation must be supplied`,
        describeKey(key),
      );
    }
    const registration = this.createClassRegistration(key, type, lifetime, 'service');
    this.table.register(key, registration);
    return registration;
  }

  registerSingleton<T>(key: ServiceKey<T>, implementation?: Constructor<T>): Registration {
    return this.register(key, implementation, ServiceLifetime.Singleton);
  }

  registerScoped<T>(key: ServiceKey<T>, implementation?: Constructor<T>): Registration {
    return this.register(key, implementation, ServiceLifetime.Scoped);
  }

  registerTransient<T>(key: ServiceKey<T>, implementation?: Constructor<T>): Registration {
    return this.register(key, implementation, ServiceLifetime.Transient);
  }

  /**
   * Register a factory. The factory receives a resolver bound to the scope
   * the instance is created in.
   */
  registerFactory<T>(key: ServiceKey<T>, factory: ServiceFactory<T>, lifetime?: ServiceLifetime): Registration {
    const registration = this.buildFactoryRegistration(factory, lifetime, describeKey(key));
    this.table.register(key, registration);
    return registration;
  }

  /**
   * Register an existing object as a singleton. The caller owns it; the
   * container never disposes it.
   */
  registerInstance<T>(key: ServiceKey<T>, instance: T): Registration {
    const registration = this.createInstanceRegistration(key, instance, 'service');
    this.table.register(key, registration);
    return registration;
  }

  /**
   * Register one of several implementations for `key`, chosen per consumer.
   * Exactly one conditional registration must apply to each request.
   *
   * @example
   * ```typescript
   * container.registerConditional(ILogger, FileLogger, ServiceLifetime.Singleton,
   *   (c) => c.consumer?.implementation === AuditService);
   * container.registerConditional(ILogger, ConsoleLogger, ServiceLifetime.Singleton,
   *   (c) => !c.handled);
   * ```
   */
  registerConditional<T>(
    key: ServiceKey<T>,
    implementation: Constructor<T>,
    lifetime: ServiceLifetime | undefined,
    predicate: (context: PredicateContext) => boolean,
  ): Registration {
    const registration = this.createClassRegistration(key, implementation, lifetime, 'service');
    this.table.registerConditional(key, { registration, predicate });
    return registration;
  }

  /**
   * Register an open implementation for an open-generic service.
   *
   * @example
   * ```typescript
   * const TEntity = typeParam('TEntity', { extends: Entity });
   * container.registerGeneric(IRepository, InMemoryRepository, {
   *   serves: IRepository.pattern(TEntity),
   *   lifetime: ServiceLifetime.Singleton,
   * });
   * ```
   */
  registerGeneric(
    service: OpenGeneric,
    implementation: Constructor,
    options: GenericRegistrationOptions = {},
  ): GenericRegistration {
    const registration = this.createGenericRegistration(service, implementation, options, 'service');
    this.table.registerGeneric(registration);
    return registration;
  }

  /**
   * Wrap every registration of `target` (a key, or every closure of an open
   * generic) in `decorator`. Decorators apply in registration order; the
   * first registered is the innermost.
   */
  registerDecorator(
    target: ServiceKey | OpenGeneric,
    decorator: Constructor,
    options: DecoratorOptions = {},
  ): DecoratorRegistration {
    const name = describeKey(decorator);
    const lifetime = options.lifetime === undefined ? undefined : this.resolveLifetime(name, options.lifetime);
    const registration = new DecoratorRegistration(
      this,
      target,
      decorator,
      options.inject ?? getDeclaredDependencies(decorator),
      lifetime,
      options.serves,
      options.predicate,
    );
    this.table.registerDecorator(registration);
    return registration;
  }

  /**
   * Run `action` on every instance of `type` the container creates.
   */
  registerInitializer<T>(type: AbstractConstructor<T>, action: (instance: T) => void): void {
    this.table.registerInitializer({
      type,
      action: (instance) => {
        if (instance instanceof type) {
          action(instance);
        }
      },
    });
  }

  /**
   * Add a handler that may supply a registration for keys that have none.
   */
  onResolveUnregisteredType(handler: UnregisteredTypeHandler): void {
    this.table.assertUnlocked();
    this.unregisteredTypeHandlers.push(handler);
  }

  /**
   * Create a registration without binding it, so it can be bound to several
   * keys with {@link addRegistration} and share one instance per lifetime.
   *
   * @example
   * ```typescript
   * const registration = container.createRegistration(FileStore, ServiceLifetime.Singleton);
   * container.addRegistration(IReader, registration);
   * container.addRegistration(IWriter, registration);
   * ```
   */
  createRegistration<T>(implementation: Constructor<T>, lifetime?: ServiceLifetime): Registration {
    return this.createClassRegistration(implementation, implementation, lifetime, 'service');
  }

  createFactoryRegistration<T>(factory: ServiceFactory<T>, lifetime?: ServiceLifetime): Registration {
    return this.buildFactoryRegistration(factory, lifetime, 'factory');
  }

  addRegistration(key: ServiceKey, registration: Registration): void {
    this.table.register(key, this.adopt(key, registration));
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Resolve `key` in the active scope, if any.
   *
   * @throws MissingDependencyError, AmbiguousResolutionError,
   * ScopeViolationError, CircularDependencyError, LifestyleMismatchError or
   * ActivationError
   */
  getInstance<T>(key: ServiceKey<T>): T {
    this.beforeResolve();
    return this.engine.resolve(key, this.currentScope());
  }

  /**
   * Like {@link getInstance}, but `undefined` when `key` itself has no
   * registration. Every other failure is still thrown.
   */
  tryGetInstance<T>(key: ServiceKey<T>): T | undefined {
    try {
      return this.getInstance(key);
    } catch (error) {
      if (
        error instanceof MissingDependencyError &&
        error.consumerChain.length === 0 &&
        error.serviceName === describeKey(key)
      ) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * The collection registered for `key`. The same object is returned on
   * every call; elements are resolved when it is iterated.
   */
  getAllInstances<T>(key: ServiceKey<T>): LazyCollection<T> {
    this.beforeResolve();
    return this.engine.resolveCollection(key, this.currentScope());
  }

  /**
   * The producer for `key`, or `undefined` when the key has no registration.
   */
  getRegistration(key: ServiceKey): InstanceProducer | undefined {
    this.assertNotDisposed();
    try {
      return this.engine.getProducer(key);
    } catch (error) {
      if (error instanceof MissingDependencyError && error.consumerChain.length === 0) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Every producer built so far.
   */
  getCurrentRegistrations(): InstanceProducer[] {
    return this.engine.getCurrentProducers();
  }

  resolveInScope<T>(key: ServiceKey<T>, scope: Scope): T {
    this.assertOwnScope(scope);
    this.beforeResolve();
    return this.engine.resolve(key, scope);
  }

  resolveAllInScope<T>(key: ServiceKey<T>, scope: Scope): LazyCollection<T> {
    this.assertOwnScope(scope);
    this.beforeResolve();
    return this.engine.resolveCollection(key, scope);
  }

  // ==========================================================================
  // Verification & Diagnostics
  // ==========================================================================

  /**
   * Build every registration, create every instance once (scoped ones in a
   * throw-away scope) and iterate every collection. With
   * `VerificationOption.VerifyAndDiagnose` the analyzer runs afterwards and
   * any warning fails verification.
   *
   * @throws the first resolution error, or DiagnosticVerificationError
   */
  verify(option: VerificationOption = VerificationOption.VerifyAndDiagnose): void {
    this.assertNotDisposed();
    this.verifying = true;
    try {
      this.engine.buildRegistered();
      this.createEveryInstance();

      if (option === VerificationOption.VerifyAndDiagnose) {
        const warnings = this.analyze().filter(
          (result) => result.severity !== DiagnosticSeverity.Information,
        );
        if (warnings.length > 0) {
          warnings.forEach((result) => this.logger.warn(`[${result.type}] ${result.description}`));
          throw new DiagnosticVerificationError(warnings);
        }
      }

      this.verified = true;
      this.logger.info(
        `Container '${this.name}' verified: ${this.engine.getCurrentProducers().length} ` +
          `registration(s), ${this.engine.getCurrentCollections().length} collection(s)`,
      );
    } finally {
      this.verifying = false;
    }
  }

  /**
   * Run the analyzer over this container.
   */
  analyze(): DiagnosticResult[] {
    return Analyzer.analyze(this);
  }

  collectProducerGraph(): ProducerGraph {
    return this.engine.collectGraph();
  }

  // ==========================================================================
  // Disposal
  // ==========================================================================

  trackSingleton(instance: unknown): void {
    this.singletons.track(instance);
  }

  /**
   * Dispose container-owned singletons, newest first.
   *
   * @throws ScopeViolationError if a singleton only supports `disposeAsync`
   * @throws DisposalError if any disposal failed
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.singletons.assertSyncDisposable(`container '${this.name}'`);
    this.disposed = true;
    this.finishDisposal(this.singletons.disposeSync());
  }

  async disposeAsync(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.finishDisposal(await this.singletons.disposeAsync());
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private currentScope(): Scope | undefined {
    return this.options.defaultScopedLifestyle?.getCurrentScope(this);
  }

  private beforeResolve(): void {
    this.assertNotDisposed();
    if (this.options.enableAutoVerification && !this.verified && !this.verifying) {
      this.verify();
    }
  }

  private createEveryInstance(): void {
    const lifestyle = this.options.defaultScopedLifestyle;
    const scope = lifestyle ? new Scope(this, lifestyle) : undefined;
    try {
      const context = this.engine.createContext(scope);
      for (const producer of this.engine.getCurrentProducers()) {
        producer.getInstance(context);
      }
      for (const collection of this.engine.getCurrentCollections()) {
        collection.elements.forEach((element) => element.getInstance(context));
      }
    } finally {
      if (scope) {
        this.endVerificationScope(scope);
      }
    }
  }

  /**
   * End the verification scope before `verify` returns. A scope holding an
   * instance that only supports `disposeAsync` is ended in the background.
   */
  private endVerificationScope(scope: Scope): void {
    const report = (error: unknown): void => this.logger.error('Ending the verification scope failed', error);
    if (scope.requiresAsyncDisposal) {
      scope.disposeAsync().catch(report);
      return;
    }
    try {
      scope.dispose();
    } catch (error) {
      report(error);
    }
  }

  private finishDisposal(errors: unknown[]): void {
    this.logger.debug(`Container '${this.name}' disposed`);
    if (errors.length > 0) {
      errors.forEach((error) => this.logger.error(`Disposal failed while disposing container '${this.name}'`, error));
      throw new DisposalError(errors, `container '${this.name}'`);
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ScopeViolationError(`Container '${this.name}' has been disposed`);
    }
  }

  private assertOwnScope(scope: Scope): void {
    if (scope.host !== this) {
      throw new ScopeViolationError(
        `Scope ${scope.id} belongs to container '${scope.host.name}', not '${this.name}'`,
      );
    }
  }

  private resolveLifetime(name: string, lifetime: ServiceLifetime | undefined): ServiceLifetime {
    const resolved = lifetime ?? this.options.defaultLifetime;
    if (!isServiceLifetime(resolved)) {
      throw new ConfigurationError(`Unknown lifetime '${String(resolved)}' for '${name}'`, name);
    }
    if (resolved === ServiceLifetime.Scoped && !this.options.defaultScopedLifestyle) {
      throw new ConfigurationError(
        `'${name}' is registered as Scoped, but the container has no defaultScopedLifestyle`,
        name,
      );
    }
    return resolved;
  }

  /**
   * Check that a registration created elsewhere may be bound to `key`.
   */
  private adopt(key: ServiceKey, registration: Registration): Registration {
    if (registration.owner !== this) {
      throw new ConfigurationError(
        `The registration of '${registration.displayName}' belongs to container ` +
          `'${registration.owner.name}'`,
        registration.displayName,
      );
    }
    if (registration.implementation) {
      this.assertImplements(key, registration.implementation);
    }
    return registration;
  }

  private assertImplements(key: ServiceKey, implementation: AbstractConstructor): void {
    if (typeof key === 'function' && !isAssignableTo(implementation, key)) {
      throw new ConfigurationError(
        `'${describeKey(implementation)}' cannot be registered for '${describeKey(key)}' ` +
          'because it does not derive from it',
        describeKey(key),
      );
    }
  }

  private createClassRegistration(
    key: ServiceKey,
    implementation: AbstractConstructor,
    lifetime: ServiceLifetime | undefined,
    role: RegistrationRole,
  ): Registration {
    const name = describeKey(implementation);
    this.assertImplements(key, implementation);

    const resolvedLifetime = this.resolveLifetime(name, lifetime ?? getInjectableOptions(implementation)?.lifetime);
    const dependencies = getDeclaredDependencies(implementation);
    validateDependencies(name, dependencies, new Set(), false);

    return new Registration(this, {
      lifetime: resolvedLifetime,
      implementation,
      dependencies: closeDependencies(dependencies, EMPTY_BINDINGS),
      activator: (args): unknown => Reflect.construct(implementation, args),
      role,
    });
  }

  private buildFactoryRegistration<T>(
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime | undefined,
    name: string,
  ): Registration {
    return new Registration(this, {
      lifetime: this.resolveLifetime(name, lifetime),
      dependencies: [],
      activator: (_args, resolver) => factory(resolver),
    });
  }

  private createInstanceRegistration<T>(key: ServiceKey<T>, instance: T, role: RegistrationRole): Registration {
    if (instance === undefined || instance === null || !conformsTo(key, instance)) {
      throw new ConfigurationError(
        `The instance registered for '${describeKey(key)}' is not a '${describeKey(key)}'`,
        describeKey(key),
      );
    }
    return new Registration(this, {
      lifetime: ServiceLifetime.Singleton,
      dependencies: [],
      activator: () => instance,
      instance: { value: instance },
      role,
    });
  }

  private createGenericRegistration(
    service: OpenGeneric,
    implementation: Constructor,
    options: GenericRegistrationOptions,
    role: RegistrationRole,
  ): GenericRegistration {
    const name = describeKey(implementation);
    const pattern = options.serves ?? service.openPattern();
    if (pattern.definition !== service) {
      throw new ConfigurationError(
        `'${name}' is registered for ${service.toString()} but serves ${pattern.toString()}`,
        name,
      );
    }
    return new GenericRegistration(
      this,
      pattern,
      implementation,
      options.inject ?? getDeclaredDependencies(implementation),
      this.resolveLifetime(name, options.lifetime ?? getInjectableOptions(implementation)?.lifetime),
      options.predicate,
      role,
    );
  }
}
