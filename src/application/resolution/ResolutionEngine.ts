/**
 * @fileoverview Resolution Engine - From Keys to Producers
 *
 * @packageDocumentation
 * @module sinew-di/application/resolution
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * The engine answers "what creates an instance of this key?" and caches the
 * answer as an {@link InstanceProducer}.
 *
 * ## Lookup Order
 *
 * 1. An unconditional registration of the exact key wins immediately.
 * 2. Conditional registrations of the key: every one whose predicate accepts
 *    the consumer is a candidate.
 * 3. For a closed generic key, every open-generic registration whose pattern
 *    unifies with the key and whose constraints and predicate pass is a
 *    candidate.
 * 4. No candidate: unregistered-type handlers, then (optionally) the key
 *    itself as a concrete class, then {@link MissingDependencyError}.
 *
 * More than one candidate at any step is an {@link AmbiguousResolutionError};
 * registration order never breaks a tie.
 *
 * ## Decorators
 *
 * Every decorator whose key or pattern covers the service, and whose
 * predicate passes, wraps the producer found above in registration order:
 * the first registered decorator is the innermost.
 *
 * ```
 * registerDecorator(IHandler, Logging)       // registered first
 * registerDecorator(IHandler, Transaction)
 *
 * getInstance(IHandler) → Transaction(Logging(Handler))
 * ```
 */

import {
  AbstractConstructor,
  ClosedGenericKey,
  EMPTY_BINDINGS,
  ServiceKey,
  TypeBindings,
  conformsTo,
  describeKey,
} from '../../domain/keys';
import { ServiceLifetime, canDependOn, getLifetimeName } from '../../domain/lifestyle';
import {
  ActivationError,
  AmbiguousResolutionError,
  CircularDependencyError,
  ConfigurationError,
  LifestyleMismatchError,
  MissingDependencyError,
} from '../../domain/exceptions';
import {
  ConsumerInfo,
  LazyCollection,
  Resolver,
  getDeclaredDependencies,
  getInjectableOptions,
} from '../di';
import {
  GenericRegistration,
  Registration,
  RegistrationOwner,
  RegistrationTable,
  ScopedInstanceCache,
  closeDependencies,
  validateDependencies,
} from '../registration';
import type { ILogger } from '../logging';
import { ActivationContext, ActivationHost, InstanceProducer, ProducerEdge } from './InstanceProducer';
import { CollectionProducer, isCollectionOf } from './ResolvedCollection';
import { UnregisteredTypeEvent, UnregisteredTypeHandler } from './UnregisteredTypeEvent';

/**
 * Where the engine finds the active scope.
 */
export interface ScopeSource {
  readonly ambient: boolean;
  current(): ScopedInstanceCache | undefined;
}

export interface ResolutionEngineOptions {
  readonly table: RegistrationTable;
  readonly owner: RegistrationOwner;
  readonly logger: ILogger;
  readonly scopes: ScopeSource;
  readonly unregisteredTypeHandlers: readonly UnregisteredTypeHandler[];
  readonly resolveUnregisteredConcreteTypes: boolean;
  readonly resolveUnregisteredCollections: boolean;
  readonly suppressLifestyleMismatchVerification: boolean;
}

export interface BuildFailure {
  readonly serviceKey: ServiceKey;
  readonly error: unknown;
}

/**
 * Every producer the engine could build for the registered keys, plus the
 * keys it could not build.
 */
export interface ProducerGraph {
  readonly producers: readonly InstanceProducer[];
  readonly collections: readonly CollectionProducer[];
  readonly failures: readonly BuildFailure[];
}

interface BuildFrame {
  readonly key: ServiceKey;
  readonly collection: boolean;
  readonly name: string;
  /** The registration chosen for `key`; unset for collections and while selecting */
  registration?: Registration;
}

interface GenericCandidate {
  readonly generic: GenericRegistration;
  readonly bindings: TypeBindings;
}

export class ResolutionEngine implements ActivationHost {
  /** Producers per key and chosen registration */
  private readonly producers = new Map<ServiceKey, Map<Registration, InstanceProducer>>();

  /** Choices that do not depend on the consumer */
  private readonly selections = new Map<ServiceKey, Registration>();

  private readonly fallbacks = new Map<ServiceKey, Registration>();
  private readonly collections = new Map<ServiceKey, CollectionProducer>();
  private readonly building: BuildFrame[] = [];

  constructor(private readonly options: ResolutionEngineOptions) {}

  // ==========================================================================
  // ActivationHost
  // ==========================================================================

  get ambientScopes(): boolean {
    return this.options.scopes.ambient;
  }

  currentScope(): ScopedInstanceCache | undefined {
    return this.options.scopes.current();
  }

  createContext(scope: ScopedInstanceCache | undefined): ActivationContext {
    const resolver: Resolver = {
      getInstance: <T>(key: ServiceKey<T>): T => this.resolve(key, scope),
      getAllInstances: <T>(key: ServiceKey<T>): LazyCollection<T> =>
        this.resolveCollection(key, scope),
    };
    return { scope, resolver };
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  resolve<T>(key: ServiceKey<T>, scope: ScopedInstanceCache | undefined): T {
    const instance = this.getProducer(key).getInstance(this.createContext(scope));
    if (!conformsTo(key, instance)) {
      throw new ActivationError(
        describeKey(key),
        new TypeError(`The resolved value is not an instance of '${describeKey(key)}'`),
      );
    }
    return instance;
  }

  resolveCollection<T>(key: ServiceKey<T>, scope: ScopedInstanceCache | undefined): LazyCollection<T> {
    const collection = this.getCollectionProducer(key).resolve(this.createContext(scope));
    if (!isCollectionOf(collection, key)) {
      throw new ConfigurationError(`The collection cached for '${describeKey(key)}' belongs to another key`);
    }
    return collection;
  }

  /**
   * The producer for `key` as seen by `consumer` (a root request when
   * omitted), building it on first use.
   */
  getProducer(key: ServiceKey, consumer?: ConsumerInfo): InstanceProducer {
    this.options.table.lock();
    const frame = this.enter(key, false);
    try {
      return this.producerFor(key, this.chosen(frame, this.selectRegistration(key, consumer)));
    } finally {
      this.building.pop();
    }
  }

  /**
   * The producer for one specific registration of `key`; lets verification
   * reach conditional registrations no root request would select.
   */
  getProducerFor(key: ServiceKey, registration: Registration): InstanceProducer {
    this.options.table.lock();
    const frame = this.enter(key, false);
    try {
      return this.producerFor(key, this.chosen(frame, registration));
    } finally {
      this.building.pop();
    }
  }

  getCollectionProducer(key: ServiceKey): CollectionProducer {
    const cached = this.collections.get(key);
    if (cached) {
      return cached;
    }

    const { table } = this.options;
    table.lock();
    this.enter(key, true);
    try {
      if (!table.hasCollection(key) && !this.options.resolveUnregisteredCollections) {
        throw new ConfigurationError(
          `No collection has been registered for '${describeKey(key)}'. Register one with ` +
            'collection.register or collection.append',
          describeKey(key),
        );
      }

      const elements: InstanceProducer[] = [];
      for (const element of table.getCollectionElements(key)) {
        const registration =
          element instanceof GenericRegistration ? this.closeCollectionElement(key, element) : element;
        if (registration) {
          elements.push(this.decorate(key, this.createProducer(key, registration)));
        }
      }

      const producer = new CollectionProducer(key, elements, this);
      this.collections.set(key, producer);
      return producer;
    } finally {
      this.building.pop();
    }
  }

  /**
   * Producers built so far, one per key and registration.
   */
  getCurrentProducers(): InstanceProducer[] {
    const result: InstanceProducer[] = [];
    this.producers.forEach((byRegistration) => byRegistration.forEach((p) => result.push(p)));
    return result;
  }

  getCurrentCollections(): CollectionProducer[] {
    return [...this.collections.values()];
  }

  /**
   * Build a producer for every registered key and collection.
   *
   * @param onFailure - Receives each key that cannot be built. Without it the
   * first failure is thrown.
   */
  buildRegistered(onFailure?: (failure: BuildFailure) => void): void {
    const { table } = this.options;
    const attempt = (serviceKey: ServiceKey, build: () => void): void => {
      if (!onFailure) {
        build();
        return;
      }
      try {
        build();
      } catch (error) {
        onFailure({ serviceKey, error });
      }
    };

    for (const key of table.getVerifiableKeys()) {
      const conditionals = table.getConditionals(key);
      if (conditionals.length > 0) {
        conditionals.forEach(({ registration }) =>
          attempt(key, () => this.getProducerFor(key, registration)),
        );
      } else {
        attempt(key, () => this.getProducer(key));
      }
    }

    for (const key of table.getVerifiableCollectionKeys()) {
      attempt(key, () => this.getCollectionProducer(key));
    }
  }

  /**
   * Build everything that can be built and report the rest. Never throws.
   */
  collectGraph(): ProducerGraph {
    const failures: BuildFailure[] = [];
    this.buildRegistered((failure) => failures.push(failure));
    return {
      producers: this.getCurrentProducers(),
      collections: this.getCurrentCollections(),
      failures,
    };
  }

  // ==========================================================================
  // Building
  // ==========================================================================

  private enter(key: ServiceKey, collection: boolean): BuildFrame {
    const name = collection ? `${describeKey(key)}[]` : describeKey(key);
    if (collection && this.building.some((frame) => frame.collection && frame.key === key)) {
      throw new CircularDependencyError([...this.path(), name]);
    }
    const frame: BuildFrame = { key, collection, name };
    this.building.push(frame);
    return frame;
  }

  /**
   * Record the registration selected for `frame`. A key is only circular
   * when the same registration is already being built for it; conditional
   * registrations may serve the same key at several depths.
   */
  private chosen(frame: BuildFrame, registration: Registration): Registration {
    const circular = this.building.some(
      (other) => other !== frame && other.key === frame.key && other.registration === registration,
    );
    if (circular) {
      throw new CircularDependencyError(this.path());
    }
    frame.registration = registration;
    return registration;
  }

  /** Names of everything being built, outermost first. */
  private path(): string[] {
    return this.building.map((frame) => frame.name);
  }

  /** Consumers of the key currently being built. */
  private consumerChain(): string[] {
    return this.path().slice(0, -1);
  }

  private producerFor(key: ServiceKey, registration: Registration): InstanceProducer {
    let byRegistration = this.producers.get(key);
    const cached = byRegistration?.get(registration);
    if (cached) {
      return cached;
    }

    const producer = this.decorate(key, this.createProducer(key, registration));
    if (!byRegistration) {
      byRegistration = new Map();
      this.producers.set(key, byRegistration);
    }
    byRegistration.set(registration, producer);
    return producer;
  }

  private createProducer(
    key: ServiceKey,
    registration: Registration,
    decoratee?: InstanceProducer,
  ): InstanceProducer {
    const consumer: ConsumerInfo = { serviceKey: key, implementation: registration.implementation };

    const edges = registration.dependencies.map((dependency): ProducerEdge => {
      switch (dependency.kind) {
        case 'service': {
          const producer = this.getProducer(dependency.key, consumer);
          this.checkLifestyle(key, registration.lifetime, producer);
          return { kind: 'service', producer };
        }
        case 'collection':
          return { kind: 'collection', collection: this.getCollectionProducer(dependency.key) };
        case 'decoratee': {
          const producer = this.requireDecoratee(registration, decoratee);
          this.checkLifestyle(key, registration.lifetime, producer);
          return { kind: 'decoratee', producer };
        }
        case 'decoratee-factory':
          return { kind: 'decoratee-factory', producer: this.requireDecoratee(registration, decoratee) };
        case 'type-argument':
          return { kind: 'type-argument', value: dependency.value };
      }
    });

    return new InstanceProducer(key, registration, edges, this.options.table.getInitializers());
  }

  private requireDecoratee(registration: Registration, decoratee?: InstanceProducer): InstanceProducer {
    if (!decoratee) {
      throw new ConfigurationError(
        `'${registration.displayName}' asks for a decoratee but is not applied as a decorator`,
        registration.displayName,
      );
    }
    return decoratee;
  }

  private checkLifestyle(
    consumerKey: ServiceKey,
    consumerLifetime: ServiceLifetime,
    dependency: InstanceProducer,
  ): void {
    if (this.options.suppressLifestyleMismatchVerification) {
      return;
    }
    if (!canDependOn(consumerLifetime, dependency.lifetime)) {
      throw new LifestyleMismatchError(
        describeKey(consumerKey),
        getLifetimeName(consumerLifetime),
        dependency.serviceName,
        getLifetimeName(dependency.lifetime),
        this.path(),
      );
    }
  }

  private decorate(key: ServiceKey, base: InstanceProducer): InstanceProducer {
    let current = base;
    const applied: AbstractConstructor[] = [];

    for (const decorator of this.options.table.getDecorators()) {
      const bindings = decorator.bind(key);
      if (!bindings) {
        continue;
      }
      const applies =
        !decorator.predicate ||
        decorator.predicate({
          serviceKey: key,
          implementation: base.registration.implementation,
          lifetime: base.lifetime,
          appliedDecorators: [...applied],
        });
      if (!applies) {
        continue;
      }

      const registration = decorator.close(key, current.registration, bindings);
      current = this.createProducer(key, registration, current);
      applied.push(decorator.implementation);
    }

    return current;
  }

  // ==========================================================================
  // Selecting a Registration
  // ==========================================================================

  private selectRegistration(key: ServiceKey, consumer?: ConsumerInfo): Registration {
    const { table } = this.options;

    const exact = table.getRegistration(key);
    if (exact) {
      return exact;
    }
    const conditionals = table.getConditionals(key);
    const selected = conditionals.length === 0 ? this.selections.get(key) : undefined;
    if (selected) {
      return selected;
    }

    if (conditionals.length > 0) {
      const match = this.pickOne(
        key,
        conditionals,
        (candidate, handled) =>
          candidate.predicate({
            serviceKey: key,
            implementation: candidate.registration.implementation,
            consumer,
            handled,
          }),
        (candidate) => candidate.registration.displayName,
      );
      if (match) {
        return match.registration;
      }
    }

    if (key instanceof ClosedGenericKey) {
      const generics = table.getGenerics(key.definition);
      const candidates: GenericCandidate[] = [];
      for (const generic of generics) {
        const bindings = generic.bind(key);
        if (bindings) {
          candidates.push({ generic, bindings });
        }
      }

      const match = this.pickOne(
        key,
        candidates,
        ({ generic }, handled) =>
          !generic.predicate ||
          generic.predicate({ serviceKey: key, implementation: generic.implementation, consumer, handled }),
        ({ generic }) => generic.displayName,
      );
      if (match) {
        const registration = match.generic.close(key, match.bindings);
        if (conditionals.length === 0 && generics.every((generic) => !generic.predicate)) {
          this.selections.set(key, registration);
        }
        return registration;
      }
    }

    return this.resolveUnregistered(key);
  }

  /**
   * The single candidate that passes `test`, evaluated in registration order.
   *
   * @throws AmbiguousResolutionError when more than one passes
   */
  private pickOne<C>(
    key: ServiceKey,
    candidates: readonly C[],
    test: (candidate: C, handled: boolean) => boolean,
    describe: (candidate: C) => string,
  ): C | undefined {
    const matched: C[] = [];
    for (const candidate of candidates) {
      if (test(candidate, matched.length > 0)) {
        matched.push(candidate);
      }
    }
    if (matched.length > 1) {
      throw new AmbiguousResolutionError(describeKey(key), matched.map(describe), this.consumerChain());
    }
    return matched[0];
  }

  private resolveUnregistered(key: ServiceKey): Registration {
    const cached = this.fallbacks.get(key);
    if (cached) {
      return cached;
    }

    const name = describeKey(key);
    const event = new UnregisteredTypeEvent(key);
    for (const handler of this.options.unregisteredTypeHandlers) {
      handler(event);
    }

    if (event.registrations.length > 1) {
      throw new AmbiguousResolutionError(
        name,
        event.registrations.map((registration) => registration.displayName),
        this.consumerChain(),
      );
    }

    let registration: Registration | undefined = event.registrations[0];
    if (!registration && this.options.resolveUnregisteredConcreteTypes && typeof key === 'function') {
      registration = this.createConcreteRegistration(key);
      this.options.logger.debug(`Resolving unregistered concrete type '${name}' as ${registration.lifetime}`);
    }
    if (!registration) {
      throw new MissingDependencyError(name, this.consumerChain());
    }

    this.fallbacks.set(key, registration);
    return registration;
  }

  private createConcreteRegistration(type: AbstractConstructor): Registration {
    const name = describeKey(type);
    const dependencies = getDeclaredDependencies(type);
    validateDependencies(name, dependencies, new Set(), false);

    return new Registration(this.options.owner, {
      lifetime: getInjectableOptions(type)?.lifetime ?? ServiceLifetime.Transient,
      implementation: type,
      dependencies: closeDependencies(dependencies, EMPTY_BINDINGS),
      activator: (args): unknown => Reflect.construct(type, args),
      role: 'unregistered-type',
    });
  }

  private closeCollectionElement(
    key: ServiceKey,
    element: GenericRegistration,
  ): Registration | undefined {
    if (!(key instanceof ClosedGenericKey)) {
      return undefined;
    }
    const bindings = element.bind(key);
    if (!bindings) {
      return undefined;
    }
    if (
      element.predicate &&
      !element.predicate({ serviceKey: key, implementation: element.implementation, handled: false })
    ) {
      return undefined;
    }
    return element.close(key, bindings);
  }
}
