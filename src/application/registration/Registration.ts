/**
 * @fileoverview Registration - A Recipe Plus a Lifetime
 *
 * @packageDocumentation
 * @module sinew-di/application/registration
 *
 * A `Registration` knows how to create one kind of instance and how long an
 * instance lives. It may be bound to several keys; the cache belongs to the
 * registration, so a scoped registration shared by `IReader` and `IWriter`
 * yields one instance per scope, not one per key.
 *
 * ```
 * Registration (lifetime: Scoped)
 *   ├─ IReader ─┐
 *   └─ IWriter ─┴─> one instance per scope
 * ```
 *
 * Open-generic recipes ({@link GenericRegistration}) and decorators
 * ({@link DecoratorRegistration}) close into plain registrations on demand,
 * once per closed key.
 */

import {
  AbstractConstructor,
  ClosedGenericKey,
  Constructor,
  GenericPattern,
  OpenGeneric,
  ServiceKey,
  TypeParameter,
  TypeBindings,
  closePattern,
  describeKey,
  describePattern,
  unify,
  EMPTY_BINDINGS,
} from '../../domain/keys';
import { ServiceLifetime, getLifetimeName } from '../../domain/lifestyle';
import { ConfigurationError, ScopeViolationError } from '../../domain/exceptions';
import {
  CollectionDependency,
  Decoratee,
  DecorateeFactory,
  Dependency,
  DecoratorPredicateContext,
  PredicateContext,
  Resolver,
  TypeArgumentDependency,
} from '../di';
import type { DiagnosticType } from '../diagnostics/DiagnosticType';

// ============================================================================
// Resolved Dependencies
// ============================================================================

/**
 * A dependency with every type parameter substituted.
 */
export type ResolvedDependency =
  | { readonly kind: 'service'; readonly key: ServiceKey }
  | { readonly kind: 'collection'; readonly key: ServiceKey }
  | { readonly kind: 'decoratee' }
  | { readonly kind: 'decoratee-factory' }
  | { readonly kind: 'type-argument'; readonly value: ServiceKey };

/**
 * Check a declared dependency list at registration time.
 *
 * @param bound - Type parameters the implementation's pattern binds
 * @param isDecorator - Whether decoratee markers are allowed (and required)
 */
export function validateDependencies(
  ownerName: string,
  dependencies: readonly Dependency[],
  bound: ReadonlySet<TypeParameter>,
  isDecorator: boolean,
): void {
  let decorateeCount = 0;

  const checkParameters = (parameters: Iterable<TypeParameter>): void => {
    for (const parameter of parameters) {
      if (!bound.has(parameter)) {
        throw new ConfigurationError(
          `'${ownerName}' depends on type parameter '${parameter.name}', which the ` +
            'service pattern it is registered for does not bind',
          ownerName,
        );
      }
    }
  };

  for (const dependency of dependencies) {
    if (dependency === Decoratee || dependency === DecorateeFactory) {
      decorateeCount++;
    } else if (dependency instanceof GenericPattern) {
      checkParameters(dependency.parameters());
    } else if (dependency instanceof CollectionDependency) {
      if (dependency.target instanceof GenericPattern) {
        checkParameters(dependency.target.parameters());
      }
    } else if (dependency instanceof TypeArgumentDependency) {
      checkParameters([dependency.parameter]);
    }
  }

  if (!isDecorator && decorateeCount > 0) {
    throw new ConfigurationError(
      `'${ownerName}' uses Decoratee/DecorateeFactory but is not registered as a decorator`,
      ownerName,
    );
  }
  if (isDecorator && decorateeCount !== 1) {
    throw new ConfigurationError(
      `Decorator '${ownerName}' must declare exactly one Decoratee or DecorateeFactory ` +
        `dependency, found ${decorateeCount}`,
      ownerName,
    );
  }
}

/**
 * Substitute bindings into a validated dependency list.
 */
export function closeDependencies(
  dependencies: readonly Dependency[],
  bindings: TypeBindings,
): ResolvedDependency[] {
  return dependencies.map((dependency): ResolvedDependency => {
    if (dependency === Decoratee) {
      return { kind: 'decoratee' };
    }
    if (dependency === DecorateeFactory) {
      return { kind: 'decoratee-factory' };
    }
    if (dependency instanceof GenericPattern) {
      return { kind: 'service', key: closePattern(dependency, bindings) };
    }
    if (dependency instanceof CollectionDependency) {
      const { target } = dependency;
      return {
        kind: 'collection',
        key: target instanceof GenericPattern ? closePattern(target, bindings) : target,
      };
    }
    if (dependency instanceof TypeArgumentDependency) {
      const value = bindings.get(dependency.parameter);
      if (value === undefined) {
        throw new ConfigurationError(`Type parameter '${dependency.parameter.name}' is not bound`);
      }
      return { kind: 'type-argument', value };
    }
    return { kind: 'service', key: dependency };
  });
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Creates the instance from the resolved constructor arguments.
 */
export type Activator = (args: unknown[], resolver: Resolver) => unknown;

export type RegistrationRole = 'service' | 'decorator' | 'collection-element' | 'unregistered-type';

/**
 * Per-scope instance storage. Implemented by `Scope`.
 */
export interface ScopedInstanceCache {
  readonly id: string;
  getOrCreate(registration: Registration, create: () => unknown): unknown;
}

/**
 * Owner of singleton instances. Implemented by the container.
 */
export interface RegistrationOwner {
  readonly name: string;
  trackSingleton(instance: unknown): void;
}

export interface RegistrationDescriptor {
  lifetime: ServiceLifetime;
  activator: Activator;
  dependencies: readonly ResolvedDependency[];
  implementation?: AbstractConstructor;
  /** For closures of open-generic recipes: the key they were closed for */
  closedFor?: ClosedGenericKey<unknown>;
  role?: RegistrationRole;
  /** For `registerInstance`: the instance, owned by the caller */
  instance?: { readonly value: unknown };
}

let lastRegistrationId = 0;

/**
 * Monotonic id shared by every kind of registration; gives collections and
 * decorators a total registration order.
 */
export function nextRegistrationId(): number {
  return ++lastRegistrationId;
}

export class Registration {
  readonly id = nextRegistrationId();
  readonly lifetime: ServiceLifetime;
  readonly activator: Activator;
  readonly dependencies: readonly ResolvedDependency[];
  readonly implementation?: AbstractConstructor;
  readonly closedFor?: ClosedGenericKey<unknown>;
  readonly role: RegistrationRole;
  readonly externallyOwned: boolean;

  private singleton?: { readonly value: unknown };
  private readonly suppressions = new Map<DiagnosticType, string>();

  constructor(
    readonly owner: RegistrationOwner,
    descriptor: RegistrationDescriptor,
  ) {
    this.lifetime = descriptor.lifetime;
    this.activator = descriptor.activator;
    this.dependencies = descriptor.dependencies;
    this.implementation = descriptor.implementation;
    this.closedFor = descriptor.closedFor;
    this.role = descriptor.role ?? 'service';
    this.singleton = descriptor.instance;
    this.externallyOwned = descriptor.instance !== undefined;
  }

  /**
   * Implementation name, or the closed key for generic closures.
   */
  get displayName(): string {
    if (this.implementation) {
      const name = describeKey(this.implementation);
      return this.closedFor
        ? `${name}<${this.closedFor.typeArguments.map(describeKey).join(', ')}>`
        : name;
    }
    return this.externallyOwned ? 'instance' : 'factory';
  }

  /**
   * Opt a registration out of one diagnostic rule.
   *
   * @param justification - Why the finding does not apply; required
   */
  suppressDiagnostic(type: DiagnosticType, justification: string): this {
    if (!justification || justification.trim().length === 0) {
      throw new ConfigurationError('Suppressing a diagnostic requires a justification');
    }
    this.suppressions.set(type, justification);
    return this;
  }

  isSuppressed(type: DiagnosticType): boolean {
    return this.suppressions.has(type);
  }

  /**
   * Return the instance for this registration, creating it if the lifetime
   * says so.
   *
   * @param scope - The active scope, if any
   * @param create - Builds a new instance
   * @param serviceName - For error messages
   * @throws ScopeViolationError for a scoped registration without a scope
   */
  getInstance(
    scope: ScopedInstanceCache | undefined,
    create: () => unknown,
    serviceName: string,
  ): unknown {
    switch (this.lifetime) {
      case ServiceLifetime.Transient:
        return create();

      case ServiceLifetime.Singleton: {
        if (!this.singleton) {
          const value = create();
          this.singleton = { value };
          this.owner.trackSingleton(value);
        }
        return this.singleton.value;
      }

      case ServiceLifetime.Scoped: {
        if (!scope) {
          throw new ScopeViolationError(
            `'${serviceName}' is registered as ${getLifetimeName(this.lifetime)}, but the ` +
              'instance is requested outside the context of an active scope',
            serviceName,
          );
        }
        return scope.getOrCreate(this, create);
      }
    }
  }
}

// ============================================================================
// Open-Generic Recipes
// ============================================================================

/**
 * An open implementation registered for an open-generic service.
 *
 * @example
 * ```typescript
 * const TEntity = typeParam('TEntity', { extends: Entity });
 *
 * container.registerGeneric(IRepository, InMemoryRepository, {
 *   serves: IRepository.pattern(TEntity),
 *   lifetime: ServiceLifetime.Singleton,
 * });
 * ```
 */
export class GenericRegistration {
  readonly id = nextRegistrationId();

  private readonly closures = new Map<ClosedGenericKey<unknown>, Registration>();

  constructor(
    readonly owner: RegistrationOwner,
    readonly pattern: GenericPattern,
    readonly implementation: Constructor,
    readonly dependencies: readonly Dependency[],
    readonly lifetime: ServiceLifetime,
    readonly predicate?: (context: PredicateContext) => boolean,
    readonly role: RegistrationRole = 'service',
  ) {
    validateDependencies(this.displayName, dependencies, pattern.parameters(), false);
  }

  get definition(): OpenGeneric {
    return this.pattern.definition;
  }

  get displayName(): string {
    return describeKey(this.implementation);
  }

  get describesPattern(): string {
    return describePattern(this.pattern);
  }

  /**
   * Whether every argument is a distinct, unconstrained parameter.
   */
  get isFullyOpen(): boolean {
    const seen = new Set<TypeParameter>();
    return this.pattern.typeArguments.every((argument) => {
      if (!(argument instanceof TypeParameter) || seen.has(argument)) {
        return false;
      }
      seen.add(argument);
      return !argument.constraints.extends && !argument.constraints.where;
    });
  }

  /**
   * Bindings for `key`, if the pattern and type constraints admit it.
   * Predicates are evaluated by the resolution engine.
   */
  bind(key: ServiceKey): TypeBindings | undefined {
    return unify(this.pattern, key);
  }

  /**
   * The plain registration serving `key`, created once per closed key.
   */
  close(key: ClosedGenericKey<unknown>, bindings: TypeBindings): Registration {
    let closure = this.closures.get(key);
    if (!closure) {
      const implementation = this.implementation;
      closure = new Registration(this.owner, {
        lifetime: this.lifetime,
        implementation,
        dependencies: closeDependencies(this.dependencies, bindings),
        activator: (args) => new implementation(...args),
        closedFor: key,
        role: this.role,
      });
      this.closures.set(key, closure);
    }
    return closure;
  }
}

// ============================================================================
// Decorators
// ============================================================================

/**
 * A decorator registered for one key or for every closure of an open generic
 * that matches `pattern`.
 */
export class DecoratorRegistration {
  readonly id = nextRegistrationId();

  private readonly closures = new Map<ServiceKey, Map<Registration, Registration>>();

  constructor(
    readonly owner: RegistrationOwner,
    readonly target: ServiceKey | OpenGeneric,
    readonly implementation: Constructor,
    readonly dependencies: readonly Dependency[],
    /** `undefined` gives each closure the lifetime of the component it wraps */
    readonly lifetime: ServiceLifetime | undefined,
    readonly pattern?: GenericPattern,
    readonly predicate?: (context: DecoratorPredicateContext) => boolean,
  ) {
    if (pattern && !(target instanceof OpenGeneric && pattern.definition === target)) {
      throw new ConfigurationError(
        `The pattern ${describePattern(pattern)} of decorator '${this.displayName}' does not ` +
          'belong to the service it decorates',
        this.displayName,
      );
    }
    const bound = target instanceof OpenGeneric
      ? (pattern ?? target.openPattern()).parameters()
      : new Set<TypeParameter>();
    validateDependencies(this.displayName, dependencies, bound, true);
  }

  get displayName(): string {
    return describeKey(this.implementation);
  }

  /**
   * Bindings when this decorator's key or pattern covers `key`; predicates
   * are evaluated by the resolution engine.
   */
  bind(key: ServiceKey): TypeBindings | undefined {
    if (this.target instanceof OpenGeneric) {
      return unify(this.pattern ?? this.target.openPattern(), key);
    }
    return this.target === key ? EMPTY_BINDINGS : undefined;
  }

  /**
   * The plain registration wrapping `inner` for `key`, created once per pair.
   */
  close(key: ServiceKey, inner: Registration, bindings: TypeBindings): Registration {
    let byInner = this.closures.get(key);
    if (!byInner) {
      byInner = new Map();
      this.closures.set(key, byInner);
    }
    let closure = byInner.get(inner);
    if (!closure) {
      const implementation = this.implementation;
      closure = new Registration(this.owner, {
        lifetime: this.lifetime ?? inner.lifetime,
        implementation,
        dependencies: closeDependencies(this.dependencies, bindings),
        activator: (args) => new implementation(...args),
        closedFor: key instanceof ClosedGenericKey ? key : undefined,
        role: 'decorator',
      });
      byInner.set(inner, closure);
    }
    return closure;
  }
}

// ============================================================================
// Conditional Registrations & Initializers
// ============================================================================

export interface ConditionalRegistration {
  readonly registration: Registration;
  readonly predicate: (context: PredicateContext) => boolean;
}

export interface Initializer {
  readonly type: AbstractConstructor;
  readonly action: (instance: unknown) => void;
}
