/**
 * @fileoverview Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module sinew-di/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This file defines what a component may ask for and what the container
 * hands to factories and predicates:
 *
 * 1. **Dependencies**: the explicit, registration-time list of what a
 *    constructor receives (`static inject`, `@Inject`, or compiler-emitted
 *    parameter types on `@Injectable` classes)
 * 2. **Resolver**: the view of the container a factory receives
 * 3. **Predicate contexts**: what conditional registrations and decorators
 *    see when deciding whether they apply
 *
 * ## Declaring Dependencies
 *
 * ```typescript
 * class OrderService {
 *   static inject = [IOrderRepository, ILogger, collectionOf(IOrderRule)] as const;
 *
 *   constructor(
 *     private readonly orders: IOrderRepository,
 *     private readonly logger: ILogger,
 *     private readonly rules: LazyCollection<IOrderRule>,
 *   ) {}
 * }
 * ```
 *
 * Decorators receive the component they wrap through the {@link Decoratee}
 * marker, or a factory for it through {@link DecorateeFactory}:
 *
 * ```typescript
 * class TransactionDecorator<T> implements ICommandHandler<T> {
 *   static inject = [Decoratee, IUnitOfWork] as const;
 *
 *   constructor(
 *     private readonly inner: ICommandHandler<T>,
 *     private readonly uow: IUnitOfWork,
 *   ) {}
 * }
 * ```
 *
 * Open-generic components reach their own type arguments through
 * {@link typeArgument}:
 *
 * ```typescript
 * const TEntity = typeParam('TEntity');
 *
 * class InMemoryRepository<T> implements IRepository<T> {
 *   static inject = [typeArgument(TEntity)] as const;
 *   constructor(readonly entityType: Constructor<T>) {}
 * }
 *
 * container.registerGeneric(IRepository, InMemoryRepository, {
 *   serves: IRepository.pattern(TEntity),
 * });
 * ```
 *
 * @version 1.0.0
 */

import {
  AbstractConstructor,
  GenericPattern,
  ServiceKey,
  TypeParameter,
  isServiceKey,
} from '../../domain/keys';
import { ServiceLifetime } from '../../domain/lifestyle';

// ============================================================================
// Dependency Markers
// ============================================================================

/**
 * Marks the constructor position receiving the instance a decorator wraps.
 */
export const Decoratee: unique symbol = Symbol('Decoratee');

/**
 * Marks the constructor position receiving a `() => T` that produces the
 * wrapped instance on each call.
 *
 * @remarks
 * Lets a long-lived decorator wrap a shorter-lived component without
 * capturing it; each call resolves the decoratee in the scope the decorator
 * was created in.
 */
export const DecorateeFactory: unique symbol = Symbol('DecorateeFactory');

/**
 * Dependency on every registration of a collection.
 */
export class CollectionDependency {
  readonly kind = 'collection' as const;

  constructor(readonly target: ServiceKey | GenericPattern) {}
}

export function collectionOf(target: ServiceKey | GenericPattern): CollectionDependency {
  return new CollectionDependency(target);
}

/**
 * Dependency on the runtime key bound to a type parameter.
 */
export class TypeArgumentDependency {
  readonly kind = 'type-argument' as const;

  constructor(readonly parameter: TypeParameter) {}
}

export function typeArgument(parameter: TypeParameter): TypeArgumentDependency {
  return new TypeArgumentDependency(parameter);
}

/**
 * One entry of a constructor's dependency list.
 */
export type Dependency =
  | ServiceKey
  | GenericPattern
  | CollectionDependency
  | TypeArgumentDependency
  | typeof Decoratee
  | typeof DecorateeFactory;

export function isDependency(value: unknown): value is Dependency {
  return (
    value === Decoratee ||
    value === DecorateeFactory ||
    value instanceof CollectionDependency ||
    value instanceof TypeArgumentDependency ||
    value instanceof GenericPattern ||
    isServiceKey(value)
  );
}

// ============================================================================
// Resolution Contracts
// ============================================================================

/**
 * Stable, lazy view over the registrations of a collection.
 *
 * @remarks
 * The same object is returned for the same key. Nothing is created until
 * the collection is iterated, and every iteration resolves each element
 * again according to its own lifetime: transient elements are new each time,
 * scoped elements are shared within the scope, singletons are shared always.
 */
export interface LazyCollection<T> extends Iterable<T> {
  /** Number of registered elements; resolves nothing. */
  readonly count: number;

  /** Resolve only the element at `index`. */
  at(index: number): T;

  /** Resolve every element into a fresh array. */
  toArray(): T[];
}

/**
 * The view of the container handed to factories.
 *
 * @remarks
 * Resolution happens in the scope that is creating the instance, so a
 * scoped factory sees the same scoped instances as its consumers.
 */
export interface Resolver {
  getInstance<T>(key: ServiceKey<T>): T;
  getAllInstances<T>(key: ServiceKey<T>): LazyCollection<T>;
}

/**
 * Factory used by `registerFactory`.
 *
 * @example
 * ```typescript
 * const factory: ServiceFactory<IDatabase> = (resolver) => {
 *   const config = resolver.getInstance(IConfig);
 *   return new PostgresDatabase(config.dbUrl);
 * };
 *
 * container.registerFactory(IDatabase, factory, ServiceLifetime.Singleton);
 * ```
 */
export type ServiceFactory<T> = (resolver: Resolver) => T;

/**
 * The component a dependency is being resolved for.
 */
export interface ConsumerInfo {
  /** Key the consumer was resolved under */
  readonly serviceKey: ServiceKey;

  /** The consumer's implementation, when known */
  readonly implementation?: AbstractConstructor;
}

/**
 * What a conditional or open-generic registration's predicate sees.
 */
export interface PredicateContext {
  /** The key being resolved */
  readonly serviceKey: ServiceKey;

  /** Implementation of the registration being considered */
  readonly implementation?: AbstractConstructor;

  /** Who asked; `undefined` for a direct `getInstance` call */
  readonly consumer?: ConsumerInfo;

  /**
   * Whether an earlier registration for the same key already matched.
   * Lets a registration act as an explicit fallback: `(c) => !c.handled`.
   */
  readonly handled: boolean;
}

/**
 * What a decorator's predicate sees.
 */
export interface DecoratorPredicateContext {
  readonly serviceKey: ServiceKey;

  /** Implementation of the decorated registration, when known */
  readonly implementation?: AbstractConstructor;

  /** Lifetime of the decorated registration */
  readonly lifetime: ServiceLifetime;

  /** Decorators already applied, innermost first */
  readonly appliedDecorators: readonly AbstractConstructor[];
}
