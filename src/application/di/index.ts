/**
 * @module sinew-di/application/di
 * @description Dependency declarations, resolver contracts and decorators
 */

// ============================================================================
// Dependency Markers
// ============================================================================

export {
  Decoratee,
  DecorateeFactory,
  CollectionDependency,
  TypeArgumentDependency,
  collectionOf,
  typeArgument,
  isDependency,
} from './IDependencyInjection';

export type { Dependency } from './IDependencyInjection';

// ============================================================================
// Resolution Contracts
// ============================================================================

export type {
  LazyCollection,
  Resolver,
  ServiceFactory,
  ConsumerInfo,
  PredicateContext,
  DecoratorPredicateContext,
} from './IDependencyInjection';

// ============================================================================
// Decorators
// ============================================================================

export {
  Injectable,
  Inject,
  getInjectableOptions,
  getDeclaredDependencies,
} from './decorators';

export type { InjectableOptions } from './decorators';
