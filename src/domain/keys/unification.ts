/**
 * @fileoverview Generic Type Unification
 *
 * @module sinew-di/domain/keys
 *
 * Matches a requested closed key against the pattern an open implementation
 * serves, producing the type-parameter bindings used to close that
 * implementation's own dependencies.
 *
 * ```
 * pattern:   IRepository<Customer, TKey>
 * requested: IRepository<Customer, CustomerId>
 * bindings:  { TKey → CustomerId }
 *
 * pattern:   IHandler<Envelope<T>>
 * requested: IHandler<Envelope<OrderPlaced>>
 * bindings:  { T → OrderPlaced }
 * ```
 */

import {
  ClosedGenericKey,
  GenericPattern,
  ServiceKey,
  TypeParameter,
  TypePattern,
  AbstractConstructor,
} from './ServiceKey';
import { ConfigurationError } from '../exceptions';

/**
 * Type-parameter bindings produced by {@link unify}.
 */
export type TypeBindings = ReadonlyMap<TypeParameter, ServiceKey>;

export const EMPTY_BINDINGS: TypeBindings = new Map();

/**
 * Whether `key` can stand where `base` is expected.
 *
 * @remarks
 * Classes follow the prototype chain. Tokens and closed generic keys only
 * satisfy themselves.
 */
export function isAssignableTo(key: ServiceKey, base: AbstractConstructor): boolean {
  if (typeof key !== 'function') {
    return false;
  }
  return key === base || key.prototype instanceof base;
}

/**
 * Whether `argument` satisfies every constraint declared on `parameter`.
 */
export function satisfiesConstraints(parameter: TypeParameter, argument: ServiceKey): boolean {
  const { constraints } = parameter;
  if (constraints.extends && !isAssignableTo(argument, constraints.extends)) {
    return false;
  }
  if (constraints.where && !constraints.where(argument)) {
    return false;
  }
  return true;
}

/**
 * Unify a pattern with a closed key.
 *
 * @returns the bindings, or `undefined` when the key is outside the pattern's
 * family or a constraint fails
 */
export function unify(
  pattern: GenericPattern,
  key: ServiceKey,
  bindings: TypeBindings = EMPTY_BINDINGS,
): TypeBindings | undefined {
  if (!(key instanceof ClosedGenericKey) || key.definition !== pattern.definition) {
    return undefined;
  }

  let current = new Map(bindings);
  for (let i = 0; i < pattern.typeArguments.length; i++) {
    const next = unifyArgument(pattern.typeArguments[i], key.typeArguments[i], current);
    if (!next) {
      return undefined;
    }
    current = next;
  }
  return current;
}

function unifyArgument(
  pattern: TypePattern,
  argument: ServiceKey,
  bindings: Map<TypeParameter, ServiceKey>,
): Map<TypeParameter, ServiceKey> | undefined {
  if (pattern instanceof TypeParameter) {
    const bound = bindings.get(pattern);
    if (bound !== undefined) {
      return bound === argument ? bindings : undefined;
    }
    if (!satisfiesConstraints(pattern, argument)) {
      return undefined;
    }
    const next = new Map(bindings);
    next.set(pattern, argument);
    return next;
  }

  if (pattern instanceof GenericPattern) {
    const nested = unify(pattern, argument, bindings);
    return nested ? new Map(nested) : undefined;
  }

  return pattern === argument ? bindings : undefined;
}

/**
 * Substitute bindings into a pattern.
 *
 * @throws ConfigurationError when a parameter of the pattern is unbound
 */
export function closePattern(pattern: GenericPattern, bindings: TypeBindings): ClosedGenericKey<unknown> {
  const closed = pattern.typeArguments.map((argument) => closeArgument(argument, bindings));
  return pattern.definition.of(...closed);
}

function closeArgument(argument: TypePattern, bindings: TypeBindings): ServiceKey {
  if (argument instanceof TypeParameter) {
    const bound = bindings.get(argument);
    if (bound === undefined) {
      throw new ConfigurationError(`Type parameter '${argument.name}' is not bound`);
    }
    return bound;
  }
  if (argument instanceof GenericPattern) {
    return closePattern(argument, bindings);
  }
  return argument;
}
