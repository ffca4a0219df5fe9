/**
 * @fileoverview Service Keys - Runtime Identities for Abstractions
 *
 * @packageDocumentation
 * @module sinew-di/domain/keys
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * TypeScript erases interfaces and generic arguments, so every abstraction
 * the container resolves needs a value that exists at run time:
 *
 * | Key | Created with | Example |
 * |-----|--------------|---------|
 * | Class | `class Foo {}` | `container.register(Foo)` |
 * | Token | `createToken<ILogger>('ILogger')` | `container.register(ILogger, ConsoleLogger)` |
 * | Closed generic | `ICommandHandler.of(CreateOrder)` | `container.getInstance(ICommandHandler.of(CreateOrder))` |
 *
 * Open generics (`defineGeneric`) and type parameters (`typeParam`) describe
 * families of closed keys. They are never resolved directly.
 *
 * Keys are compared by identity. Closed generic keys are interned, so
 * `ICommandHandler.of(A) === ICommandHandler.of(A)` always holds and a plain
 * `Map` gives O(1) lookup.
 *
 * @version 1.0.0
 */

import { ConfigurationError } from '../exceptions';

/**
 * A concrete class that can be instantiated with `new`.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * A class that may be abstract. Abstract classes are valid service keys.
 * An implementation passed alongside a key must be a {@link Constructor};
 * a class registered as its own implementation is constructed as it is,
 * because `abstract` does not exist at run time.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Nominal key for an interface.
 *
 * @example
 * ```typescript
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * container.registerSingleton(IClock, SystemClock);
 * const clock = container.getInstance(IClock); // typed as IClock
 * ```
 */
export class ServiceToken<T> {
  readonly kind = 'token' as const;

  /** Phantom member carrying `T`; never assigned. */
  declare readonly __type: T;

  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

/**
 * Create a token for an interface or any other type without a class.
 */
export function createToken<T>(name: string): ServiceToken<T> {
  if (!name || name.trim().length === 0) {
    throw new ConfigurationError('Token name must be a non-empty string');
  }
  return new ServiceToken<T>(name);
}

/**
 * An open-generic service, e.g. `ICommandHandler<TCommand>`.
 *
 * @remarks
 * Closing the generic with `of()` returns an interned {@link ClosedGenericKey};
 * `pattern()` builds a {@link GenericPattern} that may still contain
 * {@link TypeParameter}s and describes which closures an open implementation
 * or decorator can serve.
 *
 * @example
 * ```typescript
 * interface ICommandHandler<T> { handle(command: T): void; }
 * const ICommandHandler = defineGeneric('ICommandHandler', 1);
 *
 * const key = ICommandHandler.of<ICommandHandler<CreateOrder>>(CreateOrder);
 * ```
 */
export class OpenGeneric {
  readonly kind = 'open' as const;

  private readonly closures = new ClosureNode();

  constructor(
    readonly name: string,
    readonly arity: number,
  ) {}

  /**
   * Close the generic over concrete type arguments.
   *
   * @throws ConfigurationError when the number of arguments differs from `arity`
   */
  of<T = unknown>(...typeArguments: ServiceKey[]): ClosedGenericKey<T> {
    this.assertArity(typeArguments.length);

    let node = this.closures;
    for (const argument of typeArguments) {
      let child = node.children.get(argument);
      if (!child) {
        child = new ClosureNode();
        node.children.set(argument, child);
      }
      node = child;
    }

    if (!node.key) {
      node.key = new ClosedGenericKey<never>(this, Object.freeze([...typeArguments]));
    }
    return node.key;
  }

  /**
   * Describe a family of closures. Arguments may be type parameters, concrete
   * keys or nested patterns.
   */
  pattern(...typeArguments: TypePattern[]): GenericPattern {
    this.assertArity(typeArguments.length);
    return new GenericPattern(this, Object.freeze([...typeArguments]));
  }

  /**
   * The fully open pattern: one unconstrained parameter per position.
   */
  openPattern(): GenericPattern {
    const parameters: TypeParameter[] = [];
    for (let i = 0; i < this.arity; i++) {
      parameters.push(new TypeParameter(`T${i}`, {}));
    }
    return new GenericPattern(this, Object.freeze(parameters));
  }

  toString(): string {
    const placeholders = Array.from({ length: this.arity }, () => '').join(',');
    return `${this.name}<${placeholders}>`;
  }

  private assertArity(count: number): void {
    if (count !== this.arity) {
      throw new ConfigurationError(
        `${this.name} takes ${this.arity} type argument(s) but ${count} were supplied`,
      );
    }
  }
}

/** Interning trie for closed keys. */
class ClosureNode {
  readonly children = new Map<ServiceKey, ClosureNode>();
  key?: ClosedGenericKey<never>;
}

/**
 * Define an open-generic service.
 *
 * @param name - Display name used in messages and diagnostics
 * @param arity - Number of type parameters
 */
export function defineGeneric(name: string, arity: number): OpenGeneric {
  if (!Number.isInteger(arity) || arity < 1) {
    throw new ConfigurationError(`Generic '${name}' must have at least one type parameter`);
  }
  return new OpenGeneric(name, arity);
}

/**
 * A generic service closed over concrete type arguments. Only obtainable from
 * {@link OpenGeneric.of}, which interns it.
 */
export class ClosedGenericKey<T> {
  readonly kind = 'closed' as const;

  declare readonly __type: T;

  constructor(
    readonly definition: OpenGeneric,
    readonly typeArguments: readonly ServiceKey[],
  ) {}

  toString(): string {
    return describeKey(this);
  }
}

/**
 * Constraints a type argument must satisfy to bind a {@link TypeParameter}.
 */
export interface TypeConstraints {
  /** The argument must be this class or derive from it. */
  extends?: AbstractConstructor;

  /** Arbitrary check, e.g. "has a static `transactional` flag". */
  where?: (argument: ServiceKey) => boolean;
}

/**
 * A placeholder in a {@link GenericPattern}.
 *
 * @example
 * ```typescript
 * const TCommand = typeParam('TCommand', { extends: TransactionalCommand });
 * container.registerDecorator(ICommandHandler, TransactionDecorator, {
 *   serves: ICommandHandler.pattern(TCommand),
 * });
 * ```
 */
export class TypeParameter {
  readonly kind = 'parameter' as const;

  constructor(
    readonly name: string,
    readonly constraints: TypeConstraints,
  ) {}

  toString(): string {
    return this.name;
  }
}

export function typeParam(name: string, constraints: TypeConstraints = {}): TypeParameter {
  return new TypeParameter(name, constraints);
}

/**
 * An open generic applied to patterns, possibly partially closed, e.g.
 * `IRepository.pattern(Customer, TKey)`.
 */
export class GenericPattern {
  readonly kind = 'pattern' as const;

  constructor(
    readonly definition: OpenGeneric,
    readonly typeArguments: readonly TypePattern[],
  ) {}

  /**
   * Every type parameter appearing anywhere in the pattern.
   */
  parameters(): Set<TypeParameter> {
    const found = new Set<TypeParameter>();
    for (const argument of this.typeArguments) {
      if (argument instanceof TypeParameter) {
        found.add(argument);
      } else if (argument instanceof GenericPattern) {
        argument.parameters().forEach((p) => found.add(p));
      }
    }
    return found;
  }

  toString(): string {
    return `${this.definition.name}<${this.typeArguments.map(describePattern).join(', ')}>`;
  }
}

/**
 * Anything the container can resolve.
 */
export type ServiceKey<T = unknown> =
  | AbstractConstructor<T>
  | ServiceToken<T>
  | ClosedGenericKey<T>;

export type TypePattern = ServiceKey | TypeParameter | GenericPattern;

export function isServiceKey(value: unknown): value is ServiceKey {
  return (
    typeof value === 'function' ||
    value instanceof ServiceToken ||
    value instanceof ClosedGenericKey
  );
}

/**
 * Human-readable name of a key, e.g. `ICommandHandler<CreateOrder>`.
 */
export function describeKey(key: ServiceKey): string {
  if (typeof key === 'function') {
    return key.name || '<anonymous class>';
  }
  if (key instanceof ServiceToken) {
    return key.name;
  }
  return `${key.definition.name}<${key.typeArguments.map(describeKey).join(', ')}>`;
}

export function describePattern(pattern: TypePattern): string {
  if (pattern instanceof TypeParameter || pattern instanceof GenericPattern) {
    return pattern.toString();
  }
  return describeKey(pattern);
}

/**
 * Whether a resolved value is a valid `T` for the given key.
 *
 * @remarks
 * Classes are checked with `instanceof`. Tokens and closed generic keys have
 * no runtime shape, so any value registered against them is accepted; the
 * registration methods are typed so only a `T` can be registered.
 */
export function conformsTo<T>(key: ServiceKey<T>, value: unknown): value is T {
  if (typeof key === 'function') {
    return value instanceof key;
  }
  return true;
}
