/**
 * @fileoverview Class and Parameter Decorators
 *
 * @module sinew-di/application/di
 *
 * `@Injectable` and `@Inject` record dependency metadata with
 * reflect-metadata. Nothing here registers a class; registration stays an
 * explicit call on the container.
 *
 * Resolution order for a class's dependency list:
 *
 * 1. `static inject = [...]` on the class
 * 2. `@Inject(...)` per constructor parameter, falling back to the
 *    compiler-emitted `design:paramtypes` of an `@Injectable()` class
 * 3. nothing, for a class whose constructor takes no parameters
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class OrderService {
 *   constructor(
 *     private readonly clock: SystemClock,                  // from design:paramtypes
 *     @Inject(IOrderRepository) private readonly orders: IOrderRepository,
 *   ) {}
 * }
 * ```
 */

import 'reflect-metadata';

import { AbstractConstructor, describeKey } from '../../domain/keys';
import { ServiceLifetime, isServiceLifetime } from '../../domain/lifestyle';
import { ConfigurationError } from '../../domain/exceptions';
import { Dependency, isDependency } from './IDependencyInjection';

const INJECTABLE_KEY = 'sinew:injectable';
const INJECT_KEY = 'sinew:inject';
const PARAMTYPES_KEY = 'design:paramtypes';

export interface InjectableOptions {
  /** Lifetime used when a registration call does not name one */
  lifetime?: ServiceLifetime;
}

/**
 * Mark a class as injectable so its emitted constructor parameter types may
 * be used as dependencies.
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  if (options.lifetime !== undefined && !isServiceLifetime(options.lifetime)) {
    throw new ConfigurationError(`Unknown lifetime '${String(options.lifetime)}'`);
  }
  return function (target) {
    Reflect.defineMetadata(INJECTABLE_KEY, options, target);
  };
}

/**
 * Override the dependency for one constructor parameter.
 */
export function Inject(dependency: Dependency): ParameterDecorator {
  return function (target, propertyKey, parameterIndex) {
    if (propertyKey !== undefined) {
      throw new ConfigurationError(
        '@Inject is only supported on constructor parameters',
      );
    }
    const existing: unknown = Reflect.getOwnMetadata(INJECT_KEY, target);
    const overrides = existing instanceof Map ? new Map(existing) : new Map<number, Dependency>();
    overrides.set(parameterIndex, dependency);
    Reflect.defineMetadata(INJECT_KEY, overrides, target);
  };
}

/**
 * The `@Injectable` options of a class, if it carries any.
 */
export function getInjectableOptions(type: AbstractConstructor): InjectableOptions | undefined {
  const options: unknown = Reflect.getOwnMetadata(INJECTABLE_KEY, type);
  if (typeof options !== 'object' || options === null) {
    return undefined;
  }
  const lifetime: unknown = Reflect.get(options, 'lifetime');
  return { lifetime: isServiceLifetime(lifetime) ? lifetime : undefined };
}

/** Parameter types the compiler emits for interfaces and primitives. */
const UNINFORMATIVE_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  Object,
  Function,
  String,
  Number,
  Boolean,
  Symbol,
  Array,
  Promise,
  undefined,
]);

/**
 * Read the dependency list a class declares.
 *
 * @throws ConfigurationError when the list is malformed or shorter than the
 * constructor's parameter list
 */
export function getDeclaredDependencies(implementation: AbstractConstructor): readonly Dependency[] {
  const name = describeKey(implementation);
  const declared: unknown = Reflect.get(implementation, 'inject');

  if (declared !== undefined) {
    if (!Array.isArray(declared)) {
      throw new ConfigurationError(`'${name}.inject' must be an array of dependencies`, name);
    }
    const dependencies: Dependency[] = [];
    declared.forEach((entry: unknown, index) => {
      if (!isDependency(entry)) {
        throw new ConfigurationError(
          `'${name}.inject[${index}]' is not a service key, pattern or dependency marker`,
          name,
        );
      }
      dependencies.push(entry);
    });
    assertCoversConstructor(implementation, dependencies.length);
    return dependencies;
  }

  const overrides: unknown = Reflect.getOwnMetadata(INJECT_KEY, implementation);
  const paramTypes: unknown = Reflect.getOwnMetadata(PARAMTYPES_KEY, implementation);
  const injectable = Reflect.hasOwnMetadata(INJECTABLE_KEY, implementation);

  if (overrides instanceof Map || (injectable && Array.isArray(paramTypes))) {
    const emitted: readonly unknown[] = Array.isArray(paramTypes) ? paramTypes : [];
    const byIndex: ReadonlyMap<unknown, unknown> = overrides instanceof Map ? overrides : new Map();
    let count = Math.max(emitted.length, implementation.length);
    byIndex.forEach((_, index) => {
      if (typeof index === 'number') {
        count = Math.max(count, index + 1);
      }
    });

    const dependencies: Dependency[] = [];
    for (let i = 0; i < count; i++) {
      const candidate = byIndex.has(i) ? byIndex.get(i) : emitted[i];
      if (UNINFORMATIVE_TYPES.has(candidate) || !isDependency(candidate)) {
        throw new ConfigurationError(
          `Cannot determine constructor parameter ${i} of '${name}'. ` +
            'Interfaces and primitives need @Inject(token)',
          name,
        );
      }
      dependencies.push(candidate);
    }
    return dependencies;
  }

  assertCoversConstructor(implementation, 0);
  return [];
}

function assertCoversConstructor(implementation: AbstractConstructor, declared: number): void {
  if (declared < implementation.length) {
    const name = describeKey(implementation);
    throw new ConfigurationError(
      `'${name}' takes ${implementation.length} constructor parameter(s) but declares ` +
        `${declared} dependencies. Declare them with 'static inject' or @Inject`,
      name,
    );
  }
}
