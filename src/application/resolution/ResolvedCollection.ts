/**
 * @fileoverview Lazy Collections
 *
 * @module sinew-di/application/resolution
 *
 * A {@link CollectionProducer} holds one producer per element, in
 * registration order. The {@link ResolvedCollection} it hands out is a stable
 * view: the same object is returned for the same key (per scope when scopes
 * are passed explicitly), and nothing is created until it is iterated.
 *
 * ```typescript
 * const rules = container.getAllInstances(IOrderRule);
 * rules === container.getAllInstances(IOrderRule); // true
 * rules.count;                                     // no instance created
 * for (const rule of rules) rule.check(order);     // each element resolved now
 * ```
 */

import { ServiceKey, conformsTo, describeKey } from '../../domain/keys';
import { ActivationError } from '../../domain/exceptions';
import type { LazyCollection } from '../di';
import type { ScopedInstanceCache } from '../registration';
import type { ActivationContext, ActivationHost, InstanceProducer } from './InstanceProducer';

export class ResolvedCollection<T> implements LazyCollection<T> {
  constructor(
    readonly serviceKey: ServiceKey<T>,
    private readonly producer: CollectionProducer,
    private readonly scopeOf: () => ScopedInstanceCache | undefined,
  ) {}

  get count(): number {
    return this.producer.elements.length;
  }

  at(index: number): T {
    const element = this.producer.elements[index];
    if (!element) {
      throw new RangeError(
        `Index ${index} is outside the collection of ${this.count} '${describeKey(this.serviceKey)}' element(s)`,
      );
    }
    const instance = this.producer.resolveElement(element, this.scopeOf());
    if (!conformsTo(this.serviceKey, instance)) {
      throw new ActivationError(
        describeKey(this.serviceKey),
        new TypeError(`Collection element '${element.registration.displayName}' has the wrong type`),
      );
    }
    return instance;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      yield this.at(i);
    }
  }

  toArray(): T[] {
    return [...this];
  }
}

/**
 * Narrow a cached collection to the element type of the key it was built for.
 */
export function isCollectionOf<T>(
  collection: ResolvedCollection<unknown>,
  key: ServiceKey<T>,
): collection is ResolvedCollection<T> {
  return collection.serviceKey === key;
}

export class CollectionProducer {
  private root?: ResolvedCollection<unknown>;
  private readonly perScope = new WeakMap<ScopedInstanceCache, ResolvedCollection<unknown>>();

  constructor(
    readonly serviceKey: ServiceKey,
    readonly elements: readonly InstanceProducer[],
    private readonly host: ActivationHost,
  ) {}

  get serviceName(): string {
    return describeKey(this.serviceKey);
  }

  /**
   * The collection for the given context. Without an explicitly passed scope
   * the collection finds the active scope each time it is iterated.
   */
  resolve(context: ActivationContext): ResolvedCollection<unknown> {
    const { scope } = context;
    if (!scope || this.host.ambientScopes) {
      this.root ??= new ResolvedCollection(this.serviceKey, this, () => this.host.currentScope());
      return this.root;
    }

    let collection = this.perScope.get(scope);
    if (!collection) {
      collection = new ResolvedCollection(this.serviceKey, this, () => scope);
      this.perScope.set(scope, collection);
    }
    return collection;
  }

  resolveElement(element: InstanceProducer, scope: ScopedInstanceCache | undefined): unknown {
    return element.getInstance(this.host.createContext(scope));
  }
}
