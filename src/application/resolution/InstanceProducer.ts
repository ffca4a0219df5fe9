/**
 * @fileoverview InstanceProducer - A Built Node of the Object Graph
 *
 * @packageDocumentation
 * @module sinew-di/application/resolution
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * A producer pairs a service key with the registration chosen for it (after
 * decorators were applied) and with producers for each of its dependencies.
 * Producers are built once, on first resolution, and then reused; building
 * is where cycles and lifestyle mismatches are found, so creating instances
 * afterwards only walks edges.
 *
 * ```
 * InstanceProducer(ICommandHandler<CreateOrder>)      registration: TransactionDecorator
 *   └─ decoratee → InstanceProducer(...)              registration: CreateOrderHandler
 *        ├─ service → InstanceProducer(IOrderRepository)
 *        └─ collection → CollectionProducer(IOrderRule)
 * ```
 */

import { ServiceKey, conformsTo, describeKey } from '../../domain/keys';
import { ServiceLifetime } from '../../domain/lifestyle';
import { ActivationError, CircularDependencyError, DIError } from '../../domain/exceptions';
import type { Resolver } from '../di';
import type { Initializer, Registration, ScopedInstanceCache } from '../registration';
import type { CollectionProducer } from './ResolvedCollection';

/**
 * The scope an instance is created in, and the resolver handed to factories
 * running in that scope.
 */
export interface ActivationContext {
  readonly scope: ScopedInstanceCache | undefined;
  readonly resolver: Resolver;
}

/**
 * Supplies activation contexts. Implemented by the resolution engine.
 */
export interface ActivationHost {
  /**
   * Whether the active scope is found through the async call chain. When it
   * is, collections look the scope up each time they are iterated.
   */
  readonly ambientScopes: boolean;

  currentScope(): ScopedInstanceCache | undefined;

  createContext(scope: ScopedInstanceCache | undefined): ActivationContext;
}

/**
 * One dependency of a producer, already resolved to what supplies it.
 */
export type ProducerEdge =
  | { readonly kind: 'service'; readonly producer: InstanceProducer }
  | { readonly kind: 'decoratee'; readonly producer: InstanceProducer }
  | { readonly kind: 'decoratee-factory'; readonly producer: InstanceProducer }
  | { readonly kind: 'collection'; readonly collection: CollectionProducer }
  | { readonly kind: 'type-argument'; readonly value: ServiceKey };

export class InstanceProducer {
  private activating = false;

  constructor(
    readonly serviceKey: ServiceKey,
    readonly registration: Registration,
    readonly dependencies: readonly ProducerEdge[],
    private readonly initializers: readonly Initializer[],
  ) {}

  get serviceName(): string {
    return describeKey(this.serviceKey);
  }

  get lifetime(): ServiceLifetime {
    return this.registration.lifetime;
  }

  /**
   * The producer this one decorates, if it is a decorator.
   */
  get decoratee(): InstanceProducer | undefined {
    for (const edge of this.dependencies) {
      if (edge.kind === 'decoratee' || edge.kind === 'decoratee-factory') {
        return edge.producer;
      }
    }
    return undefined;
  }

  /**
   * Return the instance for the given context, creating it when the
   * registration's lifetime requires.
   */
  getInstance(context: ActivationContext): unknown {
    return this.registration.getInstance(
      context.scope,
      () => this.activate(context),
      this.serviceName,
    );
  }

  private activate(context: ActivationContext): unknown {
    // A factory resolving its own service would otherwise recurse until the
    // stack overflows.
    if (this.activating) {
      throw new CircularDependencyError([this.serviceName, this.serviceName]);
    }

    this.activating = true;
    try {
      const args = this.dependencies.map((edge) => this.resolveEdge(edge, context));
      const instance = this.invoke(args, context);

      if (!conformsTo(this.serviceKey, instance)) {
        throw new ActivationError(
          this.serviceName,
          new TypeError(
            `'${this.registration.displayName}' produced a value that is not an instance of ` +
              `'${this.serviceName}'`,
          ),
        );
      }
      return instance;
    } finally {
      this.activating = false;
    }
  }

  private invoke(args: unknown[], context: ActivationContext): unknown {
    try {
      const instance = this.registration.activator(args, context.resolver);
      for (const initializer of this.initializers) {
        if (instance instanceof initializer.type) {
          initializer.action(instance);
        }
      }
      return instance;
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }
      throw new ActivationError(this.serviceName, error);
    }
  }

  private resolveEdge(edge: ProducerEdge, context: ActivationContext): unknown {
    switch (edge.kind) {
      case 'service':
      case 'decoratee':
        return edge.producer.getInstance(context);
      case 'decoratee-factory': {
        const { producer } = edge;
        return () => producer.getInstance(context);
      }
      case 'collection':
        return edge.collection.resolve(context);
      case 'type-argument':
        return edge.value;
    }
  }
}
