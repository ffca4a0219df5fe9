/**
 * @fileoverview Registration Table
 *
 * @packageDocumentation
 * @module sinew-di/application/registration
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Storage and lookup only; choosing between registrations is the
 * resolution engine's job.
 *
 * - Exact keys map to one {@link Registration} (O(1) lookup). Binding a key
 *   twice is an error unless overriding is explicitly allowed.
 * - Conditional registrations for an exact key are kept in registration
 *   order and may not be mixed with an unconditional one.
 * - Open-generic recipes are kept per {@link OpenGeneric}.
 * - Collections are ordered lists, separate from single bindings.
 * - Once the table is locked (the first producer was built) nothing may
 *   change, so resolution stays deterministic.
 */

import {
  ClosedGenericKey,
  EMPTY_BINDINGS,
  OpenGeneric,
  ServiceKey,
  closePattern,
  describeKey,
} from '../../domain/keys';
import { ConfigurationError } from '../../domain/exceptions';
import type { ILogger } from '../logging';
import {
  ConditionalRegistration,
  DecoratorRegistration,
  GenericRegistration,
  Initializer,
  Registration,
} from './Registration';

export interface RegistrationTableOptions {
  allowOverridingRegistrations: boolean;
  logger: ILogger;
}

/**
 * The elements of one collection, exact and open-generic, in registration
 * order.
 */
export type CollectionElement = Registration | GenericRegistration;

export class RegistrationTable {
  private readonly singles = new Map<ServiceKey, Registration>();
  private readonly conditionals = new Map<ServiceKey, ConditionalRegistration[]>();
  private readonly generics = new Map<OpenGeneric, GenericRegistration[]>();
  private readonly collections = new Map<ServiceKey | OpenGeneric, CollectionElement[]>();
  private readonly decorators: DecoratorRegistration[] = [];
  private readonly initializers: Initializer[] = [];
  private locked = false;

  constructor(private readonly options: RegistrationTableOptions) {}

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Freeze the table. Called when the first producer is built.
   */
  lock(): void {
    if (!this.locked) {
      this.locked = true;
      this.options.logger.debug(
        `Registration table locked with ${this.singles.size} single, ` +
          `${this.conditionals.size} conditional, ${this.generics.size} open-generic and ` +
          `${this.collections.size} collection registration(s)`,
      );
    }
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Bind `key` to a registration.
   *
   * @throws ConfigurationError when the key is already bound and overriding
   * is not allowed, or the key has conditional registrations
   */
  register(key: ServiceKey, registration: Registration): void {
    this.assertUnlocked();
    const name = describeKey(key);

    if (this.conditionals.has(key)) {
      throw new ConfigurationError(
        `Type '${name}' already has conditional registrations; an unconditional ` +
          'registration would make every resolution ambiguous',
        name,
      );
    }

    if (this.singles.has(key)) {
      if (!this.options.allowOverridingRegistrations) {
        throw new ConfigurationError(
          `Type '${name}' has already been registered. Set ` +
            "'allowOverridingRegistrations' to replace existing registrations",
          name,
        );
      }
      this.options.logger.warn(`Overriding registration for '${name}'`);
    }

    this.singles.set(key, registration);
  }

  registerConditional(key: ServiceKey, conditional: ConditionalRegistration): void {
    this.assertUnlocked();
    const name = describeKey(key);
    if (this.singles.has(key)) {
      throw new ConfigurationError(
        `Type '${name}' already has an unconditional registration; conditional ` +
          'registrations cannot be added to it',
        name,
      );
    }
    const list = this.conditionals.get(key) ?? [];
    list.push(conditional);
    this.conditionals.set(key, list);
  }

  registerGeneric(registration: GenericRegistration): void {
    this.assertUnlocked();
    const list = this.generics.get(registration.definition) ?? [];

    if (registration.isFullyOpen && !registration.predicate) {
      const duplicate = list.findIndex((existing) => existing.isFullyOpen && !existing.predicate);
      if (duplicate >= 0) {
        const name = registration.definition.toString();
        if (!this.options.allowOverridingRegistrations) {
          throw new ConfigurationError(
            `Open generic '${name}' already has an unconditional implementation ` +
              `('${list[duplicate].displayName}')`,
            name,
          );
        }
        this.options.logger.warn(`Overriding open-generic registration for '${name}'`);
        list.splice(duplicate, 1);
      }
    }

    list.push(registration);
    this.generics.set(registration.definition, list);
  }

  /**
   * Declare the complete collection for a key.
   *
   * @throws ConfigurationError if the collection was declared before and
   * overriding is not allowed
   */
  registerCollection(key: ServiceKey | OpenGeneric, elements: readonly CollectionElement[]): void {
    this.assertUnlocked();
    const name = key instanceof OpenGeneric ? key.toString() : describeKey(key);
    if (this.collections.has(key)) {
      if (!this.options.allowOverridingRegistrations) {
        throw new ConfigurationError(
          `A collection for '${name}' has already been registered; use ` +
            'collection.append to add elements',
          name,
        );
      }
      this.options.logger.warn(`Overriding collection registration for '${name}'`);
    }
    this.collections.set(key, [...elements]);
  }

  appendToCollection(key: ServiceKey | OpenGeneric, element: CollectionElement): void {
    this.assertUnlocked();
    const list = this.collections.get(key) ?? [];
    list.push(element);
    this.collections.set(key, list);
  }

  registerDecorator(decorator: DecoratorRegistration): void {
    this.assertUnlocked();
    this.decorators.push(decorator);
  }

  registerInitializer(initializer: Initializer): void {
    this.assertUnlocked();
    this.initializers.push(initializer);
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  getRegistration(key: ServiceKey): Registration | undefined {
    return this.singles.get(key);
  }

  getConditionals(key: ServiceKey): readonly ConditionalRegistration[] {
    return this.conditionals.get(key) ?? [];
  }

  getGenerics(definition: OpenGeneric): readonly GenericRegistration[] {
    return this.generics.get(definition) ?? [];
  }

  hasCollection(key: ServiceKey): boolean {
    return (
      this.collections.has(key) ||
      (key instanceof ClosedGenericKey && this.collections.has(key.definition))
    );
  }

  /**
   * Every element registered for `key`: exact ones and, for a closed key,
   * the open-generic ones of its definition, in registration order.
   */
  getCollectionElements(key: ServiceKey): readonly CollectionElement[] {
    const exact = this.collections.get(key) ?? [];
    if (!(key instanceof ClosedGenericKey)) {
      return exact;
    }
    const open = this.collections.get(key.definition);
    if (!open) {
      return exact;
    }
    return [...exact, ...open].sort((a, b) => a.id - b.id);
  }

  getDecorators(): readonly DecoratorRegistration[] {
    return this.decorators;
  }

  getInitializers(): readonly Initializer[] {
    return this.initializers;
  }

  /**
   * Keys that can be verified without knowing closures in advance: every
   * exact key, and the closed keys of open-generic registrations whose
   * pattern has no parameters.
   */
  getVerifiableKeys(): ServiceKey[] {
    const keys = new Set<ServiceKey>([...this.singles.keys(), ...this.conditionals.keys()]);
    this.generics.forEach((list) => {
      for (const generic of list) {
        if (generic.pattern.parameters().size === 0) {
          keys.add(closePattern(generic.pattern, EMPTY_BINDINGS));
        }
      }
    });
    return [...keys];
  }

  /**
   * Collection keys that can be verified: exact keys and closed keys named by
   * parameterless open-generic elements.
   */
  getVerifiableCollectionKeys(): ServiceKey[] {
    const keys = new Set<ServiceKey>();
    this.collections.forEach((elements, key) => {
      if (!(key instanceof OpenGeneric)) {
        keys.add(key);
        return;
      }
      for (const element of elements) {
        if (element instanceof GenericRegistration && element.pattern.parameters().size === 0) {
          keys.add(closePattern(element.pattern, EMPTY_BINDINGS));
        }
      }
    });
    return [...keys];
  }

  assertUnlocked(): void {
    if (this.locked) {
      throw new ConfigurationError(
        'The container can no longer be changed after the first instance was resolved ' +
          'or the container was verified',
      );
    }
  }
}
