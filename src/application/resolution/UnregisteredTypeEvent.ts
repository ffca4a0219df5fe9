/**
 * @module sinew-di/application/resolution
 */

import { ServiceKey, describeKey } from '../../domain/keys';
import type { Registration } from '../registration';

/**
 * Raised when a key has no registration. A handler may supply one; the
 * registration it supplies is used for that key from then on.
 *
 * @example
 * ```typescript
 * container.onResolveUnregisteredType((event) => {
 *   if (event.serviceKey instanceof ClosedGenericKey && event.serviceKey.definition === IValidator) {
 *     event.register(container.createRegistration(NullValidator, ServiceLifetime.Singleton));
 *   }
 * });
 * ```
 */
export class UnregisteredTypeEvent {
  private readonly supplied: Registration[] = [];

  constructor(readonly serviceKey: ServiceKey) {}

  get serviceName(): string {
    return describeKey(this.serviceKey);
  }

  /** Whether a handler has already supplied a registration. */
  get handled(): boolean {
    return this.supplied.length > 0;
  }

  get registrations(): readonly Registration[] {
    return this.supplied;
  }

  register(registration: Registration): void {
    this.supplied.push(registration);
  }
}

export type UnregisteredTypeHandler = (event: UnregisteredTypeEvent) => void;
