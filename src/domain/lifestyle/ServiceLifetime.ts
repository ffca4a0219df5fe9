/**
 * @fileoverview ServiceLifetime - How Long Instances Live
 *
 * @packageDocumentation
 * @module sinew-di/domain/lifestyle
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * | Lifetime | Created | Shared | Disposed |
 * |----------|---------|--------|----------|
 * | Transient | Every resolve | Never | Never (not tracked) |
 * | Scoped | First resolve in a scope | Within that scope | When the scope ends |
 * | Singleton | First resolve | Container-wide | `container.dispose()` |
 *
 * **Dependency Rules:**
 *
 * A consumer may only depend on services that live at least as long as it
 * does. Anything else is a *lifestyle mismatch* (a captive dependency):
 *
 * - ✅ Singleton can inject: Singleton
 * - ✅ Scoped can inject: Singleton, Scoped
 * - ✅ Transient can inject: Singleton, Scoped, Transient
 * - ❌ Singleton cannot inject: Scoped, Transient
 * - ❌ Scoped cannot inject: Transient
 *
 * @version 1.0.0
 */

export enum ServiceLifetime {
  /**
   * A new instance on every resolution.
   *
   * @remarks
   * Transient instances are never tracked, so a transient that holds
   * resources is never disposed. The analyzer reports such registrations as
   * `DisposableTransientComponent`.
   */
  Transient = 'transient',

  /**
   * One instance per scope, disposed when the scope ends.
   *
   * @remarks
   * Resolving a scoped service with no active scope is always an error; it is
   * never silently treated as transient or singleton.
   */
  Scoped = 'scoped',

  /**
   * One instance per container.
   *
   * @remarks
   * Singletons must not keep per-operation state. Instances the container
   * created are disposed with the container; instances passed to
   * `registerInstance` are owned by the caller.
   */
  Singleton = 'singleton',
}

const LIFETIME_LENGTH: Readonly<Record<ServiceLifetime, number>> = {
  [ServiceLifetime.Transient]: 1,
  [ServiceLifetime.Scoped]: 500,
  [ServiceLifetime.Singleton]: 1000,
};

/**
 * Relative length of a lifetime. Longer lifetimes have larger values.
 */
export function getLifetimeLength(lifetime: ServiceLifetime): number {
  return LIFETIME_LENGTH[lifetime];
}

/**
 * Check if a consumer with lifetime `consumer` may depend on a service with
 * lifetime `dependency`.
 *
 * @example
 * ```typescript
 * canDependOn(ServiceLifetime.Scoped, ServiceLifetime.Singleton);   // true
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Scoped);   // false
 * canDependOn(ServiceLifetime.Transient, ServiceLifetime.Scoped);   // true
 * ```
 */
export function canDependOn(consumer: ServiceLifetime, dependency: ServiceLifetime): boolean {
  return getLifetimeLength(consumer) <= getLifetimeLength(dependency);
}

export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
  }
}

export function isServiceLifetime(value: unknown): value is ServiceLifetime {
  return (
    value === ServiceLifetime.Transient ||
    value === ServiceLifetime.Scoped ||
    value === ServiceLifetime.Singleton
  );
}
