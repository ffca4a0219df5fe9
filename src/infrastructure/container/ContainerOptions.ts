/**
 * @fileoverview Container Options
 *
 * @module sinew-di/infrastructure/container
 *
 * Every option has a default; `new Container()` gives a container with
 * transient defaults, no scopes, strict duplicate checks and logging to the
 * console.
 */

import { ServiceLifetime, isServiceLifetime } from '../../domain/lifestyle';
import { ConfigurationError } from '../../domain/exceptions';
import type { ILogger } from '../../application/logging';
import { ScopedLifestyle } from '../../application/scoping';
import { consoleLogger } from '../logging';

export interface ContainerOptions {
  /** Used in log lines and error messages */
  name: string;

  /** Lifetime for registrations that name none */
  defaultLifetime: ServiceLifetime;

  /**
   * How scopes are found. Scoped registrations are rejected while this is
   * unset.
   */
  defaultScopedLifestyle?: ScopedLifestyle;

  /** Let a later registration of a key replace an earlier one */
  allowOverridingRegistrations: boolean;

  /** Resolve unregistered classes as transients instead of failing */
  resolveUnregisteredConcreteTypes: boolean;

  /** Resolve unregistered collections as empty instead of failing */
  resolveUnregisteredCollections: boolean;

  /**
   * Leave lifestyle mismatches to the analyzer instead of failing when the
   * producer is built
   */
  suppressLifestyleMismatchVerification: boolean;

  /** Verify the container on the first resolution */
  enableAutoVerification: boolean;

  logger: ILogger;
}

export const DEFAULT_CONTAINER_OPTIONS: Readonly<ContainerOptions> = Object.freeze({
  name: 'default',
  defaultLifetime: ServiceLifetime.Transient,
  defaultScopedLifestyle: undefined,
  allowOverridingRegistrations: false,
  resolveUnregisteredConcreteTypes: false,
  resolveUnregisteredCollections: false,
  suppressLifestyleMismatchVerification: false,
  enableAutoVerification: false,
  logger: consoleLogger,
});

/**
 * Merge `options` over the defaults and validate the result.
 *
 * @throws ConfigurationError for an unknown lifetime, a missing name, or a
 * scoped default lifetime without a scoped lifestyle
 */
export function resolveContainerOptions(options: Partial<ContainerOptions> = {}): Readonly<ContainerOptions> {
  const defaults = DEFAULT_CONTAINER_OPTIONS;
  const resolved: ContainerOptions = {
    name: options.name ?? defaults.name,
    defaultLifetime: options.defaultLifetime ?? defaults.defaultLifetime,
    defaultScopedLifestyle: options.defaultScopedLifestyle ?? defaults.defaultScopedLifestyle,
    allowOverridingRegistrations:
      options.allowOverridingRegistrations ?? defaults.allowOverridingRegistrations,
    resolveUnregisteredConcreteTypes:
      options.resolveUnregisteredConcreteTypes ?? defaults.resolveUnregisteredConcreteTypes,
    resolveUnregisteredCollections:
      options.resolveUnregisteredCollections ?? defaults.resolveUnregisteredCollections,
    suppressLifestyleMismatchVerification:
      options.suppressLifestyleMismatchVerification ?? defaults.suppressLifestyleMismatchVerification,
    enableAutoVerification: options.enableAutoVerification ?? defaults.enableAutoVerification,
    logger: options.logger ?? defaults.logger,
  };

  if (resolved.name.trim().length === 0) {
    throw new ConfigurationError('Container name must be a non-empty string');
  }
  if (!isServiceLifetime(resolved.defaultLifetime)) {
    throw new ConfigurationError(`Unknown default lifetime '${String(resolved.defaultLifetime)}'`);
  }
  if (resolved.defaultScopedLifestyle !== undefined && !(resolved.defaultScopedLifestyle instanceof ScopedLifestyle)) {
    throw new ConfigurationError('defaultScopedLifestyle must be a ScopedLifestyle instance');
  }
  if (resolved.defaultLifetime === ServiceLifetime.Scoped && !resolved.defaultScopedLifestyle) {
    throw new ConfigurationError('A Scoped default lifetime requires a defaultScopedLifestyle');
  }

  return Object.freeze(resolved);
}

/**
 * What `verify()` checks beyond building and creating every registration.
 */
export enum VerificationOption {
  /** Build and create only */
  VerifyOnly = 'verify-only',

  /** Also run the analyzer and fail on warnings */
  VerifyAndDiagnose = 'verify-and-diagnose',
}
