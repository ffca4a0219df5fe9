/**
 * sinew-di - Container Exceptions
 *
 * Every failure the container raises derives from {@link DIError}. The
 * container never guesses: configuration problems surface when registering
 * or verifying, resolution problems at the first resolution that hits them.
 *
 * ```
 * DIError
 * ├─ ConfigurationError            duplicate / locked / invalid registration
 * ├─ DependencyResolutionError     carries the dependency graph
 * │  ├─ MissingDependencyError
 * │  ├─ AmbiguousResolutionError
 * │  ├─ ScopeViolationError
 * │  ├─ CircularDependencyError
 * │  ├─ LifestyleMismatchError
 * │  └─ ActivationError
 * └─ DisposalError
 * ```
 */

import { formatDependencyGraph, GraphMarker } from './dependency-graph';

/**
 * Base class for every container error.
 */
export class DIError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DIError';

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * The registrations themselves are wrong: a key bound twice, a mutation after
 * the container locked, an invalid dependency list, a collection that was
 * never registered.
 */
export class ConfigurationError extends DIError {
  constructor(
    message: string,
    public readonly serviceName?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ResolutionErrorDetails {
  /** The service that could not be produced */
  serviceName?: string;

  /** Consumers leading to it, outermost first */
  consumerChain?: readonly string[];

  cause?: unknown;
}

/**
 * Base class for failures while building or running a producer.
 *
 * @remarks
 * `dependencyGraph` shows the resolution path in the same tree format for
 * every subclass:
 *
 * ```
 * ├─ OrderController
 *   └─ OrderService
 *     └─ IMailer (UNREGISTERED)
 * ```
 */
export class DependencyResolutionError extends DIError {
  public readonly dependencyGraph: string;
  public readonly serviceName?: string;
  public readonly consumerChain: readonly string[];

  constructor(message: string, dependencyGraph: string = '', details: ResolutionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;
    this.serviceName = details.serviceName;
    this.consumerChain = details.consumerChain ?? [];
  }
}

function requiredBy(chain: readonly string[]): string {
  return chain.length > 0 ? ` (required by ${chain.join(' → ')})` : '';
}

export class MissingDependencyError extends DependencyResolutionError {
  constructor(serviceName: string, consumerChain: readonly string[] = []) {
    super(
      `No registration for service '${serviceName}' could be found${requiredBy(consumerChain)}`,
      formatDependencyGraph(consumerChain, `${serviceName} (${GraphMarker.Unregistered})`),
      { serviceName, consumerChain },
    );
    this.name = 'MissingDependencyError';
  }
}

/**
 * More than one registration could serve the request. The container never
 * picks the first one.
 */
export class AmbiguousResolutionError extends DependencyResolutionError {
  constructor(
    serviceName: string,
    public readonly candidates: readonly string[],
    consumerChain: readonly string[] = [],
  ) {
    super(
      `Multiple registrations match service '${serviceName}': ${candidates.join(', ')}. ` +
        'Make the predicates or type constraints mutually exclusive',
      formatDependencyGraph(consumerChain, `${serviceName} (${GraphMarker.Ambiguous})`),
      { serviceName, consumerChain },
    );
    this.name = 'AmbiguousResolutionError';
  }
}

/**
 * A scoped service was requested where no usable scope exists, or a scope
 * was used after it ended.
 */
export class ScopeViolationError extends DependencyResolutionError {
  constructor(message: string, serviceName?: string, consumerChain: readonly string[] = []) {
    super(
      message,
      serviceName ? formatDependencyGraph(consumerChain, `${serviceName} (${GraphMarker.NoScope})`) : '',
      { serviceName, consumerChain },
    );
    this.name = 'ScopeViolationError';
  }
}

export class CircularDependencyError extends DependencyResolutionError {
  public readonly cycle: readonly string[];

  /**
   * @param cycle - Resolution path ending with the service that repeats
   */
  constructor(cycle: readonly string[]) {
    const chain = cycle.slice(0, -1);
    const repeated = cycle[cycle.length - 1];
    super(
      `Circular dependency detected: ${cycle.join(' → ')}`,
      formatDependencyGraph(chain, `${repeated} (${GraphMarker.Circular})`),
      { serviceName: repeated, consumerChain: chain },
    );
    this.name = 'CircularDependencyError';
    this.cycle = cycle;
  }
}

/**
 * A consumer depends on a service with a shorter lifetime than its own.
 */
export class LifestyleMismatchError extends DependencyResolutionError {
  constructor(
    consumerName: string,
    consumerLifetime: string,
    dependencyName: string,
    dependencyLifetime: string,
    consumerChain: readonly string[],
  ) {
    super(
      `Lifestyle mismatch: ${consumerLifetime} service '${consumerName}' cannot depend on ` +
        `${dependencyLifetime} service '${dependencyName}'`,
      formatDependencyGraph(
        consumerChain,
        `${dependencyName} (${dependencyLifetime}) ← ${GraphMarker.LifestyleMismatch}`,
      ),
      { serviceName: dependencyName, consumerChain },
    );
    this.name = 'LifestyleMismatchError';
  }
}

/**
 * A constructor, factory or initializer threw while creating an instance.
 */
export class ActivationError extends DependencyResolutionError {
  constructor(serviceName: string, cause: unknown, consumerChain: readonly string[] = []) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Creating an instance of '${serviceName}' failed: ${reason}`,
      formatDependencyGraph(consumerChain, `${serviceName} (${GraphMarker.ActivationFailed})`),
      { serviceName, consumerChain, cause },
    );
    this.name = 'ActivationError';
  }
}

/**
 * One or more components failed to dispose. Every component is still given
 * the chance to dispose before this is thrown.
 */
export class DisposalError extends DIError {
  constructor(
    public readonly errors: readonly unknown[],
    owner: string,
  ) {
    super(`${errors.length} component(s) failed to dispose while ending ${owner}`);
    this.name = 'DisposalError';
  }
}
