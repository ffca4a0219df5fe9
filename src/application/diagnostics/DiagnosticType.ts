/**
 * @module sinew-di/application/diagnostics
 */

/**
 * Structural problems the analyzer looks for.
 */
export enum DiagnosticType {
  /** A consumer depends on a service with a shorter lifetime. */
  LifestyleMismatch = 'LifestyleMismatch',

  /** A transient implementation holds resources nobody will dispose. */
  DisposableTransientComponent = 'DisposableTransientComponent',

  /** One implementation, one lifetime, several registrations: "one instance" no longer holds. */
  TornLifestyle = 'TornLifestyle',

  /** One implementation registered with different lifetimes. */
  AmbiguousLifestyles = 'AmbiguousLifestyles',

  /** A consumer depends on the implementation directly instead of its registered abstraction. */
  ShortCircuitedDependency = 'ShortCircuitedDependency',

  /** A component with too many dependencies. */
  SingleResponsibilityViolation = 'SingleResponsibilityViolation',

  /** A registered service whose producer cannot be built. */
  ResolutionFailure = 'ResolutionFailure',
}

export enum DiagnosticSeverity {
  Information = 'information',
  Warning = 'warning',
  Error = 'error',
}

export const DIAGNOSTIC_SEVERITY: Readonly<Record<DiagnosticType, DiagnosticSeverity>> = {
  [DiagnosticType.LifestyleMismatch]: DiagnosticSeverity.Warning,
  [DiagnosticType.DisposableTransientComponent]: DiagnosticSeverity.Warning,
  [DiagnosticType.TornLifestyle]: DiagnosticSeverity.Warning,
  [DiagnosticType.AmbiguousLifestyles]: DiagnosticSeverity.Warning,
  [DiagnosticType.ShortCircuitedDependency]: DiagnosticSeverity.Warning,
  [DiagnosticType.SingleResponsibilityViolation]: DiagnosticSeverity.Information,
  [DiagnosticType.ResolutionFailure]: DiagnosticSeverity.Error,
};
