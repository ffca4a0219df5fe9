/**
 * @module sinew-di/application/diagnostics
 * @description Read-only analysis of the object graph
 */

export { DiagnosticType, DiagnosticSeverity, DIAGNOSTIC_SEVERITY } from './DiagnosticType';

export { DiagnosticVerificationError } from './DiagnosticResult';
export type { DiagnosticResult } from './DiagnosticResult';

export {
  lifestyleMismatchRule,
  disposableTransientRule,
  tornLifestyleRule,
  ambiguousLifestylesRule,
  shortCircuitedDependencyRule,
  singleResponsibilityRule,
  resolutionFailureRule,
  DEFAULT_RULES,
  MAX_DEPENDENCIES,
} from './rules';
export type { AnalysisGraph, DiagnosticRule } from './rules';

export { Analyzer } from './Analyzer';
export type { DiagnosticSource } from './Analyzer';
