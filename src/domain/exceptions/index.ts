/**
 * sinew-di - Exception Module
 *
 * Error taxonomy shared by every layer
 */

export {
  DIError,
  ConfigurationError,
  DependencyResolutionError,
  MissingDependencyError,
  AmbiguousResolutionError,
  ScopeViolationError,
  CircularDependencyError,
  LifestyleMismatchError,
  ActivationError,
  DisposalError,
} from './exceptions';

export type { ResolutionErrorDetails } from './exceptions';

export { formatDependencyGraph, GraphMarker } from './dependency-graph';
