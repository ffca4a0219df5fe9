/**
 * @module sinew-di/application/scoping
 * @description Scopes, scoped lifestyles and disposal
 */

export { Scope, ScopeState } from './Scope';
export type { ScopeHost } from './Scope';

export { ScopedLifestyle, AsyncScopedLifestyle, ExplicitScopedLifestyle } from './ScopedLifestyle';

export { DisposalTracker } from './DisposalTracker';
