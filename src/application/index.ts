/**
 * @module sinew-di/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Declarations
// ============================================================================

export * from './di';

// ============================================================================
// Logging Contract
// ============================================================================

export * from './logging';

// ============================================================================
// Registrations
// ============================================================================

export * from './registration';

// ============================================================================
// Resolution
// ============================================================================

export * from './resolution';

// ============================================================================
// Scopes
// ============================================================================

export * from './scoping';

// ============================================================================
// Diagnostics
// ============================================================================

export * from './diagnostics';
