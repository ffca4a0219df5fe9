/**
 * @module sinew-di/domain
 * @description Domain layer exports
 */

// ============================================================================
// Service Keys & Generics
// ============================================================================

export * from './keys';

// ============================================================================
// Lifetimes
// ============================================================================

export * from './lifestyle';

// ============================================================================
// Disposal
// ============================================================================

export * from './disposal';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
