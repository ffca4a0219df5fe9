/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Concrete pieces built on the application layer:
 *
 * - **Container**: registration, resolution, verification and disposal
 * - **Logging**: console loggers for the container's `ILogger`
 *
 * @packageDocumentation
 * @module sinew-di/infrastructure
 */

// The Container
export * from './container';

// Console Logging
export * from './logging';
