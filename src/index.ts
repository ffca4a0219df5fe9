/**
 * @fileoverview sinew-di - Dependency Injection for Node.js
 * @description
 * A container that resolves object graphs from registrations, with open
 * generics, conditional registrations, decorators, lazy collections, scoped
 * lifetimes and a diagnostic analyzer.
 *
 * ## Architecture Layers
 *
 * - **Domain**: service keys and unification, lifetimes, disposal contracts,
 *   the error taxonomy
 * - **Application**: registrations, the resolution engine, scopes and
 *   diagnostics
 * - **Infrastructure**: the `Container` and console logging
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, Inject, Injectable, ServiceLifetime, createToken } from 'sinew-di';
 *
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * @Injectable()
 * class Greeter {
 *   constructor(@Inject(IClock) private readonly clock: IClock) {}
 * }
 *
 * const container = new Container();
 * container.register(IClock, SystemClock, ServiceLifetime.Singleton);
 * container.register(Greeter);
 * container.verify();
 * ```
 *
 * @packageDocumentation
 * @module sinew-di
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS (Keys, Lifetimes, Errors)
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Registration, Resolution, Scopes, Diagnostics)
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Container, Logging)
// ============================================================================

export * from './infrastructure';
