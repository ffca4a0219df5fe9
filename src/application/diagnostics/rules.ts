/**
 * @fileoverview Diagnostic Rules
 *
 * @module sinew-di/application/diagnostics
 *
 * Each rule is a pure function over the built producer graph. Rules read
 * registrations and producers; none creates an instance.
 */

import { AbstractConstructor, ClosedGenericKey, describeKey } from '../../domain/keys';
import { ServiceLifetime, canDependOn, getLifetimeName } from '../../domain/lifestyle';
import { isDisposableType } from '../../domain/disposal';
import type { Registration } from '../registration';
import type { BuildFailure, InstanceProducer } from '../resolution';
import { DiagnosticResult } from './DiagnosticResult';
import { DIAGNOSTIC_SEVERITY, DiagnosticType } from './DiagnosticType';

/**
 * Every producer reachable from the registered keys, each listed once.
 */
export interface AnalysisGraph {
  readonly producers: readonly InstanceProducer[];
  readonly failures: readonly BuildFailure[];
}

export type DiagnosticRule = (graph: AnalysisGraph) => DiagnosticResult[];

/** Dependencies above which a component is reported as doing too much. */
export const MAX_DEPENDENCIES = 7;

function finding(type: DiagnosticType, producer: InstanceProducer, description: string): DiagnosticResult {
  return {
    type,
    severity: DIAGNOSTIC_SEVERITY[type],
    serviceKey: producer.serviceKey,
    serviceName: producer.serviceName,
    description,
    registration: producer.registration,
  };
}

/** The undecorated producer at the bottom of a decorator chain. */
function baseOf(producer: InstanceProducer): InstanceProducer {
  let current = producer;
  let inner = current.decoratee;
  while (inner) {
    current = inner;
    inner = current.decoratee;
  }
  return current;
}

/** Producers per registration, in the order they were reached. */
function byRegistration(producers: readonly InstanceProducer[]): Map<Registration, InstanceProducer[]> {
  const grouped = new Map<Registration, InstanceProducer[]>();
  for (const producer of producers) {
    const list = grouped.get(producer.registration) ?? [];
    list.push(producer);
    grouped.set(producer.registration, list);
  }
  return grouped;
}

function serviceNames(producers: Iterable<InstanceProducer>): string {
  return [...new Set([...producers].map((p) => p.serviceName))].join(', ');
}

// ============================================================================
// Lifetimes
// ============================================================================

export const lifestyleMismatchRule: DiagnosticRule = ({ producers }) => {
  const results: DiagnosticResult[] = [];
  const seen = new Set<string>();

  for (const producer of producers) {
    for (const edge of producer.dependencies) {
      if (edge.kind !== 'service' && edge.kind !== 'decoratee') {
        continue;
      }
      const dependency = edge.producer;
      const id = `${producer.registration.id}:${dependency.registration.id}`;
      if (canDependOn(producer.lifetime, dependency.lifetime) || seen.has(id)) {
        continue;
      }
      seen.add(id);
      results.push(
        finding(
          DiagnosticType.LifestyleMismatch,
          producer,
          `'${producer.serviceName}' (${getLifetimeName(producer.lifetime)}) depends on ` +
            `'${dependency.serviceName}' (${getLifetimeName(dependency.lifetime)}).`,
        ),
      );
    }
  }
  return results;
};

export const disposableTransientRule: DiagnosticRule = ({ producers }) => {
  const results: DiagnosticResult[] = [];
  byRegistration(producers).forEach((list, registration) => {
    const { implementation } = registration;
    if (
      registration.lifetime === ServiceLifetime.Transient &&
      !registration.externallyOwned &&
      implementation &&
      isDisposableType(implementation)
    ) {
      results.push(
        finding(
          DiagnosticType.DisposableTransientComponent,
          list[0],
          `'${registration.displayName}' is registered as Transient but is disposable; ` +
            'transient instances are not tracked, so it will never be disposed.',
        ),
      );
    }
  });
  return results;
};

interface ComponentGroup {
  readonly registrations: Map<Registration, InstanceProducer[]>;
}

/**
 * Registrations grouped by the component they create: the implementation
 * and, for closures of open generics, the closed key.
 */
function groupByComponent(producers: readonly InstanceProducer[]): ComponentGroup[] {
  const groups = new Map<AbstractConstructor, Map<ClosedGenericKey<unknown> | undefined, ComponentGroup>>();

  byRegistration(producers).forEach((list, registration) => {
    const { implementation } = registration;
    if (!implementation || registration.role === 'decorator') {
      return;
    }
    let byClosure = groups.get(implementation);
    if (!byClosure) {
      byClosure = new Map();
      groups.set(implementation, byClosure);
    }
    let group = byClosure.get(registration.closedFor);
    if (!group) {
      group = { registrations: new Map() };
      byClosure.set(registration.closedFor, group);
    }
    group.registrations.set(registration, list);
  });

  const result: ComponentGroup[] = [];
  groups.forEach((byClosure) => byClosure.forEach((group) => result.push(group)));
  return result;
}

export const tornLifestyleRule: DiagnosticRule = ({ producers }) => {
  const results: DiagnosticResult[] = [];

  for (const group of groupByComponent(producers)) {
    for (const lifetime of [ServiceLifetime.Scoped, ServiceLifetime.Singleton]) {
      const torn = [...group.registrations].filter(([registration]) => registration.lifetime === lifetime);
      if (torn.length < 2) {
        continue;
      }
      const keys = serviceNames(torn.flatMap(([, list]) => list));
      for (const [registration, list] of torn) {
        results.push(
          finding(
            DiagnosticType.TornLifestyle,
            list[0],
            `'${registration.displayName}' is registered as ${getLifetimeName(lifetime)} ` +
              `${torn.length} times (for ${keys}); each registration creates its own instance.`,
          ),
        );
      }
    }
  }
  return results;
};

export const ambiguousLifestylesRule: DiagnosticRule = ({ producers }) => {
  const results: DiagnosticResult[] = [];

  for (const group of groupByComponent(producers)) {
    const lifetimes = new Set([...group.registrations.keys()].map((r) => r.lifetime));
    if (lifetimes.size < 2) {
      continue;
    }
    const names = [...lifetimes].map(getLifetimeName).join(', ');
    const keys = serviceNames([...group.registrations.values()].flat());
    group.registrations.forEach((list, registration) => {
      results.push(
        finding(
          DiagnosticType.AmbiguousLifestyles,
          list[0],
          `'${registration.displayName}' is registered with different lifetimes (${names}) ` +
            `for ${keys}.`,
        ),
      );
    });
  }
  return results;
};

// ============================================================================
// Structure
// ============================================================================

export const shortCircuitedDependencyRule: DiagnosticRule = ({ producers }) => {
  // Producers serving an abstraction, keyed by the class that implements them
  const abstractions = new Map<AbstractConstructor, InstanceProducer[]>();
  for (const producer of producers) {
    const implementation = baseOf(producer).registration.implementation;
    if (implementation && producer.serviceKey !== implementation) {
      const list = abstractions.get(implementation) ?? [];
      list.push(producer);
      abstractions.set(implementation, list);
    }
  }

  const results: DiagnosticResult[] = [];
  const seen = new Set<string>();
  for (const producer of producers) {
    for (const edge of producer.dependencies) {
      if (edge.kind !== 'service') {
        continue;
      }
      const dependencyKey = edge.producer.serviceKey;
      if (typeof dependencyKey !== 'function') {
        continue;
      }
      const direct = baseOf(edge.producer).registration;
      const others = (abstractions.get(dependencyKey) ?? []).filter(
        (candidate) => baseOf(candidate).registration !== direct,
      );
      const id = `${producer.registration.id}:${edge.producer.serviceName}`;
      if (others.length === 0 || seen.has(id)) {
        continue;
      }
      seen.add(id);
      const implementation = edge.producer.serviceName;
      const abstraction = others[0].serviceName;
      results.push(
        finding(
          DiagnosticType.ShortCircuitedDependency,
          producer,
          `'${producer.serviceName}' depends on '${implementation}' directly, while ` +
            `'${implementation}' is registered as '${abstraction}'; it may receive a different ` +
            `instance than consumers of '${abstraction}'.`,
        ),
      );
    }
  }
  return results;
};

export const singleResponsibilityRule: DiagnosticRule = ({ producers }) => {
  const results: DiagnosticResult[] = [];
  byRegistration(producers).forEach((list, registration) => {
    if (!registration.implementation) {
      return;
    }
    const count = list[0].dependencies.filter(
      (edge) => edge.kind === 'service' || edge.kind === 'collection',
    ).length;
    if (count > MAX_DEPENDENCIES) {
      results.push(
        finding(
          DiagnosticType.SingleResponsibilityViolation,
          list[0],
          `'${registration.displayName}' has ${count} dependencies, which might indicate it ` +
            'has too many responsibilities.',
        ),
      );
    }
  });
  return results;
};

export const resolutionFailureRule: DiagnosticRule = ({ failures }) =>
  failures.map(({ serviceKey, error }) => ({
    type: DiagnosticType.ResolutionFailure,
    severity: DIAGNOSTIC_SEVERITY[DiagnosticType.ResolutionFailure],
    serviceKey,
    serviceName: describeKey(serviceKey),
    description: error instanceof Error ? error.message : String(error),
  }));

export const DEFAULT_RULES: readonly DiagnosticRule[] = [
  lifestyleMismatchRule,
  disposableTransientRule,
  tornLifestyleRule,
  ambiguousLifestylesRule,
  shortCircuitedDependencyRule,
  singleResponsibilityRule,
  resolutionFailureRule,
];
