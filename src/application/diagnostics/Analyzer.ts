/**
 * @fileoverview Diagnostic Analyzer
 *
 * @packageDocumentation
 * @module sinew-di/application/diagnostics
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Reports structural problems in a container's object graph: lifetimes that
 * do not fit together, disposables nobody disposes, components registered in
 * conflicting ways. Analysis builds the producers it needs (which locks the
 * container) but never creates an instance, never changes a registration and
 * never throws; producers that cannot be built become `ResolutionFailure`
 * findings.
 *
 * @example
 * ```typescript
 * const results = Analyzer.analyze(container);
 * for (const result of results) {
 *   console.log(`[${result.severity}] ${result.type}: ${result.description}`);
 * }
 * ```
 *
 * A finding that does not apply is suppressed on its registration:
 *
 * ```typescript
 * container
 *   .register(ReportJob, ReportJob, ServiceLifetime.Transient)
 *   .suppressDiagnostic(DiagnosticType.DisposableTransientComponent, 'Disposed by the job runner');
 * ```
 */

import type { CollectionProducer, InstanceProducer, ProducerGraph } from '../resolution';
import { DiagnosticResult } from './DiagnosticResult';
import { AnalysisGraph, DEFAULT_RULES, DiagnosticRule } from './rules';

/**
 * Anything that can hand the analyzer its producer graph. Implemented by the
 * container.
 */
export interface DiagnosticSource {
  collectProducerGraph(): ProducerGraph;
}

export class Analyzer {
  /**
   * Run every rule against `source`.
   */
  static analyze(
    source: DiagnosticSource,
    rules: readonly DiagnosticRule[] = DEFAULT_RULES,
  ): DiagnosticResult[] {
    const graph = source.collectProducerGraph();
    const analysis: AnalysisGraph = {
      producers: reachableProducers(graph),
      failures: graph.failures,
    };

    return rules
      .flatMap((rule) => rule(analysis))
      .filter((result) => !result.registration?.isSuppressed(result.type));
  }
}

/**
 * Every producer reachable from the graph's roots, through dependencies,
 * decoratees and collections, each listed once.
 */
function reachableProducers(graph: ProducerGraph): InstanceProducer[] {
  const visited = new Set<InstanceProducer>();
  const visitedCollections = new Set<CollectionProducer>();
  const pending: InstanceProducer[] = [...graph.producers];

  const visitCollection = (collection: CollectionProducer): void => {
    if (!visitedCollections.has(collection)) {
      visitedCollections.add(collection);
      pending.push(...collection.elements);
    }
  };
  graph.collections.forEach(visitCollection);

  const result: InstanceProducer[] = [];
  for (let producer = pending.shift(); producer; producer = pending.shift()) {
    if (visited.has(producer)) {
      continue;
    }
    visited.add(producer);
    result.push(producer);

    for (const edge of producer.dependencies) {
      if (edge.kind === 'collection') {
        visitCollection(edge.collection);
      } else if (edge.kind !== 'type-argument') {
        pending.push(edge.producer);
      }
    }
  }
  return result;
}
