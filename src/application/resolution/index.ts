/**
 * @module sinew-di/application/resolution
 * @description Producers, collections and the resolution engine
 */

export { InstanceProducer } from './InstanceProducer';
export type { ActivationContext, ActivationHost, ProducerEdge } from './InstanceProducer';

export { CollectionProducer, ResolvedCollection, isCollectionOf } from './ResolvedCollection';

export { UnregisteredTypeEvent } from './UnregisteredTypeEvent';
export type { UnregisteredTypeHandler } from './UnregisteredTypeEvent';

export { ResolutionEngine } from './ResolutionEngine';
export type {
  ResolutionEngineOptions,
  ScopeSource,
  BuildFailure,
  ProducerGraph,
} from './ResolutionEngine';
