/**
 * @module sinew-di/domain/keys
 * @description Service keys, open generics and unification
 */

export {
  ServiceToken,
  OpenGeneric,
  ClosedGenericKey,
  TypeParameter,
  GenericPattern,
  createToken,
  defineGeneric,
  typeParam,
  isServiceKey,
  describeKey,
  describePattern,
  conformsTo,
} from './ServiceKey';

export type {
  Constructor,
  AbstractConstructor,
  ServiceKey,
  TypePattern,
  TypeConstraints,
} from './ServiceKey';

export {
  EMPTY_BINDINGS,
  isAssignableTo,
  satisfiesConstraints,
  unify,
  closePattern,
} from './unification';

export type { TypeBindings } from './unification';
