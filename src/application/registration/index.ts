/**
 * @module sinew-di/application/registration
 * @description Registrations and the table that stores them
 */

export {
  Registration,
  GenericRegistration,
  DecoratorRegistration,
  validateDependencies,
  closeDependencies,
  nextRegistrationId,
} from './Registration';

export type {
  ResolvedDependency,
  Activator,
  RegistrationRole,
  ScopedInstanceCache,
  RegistrationOwner,
  RegistrationDescriptor,
  ConditionalRegistration,
  Initializer,
} from './Registration';

export { RegistrationTable } from './RegistrationTable';
export type { RegistrationTableOptions, CollectionElement } from './RegistrationTable';
