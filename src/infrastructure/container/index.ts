/**
 * @module sinew-di/infrastructure/container
 */

export { Container } from './Container';
export type { CollectionRegistrar, DecoratorOptions, GenericRegistrationOptions } from './Container';

export {
  DEFAULT_CONTAINER_OPTIONS,
  VerificationOption,
  resolveContainerOptions,
} from './ContainerOptions';
export type { ContainerOptions } from './ContainerOptions';
