/**
 * @module sinew-di/domain/lifestyle
 * @description Service lifetimes and the rules between them
 */

export {
  ServiceLifetime,
  getLifetimeLength,
  canDependOn,
  getLifetimeName,
  isServiceLifetime,
} from './ServiceLifetime';
