export { ValidatorRegistry } from './validator-registry.js';
export type {
  ValidatorFactory,
  ValidatorRegistrationOptions,
} from './validator-registry.js';
