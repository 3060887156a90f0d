/**
 * Validator Registry
 * Discovers the validators that apply to a reflected type
 */

import type { TypeValidator } from '../types/rules.js';
import {
  DEFAULT_OPTIONS,
  type ResolvedOptions,
} from '../types/options.js';

/** Factory for lazily created validators. */
export type ValidatorFactory = () => TypeValidator;

export interface ValidatorRegistrationOptions {
  /**
   * Registration key. Keyed validators are returned after every unkeyed
   * validator of the same type.
   */
  key?: string;
}

interface ValidatorRegistration {
  key?: string;
  factory: ValidatorFactory;
  instance?: TypeValidator;
}

/**
 * Registry keyed by type name, populated at startup.
 */
export class ValidatorRegistry {
  private readonly unkeyed = new Map<string, ValidatorRegistration[]>();
  private readonly keyed = new Map<string, ValidatorRegistration[]>();
  private initialized = false;
  private initializer?: (registry: ValidatorRegistry) => void;

  constructor(
    private readonly options: Pick<
      ResolvedOptions,
      'oneValidatorPerType'
    > = DEFAULT_OPTIONS
  ) {}

  /**
   * Set the population function (called once on first query)
   */
  setInitializer(init: (registry: ValidatorRegistry) => void): void {
    this.initializer = init;
    this.initialized = false;
  }

  private ensureInitialized(): void {
    if (!this.initialized && this.initializer) {
      const init = this.initializer;
      this.initialized = true;
      this.initializer = undefined;
      init(this);
    }
  }

  /**
   * Register a validator instance, or a factory creating it on first use.
   * The factory must produce a validator for `typeName`.
   */
  register(
    typeName: string,
    validator: TypeValidator | ValidatorFactory,
    options: ValidatorRegistrationOptions = {}
  ): void {
    const registration: ValidatorRegistration =
      typeof validator === 'function'
        ? { key: options.key, factory: validator }
        : { key: options.key, factory: () => validator, instance: validator };

    const bucket = options.key === undefined ? this.unkeyed : this.keyed;
    const list = bucket.get(typeName) ?? [];
    list.push(registration);
    bucket.set(typeName, list);
  }

  /**
   * All validators for a type: unkeyed first, then keyed, each group in
   * registration order. With oneValidatorPerType only the first is returned.
   */
  getValidators(typeName: string): TypeValidator[] {
    this.ensureInitialized();
    const registrations = [
      ...(this.unkeyed.get(typeName) ?? []),
      ...(this.keyed.get(typeName) ?? []),
    ];
    const selected = this.options.oneValidatorPerType
      ? registrations.slice(0, 1)
      : registrations;
    return selected.map(instantiate);
  }

  getValidator(typeName: string): TypeValidator | null {
    return this.getValidators(typeName)[0] ?? null;
  }

  hasValidators(typeName: string): boolean {
    this.ensureInitialized();
    return this.unkeyed.has(typeName) || this.keyed.has(typeName);
  }

  getRegisteredTypes(): string[] {
    this.ensureInitialized();
    return Array.from(
      new Set([...this.unkeyed.keys(), ...this.keyed.keys()])
    );
  }
}

function instantiate(registration: ValidatorRegistration): TypeValidator {
  if (!registration.instance) {
    registration.instance = registration.factory();
  }
  return registration.instance;
}
