import { ErrorCode } from '../errors/codes.js';
import type { TypeDescriptor } from '../types/catalog.js';
import { ConfigError } from '../types/errors.js';

/**
 * Named object and enum types known to a generator.
 */
export class TypeCatalog {
  readonly #types = new Map<string, TypeDescriptor>();

  constructor(types: Iterable<TypeDescriptor> = []) {
    for (const type of types) this.add(type);
  }

  add(descriptor: TypeDescriptor): this {
    if (this.#types.has(descriptor.name)) {
      throw new ConfigError({
        message: `Type "${descriptor.name}" is declared twice`,
        context: { typeName: descriptor.name },
      });
    }
    this.#types.set(descriptor.name, descriptor);
    return this;
  }

  has(name: string): boolean {
    return this.#types.has(name);
  }

  get(name: string): TypeDescriptor {
    const descriptor = this.#types.get(name);
    if (!descriptor) {
      throw new ConfigError({
        message: `Unknown type "${name}"`,
        errorCode: ErrorCode.UNKNOWN_TYPE,
        context: { typeName: name },
      });
    }
    return descriptor;
  }

  names(): string[] {
    return Array.from(this.#types.keys());
  }
}
