/**
 * Reflected type descriptions consumed by the schema generators.
 */

import type { Scalar } from './rules.js';

export type PrimitiveKind = 'string' | 'integer' | 'number' | 'boolean';

export interface PrimitiveType {
  kind: PrimitiveKind;
  format?: string;
  nullable?: boolean;
}

export interface ArrayType {
  kind: 'array';
  items: PropertyType;
  nullable?: boolean;
}

/** Reference to a named object or enum type of the catalog. */
export interface NamedTypeRef {
  kind: 'ref';
  name: string;
  nullable?: boolean;
}

export type PropertyType = PrimitiveType | ArrayType | NamedTypeRef;

export interface ObjectTypeDescriptor {
  kind: 'object';
  name: string;
  properties: Readonly<Record<string, PropertyType>>;
}

export interface EnumTypeDescriptor {
  kind: 'enum';
  name: string;
  values: readonly Scalar[];
}

export type TypeDescriptor = ObjectTypeDescriptor | EnumTypeDescriptor;
