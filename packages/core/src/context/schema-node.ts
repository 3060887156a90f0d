/**
 * SchemaNode: a handle to the constraint-bearing fields of one schema object,
 * independent of the document model behind it.
 *
 * A node that cannot be resolved to a concrete, mutable schema object is an
 * `empty` node. Writes to it are discarded.
 */

import type { ConstraintSet } from '../rules/constraint-set.js';

export type DataType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'array'
  | 'object';

/**
 * Model-specific accessor for the constraint fields of one schema object.
 */
export interface ConstraintTarget {
  /** Declared data type, when the schema states one. */
  readonly dataType: DataType | undefined;
  /** Constraints already present on the schema. `required` is never set. */
  read(): ConstraintSet;
  /** Replace the schema's constraint fields with `set` (minus `required`). */
  write(set: ConstraintSet): void;
}

/**
 * - missing: the owning schema has no such property
 * - reference: the property is a pointer to another schema (enum, nested type)
 * - shape: the property value is not a schema object this model can edit
 */
export type EmptyReason = 'missing' | 'reference' | 'shape';

export interface ConcreteSchemaNode {
  readonly kind: 'concrete';
  readonly key: string;
  readonly target: ConstraintTarget;
}

export interface EmptySchemaNode {
  readonly kind: 'empty';
  readonly key: string;
  readonly reason: EmptyReason;
}

export type SchemaNode = ConcreteSchemaNode | EmptySchemaNode;

export function concreteNode(
  key: string,
  target: ConstraintTarget
): ConcreteSchemaNode {
  return { kind: 'concrete', key, target };
}

export function emptyNode(key: string, reason: EmptyReason): EmptySchemaNode {
  return { kind: 'empty', key, reason };
}

/**
 * Write constraints through a node. Returns false when the node is empty and
 * the write was discarded.
 */
export function writeNode(node: SchemaNode, set: ConstraintSet): boolean {
  if (node.kind === 'empty') return false;
  node.target.write(set);
  return true;
}

export function readNode(node: SchemaNode): ConstraintSet {
  return node.kind === 'empty' ? {} : node.target.read();
}
