import type { SchemaNode } from './schema-node.js';

/**
 * The capability the rule engine works against: the schema of one type,
 * with access to its properties and to schemas of other types.
 *
 * Implemented once per document model; the engine never branches on which
 * implementation it holds.
 */
export interface SchemaContext {
  readonly typeName: string;
  /** Property keys present on the type's schema. */
  propertyKeys(): string[];
  /** Never throws; unreachable properties come back as empty nodes. */
  getPropertyNode(key: string): SchemaNode;
  /** Add `key` to the type schema's required list. */
  markRequired(key: string): void;
  isRequired(key: string): boolean;
  /**
   * Schema of another type, taken from the shared store or generated and
   * registered there on demand.
   */
  getSchemaForType(typeName: string): SchemaContext;
}

/**
 * Fetch-or-create access to type schemas. Creating a schema registers it in
 * the shared store as a side effect.
 */
export interface SchemaProvider {
  getSchemaForType(typeName: string): SchemaContext;
}
