/**
 * Naming conventions mapping reflected property names to schema keys.
 */

export type NameResolver = (propertyName: string) => string;

function camelCase(name: string): string {
  if (name.length === 0) return name;
  // Leading acronyms are lowered as a block: "URLValue" -> "urlValue"
  let upper = 0;
  while (upper < name.length && isUpper(name.charAt(upper))) upper += 1;
  if (upper === 0) return name;
  if (upper === 1 || upper === name.length) {
    return name.slice(0, upper).toLowerCase() + name.slice(upper);
  }
  return name.slice(0, upper - 1).toLowerCase() + name.slice(upper - 1);
}

function isUpper(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

export const NameResolvers = {
  identity: ((name) => name) satisfies NameResolver,
  camelCase: camelCase satisfies NameResolver,
} as const;

export type NamingPolicy = keyof typeof NameResolvers;

/**
 * Find the schema key for a property: the resolver's key when present,
 * otherwise a case-insensitive match against the existing keys.
 */
export function findSchemaKey(
  propertyName: string,
  keys: Iterable<string>,
  resolver: NameResolver
): string | undefined {
  const resolved = resolver(propertyName);
  const candidates = Array.from(keys);
  if (candidates.includes(resolved)) return resolved;
  const lowered = resolved.toLowerCase();
  return candidates.find((key) => key.toLowerCase() === lowered);
}
