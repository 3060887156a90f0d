import type { RefResolver, SchemaStore } from './schema-store.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Store identifiers referenced anywhere below `root` through `$ref`.
 */
export function collectReferencedIds(
  root: unknown,
  resolve: RefResolver,
  into: Set<string> = new Set()
): Set<string> {
  const stack: unknown[] = [root];
  const seen = new Set<object>();
  while (stack.length > 0) {
    const current = stack.pop();
    if (Array.isArray(current)) {
      stack.push(...current);
      continue;
    }
    if (!isRecord(current) || seen.has(current)) continue;
    seen.add(current);
    for (const [key, value] of Object.entries(current)) {
      if (key === '$ref' && typeof value === 'string') {
        const id = resolve(value);
        if (id !== undefined) into.add(id);
      } else {
        stack.push(value);
      }
    }
  }
  return into;
}

/**
 * Identifiers reachable from `roots`, following references through the
 * store transitively.
 */
export function reachableIds<S>(
  roots: readonly unknown[],
  store: SchemaStore<S>,
  resolve: RefResolver
): Set<string> {
  const reached = new Set<string>();
  const pending: string[] = [];
  const visit = (node: unknown): void => {
    for (const id of collectReferencedIds(node, resolve)) {
      if (!reached.has(id)) {
        reached.add(id);
        pending.push(id);
      }
    }
  };

  roots.forEach(visit);
  while (pending.length > 0) {
    const id = pending.pop();
    if (id !== undefined && store.has(id)) visit(store.get(id));
  }
  return reached;
}
