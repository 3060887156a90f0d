/**
 * SchemaStore: identifier -> schema object for one generation pass.
 *
 * The store writes through to the record it wraps, which is normally the
 * document's own `components.schemas` or `definitions` map.
 */
export class SchemaStore<S> {
  constructor(private readonly schemas: Record<string, S> = {}) {}

  has(id: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.schemas, id);
  }

  get(id: string): S | undefined {
    return this.has(id) ? this.schemas[id] : undefined;
  }

  set(id: string, schema: S): void {
    this.schemas[id] = schema;
  }

  delete(id: string): boolean {
    if (!this.has(id)) return false;
    delete this.schemas[id];
    return true;
  }

  ids(): string[] {
    return Object.keys(this.schemas);
  }

  get size(): number {
    return this.ids().length;
  }

  entries(): Array<[string, S]> {
    return Object.entries(this.schemas);
  }

  /** The backing record, shared with the document. */
  asRecord(): Record<string, S> {
    return this.schemas;
  }
}

/** Maps a `$ref` string to a store identifier, or undefined when foreign. */
export type RefResolver = (ref: string) => string | undefined;

export function pointerRefResolver(prefix: string): RefResolver {
  return (ref) => {
    if (!ref.startsWith(prefix)) return undefined;
    const id = ref.slice(prefix.length);
    return id.length > 0 ? decodePointerSegment(id) : undefined;
  };
}

export function pointerRef(prefix: string, id: string): string {
  return `${prefix}${encodePointerSegment(id)}`;
}

function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}
