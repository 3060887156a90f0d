/**
 * Snapshot/cleanup protocol around one operation's augmentation pass.
 *
 *   snapshot()        ids present before the pass
 *   ...               getSchemaForType() may add entries
 *   cleanup(roots)    remove ids created since the snapshot that the final
 *                     output does not reference
 *
 * Entries present at snapshot time are never removed. They also count as
 * roots, so a schema they point to is never left dangling.
 */

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import { NOOP_DIAGNOSTICS, type DiagnosticSink } from '../diag/collector.js';
import { MaterializationProtocolError } from '../types/errors.js';
import { reachableIds } from './references.js';
import type { RefResolver, SchemaStore } from './schema-store.js';

type TrackerState = 'idle' | 'open' | 'closed';

export class MaterializationTracker<S> {
  #state: TrackerState = 'idle';
  #snapshot: ReadonlySet<string> = new Set();

  constructor(
    private readonly store: SchemaStore<S>,
    private readonly resolveRef: RefResolver,
    private readonly diagnostics: DiagnosticSink = NOOP_DIAGNOSTICS,
    private readonly scope = 'operation'
  ) {}

  snapshot(): ReadonlySet<string> {
    if (this.#state !== 'idle') {
      throw new MaterializationProtocolError({
        message: `Snapshot already taken for ${this.scope}`,
        context: { scope: this.scope, state: this.#state },
      });
    }
    this.#snapshot = new Set(this.store.ids());
    this.#state = 'open';
    return this.#snapshot;
  }

  /** Ids added to the store since the snapshot. */
  created(): string[] {
    this.assertOpen('created');
    return this.store.ids().filter((id) => !this.#snapshot.has(id));
  }

  /**
   * Remove created ids not reachable from `roots`. Returns the removed ids.
   */
  cleanup(roots: readonly unknown[]): string[] {
    this.assertOpen('cleanup');
    const created = this.created();
    this.#state = 'closed';
    if (created.length === 0) return [];

    const preExisting = Array.from(this.#snapshot, (id) => this.store.get(id));
    const reachable = reachableIds(
      [...roots, ...preExisting],
      this.store,
      this.resolveRef
    );

    const removed: string[] = [];
    for (const id of created) {
      if (reachable.has(id)) continue;
      this.store.delete(id);
      removed.push(id);
      this.diagnostics.report({
        code: DIAGNOSTIC_CODES.SCHEMA_REMOVED,
        typeName: id,
        details: { scope: this.scope },
      });
    }
    return removed;
  }

  private assertOpen(action: string): void {
    if (this.#state === 'open') return;
    throw new MaterializationProtocolError({
      message:
        this.#state === 'idle'
          ? `Cannot run ${action} for ${this.scope} without a prior snapshot`
          : `Cleanup already ran for ${this.scope}`,
      context: { scope: this.scope, state: this.#state, action },
    });
  }
}

/**
 * Run `pass` inside a snapshot/cleanup span. `pass` returns the roots of the
 * output it produced. If it throws, cleanup runs with no roots before the
 * error propagates.
 */
export function withMaterializationGuard<S>(
  tracker: MaterializationTracker<S>,
  pass: () => readonly unknown[]
): string[] {
  tracker.snapshot();
  let roots: readonly unknown[] = [];
  let removed: string[] = [];
  try {
    roots = pass();
  } finally {
    removed = tracker.cleanup(roots);
  }
  return removed;
}
