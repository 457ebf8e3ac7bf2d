import type { WorkflowDefinition } from '../domain/index.js';

interface Snapshot {
  readonly byId: ReadonlyMap<string, WorkflowDefinition>;
  /** Enabled definitions per trigger event type. */
  readonly byEvent: ReadonlyMap<string, readonly WorkflowDefinition[]>;
}

function buildSnapshot(definitions: Iterable<WorkflowDefinition>): Snapshot {
  const byId = new Map<string, WorkflowDefinition>();
  for (const definition of definitions) {
    byId.set(definition.id, definition);
  }

  const byEvent = new Map<string, WorkflowDefinition[]>();
  for (const definition of byId.values()) {
    if (!definition.enabled) continue;
    const bucket = byEvent.get(definition.trigger.event) ?? [];
    bucket.push(definition);
    byEvent.set(definition.trigger.event, bucket);
  }

  return { byId, byEvent };
}

/**
 * Registry of active workflow definitions.
 *
 * Every write builds a complete new snapshot and swaps it in with one
 * assignment. Because Node.js is single-threaded and reads are
 * synchronous, a reader sees either the old snapshot or the new one,
 * never a partial mix. Invocations keep the definition object they
 * matched, so a replace never touches work already in flight.
 */
export class WorkflowRegistry {
  private snapshot: Snapshot;

  constructor(initial: readonly WorkflowDefinition[] = []) {
    this.snapshot = buildSnapshot(initial);
  }

  /** Adds or replaces the definition with the same id. */
  register(definition: WorkflowDefinition): void {
    const next = new Map(this.snapshot.byId);
    next.set(definition.id, definition);
    this.snapshot = buildSnapshot(next.values());
  }

  /** Returns false if no definition had that id. */
  remove(id: string): boolean {
    if (!this.snapshot.byId.has(id)) return false;
    const next = new Map(this.snapshot.byId);
    next.delete(id);
    this.snapshot = buildSnapshot(next.values());
    return true;
  }

  /** Atomically replaces the whole set (hot reload). */
  replaceAll(definitions: readonly WorkflowDefinition[]): void {
    this.snapshot = buildSnapshot(definitions);
  }

  get(id: string): WorkflowDefinition | undefined {
    return this.snapshot.byId.get(id);
  }

  list(): WorkflowDefinition[] {
    return [...this.snapshot.byId.values()];
  }

  /** Enabled definitions triggered by `eventType`. O(1), no copy. */
  match(eventType: string): readonly WorkflowDefinition[] {
    return this.snapshot.byEvent.get(eventType) ?? [];
  }

  get size(): number {
    return this.snapshot.byId.size;
  }
}
