import { NotFoundError } from '../errors.js';
import type { ResourceKind, ResourceLocation, ResourceRecord } from '../types.js';
import { outranks } from './precedence.js';

/**
 * In-memory index of resources keyed by identifier.
 *
 * At most one record per identifier is active. A colliding `register` replaces the
 * active record only when it outranks it (see `compareRecords`); otherwise the call is
 * a no-op. `register` is synchronous, so concurrent discovery merges cannot interleave
 * inside a single override decision.
 */
export class ResourceRegistry {
  private readonly index = new Map<string, ResourceRecord>();

  /** Returns true when the record is active after the call. */
  register(record: ResourceRecord): boolean {
    const existing = this.index.get(record.id);
    if (existing && !outranks(record, existing)) return false;
    // delete first so the override lands at the end of iteration order
    this.index.delete(record.id);
    this.index.set(record.id, Object.freeze({ ...record, metadata: Object.freeze({ ...record.metadata }) }));
    return true;
  }

  resolve(id: string): ResourceLocation {
    const rec = this.index.get(id);
    if (!rec) throw new NotFoundError(id);
    return rec.location;
  }

  get(id: string): ResourceRecord | undefined {
    return this.index.get(id);
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  get size(): number {
    return this.index.size;
  }

  clear(): void {
    this.index.clear();
  }

  // Each iteration walks the live index again
  list(): Iterable<ResourceRecord> {
    const index = this.index;
    return {
      *[Symbol.iterator]() {
        yield* index.values();
      },
    };
  }

  listByKind(kind: ResourceKind): ResourceRecord[] {
    const out: ResourceRecord[] = [];
    for (const rec of this.list()) {
      if (rec.kind === kind) out.push(rec);
    }
    return out.sort((a, b) => a.id.localeCompare(b.id));
  }
}
