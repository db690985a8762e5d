/**
 * Indexed Collection
 *
 * One canonical arena (id -> record) plus derived views that hold ids only:
 *
 * - the global list, in insertion order until a removal swaps the last
 *   element into the freed slot
 * - one list per key for every secondary index (adder, merchant, ...)
 *
 * Because every view resolves ids through the arena, a record replaced in
 * the arena is seen identically from every view; there is no second copy to
 * keep in sync. Records are frozen on the way in, so a caller holding one
 * cannot move it under a different key behind the indexes' back.
 * Removal is swap-with-last-and-truncate: O(1) for the global list
 * (position map), first match then swap for the per-key lists.
 */

import { z } from 'zod';

export interface CollectionState<T> {
  // Records in global-list order
  records: T[];
  // index name -> [key, ids in view order][]
  indexes: Record<string, Array<[string, string[]]>>;
}

// Secondary-index part of a persisted CollectionState
export const collectionIndexesSchema = z.record(z.array(z.tuple([z.string(), z.array(z.string())])));

export class IndexedCollection<T, I extends string> {
  private records: Map<string, T> = new Map();
  private order: string[] = [];
  private positions: Map<string, number> = new Map();
  private groups: Map<string, Map<string, string[]>> = new Map();

  constructor(
    private readonly idOf: (record: T) => string,
    private readonly indexes: Record<I, (record: T) => string>
  ) {
    for (const name of Object.keys(indexes)) {
      this.groups.set(name, new Map());
    }
  }

  get size(): number {
    return this.order.length;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): T | undefined {
    return this.records.get(id);
  }

  insert(record: T): void {
    const id = this.idOf(record);
    if (this.records.has(id)) {
      throw new Error(`Record ${id} is already indexed`);
    }

    Object.freeze(record);
    this.records.set(id, record);
    this.positions.set(id, this.order.length);
    this.order.push(id);

    for (const [name, keyOf] of this.indexEntries()) {
      this.addToGroup(name, keyOf(record), id);
    }
  }

  /**
   * Swap in a new version of an existing record. If a secondary key changed,
   * the id moves to the end of the new key's list.
   */
  replace(record: T): T {
    const id = this.idOf(record);
    const previous = this.records.get(id);
    if (previous === undefined) {
      throw new Error(`Record ${id} is not indexed`);
    }

    for (const [name, keyOf] of this.indexEntries()) {
      const before = keyOf(previous);
      const after = keyOf(record);
      if (before !== after) {
        this.removeFromGroup(name, before, id);
        this.addToGroup(name, after, id);
      }
    }

    Object.freeze(record);
    this.records.set(id, record);
    return previous;
  }

  remove(id: string): T | undefined {
    const record = this.records.get(id);
    const position = this.positions.get(id);
    if (record === undefined || position === undefined) return undefined;

    const lastIndex = this.order.length - 1;
    const lastId = this.order[lastIndex];
    this.order[position] = lastId;
    this.positions.set(lastId, position);
    this.order.pop();
    this.positions.delete(id);
    this.records.delete(id);

    for (const [name, keyOf] of this.indexEntries()) {
      this.removeFromGroup(name, keyOf(record), id);
    }

    return record;
  }

  /**
   * Global list view.
   */
  list(): T[] {
    return this.resolveIds(this.order);
  }

  /**
   * Secondary view: every record whose `index` key equals `key`.
   */
  listBy(index: I, key: string): T[] {
    return this.resolveIds(this.groups.get(index)?.get(key) ?? []);
  }

  snapshot(): CollectionState<T> {
    const indexes: Record<string, Array<[string, string[]]>> = {};
    for (const [name, group] of this.groups) {
      indexes[name] = Array.from(group.entries(), ([key, ids]) => [key, [...ids]]);
    }
    return { records: this.list(), indexes };
  }

  /**
   * Load a snapshot. Secondary lists must reference only records present in
   * the snapshot under the key they are filed under.
   */
  restore(state: CollectionState<T>): void {
    const records = new Map<string, T>();
    const order: string[] = [];
    const positions = new Map<string, number>();
    for (const record of state.records) {
      const id = this.idOf(record);
      positions.set(id, order.length);
      order.push(id);
      Object.freeze(record);
      records.set(id, record);
    }

    const groups = new Map<string, Map<string, string[]>>();
    for (const [name, keyOf] of this.indexEntries()) {
      const group = new Map<string, string[]>();
      let filed = 0;
      for (const [key, ids] of state.indexes[name] ?? []) {
        for (const id of ids) {
          const record = records.get(id);
          if (record === undefined || keyOf(record) !== key) {
            throw new Error(`Index ${name} files ${id} under ${key} inconsistently`);
          }
        }
        filed += ids.length;
        if (ids.length > 0) group.set(key, [...ids]);
      }
      if (filed !== order.length) {
        throw new Error(`Index ${name} covers ${filed} of ${order.length} records`);
      }
      groups.set(name, group);
    }

    this.records = records;
    this.order = order;
    this.positions = positions;
    this.groups = groups;
  }

  private indexEntries(): Array<[string, (record: T) => string]> {
    return Object.entries<(record: T) => string>(this.indexes);
  }

  private addToGroup(name: string, key: string, id: string): void {
    const group = this.groups.get(name);
    if (!group) return;
    const ids = group.get(key);
    if (ids) {
      ids.push(id);
    } else {
      group.set(key, [id]);
    }
  }

  private removeFromGroup(name: string, key: string, id: string): void {
    const ids = this.groups.get(name)?.get(key);
    if (!ids) return;

    for (let i = 0; i < ids.length; i++) {
      if (ids[i] === id) {
        ids[i] = ids[ids.length - 1];
        ids.pop();
        break;
      }
    }

    if (ids.length === 0) {
      this.groups.get(name)?.delete(key);
    }
  }

  private resolveIds(ids: string[]): T[] {
    const resolved: T[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record !== undefined) resolved.push(record);
    }
    return resolved;
  }
}
