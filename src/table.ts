/**
 * netvent table: an ordered map keyed by Value, or a dense array.
 * Map entries iterate in key order (see compareValues), never insertion order.
 */

import { NetventTypeError } from './errors.js';
import { compareValues, defaultValue, int, type Value } from './value.js';

export type TableKind = 'map' | 'array';

export type TableSnapshot =
  | { kind: 'array'; values: Value[] }
  | { kind: 'map'; entries: Array<[Value, Value]> };

let nextIdentity = 0;

function describeKey(key: Value): string {
  return key.kind === 'table' ? 'table' : `${key.kind} ${JSON.stringify(key.value)}`;
}

export class Table implements Iterable<[Value, Value]> {
  /** Orders table-valued keys; unique per table object. */
  readonly identity: number = nextIdentity++;
  private readonly mode: TableKind;
  // parallel arrays, sorted by key
  private readonly keys: Value[] = [];
  private readonly vals: Value[] = [];

  constructor(kind: TableKind = 'map') {
    this.mode = kind;
  }

  /** Map-mode table. A key given twice keeps its last value. */
  static fromEntries(entries: Iterable<readonly [Value, Value]>): Table {
    const t = new Table('map');
    for (const [k, v] of entries) t.set(k, v);
    return t;
  }

  /** Array-mode table; element i gets key i. */
  static fromArray(values: Iterable<Value>): Table {
    const t = new Table('array');
    for (const v of values) t.push(v);
    return t;
  }

  get size(): number {
    return this.vals.length;
  }

  isArray(): boolean {
    return this.mode === 'array';
  }

  /**
   * Keyed access. An absent key is inserted with the default value, which is
   * returned. In array mode only indices 0..size are accepted; size appends.
   */
  get(key: Value): Value {
    if (this.mode === 'array') {
      const idx = this.arrayIndex(key, true);
      if (idx === this.vals.length) this.push(defaultValue());
      return this.vals[idx]!;
    }
    const [found, idx] = this.search(key);
    if (!found) this.insertAt(idx, key, defaultValue());
    return this.vals[idx]!;
  }

  set(key: Value, value: Value): this {
    if (this.mode === 'array') {
      const idx = this.arrayIndex(key, true);
      if (idx === this.vals.length) this.push(value);
      else this.vals[idx] = value;
      return this;
    }
    const [found, idx] = this.search(key);
    if (found) this.vals[idx] = value;
    else this.insertAt(idx, key, value);
    return this;
  }

  /** Read without inserting. */
  lookup(key: Value): Value | undefined {
    if (this.mode === 'array') {
      if (key.kind !== 'int' || key.value < 0 || key.value >= this.vals.length) return undefined;
      return this.vals[key.value];
    }
    const [found, idx] = this.search(key);
    return found ? this.vals[idx] : undefined;
  }

  has(key: Value): boolean {
    return this.lookup(key) !== undefined;
  }

  /** Removes a key. Arrays only allow removing their last element. */
  delete(key: Value): boolean {
    if (this.mode === 'array') {
      if (!this.has(key)) return false;
      if (this.arrayIndex(key, false) !== this.vals.length - 1) {
        throw new NetventTypeError(`Only the last element can be removed from an array table (${describeKey(key)})`);
      }
      this.keys.pop();
      this.vals.pop();
      return true;
    }
    const [found, idx] = this.search(key);
    if (!found) return false;
    this.keys.splice(idx, 1);
    this.vals.splice(idx, 1);
    return true;
  }

  push(value: Value): this {
    if (this.mode !== 'array') {
      throw new NetventTypeError('push() requires an array table');
    }
    this.keys.push(int(this.vals.length));
    this.vals.push(value);
    return this;
  }

  /** Values in index order for arrays, sorted entries for maps. */
  snapshot(): TableSnapshot {
    if (this.mode === 'array') return { kind: 'array', values: [...this.vals] };
    return { kind: 'map', entries: [...this.entries()] };
  }

  *entries(): IterableIterator<[Value, Value]> {
    for (let i = 0; i < this.keys.length; i++) {
      yield [this.keys[i]!, this.vals[i]!];
    }
  }

  values(): IterableIterator<Value> {
    return this.vals.values();
  }

  [Symbol.iterator](): IterableIterator<[Value, Value]> {
    return this.entries();
  }

  /** Shallow copy with a fresh identity; nested tables stay shared. */
  clone(): Table {
    const t = new Table(this.mode);
    t.keys.push(...this.keys);
    t.vals.push(...this.vals);
    return t;
  }

  private arrayIndex(key: Value, allowAppend: boolean): number {
    const limit = allowAppend ? this.vals.length : this.vals.length - 1;
    if (key.kind === 'int' && key.value >= 0 && key.value <= limit) return key.value;
    throw new NetventTypeError(
      `Array table index out of range: ${describeKey(key)} (size ${this.vals.length})`
    );
  }

  /** Binary search: [found, index of the key or its insertion point]. */
  private search(key: Value): [boolean, number] {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const c = compareValues(this.keys[mid]!, key);
      if (c === 0) return [true, mid];
      if (c < 0) lo = mid + 1;
      else hi = mid;
    }
    return [false, lo];
  }

  private insertAt(idx: number, key: Value, value: Value): void {
    this.keys.splice(idx, 0, key);
    this.vals.splice(idx, 0, value);
  }
}
