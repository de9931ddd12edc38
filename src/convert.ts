/**
 * Conversions between plain JavaScript data and netvent values.
 */

import { NetventTypeError } from './errors.js';
import { Table } from './table.js';
import { bool, float, int, isInt32, str, table, type Value } from './value.js';

export type ValueInput =
  | Value
  | Table
  | number
  | boolean
  | string
  | readonly ValueInput[]
  | { readonly [key: string]: ValueInput };

export type PlainValue =
  | number
  | boolean
  | string
  | PlainValue[]
  | PlainObject
  | Map<PlainValue, PlainValue>;

export interface PlainObject {
  [key: string]: PlainValue;
}

function isList(input: ValueInput): input is readonly ValueInput[] {
  return Array.isArray(input);
}

/**
 * An object shaped exactly `{ kind, value }` whose payload fits its kind is
 * taken as a Value. Any other object is a plain record.
 */
function isValue(input: ValueInput): input is Value {
  if (typeof input !== 'object' || !('kind' in input) || !('value' in input)) return false;
  if (Object.keys(input).length !== 2) return false;
  const payload: unknown = input.value;
  switch (input.kind) {
    case 'int':
      return typeof payload === 'number' && isInt32(payload);
    case 'float':
      return typeof payload === 'number';
    case 'bool':
      return typeof payload === 'boolean';
    case 'string':
      return typeof payload === 'string';
    case 'table':
      return payload instanceof Table;
    default:
      return false;
  }
}

/**
 * Integral numbers in 32-bit range become ints, other numbers floats;
 * arrays become array tables and objects map tables with string keys.
 */
export function toValue(input: ValueInput): Value {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) throw new NetventTypeError(`Not a finite number: ${input}`);
    return isInt32(input) ? int(input) : float(input);
  }
  if (typeof input === 'boolean') return bool(input);
  if (typeof input === 'string') return str(input);
  if (input instanceof Table) return table(input);
  if (isList(input)) return table(arrayTable(input));
  if (isValue(input)) return input;
  return table(mapTable(input));
}

export function mapTable(record: { readonly [key: string]: ValueInput }): Table {
  return Table.fromEntries(Object.entries(record).map(([k, v]) => [str(k), toValue(v)] as const));
}

export function arrayTable(items: readonly ValueInput[]): Table {
  return Table.fromArray(items.map(toValue));
}

function tableToPlain(t: Table, path: Set<Table>): PlainValue {
  if (path.has(t)) throw new NetventTypeError('Cannot convert a table that contains itself');
  path.add(t);
  try {
    if (t.isArray()) {
      return [...t.values()].map((v) => valueToPlain(v, path));
    }
    const entries = [...t.entries()];
    if (entries.every(([k]) => k.kind === 'string')) {
      const obj: PlainObject = {};
      for (const [k, v] of entries) {
        // defineProperty keeps a "__proto__" key an own property
        if (k.kind === 'string') {
          Object.defineProperty(obj, k.value, {
            value: valueToPlain(v, path),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
      }
      return obj;
    }
    return new Map(
      entries.map(([k, v]): [PlainValue, PlainValue] => [valueToPlain(k, path), valueToPlain(v, path)])
    );
  } finally {
    path.delete(t);
  }
}

function valueToPlain(v: Value, path: Set<Table>): PlainValue {
  return v.kind === 'table' ? tableToPlain(v.value, path) : v.value;
}

/**
 * Unwrap a value into plain data. Map tables keyed only by strings become
 * objects; any other map table becomes a Map.
 */
export function toPlain(value: Value): PlainValue {
  return valueToPlain(value, new Set());
}
