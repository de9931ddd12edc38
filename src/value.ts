/**
 * netvent value model: a closed tagged union over int, float, bool, string
 * and table reference. Values are immutable; table values hold their table
 * by reference, so every holder observes mutations made through another.
 */

import { NetventTypeError } from './errors.js';
import type { Table } from './table.js';

export interface IntValue {
  readonly kind: 'int';
  readonly value: number;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface TableValue {
  readonly kind: 'table';
  readonly value: Table;
}

export type Value = IntValue | FloatValue | BoolValue | StringValue | TableValue;

export type ValueKind = Value['kind'];

/** Declaration order; values of different kinds sort by this rank. */
const KIND_RANK: Record<ValueKind, number> = {
  int: 0,
  float: 1,
  bool: 2,
  string: 3,
  table: 4,
};

export const INT32_MIN = -0x8000_0000;
export const INT32_MAX = 0x7fff_ffff;

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

export function int(n: number): IntValue {
  if (!isInt32(n)) {
    throw new NetventTypeError(`Not a 32-bit integer: ${n}`);
  }
  // normalizes -0
  return { kind: 'int', value: n | 0 };
}

export function float(n: number): FloatValue {
  return { kind: 'float', value: Math.fround(n) };
}

export function bool(b: boolean): BoolValue {
  return { kind: 'bool', value: b };
}

export function str(s: string): StringValue {
  return { kind: 'string', value: s };
}

export function table(t: Table): TableValue {
  return { kind: 'table', value: t };
}

/** There is no null variant: the default value is the integer zero. */
export function defaultValue(): IntValue {
  return int(0);
}

export function isInt(v: Value): v is IntValue {
  return v.kind === 'int';
}

export function isFloat(v: Value): v is FloatValue {
  return v.kind === 'float';
}

export function isBool(v: Value): v is BoolValue {
  return v.kind === 'bool';
}

export function isString(v: Value): v is StringValue {
  return v.kind === 'string';
}

export function isTable(v: Value): v is TableValue {
  return v.kind === 'table';
}

function wrongKind(expected: ValueKind, v: Value): never {
  throw new NetventTypeError(`Expected ${expected} value, got ${v.kind}`);
}

export function asInt(v: Value): number {
  return v.kind === 'int' ? v.value : wrongKind('int', v);
}

export function asFloat(v: Value): number {
  return v.kind === 'float' ? v.value : wrongKind('float', v);
}

export function asBool(v: Value): boolean {
  return v.kind === 'bool' ? v.value : wrongKind('bool', v);
}

export function asString(v: Value): string {
  return v.kind === 'string' ? v.value : wrongKind('string', v);
}

export function asTable(v: Value): Table {
  return v.kind === 'table' ? v.value : wrongKind('table', v);
}

function sign(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Code point order, which is also the byte order of the UTF-8 encodings. */
export function compareStrings(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; ) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  return sign(a.length, b.length);
}

/**
 * Total order over values: kind first, then natural order within a kind
 * (strings by code point).
 * Tables compare by identity, never by content: two distinct tables with the
 * same entries are unequal.
 */
export function compareValues(a: Value, b: Value): number {
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0) return rank;
  if (a.kind === 'table' && b.kind === 'table') {
    return sign(a.value.identity, b.value.identity);
  }
  if (a.kind === 'bool' && b.kind === 'bool') {
    return Number(a.value) - Number(b.value);
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return compareStrings(a.value, b.value);
  }
  if ((a.kind === 'int' || a.kind === 'float') && (b.kind === 'int' || b.kind === 'float')) {
    return sign(a.value, b.value);
  }
  return 0;
}

export function valuesEqual(a: Value, b: Value): boolean {
  return compareValues(a, b) === 0;
}
