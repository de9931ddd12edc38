/**
 * netvent value to canonical text. Compact, single line, map keys sorted.
 * Strings are written verbatim between double quotes, without escaping.
 */

import { NetventEncodeError } from './errors.js';
import type { Table } from './table.js';
import type { Value } from './value.js';

export interface StringifyOptions {
  /** Max nesting depth (default 256). Also stops cyclic tables. */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 256;

/** toFixed switches to exponent notation from here on. */
const FIXED_NOTATION_LIMIT = 1e21;

function writeFloat(n: number): string {
  if (!Number.isFinite(n)) {
    throw new NetventEncodeError(`Cannot write non-finite float: ${n}`);
  }
  if (Math.abs(n) >= FIXED_NOTATION_LIMIT) {
    // integral at this magnitude
    return `${BigInt(n).toString()}.0`;
  }
  // exact for 32-bit floats
  const scaled = n * 10;
  if (Math.fround(n) !== n || Math.abs(scaled - Math.trunc(scaled)) !== 0.5) {
    return n.toFixed(1);
  }
  // exact halfway (0.25, 0.75, ...): round half to even, as printf does
  let tenths = Math.trunc(scaled);
  if (tenths % 2 !== 0) tenths += Math.sign(scaled);
  const abs = Math.abs(tenths);
  return `${n < 0 ? '-' : ''}${Math.trunc(abs / 10)}.${abs % 10}`;
}

function stringifyValue(value: Value, maxDepth: number, depth: number): string {
  switch (value.kind) {
    case 'int':
      return String(value.value);
    case 'float':
      return writeFloat(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'string':
      return `"${value.value}"`;
    case 'table':
      return stringifyTableAt(value.value, maxDepth, depth);
  }
}

function stringifyTableAt(table: Table, maxDepth: number, depth: number): string {
  if (depth >= maxDepth) {
    throw new NetventEncodeError(`Maximum nesting depth exceeded (${maxDepth})`);
  }
  if (table.isArray()) {
    const items: string[] = [];
    for (const v of table.values()) items.push(stringifyValue(v, maxDepth, depth + 1));
    return `[${items.join(',')}]`;
  }
  const pairs: string[] = [];
  for (const [k, v] of table.entries()) {
    pairs.push(`${stringifyValue(k, maxDepth, depth + 1)}=${stringifyValue(v, maxDepth, depth + 1)}`);
  }
  return `{${pairs.join(',')}}`;
}

/**
 * Serialize a value to its canonical text form.
 */
export function stringify(value: Value, options: StringifyOptions = {}): string {
  return stringifyValue(value, options.maxDepth ?? DEFAULT_MAX_DEPTH, 0);
}

export function stringifyTable(table: Table, options: StringifyOptions = {}): string {
  return stringifyTableAt(table, options.maxDepth ?? DEFAULT_MAX_DEPTH, 0);
}
