/**
 * netvent: a compact, self-describing text format for typed event data.
 *
 * @example
 * ```ts
 * import { mapTable, stringify, table, parse } from 'netvent';
 *
 * const rect = table(mapTable({ x: 10, y: 20 }));
 * stringify(rect); // '{"x"=10,"y"=20}'
 * parse('[1,2,3,]'); // array table of three ints
 * ```
 */

export {
  type Value,
  type ValueKind,
  type IntValue,
  type FloatValue,
  type BoolValue,
  type StringValue,
  type TableValue,
  INT32_MIN,
  INT32_MAX,
  int,
  float,
  bool,
  str,
  table,
  defaultValue,
  isInt,
  isFloat,
  isBool,
  isString,
  isTable,
  asInt,
  asFloat,
  asBool,
  asString,
  asTable,
  compareValues,
  compareStrings,
  valuesEqual,
} from './value.js';
export { Table, type TableKind, type TableSnapshot } from './table.js';
export { stringify, stringifyTable, type StringifyOptions } from './stringify.js';
export { parse, parseTable, DEFAULT_MAX_INPUT_LENGTH, type ParseOptions } from './parser.js';
export {
  stringifyEvent,
  parseEvent,
  type NetventEvent,
  type EventData,
  type ParseEventOptions,
} from './envelope.js';
export {
  toValue,
  toPlain,
  mapTable,
  arrayTable,
  type ValueInput,
  type PlainValue,
  type PlainObject,
} from './convert.js';
export {
  NetventError,
  NetventParseError,
  NetventEncodeError,
  NetventTypeError,
  ParseErrorCode,
  type SourcePosition,
} from './errors.js';
