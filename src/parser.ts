/**
 * netvent text parser. Recursive descent over index ranges of the input;
 * a single bracket-depth counter finds the top-level commas of a table.
 *
 * A fragment is tried, in order, as a number, a boolean literal, a quoted
 * string and a table. Anything else is taken as an unquoted string.
 */

import { NetventParseError, ParseErrorCode, type SourcePosition } from './errors.js';
import { Table, type TableKind } from './table.js';
import { bool, float, int, isInt32, str, table, type Value } from './value.js';

export interface ParseOptions {
  /** Max table nesting depth (default 256). */
  maxDepth?: number;
  /** Max input length in characters (default 1_000_000). */
  maxInputLength?: number;
}

const DEFAULT_MAX_DEPTH = 256;
export const DEFAULT_MAX_INPUT_LENGTH = 1_000_000;

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** A fragment with a dot is only ever tried as a float, never as an int. */
function parseNumber(text: string): Value | undefined {
  if (text.includes('.')) {
    if (!FLOAT.test(text)) return undefined;
    const n = Math.fround(Number(text));
    return Number.isFinite(n) ? float(n) : undefined;
  }
  if (!INTEGER.test(text)) return undefined;
  const n = Number(text);
  return isInt32(n) ? int(n) : undefined;
}

function isBlank(c: string | undefined): boolean {
  return c === ' ' || c === '\t';
}

/**
 * Parse netvent text into a value.
 */
export function parse(text: string, options: ParseOptions = {}): Value {
  const p = new Parser(text, options);
  return p.parseValue(0, text.length, 0);
}

/**
 * Parse netvent text that must be an array (`[...]`) or object (`{...}`).
 */
export function parseTable(text: string, options: ParseOptions = {}): Table {
  const p = new Parser(text, options);
  return p.parseTableFragment(0, text.length, 0);
}

class Parser {
  private readonly maxDepth: number;

  constructor(
    private readonly input: string,
    options: ParseOptions
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
    if (input.length > maxLen) {
      this.fail(
        `Input exceeds maximum length (${input.length} > ${maxLen})`,
        ParseErrorCode.InputTooLong,
        0
      );
    }
  }

  private positionAt(offset: number): SourcePosition {
    let line = 1;
    let column = 1;
    for (let i = 0; i < offset; i++) {
      if (this.input[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { line, column, offset };
  }

  private fail(message: string, code: ParseErrorCode, offset: number): never {
    throw new NetventParseError(message, code, { position: this.positionAt(offset) });
  }

  /** Shrinks [start, end) past surrounding spaces and tabs. */
  private trim(start: number, end: number): [number, number] {
    while (start < end && isBlank(this.input[start])) start++;
    while (end > start && isBlank(this.input[end - 1])) end--;
    return [start, end];
  }

  parseValue(start: number, end: number, depth: number): Value {
    if (start >= end) this.fail('Empty input', ParseErrorCode.EmptyInput, start);
    const text = this.input.slice(start, end);

    const n = parseNumber(text);
    if (n !== undefined) return n;

    if (text === 'true') return bool(true);
    if (text === 'false') return bool(false);

    if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
      return str(text.slice(1, -1));
    }

    if (text.startsWith('[') || text.startsWith('{')) {
      return table(this.parseTable(start, end, depth));
    }

    // bare identifiers, e.g. unquoted event names
    return str(text);
  }

  parseTableFragment(start: number, end: number, depth: number): Table {
    if (start >= end) this.fail('Empty input', ParseErrorCode.EmptyInput, start);
    const open = this.input[start];
    if (open !== '[' && open !== '{') {
      this.fail('Expected array or object', ParseErrorCode.MalformedStructure, start);
    }
    return this.parseTable(start, end, depth);
  }

  /**
   * Bracket kinds are not matched against each other: `[1,2}` only fails
   * because its last character is not `]`.
   */
  private parseTable(start: number, end: number, depth: number): Table {
    if (depth >= this.maxDepth) {
      this.fail(
        `Maximum nesting depth exceeded (${this.maxDepth})`,
        ParseErrorCode.DepthExceeded,
        start
      );
    }
    const kind: TableKind = this.input[start] === '[' ? 'array' : 'map';
    const close = kind === 'array' ? ']' : '}';
    if (end - start < 2 || this.input[end - 1] !== close) {
      this.fail(
        `Malformed ${kind === 'array' ? 'array' : 'object'}: missing closing '${close}'`,
        ParseErrorCode.MalformedStructure,
        start
      );
    }

    const result = new Table(kind);
    const inner = end - 1;
    let nesting = 0;
    let segmentStart = start + 1;
    for (let i = start + 1; i < inner; i++) {
      const c = this.input[i];
      if (c === '[' || c === '{') {
        nesting++;
      } else if (c === ']' || c === '}') {
        nesting--;
      } else if (c === ',' && nesting === 0) {
        this.addSegment(result, segmentStart, i, depth);
        segmentStart = i + 1;
      }
    }
    if (nesting !== 0) {
      this.fail('Unbalanced brackets', ParseErrorCode.MalformedStructure, start);
    }
    this.addSegment(result, segmentStart, inner, depth);
    return result;
  }

  private addSegment(target: Table, segmentStart: number, segmentEnd: number, depth: number): void {
    const [start, end] = this.trim(segmentStart, segmentEnd);
    // trailing comma
    if (start === end) return;

    if (target.isArray()) {
      target.push(this.parseValue(start, end, depth + 1));
      return;
    }

    const eq = this.input.indexOf('=', start);
    if (eq === -1 || eq >= end) {
      this.fail("Missing '=' in object entry", ParseErrorCode.MissingSeparator, start);
    }
    const [keyStart, keyEnd] = this.trim(start, eq);
    const [valueStart, valueEnd] = this.trim(eq + 1, end);
    if (keyStart === keyEnd || valueStart === valueEnd) return;
    target.set(
      this.parseValue(keyStart, keyEnd, depth + 1),
      this.parseValue(valueStart, valueEnd, depth + 1)
    );
  }
}
