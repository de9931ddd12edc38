/**
 * Event envelope: an event-name line followed by one `key value` line per
 * field, keys sorted.
 *
 *   "shoot"          // event name
 *   gun_active true
 *   x 0
 *
 * `//` starts a comment anywhere on a line, including inside quoted strings.
 * Lines starting with `#` are comments too.
 */

import { NetventEncodeError, NetventParseError, ParseErrorCode } from './errors.js';
import { DEFAULT_MAX_INPUT_LENGTH, parse, type ParseOptions } from './parser.js';
import { stringify, type StringifyOptions } from './stringify.js';
import { compareStrings, defaultValue, type Value } from './value.js';

export interface NetventEvent {
  name: Value;
  /** Fields in sorted key order. */
  data: Map<string, Value>;
}

export type EventData = Readonly<Record<string, Value>> | ReadonlyMap<string, Value>;

export interface ParseEventOptions extends ParseOptions {
  /** Called for each field line dropped for having no space after its key. */
  onSkippedLine?: (line: number, reason: string) => void;
}

function isMap(data: EventData): data is ReadonlyMap<string, Value> {
  return data instanceof Map;
}

function validateKey(key: string): void {
  if (key.length === 0 || /\s/.test(key) || key.includes('//') || key.startsWith('#')) {
    throw new NetventEncodeError(`Invalid event field key: ${JSON.stringify(key)}`);
  }
}

function stringifyLine(value: Value, options: StringifyOptions): string {
  const text = stringify(value, options);
  if (/[\r\n]/.test(text)) {
    throw new NetventEncodeError('Event values cannot span lines');
  }
  return text;
}

/**
 * Serialize an event name and its fields. Every line ends with a newline.
 */
export function stringifyEvent(name: Value, data: EventData, options: StringifyOptions = {}): string {
  const entries = isMap(data) ? [...data.entries()] : Object.entries(data);
  entries.sort(([a], [b]) => compareStrings(a, b));

  let out = `${stringifyLine(name, options)}\n`;
  for (const [key, value] of entries) {
    validateKey(key);
    out += `${key} ${stringifyLine(value, options)}\n`;
  }
  return out;
}

/** Strips indentation and comments; null for lines with nothing left. */
function stripLine(raw: string): { text: string; column: number } | null {
  let line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
  const indent = line.length - line.replace(/^[ \t]+/, '').length;
  line = line.slice(indent);
  const comment = line.indexOf('//');
  if (comment !== -1) line = line.slice(0, comment);
  line = line.replace(/[ \t]+$/, '');
  if (line.length === 0 || line.startsWith('#')) return null;
  return { text: line, column: indent + 1 };
}

/**
 * Parse a value found at `column` on envelope line `lineNo`. Errors are
 * re-reported against the envelope text.
 */
function parseField(
  text: string,
  lineNo: number,
  column: number,
  lineOffset: number,
  options: ParseOptions
): Value {
  try {
    return parse(text, options);
  } catch (err) {
    if (!(err instanceof NetventParseError) || !err.position) throw err;
    const { column: innerColumn, offset } = err.position;
    throw new NetventParseError(err.message, err.code, {
      position: {
        line: lineNo,
        column: column + innerColumn - 1,
        offset: lineOffset + column - 1 + offset,
      },
      cause: err,
    });
  }
}

/**
 * Parse envelope text. Field lines without a space after the key are skipped;
 * a value that fails to parse throws.
 */
export function parseEvent(text: string, options: ParseEventOptions = {}): NetventEvent {
  const { onSkippedLine, ...parseOptions } = options;
  const maxLen = parseOptions.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (text.length > maxLen) {
    throw new NetventParseError(
      `Input exceeds maximum length (${text.length} > ${maxLen})`,
      ParseErrorCode.InputTooLong,
      { position: { line: 1, column: 1, offset: 0 } }
    );
  }
  const lines = text.split('\n');
  const fields = new Map<string, Value>();
  let name: Value | undefined;
  let lineOffset = 0;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i]!;
    const offset = lineOffset;
    lineOffset += raw.length + 1;
    const stripped = stripLine(raw);
    if (stripped === null) continue;
    const lineNo = i + 1;

    if (name === undefined) {
      name = parseField(stripped.text, lineNo, stripped.column, offset, parseOptions);
      continue;
    }

    const space = stripped.text.indexOf(' ');
    if (space === -1) {
      onSkippedLine?.(lineNo, 'missing value');
      continue;
    }
    const key = stripped.text.slice(0, space);
    const rest = stripped.text.slice(space);
    // never empty: trailing blanks are already stripped
    const valueText = rest.replace(/^[ \t]+/, '');
    const column = stripped.column + space + (rest.length - valueText.length);
    fields.set(key, parseField(valueText, lineNo, column, offset, parseOptions));
  }

  const data = new Map([...fields.entries()].sort(([a], [b]) => compareStrings(a, b)));
  return { name: name ?? defaultValue(), data };
}
