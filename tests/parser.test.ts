import { describe, it, expect } from 'vitest';
import { parse, parseTable } from '../src/parser.js';
import { stringify, stringifyTable } from '../src/stringify.js';
import { Table } from '../src/table.js';
import { asInt, asTable, bool, float, int, str, table, type Value } from '../src/value.js';
import { mapTable } from '../src/convert.js';
import { NetventParseError, ParseErrorCode } from '../src/errors.js';

function parseError(run: () => unknown): NetventParseError {
  try {
    run();
  } catch (err) {
    if (err instanceof NetventParseError) return err;
    throw err;
  }
  throw new Error('expected a NetventParseError');
}

function items(v: Value): Value[] {
  const snap = asTable(v).snapshot();
  if (snap.kind !== 'array') throw new Error('expected an array table');
  return snap.values;
}

describe('parse()', () => {
  describe('scalars', () => {
    it('reads integers', () => {
      expect(parse('42')).toEqual(int(42));
      expect(parse('-42')).toEqual(int(-42));
    });

    it('reads a fragment with a dot as a float', () => {
      expect(parse('42.0')).toEqual(float(42));
      expect(parse('-42.5')).toEqual(float(-42.5));
      expect(parse('0.1')).toEqual(float(0.1));
    });

    it('reads boolean literals', () => {
      expect(parse('true')).toEqual(bool(true));
      expect(parse('false')).toEqual(bool(false));
    });

    it('reads quoted strings', () => {
      expect(parse('"hello"')).toEqual(str('hello'));
      expect(parse('""')).toEqual(str(''));
    });

    it('keeps quoted numbers and literals as strings', () => {
      expect(parse('"12"')).toEqual(str('12'));
      expect(parse('"1.5"')).toEqual(str('1.5'));
      expect(parse('"true"')).toEqual(str('true'));
    });

    it('falls back to an unquoted string', () => {
      expect(parse('player_joined')).toEqual(str('player_joined'));
      expect(parse('1.2.3')).toEqual(str('1.2.3'));
      expect(parse('TRUE')).toEqual(str('TRUE'));
    });

    it('falls back to a string for integers beyond 32 bits', () => {
      expect(parse('2147483648')).toEqual(str('2147483648'));
    });
  });

  describe('tables', () => {
    it('reads empty forms in the right mode', () => {
      const arr = parseTable('[]');
      const obj = parseTable('{}');
      expect(arr.isArray()).toBe(true);
      expect(arr.size).toBe(0);
      expect(obj.isArray()).toBe(false);
      expect(obj.size).toBe(0);
    });

    it('reads arrays', () => {
      expect(items(parse('[1,2,3]'))).toEqual([int(1), int(2), int(3)]);
    });

    it('ignores a trailing comma', () => {
      expect(items(parse('[1,2,3,]'))).toEqual([int(1), int(2), int(3)]);
      expect(items(parse('[1, 2, 3,]'))).toEqual([int(1), int(2), int(3)]);
    });

    it('reads objects with blanks around separators', () => {
      const t = parseTable('{ "x" = 10 , "y"=20, }');
      expect(t.snapshot()).toEqual({
        kind: 'map',
        entries: [
          [str('x'), int(10)],
          [str('y'), int(20)],
        ],
      });
    });

    it('splits only at top-level commas', () => {
      const list = items(parse('[{"a"=1,},{"b"=2,},]'));
      expect(list).toHaveLength(2);
      expect(asInt(asTable(list[0]!).get(str('a')))).toBe(1);
      expect(asInt(asTable(list[1]!).get(str('b')))).toBe(2);
    });

    it('reads nested arrays inside objects', () => {
      const t = parseTable('{"nested"=[1,2,3],"simple"=42}');
      expect(t.isArray()).toBe(false);
      const nested = asTable(t.get(str('nested')));
      expect(nested.isArray()).toBe(true);
      expect(nested.size).toBe(3);
      expect(t.get(str('simple'))).toEqual(int(42));
    });

    it('reads keys of every scalar kind', () => {
      const t = parseTable('{2=2,1.5=4,true=3,"a"=1}');
      expect(t.lookup(int(2))).toEqual(int(2));
      expect(t.lookup(float(1.5))).toEqual(int(4));
      expect(t.lookup(bool(true))).toEqual(int(3));
      expect(t.lookup(str('a'))).toEqual(int(1));
    });

    it('keeps the last of repeated keys', () => {
      expect(stringifyTable(parseTable('{"a"=1,"a"=2}'))).toBe('{"a"=2}');
    });

    it('skips pairs with an empty side', () => {
      expect(parseTable('{"a"=,=1,"b"=2}').size).toBe(1);
    });

    it('splits a pair at its first "="', () => {
      expect(parseTable('{"a"=b=c}').lookup(str('a'))).toEqual(str('b=c'));
    });

    it('reads balanced brackets inside strings', () => {
      expect(items(parse('["a[b]c","d"]'))).toEqual([str('a[b]c'), str('d')]);
    });

    it('reads the array-of-objects form back', () => {
      const list = items(
        parse('[{"height"=50,"width"=100,"x"=10,"y"=20},{"height"=75,"width"=200,"x"=30,"y"=40}]')
      );
      expect(list).toHaveLength(2);
      const [first, second] = list.map(asTable);
      expect(asInt(first!.get(str('x')))).toBe(10);
      expect(asInt(first!.get(str('height')))).toBe(50);
      expect(asInt(second!.get(str('width')))).toBe(200);
      expect(asInt(second!.get(str('y')))).toBe(40);
    });
  });

  describe('errors', () => {
    it('rejects empty input', () => {
      const err = parseError(() => parse(''));
      expect(err.code).toBe(ParseErrorCode.EmptyInput);
    });

    it('rejects an unclosed bracket', () => {
      const err = parseError(() => parse('['));
      expect(err.code).toBe(ParseErrorCode.MalformedStructure);
      expect(err.message).toBe("Malformed array: missing closing ']'");
    });

    it('rejects a table closed by the other bracket kind', () => {
      expect(parseError(() => parse('[1,2}')).code).toBe(ParseErrorCode.MalformedStructure);
      expect(parseError(() => parse('{"a"=1]')).code).toBe(ParseErrorCode.MalformedStructure);
    });

    it('rejects unbalanced brackets inside a table', () => {
      expect(parseError(() => parse('[[1]')).code).toBe(ParseErrorCode.MalformedStructure);
      expect(parseError(() => parse('["a[b"]')).code).toBe(ParseErrorCode.MalformedStructure);
    });

    it('rejects an object entry without "="', () => {
      const err = parseError(() => parse('[1,{"a"}]'));
      expect(err.code).toBe(ParseErrorCode.MissingSeparator);
      expect(err.position).toEqual({ line: 1, column: 5, offset: 4 });
      expect(err.toString()).toBe("Missing '=' in object entry (line 1, column 5)");
    });

    it('reports line and column across newlines', () => {
      const err = parseError(() => parse('["x\ny",{"a"}]'));
      expect(err.code).toBe(ParseErrorCode.MissingSeparator);
      expect(err.position).toEqual({ line: 2, column: 5, offset: 8 });
    });

    it('enforces maxDepth', () => {
      expect(items(parse('[[[1]]]', { maxDepth: 3 }))).toHaveLength(1);
      expect(parseError(() => parse('[[[1]]]', { maxDepth: 2 })).code).toBe(
        ParseErrorCode.DepthExceeded
      );
    });

    it('enforces maxInputLength', () => {
      expect(parseError(() => parse('12345', { maxInputLength: 4 })).code).toBe(
        ParseErrorCode.InputTooLong
      );
    });

    it('parseTable() rejects non-table text', () => {
      expect(parseError(() => parseTable('5')).code).toBe(ParseErrorCode.MalformedStructure);
      expect(parseError(() => parseTable('')).code).toBe(ParseErrorCode.EmptyInput);
    });
  });

  describe('round trip', () => {
    const samples: Value[] = [
      int(0),
      int(-2147483648),
      float(0.5),
      float(-3),
      bool(true),
      str('this person'),
      str('{not a table}'),
      table(Table.fromArray([])),
      table(new Table()),
      table(Table.fromArray([int(1), float(2.5), str('x'), bool(false)])),
      table(mapTable({ player: { name: 'p1', pos: [1, 2] }, active: true })),
    ];

    it.each(samples.map((v): [string, Value] => [stringify(v), v]))('%s', (text, value) => {
      const back = parse(text);
      expect(back.kind).toBe(value.kind);
      expect(stringify(back)).toBe(text);
    });
  });
});
