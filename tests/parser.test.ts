import { Lexer } from '../src/lexer/lexer';
import { Parser } from '../src/parser/parser';
import * as AST from '../src/parser/ast';
import { ParseError } from '../src/runtime/errors';
import {
  confString,
  confInteger,
  confFloat,
  confBoolean,
  confList,
  declaredList,
  confReference,
  indexAccessor,
  rangeAccessor,
  isConfValue,
} from '../src/runtime/values';
import { flattenValue } from '../src/runtime/views';

describe('Parser', () => {
  function parse(source: string, maxDepth?: number): AST.Document {
    return new Parser({ maxDepth }).parse(new Lexer(source));
  }

  function firstValue(source: string) {
    return parse(source).namespaces[0].variables[0].value;
  }

  describe('documents', () => {
    it('should parse an empty document', () => {
      const doc = parse('');
      expect(doc.type).toBe('Document');
      expect(doc.namespaces).toEqual([]);
    });

    it('should parse a document of comments and blank lines', () => {
      expect(parse('# nothing here\n\n# still nothing\n').namespaces).toEqual([]);
    });

    it('should parse namespaces and their declarations in order', () => {
      const doc = parse('@server:\n  $host := "localhost"\n  $port := 8080\n\n@debug:\n  $on := true\n');
      expect(doc.namespaces.map(ns => ns.name)).toEqual(['server', 'debug']);
      expect(doc.namespaces[0].variables.map(v => v.name)).toEqual(['host', 'port']);
      expect(doc.namespaces[0].variables[1].value).toEqual(confInteger(8080n));
      expect(doc.namespaces[1].variables[0].value).toEqual(confBoolean(true));
    });

    it('should accept a header with no declarations', () => {
      const doc = parse('@empty:');
      expect(doc.namespaces).toHaveLength(1);
      expect(doc.namespaces[0].variables).toEqual([]);
    });

    it('should keep repeated blocks of the same namespace separate', () => {
      const doc = parse('@a:\n$x := 1\n@b:\n$y := 2\n@a:\n$z := 3');
      expect(doc.namespaces.map(ns => ns.name)).toEqual(['a', 'b', 'a']);
    });

    it('should record node positions', () => {
      const doc = parse('\n@a:\n    $x := 1');
      expect(doc.namespaces[0].position).toEqual({ line: 2, column: 1, offset: 1 });
      expect(doc.namespaces[0].variables[0].position).toEqual({ line: 3, column: 5, offset: 9 });
    });

    it('should accept a pre-tokenized stream', () => {
      const tokens = new Lexer('@a:\n$x := 1').tokenize();
      const doc = new Parser().parse(tokens);
      expect(doc.namespaces[0].variables[0].value).toEqual(confInteger(1n));
    });
  });

  describe('values', () => {
    it('should parse each scalar kind', () => {
      expect(firstValue('@a:\n$v := "hi"')).toEqual(confString('hi'));
      expect(firstValue("@a:\n$v := 'hi'")).toEqual(confString('hi'));
      expect(firstValue('@a:\n$v := -42')).toEqual(confInteger(-42n));
      expect(firstValue('@a:\n$v := 3.14')).toEqual(confFloat(3.14));
      expect(firstValue('@a:\n$v := False')).toEqual(confBoolean(false));
    });

    it('should parse 64-bit integers exactly', () => {
      expect(firstValue('@a:\n$v := 9223372036854775807')).toEqual(confInteger(9223372036854775807n));
    });

    it('should parse negative zero as a float', () => {
      const value = firstValue('@a:\n$v := -0.0');
      expect(value.kind).toBe('float');
      if (value.kind === 'float') {
        expect(Object.is(value.value, -0)).toBe(true);
      }
    });

    it('should parse empty and nested lists', () => {
      expect(firstValue('@a:\n$v := []')).toEqual(confList([]));
      expect(firstValue('@a:\n$v := [1, [2, 3], []]')).toEqual(
        confList([confInteger(1n), confList([confInteger(2n), confInteger(3n)]), confList([])]),
      );
    });

    it('should parse mixed lists spread over several lines', () => {
      const value = firstValue('@a:\n$v := [\n  "a",\n  1.5,\n  true\n]\n$w := 1');
      expect(value).toEqual(confList([confString('a'), confFloat(1.5), confBoolean(true)]));
    });

    it('should parse deep nesting without growing the call stack', () => {
      const depth = 20000;
      const value = firstValue('@a:\n$v := ' + '['.repeat(depth) + '7' + ']'.repeat(depth));
      expect(isConfValue(value)).toBe(true);
      if (isConfValue(value)) {
        expect(flattenValue(value)).toEqual([confInteger(7n)]);
      }
    });
  });

  describe('references', () => {
    it('should parse local and external references', () => {
      expect(firstValue('@a:\n$v := %target')).toEqual(confReference('target'));
      expect(firstValue('@a:\n$v := &Other.target')).toEqual(confReference('target', 'Other'));
    });

    it('should parse index and range accessors in order', () => {
      expect(firstValue('@a:\n$v := %items->(1)')).toEqual(
        confReference('items', undefined, [indexAccessor(1)]),
      );
      expect(firstValue('@a:\n$v := &b.items->(0..2)->(1)')).toEqual(
        confReference('items', 'b', [rangeAccessor(0, 2), indexAccessor(1)]),
      );
    });

    it('should parse references inside lists', () => {
      expect(firstValue('@a:\n$v := [1, %x, [&b.y]]')).toEqual(
        declaredList([confInteger(1n), confReference('x'), declaredList([confReference('y', 'b')])]),
      );
    });

    it('should reject a negative list position', () => {
      expect(() => parse('@a:\n$v := %items->(-1)')).toThrow(
        'ParseError: List position -1 is out of range at line 2, column 16',
      );
    });

    it('should reject a range that ends before it starts', () => {
      expect(() => parse('@a:\n$v := %items->(3..1)')).toThrow(
        'ParseError: Range 3..1 ends before it starts at line 2, column 16',
      );
    });

    it('should require a closing parenthesis', () => {
      expect(() => parse('@a:\n$v := %items->(1')).toThrow(
        "ParseError: Expected ')' to close the accessor but found end of input at line 2, column 17",
      );
    });
  });

  describe('depth limit', () => {
    it('should not limit nesting unless asked to', () => {
      const depth = 600;
      expect(() => parse('@a:\n$x := ' + '['.repeat(depth) + ']'.repeat(depth))).not.toThrow();
    });

    it('should accept nesting up to the limit', () => {
      expect(() => parse('@a:\n$x := [[[1]]]', 3)).not.toThrow();
    });

    it('should reject nesting past the limit', () => {
      expect(() => parse('@a:\n$x := [[[[1]]]]', 3)).toThrow(
        'ParseError: List nesting exceeds the maximum depth of 3 at line 2, column 10',
      );
    });
  });

  describe('errors', () => {
    it('should reject a declaration outside any namespace', () => {
      expect(() => parse('$x := 1')).toThrow(
        "ParseError: Expected namespace header but found variable '$x' at line 1, column 1",
      );
    });

    it('should require a colon after the namespace name', () => {
      expect(() => parse('@a\n$x := 1')).toThrow(
        "ParseError: Expected ':' after namespace header '@a' but found end of line at line 1, column 3",
      );
    });

    it('should require the header to end its line', () => {
      expect(() => parse('@a: $x := 1')).toThrow(
        "ParseError: Expected end of line but found variable '$x' at line 1, column 5",
      );
    });

    it('should require := after a variable name', () => {
      expect(() => parse('@a:\n$x 1')).toThrow(
        "ParseError: Expected ':=' after variable '$x' but found INTEGER '1' at line 2, column 4",
      );
    });

    it('should reject two declarations on one line', () => {
      expect(() => parse('@a:\n$x := 1 $y := 2')).toThrow(
        "ParseError: Expected end of line but found variable '$y' at line 2, column 9",
      );
    });

    it('should reject stray words inside a block', () => {
      expect(() => parse('@a:\n$x := 1\nfoo')).toThrow(
        "ParseError: Expected variable declaration or namespace header but found IDENTIFIER 'foo' at line 3, column 1",
      );
    });

    it('should reject a bare word as a value', () => {
      expect(() => parse('@a:\n$x := yes')).toThrow(
        "ParseError: Expected a value (string, integer, float, boolean, list or reference) but found IDENTIFIER 'yes' at line 2, column 7",
      );
    });

    it('should reject a trailing comma in a list', () => {
      expect(() => parse('@a:\n$x := [1,]')).toThrow(
        "ParseError: Expected a value (string, integer, float, boolean, list or reference) but found RBRACKET ']' at line 2, column 10",
      );
    });

    it('should point an unclosed list at its opening bracket', () => {
      expect(() => parse('@a:\n$x := [1, 2')).toThrow(
        "ParseError: Expected ',' or ']' to close the list opened at line 2, column 7 but found end of input at line 2, column 12",
      );
    });

    it('should expose what was expected', () => {
      let caught: unknown;
      try {
        parse('@a:\n$x :=');
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.expected).toBe('a value (string, integer, float, boolean, list or reference)');
        expect(caught.position).toEqual({ line: 2, column: 6, offset: 9 });
      }
    });
  });

  describe('parseValueOnly()', () => {
    function parseValue(source: string) {
      return new Parser().parseValueOnly(new Lexer(source));
    }

    it('should parse a lone value', () => {
      expect(parseValue('[1, "two", 3.0, false]')).toEqual(
        confList([confInteger(1n), confString('two'), confFloat(3), confBoolean(false)]),
      );
    });

    it('should allow surrounding newlines', () => {
      expect(parseValue('\n42\n')).toEqual(confInteger(42n));
    });

    it('should reject references', () => {
      expect(() => parseValue('[1, %x]')).toThrow(
        'ParseError: References are only allowed inside a document at line 1, column 1',
      );
    });

    it('should reject trailing tokens', () => {
      expect(() => parseValue('1 2')).toThrow(
        "ParseError: Expected end of input but found INTEGER '2' at line 1, column 3",
      );
    });
  });
});
