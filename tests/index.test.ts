import { parse, parseValue, load, confList, confString, RuntimeStore, ParseError } from '../src/index';

describe('Public API', () => {
  it('should parse a document to an AST', () => {
    const doc = parse('@a:\n$x := "y"');
    expect(doc.namespaces).toHaveLength(1);
    expect(doc.namespaces[0].variables[0].name).toBe('x');
  });

  it('should parse a lone value', () => {
    expect(parseValue("['a', \"b\"]")).toEqual(confList([confString('a'), confString('b')]));
  });

  it('should build a store in one step', () => {
    const store = load('@a:\n$x := 1', { indent: 2 });
    expect(store).toBeInstanceOf(RuntimeStore);
    expect(store.serialize()).toBe('@a:\n  $x := 1\n\n');
  });

  it('should surface parse errors as ParseError', () => {
    expect(() => parseValue('[1 2]')).toThrow(ParseError);
  });
});
