import {
  ConfValue,
  confString,
  confInteger,
  confFloat,
  confBoolean,
  confList,
  ConfList,
  confReference,
  declaredList,
  indexAccessor,
  rangeAccessor,
  formatReference,
  isConfValue,
  normalizeValue,
  kindOf,
  isScalar,
  formatFloat,
  valueToString,
  serializeValue,
  valuesEqual,
  asString,
  asInteger,
  asFloat,
  asBoolean,
  asList,
} from '../src/runtime/values';
import { InvalidNameError, TypeMismatchError } from '../src/runtime/errors';
import { parseValue } from '../src/index';

describe('Values', () => {
  describe('constructors', () => {
    it('should freeze values and list elements', () => {
      const list = confList([confInteger(1n)]);
      expect(Object.isFrozen(list)).toBe(true);
      expect(Object.isFrozen(list.elements)).toBe(true);
      expect(Object.isFrozen(confString('x'))).toBe(true);
    });

    it('should copy the element array it is given', () => {
      const elements: ConfValue[] = [confInteger(1n)];
      const list = confList(elements);
      elements.push(confInteger(2n));
      expect(list.elements).toHaveLength(1);
    });

    it('should accept safe numbers as integers', () => {
      expect(confInteger(42).value).toBe(42n);
    });

    it('should reject integers outside 64 bits', () => {
      expect(() => confInteger(2n ** 63n)).toThrow(
        new RangeError('9223372036854775808 is outside the signed 64-bit range'),
      );
      expect(() => confInteger(-(2n ** 63n))).not.toThrow();
    });

    it('should reject fractional or unsafe numbers as integers', () => {
      expect(() => confInteger(1.5)).toThrow(new RangeError('1.5 is not a safe integer'));
    });

    it('should reject non-finite floats', () => {
      expect(() => confFloat(NaN)).toThrow(new RangeError('NaN is not a finite float'));
      expect(() => confFloat(Infinity)).toThrow(RangeError);
    });
  });

  describe('kinds', () => {
    it('should report the kind of each value', () => {
      expect(kindOf(confString('a'))).toBe('string');
      expect(kindOf(confFloat(1))).toBe('float');
      expect(kindOf(confList([]))).toBe('list');
    });

    it('should treat every non-list as a scalar', () => {
      expect(isScalar(confBoolean(false))).toBe(true);
      expect(isScalar(confInteger(0n))).toBe(true);
      expect(isScalar(confList([confInteger(0n)]))).toBe(false);
    });
  });

  describe('formatFloat()', () => {
    it('should keep a fractional part on whole numbers', () => {
      expect(formatFloat(2)).toBe('2.0');
      expect(formatFloat(-0)).toBe('-0.0');
      expect(formatFloat(3.14)).toBe('3.14');
    });

    it('should never use exponent notation', () => {
      expect(formatFloat(1e21)).toBe('1000000000000000000000.0');
      expect(formatFloat(1.25e22)).toBe('12500000000000000000000.0');
      expect(formatFloat(1e-7)).toBe('0.0000001');
      expect(formatFloat(-1.5e-10)).toBe('-0.00000000015');
    });
  });

  describe('valueToString()', () => {
    it('should render scalars in display form', () => {
      expect(valueToString(confString('plain text'))).toBe('plain text');
      expect(valueToString(confInteger(-9223372036854775808n))).toBe('-9223372036854775808');
      expect(valueToString(confFloat(0.5))).toBe('0.5');
      expect(valueToString(confBoolean(true))).toBe('true');
    });

    it('should render lists with comma-space separators', () => {
      const list = confList([
        confInteger(1n),
        confString('a'),
        confFloat(2),
        confBoolean(true),
        confList([]),
        confList([confInteger(3n), confInteger(4n)]),
      ]);
      expect(valueToString(list)).toBe('[1, a, 2.0, true, [], [3, 4]]');
    });
  });

  describe('serializeValue()', () => {
    it('should quote and escape strings', () => {
      expect(serializeValue(confString('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
      expect(serializeValue(confString('tab\there\\'))).toBe('"tab\\there\\\\"');
    });

    it('should quote strings nested in lists', () => {
      expect(serializeValue(confList([confString('a'), confInteger(1n)]))).toBe('["a", 1]');
    });

    it('should read back as an equal value', () => {
      const samples: ConfValue[] = [
        confString('quote " backslash \\ newline \n nul \0'),
        confString(''),
        confInteger(9223372036854775807n),
        confInteger(-1n),
        confFloat(-0),
        confFloat(6.02e23),
        confFloat(1e-12),
        confBoolean(false),
        confList([confList([]), confList([confString("it's")])]),
      ];
      for (const sample of samples) {
        expect(valuesEqual(parseValue(serializeValue(sample)), sample)).toBe(true);
      }
    });
  });

  describe('valuesEqual()', () => {
    it('should compare structurally', () => {
      const a = confList([confInteger(1n), confList([confString('x')])]);
      const b = confList([confInteger(1n), confList([confString('x')])]);
      expect(valuesEqual(a, b)).toBe(true);
    });

    it('should not coerce between kinds', () => {
      expect(valuesEqual(confInteger(1n), confFloat(1))).toBe(false);
      expect(valuesEqual(confString('1'), confInteger(1n))).toBe(false);
      expect(valuesEqual(confBoolean(true), confInteger(1n))).toBe(false);
    });

    it('should tell negative zero apart from zero', () => {
      expect(valuesEqual(confFloat(-0), confFloat(0))).toBe(false);
    });

    it('should compare list lengths', () => {
      expect(valuesEqual(confList([confInteger(1n)]), confList([]))).toBe(false);
    });
  });

  describe('deep nesting', () => {
    const depth = 20000;

    function nested(leaf: ConfValue): ConfValue {
      let value = leaf;
      for (let i = 0; i < depth; i++) {
        value = confList([value]);
      }
      return value;
    }

    it('should display a deeply nested list', () => {
      expect(valueToString(nested(confInteger(7n)))).toBe('['.repeat(depth) + '7' + ']'.repeat(depth));
    });

    it('should serialize a deeply nested list so it reads back equal', () => {
      const value = nested(confString('x'));
      const text = serializeValue(value);
      expect(text).toBe('['.repeat(depth) + '"x"' + ']'.repeat(depth));
      expect(valuesEqual(parseValue(text), value)).toBe(true);
    });

    it('should compare deeply nested lists', () => {
      expect(valuesEqual(nested(confInteger(7n)), nested(confInteger(7n)))).toBe(true);
      expect(valuesEqual(nested(confInteger(7n)), nested(confInteger(8n)))).toBe(false);
    });
  });

  describe('references', () => {
    it('should render references in source form', () => {
      expect(formatReference(confReference('target'))).toBe('%target');
      expect(formatReference(confReference('ports', 'net', [rangeAccessor(0, 2), indexAccessor(1)]))).toBe(
        '&net.ports->(0..2)->(1)',
      );
    });

    it('should serialize references inside lists', () => {
      expect(serializeValue(declaredList([confString('a'), confReference('x', 'b', [indexAccessor(0)])]))).toBe(
        '["a", &b.x->(0)]',
      );
    });

    it('should validate names and accessors', () => {
      expect(() => confReference('1x')).toThrow(InvalidNameError);
      expect(() => confReference('x', 'bad-ns')).toThrow("InvalidName: 'bad-ns' is not a valid namespace name");
      expect(() => indexAccessor(-1)).toThrow(new RangeError('-1 is not a valid list position'));
      expect(() => rangeAccessor(3, 1)).toThrow(new RangeError('range 3..1 ends before it starts'));
    });

    it('should tell resolved values from declared ones', () => {
      expect(isConfValue(confList([confInteger(1n), confList([])]))).toBe(true);
      expect(isConfValue(declaredList([confInteger(1n), declaredList([confReference('x')])]))).toBe(false);
    });
  });

  describe('normalizeValue()', () => {
    it('should copy and freeze a caller-built list', () => {
      const elements: ConfValue[] = [confInteger(1n)];
      const raw: ConfList = { kind: 'list', elements };
      const normalized = normalizeValue(raw);
      elements.push(confInteger(2n));
      expect(normalized).toEqual(confList([confInteger(1n)]));
      expect(Object.isFrozen(normalized)).toBe(true);
      if (normalized.kind === 'list') {
        expect(Object.isFrozen(normalized.elements)).toBe(true);
      }
    });

    it('should reject an integer outside 64 bits', () => {
      expect(() => normalizeValue({ kind: 'integer', value: 2n ** 64n })).toThrow(
        new RangeError('18446744073709551616 is outside the signed 64-bit range'),
      );
    });

    it('should reject a non-finite float', () => {
      expect(() => normalizeValue({ kind: 'float', value: NaN })).toThrow(new RangeError('NaN is not a finite float'));
    });
  });

  describe('strict extraction', () => {
    it('should return the payload of a matching kind', () => {
      expect(asString(confString('hi'))).toBe('hi');
      expect(asInteger(confInteger(7n))).toBe(7n);
      expect(asFloat(confFloat(2.5))).toBe(2.5);
      expect(asBoolean(confBoolean(true))).toBe(true);
    });

    it('should never coerce a numeric-looking string', () => {
      expect(() => asInteger(confString('42'))).toThrow(
        'TypeMismatch: expected integer but found string',
      );
    });

    it('should not read an integer as a float', () => {
      expect(() => asFloat(confInteger(1n), 'ns.a')).toThrow(
        "TypeMismatch: expected float but 'ns.a' holds integer",
      );
    });

    it('should carry the kinds on the error', () => {
      let caught: unknown;
      try {
        asBoolean(confList([]));
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(TypeMismatchError);
      if (caught instanceof TypeMismatchError) {
        expect(caught.expected).toBe('boolean');
        expect(caught.actual).toBe('list');
        expect(caught.errorType).toBe('TypeMismatch');
      }
    });

    it('should hand out a copy of list elements', () => {
      const list = confList([confInteger(1n)]);
      const elements = asList(list);
      elements.push(confInteger(2n));
      expect(list.elements).toHaveLength(1);
    });
  });
});
