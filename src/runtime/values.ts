/**
 * Runtime value types for nsconf.
 * Every literal in a configuration document becomes a ConfValue. The set
 * of kinds is closed; consumers switch on `kind` exhaustively.
 *
 * A document may also hold references to other variables. Those live in
 * DeclaredValue and are resolved by the store before anyone reads them, so
 * queries only ever see the five ConfValue kinds.
 */

import { InvalidNameError, TypeMismatchError } from './errors';

export type ConfValue =
  | ConfString
  | ConfInteger
  | ConfFloat
  | ConfBoolean
  | ConfList;

export type ScalarValue = Exclude<ConfValue, ConfList>;

export type ValueKind = ConfValue['kind'];

export interface ConfString {
  readonly kind: 'string';
  readonly value: string;
}

export interface ConfInteger {
  readonly kind: 'integer';
  /** Always within the signed 64-bit range. */
  readonly value: bigint;
}

export interface ConfFloat {
  readonly kind: 'float';
  readonly value: number;
}

export interface ConfBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface ConfList {
  readonly kind: 'list';
  readonly elements: readonly ConfValue[];
}

// ─── References ──────────────────────────────────────

/** `->(i)` picks one element; `->(a..b)` slices `[a, b)`. */
export type Accessor =
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'range'; readonly start: number; readonly end: number };

/**
 * `%var` (same namespace, `namespace` undefined) or `&ns.var`, followed by
 * any number of accessors.
 */
export interface ConfReference {
  readonly kind: 'reference';
  readonly namespace?: string;
  readonly variable: string;
  readonly accessors: readonly Accessor[];
}

/** A list as written in a document: its elements may still be references. */
export interface DeclaredList {
  readonly kind: 'list';
  readonly elements: readonly DeclaredValue[];
}

export type DeclaredValue = ScalarValue | ConfReference | DeclaredList;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ─── Constructors ────────────────────────────────────

export function confString(value: string): ConfString {
  const str: ConfString = { kind: 'string', value };
  return Object.freeze(str);
}

export function confInteger(value: bigint | number): ConfInteger {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`${value} is not a safe integer`);
  }
  const big = BigInt(value);
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new RangeError(`${big} is outside the signed 64-bit range`);
  }
  const int: ConfInteger = { kind: 'integer', value: big };
  return Object.freeze(int);
}

export function confFloat(value: number): ConfFloat {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${value} is not a finite float`);
  }
  const float: ConfFloat = { kind: 'float', value };
  return Object.freeze(float);
}

export function confBoolean(value: boolean): ConfBoolean {
  const bool: ConfBoolean = { kind: 'boolean', value };
  return Object.freeze(bool);
}

export function confList(elements: readonly ConfValue[]): ConfList {
  const list: ConfList = { kind: 'list', elements: Object.freeze([...elements]) };
  return Object.freeze(list);
}

export function declaredList(elements: readonly DeclaredValue[]): DeclaredList {
  const list: DeclaredList = { kind: 'list', elements: Object.freeze([...elements]) };
  return Object.freeze(list);
}

export function indexAccessor(index: number): Accessor {
  checkPosition(index);
  const accessor: Accessor = { type: 'index', index };
  return Object.freeze(accessor);
}

export function rangeAccessor(start: number, end: number): Accessor {
  checkPosition(start);
  checkPosition(end);
  if (start > end) {
    throw new RangeError(`range ${start}..${end} ends before it starts`);
  }
  const accessor: Accessor = { type: 'range', start, end };
  return Object.freeze(accessor);
}

function checkPosition(position: number): void {
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new RangeError(`${position} is not a valid list position`);
  }
}

export function confReference(
  variable: string,
  namespace?: string,
  accessors: readonly Accessor[] = [],
): ConfReference {
  if (namespace !== undefined && !IDENTIFIER.test(namespace)) {
    throw new InvalidNameError(namespace, 'namespace');
  }
  if (!IDENTIFIER.test(variable)) {
    throw new InvalidNameError(variable, 'variable');
  }
  const copies = accessors.map(a => a.type === 'index'
    ? indexAccessor(a.index)
    : rangeAccessor(a.start, a.end));
  const ref: ConfReference = namespace === undefined
    ? { kind: 'reference', variable, accessors: Object.freeze(copies) }
    : { kind: 'reference', namespace, variable, accessors: Object.freeze(copies) };
  return Object.freeze(ref);
}

// ─── Tree walking ────────────────────────────────────
// Lists can nest as deep as memory allows, so nothing below recurses.

/**
 * Rebuild a value bottom-up: `leaf` maps every non-list, `list` assembles
 * each list from its already-mapped elements.
 */
export function rebuildValue<T>(
  value: DeclaredValue,
  leaf: (item: ScalarValue | ConfReference) => T,
  list: (elements: T[]) => T,
): T {
  if (value.kind !== 'list') return leaf(value);

  const frames: { items: readonly DeclaredValue[]; index: number; out: T[] }[] = [
    { items: value.elements, index: 0, out: [] },
  ];
  for (;;) {
    const top = frames[frames.length - 1];
    if (top.index < top.items.length) {
      const item = top.items[top.index++];
      if (item.kind === 'list') {
        frames.push({ items: item.elements, index: 0, out: [] });
      } else {
        top.out.push(leaf(item));
      }
      continue;
    }
    frames.pop();
    const built = list(top.out);
    const parent = frames[frames.length - 1];
    if (parent === undefined) return built;
    parent.out.push(built);
  }
}

function render(value: DeclaredValue, leaf: (item: ScalarValue | ConfReference) => string): string {
  if (value.kind !== 'list') return leaf(value);

  let out = '[';
  const frames: { items: readonly DeclaredValue[]; index: number }[] = [
    { items: value.elements, index: 0 },
  ];
  while (frames.length > 0) {
    const top = frames[frames.length - 1];
    if (top.index >= top.items.length) {
      frames.pop();
      out += ']';
      continue;
    }
    if (top.index > 0) out += ', ';
    const item = top.items[top.index++];
    if (item.kind === 'list') {
      out += '[';
      frames.push({ items: item.elements, index: 0 });
    } else {
      out += leaf(item);
    }
  }
  return out;
}

/** Narrow a declared value to a ConfValue when it holds no references. */
export function isConfValue(value: DeclaredValue): value is ConfValue {
  const pending: DeclaredValue[] = [value];
  let item: DeclaredValue | undefined;
  while ((item = pending.pop()) !== undefined) {
    if (item.kind === 'reference') return false;
    if (item.kind === 'list') {
      for (const element of item.elements) pending.push(element);
    }
  }
  return true;
}

// ─── Utilities ───────────────────────────────────────

export function kindOf(value: ConfValue): ValueKind {
  return value.kind;
}

export function isScalar(value: ConfValue): value is ScalarValue {
  return value.kind !== 'list';
}

/**
 * Plain decimal rendering of a float. Whole numbers keep a `.0` so the
 * text still reads back as a float; exponent notation is expanded.
 */
export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return '-0.0';
  const text = expandExponent(String(value));
  return text.includes('.') ? text : `${text}.0`;
}

function expandExponent(text: string): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, head, tail = '', exponent] = match;
  const digits = head + tail;
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Source form of a reference, e.g. `&net.ports->(0..2)`. */
export function formatReference(ref: ConfReference): string {
  let text = ref.namespace === undefined ? `%${ref.variable}` : `&${ref.namespace}.${ref.variable}`;
  for (const accessor of ref.accessors) {
    text += accessor.type === 'index'
      ? `->(${accessor.index})`
      : `->(${accessor.start}..${accessor.end})`;
  }
  return text;
}

function displayLeaf(item: ScalarValue | ConfReference): string {
  switch (item.kind) {
    case 'string': return item.value;
    case 'integer': return item.value.toString();
    case 'float': return formatFloat(item.value);
    case 'boolean': return String(item.value);
    case 'reference': return formatReference(item);
  }
}

/** Display form: strings unquoted, lists as `[a, b]`. */
export function valueToString(value: ConfValue): string {
  return render(value, displayLeaf);
}

const STRING_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
  '\0': '\\0',
};

export function quoteString(text: string): string {
  return '"' + text.replace(/[\\"\n\t\r\0]/g, ch => STRING_ESCAPES[ch]) + '"';
}

/** Source form: reads back through the parser as an equal value. */
export function serializeValue(value: DeclaredValue): string {
  return render(value, item => item.kind === 'string' ? quoteString(item.value) : displayLeaf(item));
}

export function valuesEqual(a: ConfValue, b: ConfValue): boolean {
  const pending: [ConfValue, ConfValue][] = [[a, b]];
  let pair: [ConfValue, ConfValue] | undefined;
  while ((pair = pending.pop()) !== undefined) {
    const [x, y] = pair;
    switch (x.kind) {
      case 'string':
        if (y.kind !== 'string' || x.value !== y.value) return false;
        break;
      case 'integer':
        if (y.kind !== 'integer' || x.value !== y.value) return false;
        break;
      case 'float':
        if (y.kind !== 'float' || !Object.is(x.value, y.value)) return false;
        break;
      case 'boolean':
        if (y.kind !== 'boolean' || x.value !== y.value) return false;
        break;
      case 'list':
        if (y.kind !== 'list' || x.elements.length !== y.elements.length) return false;
        for (let i = 0; i < x.elements.length; i++) {
          pending.push([x.elements[i], y.elements[i]]);
        }
        break;
    }
  }
  return true;
}

/**
 * Copy a caller-built value through the constructors, so ranges are
 * checked and nothing the caller still holds can change it.
 */
export function normalizeValue(value: DeclaredValue): DeclaredValue {
  return rebuildValue<DeclaredValue>(value, normalizeLeaf, declaredList);
}

function normalizeLeaf(item: ScalarValue | ConfReference): DeclaredValue {
  switch (item.kind) {
    case 'string': return confString(item.value);
    case 'integer': return confInteger(item.value);
    case 'float': return confFloat(item.value);
    case 'boolean': return confBoolean(item.value);
    case 'reference': return confReference(item.variable, item.namespace, item.accessors);
  }
}

// ─── Strict extraction ───────────────────────────────
// No coercion: "42" is never an integer.

export function asString(value: ConfValue, subject?: string): string {
  if (value.kind !== 'string') throw new TypeMismatchError('string', value.kind, subject);
  return value.value;
}

export function asInteger(value: ConfValue, subject?: string): bigint {
  if (value.kind !== 'integer') throw new TypeMismatchError('integer', value.kind, subject);
  return value.value;
}

export function asFloat(value: ConfValue, subject?: string): number {
  if (value.kind !== 'float') throw new TypeMismatchError('float', value.kind, subject);
  return value.value;
}

export function asBoolean(value: ConfValue, subject?: string): boolean {
  if (value.kind !== 'boolean') throw new TypeMismatchError('boolean', value.kind, subject);
  return value.value;
}

/** Returns a fresh array; the elements themselves are immutable. */
export function asList(value: ConfValue, subject?: string): ConfValue[] {
  if (value.kind !== 'list') throw new TypeMismatchError('list', value.kind, subject);
  return value.elements.slice();
}
