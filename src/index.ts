export { Lexer } from './lexer/lexer';
export { Token, TokenType, TokenSource, describeToken } from './lexer/tokens';
export { Parser, ParserOptions } from './parser/parser';
export * as AST from './parser/ast';
export {
  ConfValue,
  ConfString,
  ConfInteger,
  ConfFloat,
  ConfBoolean,
  ConfList,
  ConfReference,
  Accessor,
  DeclaredValue,
  DeclaredList,
  ScalarValue,
  ValueKind,
  INT64_MIN,
  INT64_MAX,
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
  normalizeValue,
  formatReference,
  kindOf,
  isScalar,
  formatFloat,
  valueToString,
  quoteString,
  serializeValue,
  valuesEqual,
  asString,
  asInteger,
  asFloat,
  asBoolean,
  asList,
} from './runtime/values';
export {
  ConfError,
  ConfErrorType,
  LoadError,
  IoError,
  LexError,
  ParseError,
  NamespaceNotFoundError,
  VariableNotFoundError,
  TypeMismatchError,
  StructuralMismatchError,
  DuplicateKeyError,
  NamespaceExistsError,
  InvalidNameError,
  CircularReferenceError,
  InvalidAccessError,
} from './runtime/errors';
export { applyAccessors } from './runtime/references';
export { flattenValue, dictView } from './runtime/views';
export { RuntimeStore, StoreOptions, StoreStats, LoadSummary, Variable } from './runtime/store';
export { NsconfConfig, loadConfig, loadConfigForFile } from './runtime/config';
export { StatusReporter, TerminalStatusReporter, SilentStatusReporter } from './runtime/status';
export { HandleTable, Handle, Status, FailureStatus, BindingResult } from './bindings';

import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Document } from './parser/ast';
import { ConfValue } from './runtime/values';
import { RuntimeStore, StoreOptions } from './runtime/store';

/**
 * Parse an nsconf document into an AST.
 */
export function parse(source: string): Document {
  return new Parser().parse(new Lexer(source));
}

/**
 * Parse a lone value expression such as `[1, "two", 3.0]`.
 */
export function parseValue(source: string): ConfValue {
  return new Parser().parseValueOnly(new Lexer(source));
}

/**
 * Build a store from document text in one step.
 */
export function load(text: string, options?: StoreOptions): RuntimeStore {
  return RuntimeStore.fromText(text, options);
}
