import * as fs from 'fs';
import { Lexer } from '../lexer/lexer';
import { Parser } from '../parser/parser';
import * as AST from '../parser/ast';
import {
  ConfReference,
  ConfValue,
  DeclaredValue,
  ScalarValue,
  asString,
  asInteger,
  asFloat,
  asBoolean,
  asList,
  confList,
  isConfValue,
  normalizeValue,
  rebuildValue,
  serializeValue,
} from './values';
import { flattenValue, dictView } from './views';
import { applyAccessors } from './references';
import {
  CircularReferenceError,
  IoError,
  InvalidNameError,
  NamespaceExistsError,
  NamespaceNotFoundError,
  VariableNotFoundError,
} from './errors';

export interface StoreOptions {
  /** Deepest list nesting accepted by loads. Unlimited when unset. */
  maxDepth?: number;
  /** Spaces before each `$name` line in serialized output. Defaults to 4. */
  indent?: number;
  trace?: boolean;
}

export interface Variable {
  name: string;
  value: ConfValue;
}

/** What a single load contributed. */
export interface LoadSummary {
  /** Distinct namespaces touched, in order of appearance. */
  namespaces: string[];
  /** Declarations read, duplicates included. */
  variables: number;
}

export interface StoreStats {
  namespaces: number;
  variables: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const DEFAULT_INDENT = 4;

/**
 * In-memory owner of every namespace loaded from one or more documents.
 *
 * Loads are atomic: a document is fully lexed and parsed before anything
 * is merged, so a failing load leaves the store exactly as it was.
 * Namespaces and variables keep the position of their first declaration;
 * later declarations replace the value only.
 *
 * Variables are stored as declared. References (`%var`, `&ns.var`) are
 * resolved each time a value is read, so they follow later updates.
 */
export class RuntimeStore {
  private namespaces: Map<string, Map<string, DeclaredValue>> = new Map();
  private maxDepth?: number;
  private indent: number;
  private traceEnabled: boolean;

  constructor(options: StoreOptions = {}) {
    this.maxDepth = options.maxDepth;
    this.indent = options.indent ?? DEFAULT_INDENT;
    this.traceEnabled = options.trace ?? false;
  }

  static fromText(text: string, options?: StoreOptions): RuntimeStore {
    const store = new RuntimeStore(options);
    store.loadText(text);
    return store;
  }

  static fromFile(filePath: string, options?: StoreOptions): RuntimeStore {
    const store = new RuntimeStore(options);
    store.loadFile(filePath);
    return store;
  }

  // ─── Loading ───────────────────────────────────────────

  loadText(text: string, origin = '<text>'): LoadSummary {
    const parser = new Parser({ maxDepth: this.maxDepth });
    const document = parser.parse(new Lexer(text));
    return this.merge(document, origin);
  }

  loadFile(filePath: string): LoadSummary {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new IoError(filePath, 'read', error instanceof Error ? error.message : String(error));
    }
    return this.loadText(text, filePath);
  }

  private merge(document: AST.Document, origin: string): LoadSummary {
    const touched = new Set<string>();
    let declarations = 0;

    for (const block of document.namespaces) {
      let variables = this.namespaces.get(block.name);
      if (!variables) {
        variables = new Map();
        this.namespaces.set(block.name, variables);
      }
      touched.add(block.name);
      for (const decl of block.variables) {
        variables.set(decl.name, decl.value);
        declarations++;
      }
    }

    this.trace(`Loaded ${touched.size} namespace(s), ${declarations} declaration(s) from ${origin}`);
    return { namespaces: [...touched], variables: declarations };
  }

  // ─── Enumeration ───────────────────────────────────────

  listNamespaces(): string[] {
    return [...this.namespaces.keys()];
  }

  listVariables(namespace: string): string[] {
    return [...this.requireNamespace(namespace).keys()];
  }

  /** Name/value pairs of one namespace, in declaration order, references resolved. */
  getVariables(namespace: string): Variable[] {
    return this.listVariables(namespace).map(name => ({ name, value: this.getValue(namespace, name) }));
  }

  hasNamespace(namespace: string): boolean {
    return this.namespaces.has(namespace);
  }

  hasVariable(namespace: string, variable: string): boolean {
    return this.namespaces.get(namespace)?.has(variable) ?? false;
  }

  stats(): StoreStats {
    let variables = 0;
    for (const ns of this.namespaces.values()) {
      variables += ns.size;
    }
    return { namespaces: this.namespaces.size, variables };
  }

  // ─── Typed access ──────────────────────────────────────

  getValue(namespace: string, variable: string): ConfValue {
    return this.resolve(namespace, variable, []);
  }

  /** The value as written, references left in place. */
  getDeclared(namespace: string, variable: string): DeclaredValue {
    const value = this.requireNamespace(namespace).get(variable);
    if (value === undefined) {
      throw new VariableNotFoundError(namespace, variable);
    }
    return value;
  }

  getString(namespace: string, variable: string): string {
    return asString(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  getInteger(namespace: string, variable: string): bigint {
    return asInteger(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  getFloat(namespace: string, variable: string): number {
    return asFloat(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  getBoolean(namespace: string, variable: string): boolean {
    return asBoolean(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  getList(namespace: string, variable: string): ConfValue[] {
    return asList(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  // ─── Derived views ─────────────────────────────────────

  flattenList(namespace: string, variable: string): ScalarValue[] {
    return flattenValue(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  asDict(namespace: string, variable: string): Map<string, ConfValue> {
    return dictView(this.getValue(namespace, variable), `${namespace}.${variable}`);
  }

  // ─── Mutation ──────────────────────────────────────────

  /**
   * Create or overwrite a variable, creating its namespace when needed.
   * The value is copied and frozen; integers outside 64 bits throw RangeError.
   */
  setValue(namespace: string, variable: string, value: DeclaredValue): void {
    checkName(namespace, 'namespace');
    checkName(variable, 'variable');
    const stored = normalizeValue(value);
    let variables = this.namespaces.get(namespace);
    if (!variables) {
      variables = new Map();
      this.namespaces.set(namespace, variables);
    }
    variables.set(variable, stored);
    this.trace(`Set ${namespace}.${variable}`);
  }

  /** Overwrite a variable that must already exist. */
  updateValue(namespace: string, variable: string, value: DeclaredValue): void {
    const variables = this.requireNamespace(namespace);
    if (!variables.has(variable)) {
      throw new VariableNotFoundError(namespace, variable);
    }
    variables.set(variable, normalizeValue(value));
    this.trace(`Updated ${namespace}.${variable}`);
  }

  deleteValue(namespace: string, variable: string): void {
    if (!this.requireNamespace(namespace).delete(variable)) {
      throw new VariableNotFoundError(namespace, variable);
    }
    this.trace(`Deleted ${namespace}.${variable}`);
  }

  addNamespace(namespace: string): void {
    checkName(namespace, 'namespace');
    if (this.namespaces.has(namespace)) {
      throw new NamespaceExistsError(namespace);
    }
    this.namespaces.set(namespace, new Map());
    this.trace(`Added namespace ${namespace}`);
  }

  deleteNamespace(namespace: string): void {
    if (!this.namespaces.delete(namespace)) {
      throw new NamespaceNotFoundError(namespace);
    }
    this.trace(`Deleted namespace ${namespace}`);
  }

  /** Drop every namespace. The store stays usable. */
  clear(): void {
    this.namespaces.clear();
  }

  // ─── Serialization ─────────────────────────────────────

  /**
   * Render namespaces back to document text. Without a selection every
   * namespace is written in enumeration order; with one, in the order given.
   */
  serialize(selection?: string[]): string {
    const names = selection ?? this.listNamespaces();
    const pad = ' '.repeat(this.indent);
    let out = '';
    for (const name of names) {
      const variables = this.requireNamespace(name);
      out += `@${name}:\n`;
      for (const [variable, value] of variables) {
        out += `${pad}$${variable} := ${serializeValue(value)}\n`;
      }
      out += '\n';
    }
    return out;
  }

  dumpToFile(filePath: string, selection?: string[]): void {
    const text = this.serialize(selection);
    try {
      fs.writeFileSync(filePath, text, 'utf-8');
    } catch (error) {
      throw new IoError(filePath, 'write', error instanceof Error ? error.message : String(error));
    }
    this.trace(`Wrote ${text.length} character(s) to ${filePath}`);
  }

  // ─── References ────────────────────────────────────────

  /** `chain` holds the qualified names being resolved, outermost first. */
  private resolve(namespace: string, variable: string, chain: string[]): ConfValue {
    const declared = this.getDeclared(namespace, variable);
    if (isConfValue(declared)) return declared;

    const name = `${namespace}.${variable}`;
    const seen = chain.indexOf(name);
    if (seen !== -1) {
      throw new CircularReferenceError([...chain.slice(seen), name]);
    }
    chain.push(name);
    try {
      return rebuildValue<ConfValue>(
        declared,
        item => item.kind === 'reference' ? this.follow(item, namespace, chain) : item,
        confList,
      );
    } finally {
      chain.pop();
    }
  }

  private follow(ref: ConfReference, from: string, chain: string[]): ConfValue {
    const target = this.resolve(ref.namespace ?? from, ref.variable, chain);
    return applyAccessors(target, ref);
  }

  // ─── Helpers ───────────────────────────────────────────

  private requireNamespace(namespace: string): Map<string, DeclaredValue> {
    const variables = this.namespaces.get(namespace);
    if (!variables) {
      throw new NamespaceNotFoundError(namespace);
    }
    return variables;
  }

  private trace(message: string): void {
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}

function checkName(name: string, what: 'namespace' | 'variable'): void {
  if (!IDENTIFIER.test(name)) {
    throw new InvalidNameError(name, what);
  }
}
