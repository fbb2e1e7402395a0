import * as AST from '../parser/ast';
import { ValueKind } from './values';

export type ConfErrorType =
  | 'IoError'
  | 'LexError'
  | 'ParseError'
  | 'NamespaceNotFound'
  | 'VariableNotFound'
  | 'TypeMismatch'
  | 'StructuralMismatch'
  | 'DuplicateKey'
  | 'NamespaceExists'
  | 'InvalidName'
  | 'CircularReference'
  | 'InvalidAccess';

/**
 * Base class for every error the runtime raises. `errorType` lets callers
 * (and the binding layer) tell the failures apart without instanceof chains.
 */
export class ConfError extends Error {
  constructor(
    public errorType: ConfErrorType,
    message: string,
    public position?: AST.Position,
  ) {
    super(`${errorType}: ${message}`);
    this.name = 'ConfError';
  }
}

function at(position: AST.Position): string {
  return `at line ${position.line}, column ${position.column}`;
}

// ─── Load errors ─────────────────────────────────────

/** Anything that aborts a load. The store is left untouched. */
export class LoadError extends ConfError {}

export class IoError extends LoadError {
  constructor(
    public path: string,
    operation: 'read' | 'write',
    reason: string,
  ) {
    super('IoError', `cannot ${operation} '${path}': ${reason}`);
    this.name = 'IoError';
  }
}

export class LexError extends LoadError {
  constructor(
    public character: string,
    detail: string,
    position: AST.Position,
  ) {
    super('LexError', `${detail} ${at(position)}`, position);
    this.name = 'LexError';
  }
}

export class ParseError extends LoadError {
  constructor(
    detail: string,
    position: AST.Position,
    public expected?: string,
  ) {
    super('ParseError', `${detail} ${at(position)}`, position);
    this.name = 'ParseError';
  }
}

// ─── Query errors ────────────────────────────────────

export class NamespaceNotFoundError extends ConfError {
  constructor(public namespace: string) {
    super('NamespaceNotFound', `namespace '${namespace}' does not exist`);
    this.name = 'NamespaceNotFoundError';
  }
}

export class VariableNotFoundError extends ConfError {
  constructor(public namespace: string, public variable: string) {
    super('VariableNotFound', `variable '${variable}' does not exist in namespace '${namespace}'`);
    this.name = 'VariableNotFoundError';
  }
}

export class TypeMismatchError extends ConfError {
  constructor(
    public expected: ValueKind,
    public actual: ValueKind,
    subject?: string,
  ) {
    super(
      'TypeMismatch',
      subject
        ? `expected ${expected} but '${subject}' holds ${actual}`
        : `expected ${expected} but found ${actual}`,
    );
    this.name = 'TypeMismatchError';
  }
}

// ─── View errors ─────────────────────────────────────

export class StructuralMismatchError extends ConfError {
  constructor(public subject: string, public index: number, found: string) {
    super(
      'StructuralMismatch',
      `element ${index} of '${subject}' is not a two-element list (found ${found})`,
    );
    this.name = 'StructuralMismatchError';
  }
}

export class DuplicateKeyError extends ConfError {
  constructor(public subject: string, public key: string) {
    super('DuplicateKey', `key '${key}' appears more than once in '${subject}'`);
    this.name = 'DuplicateKeyError';
  }
}

// ─── Mutation errors ─────────────────────────────────

export class NamespaceExistsError extends ConfError {
  constructor(public namespace: string) {
    super('NamespaceExists', `namespace '${namespace}' already exists`);
    this.name = 'NamespaceExistsError';
  }
}

export class InvalidNameError extends ConfError {
  constructor(public invalidName: string, what: 'namespace' | 'variable') {
    super('InvalidName', `'${invalidName}' is not a valid ${what} name`);
    this.name = 'InvalidNameError';
  }
}

// ─── Reference errors ────────────────────────────────

export class CircularReferenceError extends ConfError {
  /** Qualified names along the cycle, the first repeated at the end. */
  constructor(public chain: string[]) {
    super('CircularReference', `reference cycle ${chain.join(' -> ')}`);
    this.name = 'CircularReferenceError';
  }
}

export class InvalidAccessError extends ConfError {
  constructor(public reference: string, detail: string) {
    super('InvalidAccess', `${detail} in '${reference}'`);
    this.name = 'InvalidAccessError';
  }
}
