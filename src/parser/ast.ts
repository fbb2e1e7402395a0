import { DeclaredValue } from '../runtime/values';

export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface BaseNode {
  position: Position;
}

export interface Document extends BaseNode {
  type: 'Document';
  namespaces: NamespaceBlock[];
}

/**
 * One `@name:` header and the declarations below it. The same namespace
 * may appear in several blocks of a document; the store merges them.
 */
export interface NamespaceBlock extends BaseNode {
  type: 'NamespaceBlock';
  name: string;
  variables: VariableDecl[];
}

export interface VariableDecl extends BaseNode {
  type: 'VariableDecl';
  name: string;
  /** Literal value, or a reference the store resolves on read. */
  value: DeclaredValue;
}

export type Node = Document | NamespaceBlock | VariableDecl;
