export enum TokenType {
  // Literals
  STRING = 'STRING',
  INTEGER = 'INTEGER',
  FLOAT = 'FLOAT',
  BOOLEAN = 'BOOLEAN',
  IDENTIFIER = 'IDENTIFIER',

  // Declarations
  NAMESPACE = 'NAMESPACE',     // @name
  VARIABLE = 'VARIABLE',       // $name

  // References
  LOCAL_REF = 'LOCAL_REF',     // %name
  EXTERNAL_REF = 'EXTERNAL_REF', // &ns.name
  ARROW = 'ARROW',             // ->
  RANGE = 'RANGE',             // ..

  // Operators
  ASSIGN = 'ASSIGN',           // :=
  COLON = 'COLON',             // :
  COMMA = 'COMMA',             // ,

  // Delimiters
  LBRACKET = 'LBRACKET',       // [
  RBRACKET = 'RBRACKET',       // ]
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )

  // Structure
  NEWLINE = 'NEWLINE',
  EOF = 'EOF',
}

export const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['false', false],
  ['True', true],
  ['False', false],
]);

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  /**
   * Offset of the first character in UTF-16 code units, the unit of JS
   * string indexing. `column` counts the same units, from 1.
   */
  offset: number;
}

/**
 * Anything the parser can pull tokens from, one at a time.
 * Must keep returning EOF once the input is exhausted.
 */
export interface TokenSource {
  next(): Token;
}

/** Human-readable description of a token for error messages. */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF: return 'end of input';
    case TokenType.NEWLINE: return 'end of line';
    case TokenType.NAMESPACE: return `namespace header '@${token.value}'`;
    case TokenType.VARIABLE: return `variable '$${token.value}'`;
    case TokenType.LOCAL_REF: return `reference '%${token.value}'`;
    case TokenType.EXTERNAL_REF: return `reference '&${token.value}'`;
    case TokenType.STRING: return `string ${JSON.stringify(token.value)}`;
    default: return `${token.type} '${token.value}'`;
  }
}
