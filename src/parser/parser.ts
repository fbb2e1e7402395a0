import { Token, TokenType, TokenSource, describeToken } from '../lexer/tokens';
import { ParseError } from '../runtime/errors';
import {
  Accessor,
  ConfReference,
  ConfValue,
  DeclaredValue,
  confString,
  confInteger,
  confFloat,
  confBoolean,
  confReference,
  declaredList,
  indexAccessor,
  isConfValue,
  rangeAccessor,
} from '../runtime/values';
import * as AST from './ast';

export interface ParserOptions {
  /** Deepest list nesting accepted before the parse is rejected. Unlimited when unset. */
  maxDepth?: number;
}

/** A list whose closing bracket has not been reached yet. */
interface ListFrame {
  open: Token;
  elements: DeclaredValue[];
}

class ArrayTokenSource implements TokenSource {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  next(): Token {
    const tok = this.tokens[this.pos];
    if (tok === undefined) {
      const last = this.tokens[this.tokens.length - 1];
      return {
        type: TokenType.EOF,
        value: '',
        line: last?.line ?? 1,
        column: last?.column ?? 1,
        offset: last?.offset ?? 0,
      };
    }
    this.pos++;
    return tok;
  }
}

export class Parser {
  private source: TokenSource = new ArrayTokenSource([]);
  private current: Token = { type: TokenType.EOF, value: '', line: 1, column: 1, offset: 0 };
  private maxDepth?: number;

  constructor(options: ParserOptions = {}) {
    this.maxDepth = options.maxDepth;
  }

  parse(input: Token[] | TokenSource): AST.Document {
    this.start(input);
    const position = this.position();
    const namespaces: AST.NamespaceBlock[] = [];

    this.skipNewlines();
    while (!this.check(TokenType.EOF)) {
      namespaces.push(this.parseNamespace());
      this.skipNewlines();
    }

    return { type: 'Document', namespaces, position };
  }

  /**
   * Parse a single value expression, optionally surrounded by newlines.
   * References are rejected: there is no namespace to resolve them in.
   */
  parseValueOnly(input: Token[] | TokenSource): ConfValue {
    this.start(input);
    this.skipNewlines();
    const position = this.position();
    const value = this.parseValue();
    this.skipNewlines();
    this.expect(TokenType.EOF, 'end of input');
    if (!isConfValue(value)) {
      throw new ParseError('References are only allowed inside a document', position);
    }
    return value;
  }

  // ─── Blocks ────────────────────────────────────────────

  private parseNamespace(): AST.NamespaceBlock {
    const position = this.position();
    const name = this.expect(TokenType.NAMESPACE, 'namespace header').value;
    this.expect(TokenType.COLON, `':' after namespace header '@${name}'`);
    this.endOfLine();

    const variables: AST.VariableDecl[] = [];
    this.skipNewlines();
    while (this.check(TokenType.VARIABLE)) {
      variables.push(this.parseVariable());
      this.skipNewlines();
    }

    if (!this.check(TokenType.NAMESPACE) && !this.check(TokenType.EOF)) {
      throw this.error('variable declaration or namespace header');
    }

    return { type: 'NamespaceBlock', name, variables, position };
  }

  private parseVariable(): AST.VariableDecl {
    const position = this.position();
    const name = this.expect(TokenType.VARIABLE, 'variable declaration').value;
    this.expect(TokenType.ASSIGN, `':=' after variable '$${name}'`);
    const value = this.parseValue();
    this.endOfLine();
    return { type: 'VariableDecl', name, value, position };
  }

  // ─── Values ────────────────────────────────────────────

  /**
   * Value expressions, nested lists included. Open lists live on an
   * explicit stack so nesting depth never grows the call stack.
   */
  private parseValue(): DeclaredValue {
    const stack: ListFrame[] = [];

    for (;;) {
      let value: DeclaredValue;

      if (this.check(TokenType.LBRACKET)) {
        const open = this.advance();
        if (this.maxDepth !== undefined && stack.length >= this.maxDepth) {
          throw new ParseError(
            `List nesting exceeds the maximum depth of ${this.maxDepth}`,
            { line: open.line, column: open.column, offset: open.offset },
          );
        }
        if (!this.match(TokenType.RBRACKET)) {
          stack.push({ open, elements: [] });
          continue;
        }
        value = declaredList([]);
      } else {
        value = this.parseLiteral();
      }

      // Hand the finished value to the innermost open list, closing lists as we go
      for (;;) {
        const frame = stack[stack.length - 1];
        if (frame === undefined) return value;
        frame.elements.push(value);
        if (this.match(TokenType.COMMA)) break;
        this.expect(
          TokenType.RBRACKET,
          `',' or ']' to close the list opened at line ${frame.open.line}, column ${frame.open.column}`,
        );
        stack.pop();
        value = declaredList(frame.elements);
      }
    }
  }

  private parseLiteral(): DeclaredValue {
    const tok = this.current;
    switch (tok.type) {
      case TokenType.LOCAL_REF:
      case TokenType.EXTERNAL_REF:
        return this.parseReference();
      case TokenType.STRING:
        this.advance();
        return confString(tok.value);
      case TokenType.INTEGER:
        this.advance();
        return confInteger(BigInt(tok.value));
      case TokenType.FLOAT:
        this.advance();
        return confFloat(Number(tok.value));
      case TokenType.BOOLEAN:
        this.advance();
        return confBoolean(tok.value === 'true');
      default:
        throw this.error('a value (string, integer, float, boolean, list or reference)');
    }
  }

  /** `%var` or `&ns.var`, then any number of `->(i)` / `->(a..b)` accessors. */
  private parseReference(): ConfReference {
    const tok = this.advance();
    let namespace: string | undefined;
    let variable = tok.value;
    if (tok.type === TokenType.EXTERNAL_REF) {
      const dot = tok.value.indexOf('.');
      namespace = tok.value.slice(0, dot);
      variable = tok.value.slice(dot + 1);
    }

    const accessors: Accessor[] = [];
    while (this.match(TokenType.ARROW)) {
      this.expect(TokenType.LPAREN, "'(' after '->'");
      const startTok = this.current;
      const start = this.listPosition();
      if (this.match(TokenType.RANGE)) {
        const end = this.listPosition();
        if (start > end) {
          throw new ParseError(
            `Range ${start}..${end} ends before it starts`,
            { line: startTok.line, column: startTok.column, offset: startTok.offset },
          );
        }
        accessors.push(rangeAccessor(start, end));
      } else {
        accessors.push(indexAccessor(start));
      }
      this.expect(TokenType.RPAREN, "')' to close the accessor");
    }

    return confReference(variable, namespace, accessors);
  }

  private listPosition(): number {
    const tok = this.current;
    const value = this.expect(TokenType.INTEGER, 'a list position').value;
    const position = Number(value);
    if (position < 0 || !Number.isSafeInteger(position)) {
      throw new ParseError(
        `List position ${value} is out of range`,
        { line: tok.line, column: tok.column, offset: tok.offset },
      );
    }
    return position;
  }

  // ─── Helpers ───────────────────────────────────────────

  private start(input: Token[] | TokenSource): void {
    this.source = Array.isArray(input) ? new ArrayTokenSource(input) : input;
    this.current = this.source.next();
  }

  private endOfLine(): void {
    if (this.check(TokenType.EOF)) return;
    this.expect(TokenType.NEWLINE, 'end of line');
  }

  private advance(): Token {
    const tok = this.current;
    if (tok.type !== TokenType.EOF) {
      this.current = this.source.next();
    }
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, expected: string): Token {
    if (!this.check(type)) {
      throw this.error(expected);
    }
    return this.advance();
  }

  private skipNewlines(): void {
    while (this.check(TokenType.NEWLINE)) {
      this.advance();
    }
  }

  private position(): AST.Position {
    return { line: this.current.line, column: this.current.column, offset: this.current.offset };
  }

  private error(expected: string): ParseError {
    return new ParseError(
      `Expected ${expected} but found ${describeToken(this.current)}`,
      this.position(),
      expected,
    );
  }
}
