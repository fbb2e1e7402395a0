import { Token, TokenType, TokenSource, BOOLEAN_WORDS } from './tokens';
import { LexError } from '../runtime/errors';
import { INT64_MIN, INT64_MAX } from '../runtime/values';
import * as AST from '../parser/ast';

const RADIX_DIGITS: Record<string, { name: string; prefix: string; pattern: RegExp }> = {
  x: { name: 'hexadecimal', prefix: '0x', pattern: /^[0-9a-fA-F]+$/ },
  b: { name: 'binary', prefix: '0b', pattern: /^[01]+$/ },
};

/**
 * Pull-based tokenizer. Each call to next() scans just far enough to
 * produce one token; reset() rewinds to the start of the source.
 */
export class Lexer implements TokenSource {
  private source: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private bracketDepth = 0;
  private lastType: TokenType | null = null;

  constructor(source: string) {
    this.source = source;
    this.reset();
  }

  reset(): void {
    // A leading byte order mark is not part of the document
    this.pos = this.source.startsWith('\uFEFF') ? 1 : 0;
    this.line = 1;
    this.column = 1;
    this.bracketDepth = 0;
    this.lastType = null;
  }

  /** Tokenize the whole source from the beginning, EOF included. */
  tokenize(): Token[] {
    this.reset();
    const tokens: Token[] = [];
    for (;;) {
      const tok = this.next();
      tokens.push(tok);
      if (tok.type === TokenType.EOF) return tokens;
    }
  }

  next(): Token {
    for (;;) {
      if (this.pos >= this.source.length) {
        return this.emit(TokenType.EOF, '', this.position());
      }

      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        const start = this.position();
        this.advanceLine();
        // No NEWLINE inside brackets, at the very start, or twice in a row
        if (this.bracketDepth > 0 || this.lastType === null || this.lastType === TokenType.NEWLINE) {
          continue;
        }
        return this.emit(TokenType.NEWLINE, '\\n', start);
      }

      if (ch === '#') {
        this.skipComment();
        continue;
      }

      if (ch === '"' || ch === "'") {
        return this.readString(ch);
      }

      if (this.isDigit(ch) || (ch === '-' && this.isDigit(this.peekChar(1)))) {
        return this.readNumber();
      }

      if (this.isAlpha(ch)) {
        return this.readWord();
      }

      return this.readPunctuation();
    }
  }

  private skipComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
      this.advance();
    }
  }

  private readString(quote: string): Token {
    const start = this.position();
    this.advance(); // opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== quote) {
      const ch = this.source[this.pos];
      if (ch === '\n') {
        throw new LexError(quote, 'Unterminated string', start);
      }
      if (ch === '\\') {
        this.advance();
        if (this.pos >= this.source.length) break;
        const escaped = this.source[this.pos];
        switch (escaped) {
          case 'n': text += '\n'; break;
          case 't': text += '\t'; break;
          case 'r': text += '\r'; break;
          case '0': text += '\0'; break;
          case '\\': text += '\\'; break;
          case '"': text += '"'; break;
          case "'": text += "'"; break;
          case '\n': throw new LexError(quote, 'Unterminated string', start);
          default: text += '\\' + escaped;
        }
        this.advance();
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw new LexError(quote, 'Unterminated string', start);
    }
    this.advance(); // closing quote
    return this.emit(TokenType.STRING, text, start);
  }

  private readNumber(): Token {
    const start = this.position();
    let negative = false;
    if (this.source[this.pos] === '-') {
      negative = true;
      this.advance();
    }

    const marker = this.peekChar(1).toLowerCase();
    if (this.source[this.pos] === '0' && marker in RADIX_DIGITS) {
      return this.readRadixInteger(start, negative, RADIX_DIGITS[marker]);
    }

    let text = negative ? '-' : '';
    text += this.readDigits();

    if (this.source[this.pos] === '.' && this.isDigit(this.peekChar(1))) {
      this.advance();
      text += '.' + this.readDigits();
      this.rejectTrailingWord();
      if (!Number.isFinite(Number(text))) {
        throw new LexError(text[0], `Float literal ${text} is out of range`, start);
      }
      return this.emit(TokenType.FLOAT, text, start);
    }

    this.rejectTrailingWord();
    return this.emit(TokenType.INTEGER, this.checkedInteger(BigInt(text), text, start), start);
  }

  private readRadixInteger(
    start: AST.Position,
    negative: boolean,
    radix: { name: string; prefix: string; pattern: RegExp },
  ): Token {
    this.advance(); // 0
    this.advance(); // x / b
    let digits = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      digits += this.source[this.pos];
      this.advance();
    }
    const raw = `${negative ? '-' : ''}${radix.prefix}${digits}`;
    if (!radix.pattern.test(digits)) {
      throw new LexError(raw[0], `Malformed ${radix.name} literal '${raw}'`, start);
    }
    const magnitude = BigInt(radix.prefix + digits);
    return this.emit(
      TokenType.INTEGER,
      this.checkedInteger(negative ? -magnitude : magnitude, raw, start),
      start,
    );
  }

  private checkedInteger(value: bigint, raw: string, start: AST.Position): string {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new LexError(raw[0], `Integer literal ${raw} is out of 64-bit range`, start);
    }
    return value.toString();
  }

  private readDigits(): string {
    let digits = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      digits += this.source[this.pos];
      this.advance();
    }
    return digits;
  }

  // 12abc is not a number followed by an identifier
  private rejectTrailingWord(): void {
    if (this.pos < this.source.length && this.isAlpha(this.source[this.pos])) {
      throw this.unexpected();
    }
  }

  private readWord(): Token {
    const start = this.position();
    const word = this.readIdentifier();
    const flag = BOOLEAN_WORDS.get(word);
    if (flag !== undefined) {
      return this.emit(TokenType.BOOLEAN, String(flag), start);
    }
    return this.emit(TokenType.IDENTIFIER, word, start);
  }

  private readPunctuation(): Token {
    const ch = this.source[this.pos];
    const start = this.position();

    switch (ch) {
      case '@':
      case '$': {
        this.advance();
        if (this.pos >= this.source.length || !this.isAlpha(this.source[this.pos])) {
          throw new LexError(ch, `Expected identifier after '${ch}'`, start);
        }
        const name = this.readIdentifier();
        return this.emit(ch === '@' ? TokenType.NAMESPACE : TokenType.VARIABLE, name, start);
      }
      case '%': {
        this.advance();
        if (!this.isAlpha(this.peekChar(0))) {
          throw new LexError(ch, "Expected variable name after '%'", start);
        }
        return this.emit(TokenType.LOCAL_REF, this.readIdentifier(), start);
      }
      case '&': {
        this.advance();
        const namespace = this.isAlpha(this.peekChar(0)) ? this.readIdentifier() : '';
        if (namespace === '' || this.peekChar(0) !== '.' || !this.isAlpha(this.peekChar(1))) {
          throw new LexError(ch, "Expected namespace.variable after '&'", start);
        }
        this.advance(); // .
        return this.emit(TokenType.EXTERNAL_REF, `${namespace}.${this.readIdentifier()}`, start);
      }
      case '-':
        if (this.peekChar(1) !== '>') throw this.unexpected();
        this.advance();
        this.advance();
        return this.emit(TokenType.ARROW, '->', start);
      case '.':
        if (this.peekChar(1) !== '.') throw this.unexpected();
        this.advance();
        this.advance();
        return this.emit(TokenType.RANGE, '..', start);
      case '(':
        this.advance();
        this.bracketDepth++;
        return this.emit(TokenType.LPAREN, '(', start);
      case ')':
        this.advance();
        this.bracketDepth = Math.max(0, this.bracketDepth - 1);
        return this.emit(TokenType.RPAREN, ')', start);
      case ':':
        this.advance();
        if (this.source[this.pos] === '=') {
          this.advance();
          return this.emit(TokenType.ASSIGN, ':=', start);
        }
        return this.emit(TokenType.COLON, ':', start);
      case '[':
        this.advance();
        this.bracketDepth++;
        return this.emit(TokenType.LBRACKET, '[', start);
      case ']':
        this.advance();
        this.bracketDepth = Math.max(0, this.bracketDepth - 1);
        return this.emit(TokenType.RBRACKET, ']', start);
      case ',':
        this.advance();
        return this.emit(TokenType.COMMA, ',', start);
      default:
        throw this.unexpected();
    }
  }

  private readIdentifier(): string {
    let id = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      id += this.source[this.pos];
      this.advance();
    }
    return id;
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private advanceLine(): void {
    this.pos++;
    this.line++;
    this.column = 1;
  }

  private peekChar(offset: number): string {
    return this.source[this.pos + offset] ?? '';
  }

  private position(): AST.Position {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private emit(type: TokenType, value: string, start: AST.Position): Token {
    this.lastType = type;
    return { type, value, line: start.line, column: start.column, offset: start.offset };
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private unexpected(): LexError {
    const ch = this.source[this.pos];
    return new LexError(ch, `Unexpected character '${ch}'`, this.position());
  }
}
