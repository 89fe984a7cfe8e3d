import { ScanError } from './errors';
import { KEYWORDS, PUNCTUATION, SourcePosition, Token, TokenType } from './tokens';

export interface ScanReport {
  /** Every token scanned, ending with EOF. */
  tokens: Token[];
  /** One entry per skipped invalid character, in source order. */
  errors: ScanError[];
}

/**
 * Pull-based scanner over one source string. Each call to `nextToken()`
 * consumes exactly one token; once EOF is reached it keeps returning EOF.
 */
export class Scanner implements Iterable<Token> {
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenType.EOF, '', this.currentPosition());
    }

    const ch = this.source[this.pos];

    if (this.isAlpha(ch)) {
      return this.readIdentifier();
    }

    if (this.isDigit(ch)) {
      return this.readNumber();
    }

    const start = this.currentPosition();
    const punct = PUNCTUATION.get(ch);
    if (punct !== undefined) {
      this.advance();
      return this.makeToken(punct, ch, start);
    }

    // Take the whole code point so a surrogate pair is reported as one character.
    const bad = String.fromCodePoint(this.source.codePointAt(this.pos) ?? 0);
    this.pos += bad.length;
    this.column++;
    throw new ScanError(bad, start);
  }

  /**
   * Scan the whole buffer from the start. Stops at the first invalid
   * character; the thrown error carries the tokens produced before it.
   */
  tokenize(): Token[] {
    this.reset();
    const tokens: Token[] = [];
    for (;;) {
      let tok: Token;
      try {
        tok = this.nextToken();
      } catch (e) {
        if (e instanceof ScanError) {
          throw e.withTokens(tokens);
        }
        throw e;
      }
      tokens.push(tok);
      if (tok.type === TokenType.EOF) {
        return tokens;
      }
    }
  }

  /** Scan the whole buffer from the start, skipping over invalid characters. */
  scanAll(): ScanReport {
    this.reset();
    const tokens: Token[] = [];
    const errors: ScanError[] = [];
    for (;;) {
      try {
        const tok = this.nextToken();
        tokens.push(tok);
        if (tok.type === TokenType.EOF) {
          return { tokens, errors };
        }
      } catch (e) {
        if (!(e instanceof ScanError)) throw e;
        errors.push(e);
      }
    }
  }

  *[Symbol.iterator](): Iterator<Token> {
    for (;;) {
      const tok = this.nextToken();
      yield tok;
      if (tok.type === TokenType.EOF) return;
    }
  }

  currentPosition(): SourcePosition {
    return { offset: this.pos, line: this.line, column: this.column };
  }

  reset(): void {
    this.pos = 0;
    this.line = 1;
    this.column = 1;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.pos++;
        this.line++;
        this.column = 1;
        continue;
      }

      // Line comment: runs up to (not including) the newline
      if (ch === '/' && this.source[this.pos + 1] === '/') {
        while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
          this.advanceCodePoint();
        }
        continue;
      }

      return;
    }
  }

  private readIdentifier(): Token {
    const start = this.currentPosition();
    while (this.pos < this.source.length && this.isIdentChar(this.source[this.pos])) {
      this.advance();
    }
    const id = this.source.slice(start.offset, this.pos);
    return this.makeToken(KEYWORDS.get(id) ?? TokenType.IDENTIFIER, id, start);
  }

  private readNumber(): Token {
    const start = this.currentPosition();
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      this.advance();
    }
    return this.makeToken(TokenType.NUMBER, this.source.slice(start.offset, this.pos), start);
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private advanceCodePoint(): void {
    const code = this.source.codePointAt(this.pos) ?? 0;
    this.pos += code > 0xffff ? 2 : 1;
    this.column++;
  }

  private makeToken(type: TokenType, value: string, at: SourcePosition): Token {
    return Object.freeze({ type, value, offset: at.offset, line: at.line, column: at.column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
  }

  private isIdentChar(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch) || ch === '_';
  }
}
