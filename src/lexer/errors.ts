import { SourcePosition, Token } from './tokens';

/**
 * Raised for a character that starts no token. The scanner has already
 * moved past it, so a caller may keep pulling tokens after reporting it.
 */
export class ScanError extends Error {
  readonly kind = 'InvalidCharacter';
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(
    public readonly character: string,
    position: SourcePosition,
    /** Tokens scanned before the error, when it ends a whole-buffer scan. */
    public readonly tokens: readonly Token[] = [],
  ) {
    super(
      `Scan error at line ${position.line}, column ${position.column}: ` +
      `Invalid character '${character}'`,
    );
    this.name = 'ScanError';
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
  }

  get position(): SourcePosition {
    return { offset: this.offset, line: this.line, column: this.column };
  }

  withTokens(tokens: readonly Token[]): ScanError {
    return new ScanError(this.character, this.position, tokens);
  }
}
