export enum TokenType {
  // Literals
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER',

  // Operators
  PLUS = 'PLUS',               // +
  MINUS = 'MINUS',             // -
  STAR = 'STAR',               // *
  SLASH = 'SLASH',             // /
  ASSIGN = 'ASSIGN',           // =

  // Delimiters
  SEMICOLON = 'SEMICOLON',     // ;
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )
  LBRACE = 'LBRACE',           // {
  RBRACE = 'RBRACE',           // }
  COMMA = 'COMMA',             // ,

  // Keywords
  FN = 'FN',
  SPAWN = 'SPAWN',
  SYNC = 'SYNC',
  BARRIER = 'BARRIER',
  JUMP = 'JUMP',
  JZ = 'JZ',
  JNZ = 'JNZ',

  // Structure
  EOF = 'EOF',
}

export type KeywordType =
  | TokenType.FN
  | TokenType.SPAWN
  | TokenType.SYNC
  | TokenType.BARRIER
  | TokenType.JUMP
  | TokenType.JZ
  | TokenType.JNZ;

export type PunctuationType =
  | TokenType.PLUS
  | TokenType.MINUS
  | TokenType.STAR
  | TokenType.SLASH
  | TokenType.ASSIGN
  | TokenType.SEMICOLON
  | TokenType.LPAREN
  | TokenType.RPAREN
  | TokenType.LBRACE
  | TokenType.RBRACE
  | TokenType.COMMA;

export const KEYWORDS: ReadonlyMap<string, KeywordType> = new Map([
  ['fn', TokenType.FN],
  ['spawn', TokenType.SPAWN],
  ['sync', TokenType.SYNC],
  ['barrier', TokenType.BARRIER],
  ['jump', TokenType.JUMP],
  ['jz', TokenType.JZ],
  ['jnz', TokenType.JNZ],
]);

export const PUNCTUATION: ReadonlyMap<string, PunctuationType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['*', TokenType.STAR],
  ['/', TokenType.SLASH],
  ['=', TokenType.ASSIGN],
  [';', TokenType.SEMICOLON],
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  [',', TokenType.COMMA],
]);

/** Cursor location. `offset` is 0-based, `line` and `column` are 1-based. */
export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export interface Token extends SourcePosition {
  readonly type: TokenType;
  /** The lexeme. Empty for EOF. */
  readonly value: string;
}
