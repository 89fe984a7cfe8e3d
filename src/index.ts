export { Scanner, ScanReport } from './lexer/lexer';
export {
  Token,
  TokenType,
  KeywordType,
  PunctuationType,
  SourcePosition,
  KEYWORDS,
  PUNCTUATION,
} from './lexer/tokens';
export { ScanError } from './lexer/errors';
export { formatScanError, formatToken } from './lexer/diagnostics';
export { loadConfig, loadConfigForScript, WeftConfig, OutputFormat } from './runtime/config';
export { run, scanLine, startRepl, CliIO } from './cli';

import { Scanner } from './lexer/lexer';
import { Token } from './lexer/tokens';

/**
 * Scan a Weft source string into tokens, ending with EOF.
 * Throws ScanError on the first invalid character.
 */
export function tokenize(source: string): Token[] {
  return new Scanner(source).tokenize();
}
