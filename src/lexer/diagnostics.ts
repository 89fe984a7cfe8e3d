import { ScanError } from './errors';
import { Token } from './tokens';

/** One token per line: `line:column<TAB>TYPE "value"`. */
export function formatToken(tok: Token): string {
  const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
  return `${tok.line}:${tok.column}\t${tok.type}${val}`;
}

/**
 * Render a scan error with the offending source line and a caret under
 * the bad character.
 */
export function formatScanError(error: ScanError, source: string, fileName?: string): string {
  const where = `${fileName ? `${fileName}:` : ''}${error.line}:${error.column}`;
  const lineText = source.split('\n')[error.line - 1]?.replace(/\r$/, '') ?? '';
  // Keep tabs in the padding so the caret lines up under a tab-indented line.
  const lead = Array.from(lineText)
    .slice(0, error.column - 1)
    .map(ch => (ch === '\t' ? '\t' : ' '))
    .join('');
  return `${where}: Invalid character '${error.character}'\n${lineText}\n${lead}^`;
}
