// packages/core/src/utils/shell-words.ts: Split command lines into argv

/**
 * Split a command line on whitespace, honoring single and double quotes and
 * backslash escapes outside single quotes. No expansion is performed.
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (ch === '\\' && i + 1 < line.length) {
      current += line[++i];
      inWord = true;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else current += ch;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new Error(`Unterminated ${quote === '"' ? 'double' : 'single'} quote in: ${line}`);
  }
  if (inWord) words.push(current);
  return words;
}
