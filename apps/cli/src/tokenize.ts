/**
 * Splits a session line into argv-style words.
 * Double or single quotes group words and are stripped; `""` yields an empty word.
 */

const WORD_RE = /"([^"]*)"|'([^']*)'|(\S+)/g;

export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  for (const m of line.matchAll(WORD_RE)) {
    words.push(m[1] ?? m[2] ?? m[3] ?? '');
  }
  return words;
}
