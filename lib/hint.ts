import type { Entry, Hinter } from "@/types/vocab";

export const MASK = "_";

function isAsciiLetter(ch: string): boolean {
  return /^[A-Za-z]$/.test(ch);
}

/**
 * Masked form of `term` with the first `[...typed].length` characters removed.
 *
 * Non-letters are always shown. A letter is shown once its position among the
 * letters of the term is below `mistakes`, so each mistake reveals one more.
 */
export function buildHint(term: string, typed: string, mistakes: number): string {
  let symbols = 0;
  const masked = Array.from(term).map((ch, i) => {
    if (!isAsciiLetter(ch)) {
      symbols++;
      return ch;
    }
    return i - symbols < mistakes ? ch : MASK;
  });
  return masked.slice(Array.from(typed).length).join("");
}

export function createHinter(entry: Entry, mistakes: number): Hinter {
  return (buffer) => buildHint(entry.term, buffer, mistakes);
}
