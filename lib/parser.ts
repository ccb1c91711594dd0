import type { Entry, Phrase } from "@/types/vocab";

// Line format: `term / body ;comment/ body/`
// A line that is empty or starts with `;` carries no entry.
export function parseEntry(line: string): Entry | null {
  if (line.length === 0 || line[0] === ";") return null;

  const chars = Array.from(line);
  let i = 0;

  let term = "";
  while (i < chars.length) {
    const ch = chars[i++];
    if (ch === " " && chars[i] === "/") {
      i++; // skip '/'
      break;
    }
    term += ch;
  }
  if (!term) return null;

  const phrases: Phrase[] = [];
  let body = "";
  let comment = "";
  let inComment = false;
  for (; i < chars.length; i++) {
    const ch = chars[i];
    if (ch === "/") {
      phrases.push(Object.freeze({ body, comment }));
      body = "";
      comment = "";
      inComment = false;
    } else if (ch === ";") {
      inComment = true;
    } else if (inComment) {
      comment += ch;
    } else {
      body += ch;
    }
  }
  // Anything after the last '/' is an unterminated phrase and is dropped

  return Object.freeze({ term, phrases: Object.freeze(phrases) });
}
