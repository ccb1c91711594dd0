import fs from "fs";
import type { Readable } from "stream";
import { parseEntry } from "@/lib/parser";
import { EntrySourceError } from "@/lib/errors";
import type { Entry } from "@/types/vocab";

// One entry per line; lines that carry no entry are skipped
export function parseEntries(raw: string): Entry[] {
  const entries: Entry[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const entry = parseEntry(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

export function loadEntriesFromFile(filePath: string): Entry[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new EntrySourceError(filePath, error);
  }
  return parseEntries(raw);
}

export async function readEntriesFromStream(stream: Readable, label = "standard input"): Promise<Entry[]> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    }
  } catch (error) {
    throw new EntrySourceError(label, error);
  }
  return parseEntries(Buffer.concat(chunks).toString("utf8"));
}
