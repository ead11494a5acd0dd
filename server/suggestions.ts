import type { Precedent } from "@shared/schema";
import type { IStorage } from "./storage";

export const MIN_PREFIX_LENGTH = 2;
export const MAX_SUGGESTIONS = 5;
const MIN_TITLE_WORD_LENGTH = 3;

type TermSource = Pick<Precedent, "title" | "keywords" | "section" | "article">;

/** Keyword tags, section/article references and title words of one record, lower-cased. */
export function extractTerms(record: TermSource): string[] {
  const terms: string[] = [];

  for (const keyword of (record.keywords ?? "").split(",")) {
    const term = keyword.trim().toLowerCase();
    if (term) terms.push(term);
  }

  for (const reference of [record.section, record.article]) {
    const term = reference?.trim().toLowerCase();
    if (term) terms.push(term);
  }

  for (const word of record.title.split(/\s+/)) {
    if (word.length >= MIN_TITLE_WORD_LENGTH) terms.push(word.toLowerCase());
  }

  return terms;
}

export function normalizePrefix(raw: unknown): string {
  return typeof raw === "string" ? raw.trim().toLowerCase() : "";
}

export function collectSuggestions(records: Iterable<TermSource>, prefix: string, limit = MAX_SUGGESTIONS): string[] {
  if (prefix.length < MIN_PREFIX_LENGTH) return [];

  const vocabulary = new Set<string>();
  for (const record of records) {
    for (const term of extractTerms(record)) {
      if (term.startsWith(prefix)) vocabulary.add(term);
    }
  }

  return Array.from(vocabulary).sort().slice(0, limit);
}

export async function suggestTerms(storage: IStorage, rawPrefix: unknown): Promise<string[]> {
  const prefix = normalizePrefix(rawPrefix);
  if (prefix.length < MIN_PREFIX_LENGTH) return [];
  return collectSuggestions(await storage.listPrecedents(), prefix);
}
