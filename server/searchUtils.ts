import { and, asc, desc, eq, or, sql, type AnyColumn, type SQL } from "drizzle-orm";
import { precedents } from "@shared/schema";
import { CASEFOLD_FUNCTION } from "./db";

export const SORT_FIELDS = ["year", "title", "court"] as const;
export const SORT_ORDERS = ["asc", "desc"] as const;

export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = (typeof SORT_ORDERS)[number];

export const MIN_QUERY_LENGTH = 2;
export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

/** What the store needs to run one search. `limit`/`offset` absent means every match. */
export interface SearchCriteria {
  text: string;
  year?: number;
  court?: string;
  sort: SortField;
  order: SortOrder;
  limit?: number;
  offset?: number;
}

const SEARCHABLE_COLUMNS = [
  precedents.title,
  precedents.description,
  precedents.keywords,
  precedents.caseNumber,
  precedents.section,
  precedents.article,
];

const SORT_COLUMNS = {
  year: precedents.year,
  title: precedents.title,
  court: precedents.court,
};

export function sanitizeSearchQuery(raw: unknown): string {
  if (typeof raw !== "string") return "";
  return raw.trim().split(/\s+/).filter(Boolean).join(" ");
}

/** Strict base-10 integer parse: "2023" and "-5" parse, "2023abc" and "20.5" do not. */
export function parseInteger(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isSafeInteger(raw) ? raw : undefined;
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function parsePositiveInteger(raw: unknown, fallback: number, max?: number): number {
  const value = parseInteger(raw);
  if (value === undefined || value < 1) return fallback;
  return max !== undefined ? Math.min(value, max) : value;
}

export function resolveSort(rawSort: unknown, rawOrder: unknown): { sort: SortField; order: SortOrder } {
  const sort = SORT_FIELDS.find((field) => field === rawSort);
  if (rawSort !== undefined && rawSort !== "" && !sort) {
    // unsupported field: year, newest first
    return { sort: "year", order: "desc" };
  }
  const order = SORT_ORDERS.find((value) => value === rawOrder) ?? "desc";
  return { sort: sort ?? "year", order };
}

export function countPages(total: number, perPage: number): number {
  if (total <= 0) return 0;
  return Math.ceil(total / perPage);
}

export function pageOffset(page: number, perPage: number): number {
  return (page - 1) * perPage;
}

function containsIgnoringCase(column: AnyColumn, needle: string): SQL {
  return sql`instr(${sql.raw(CASEFOLD_FUNCTION)}(${column}), ${needle.toLowerCase()}) > 0`;
}

export function buildPrecedentFilter(criteria: Pick<SearchCriteria, "text" | "year" | "court">): SQL | undefined {
  const textMatch = or(...SEARCHABLE_COLUMNS.map((column) => containsIgnoringCase(column, criteria.text)));
  const yearMatch = criteria.year !== undefined ? eq(precedents.year, criteria.year) : undefined;
  const courtMatch = criteria.court ? containsIgnoringCase(precedents.court, criteria.court) : undefined;
  return and(textMatch, yearMatch, courtMatch);
}

export function buildPrecedentOrder(sort: SortField, order: SortOrder): SQL[] {
  const column = SORT_COLUMNS[sort];
  return [order === "asc" ? asc(column) : desc(column), asc(precedents.id)];
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Escapes `text` for HTML and wraps every case-insensitive occurrence of a
 * term in `<mark>`, keeping the text's own casing. Longer terms win where
 * two overlap.
 */
export function highlightSearchTerms(text: string, terms: readonly string[]): string {
  const patterns = terms
    .map((term) => term.trim())
    .filter(Boolean)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (patterns.length === 0) return escapeHtml(text);

  // The capturing group keeps matches at the odd indexes of the split
  return text
    .split(new RegExp(`(${patterns.join("|")})`, "gi"))
    .map((part, index) => (index % 2 === 1 ? `<mark>${escapeHtml(part)}</mark>` : escapeHtml(part)))
    .join("");
}
