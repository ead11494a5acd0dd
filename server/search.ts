import { toPrecedentResponse, type SearchPage } from "@shared/schema";
import { INVALID_QUERY_MESSAGE, ValidationError } from "./errors";
import type { IStorage } from "./storage";
import {
  DEFAULT_PER_PAGE,
  MAX_PER_PAGE,
  MIN_QUERY_LENGTH,
  countPages,
  highlightSearchTerms,
  pageOffset,
  parseInteger,
  parsePositiveInteger,
  resolveSort,
  sanitizeSearchQuery,
  type SortField,
  type SortOrder,
} from "./searchUtils";

export interface SearchRequest {
  q: string;
  year?: number;
  court?: string;
  sort: SortField;
  order: SortOrder;
  page: number;
  perPage: number;
  /** Attach `<mark>`-highlighted title and description to each result */
  highlight: boolean;
}

/** Raw query-string values, as Express hands them over. */
export type SearchParams = Record<string, unknown>;

/**
 * Normalizes the query string of a search. A malformed `year` is dropped
 * rather than rejected; only an unusable `q` fails the request.
 */
export function parseSearchRequest(params: SearchParams): SearchRequest {
  const q = sanitizeSearchQuery(params.q);
  if (q.length < MIN_QUERY_LENGTH) {
    throw new ValidationError(INVALID_QUERY_MESSAGE);
  }

  const court = sanitizeSearchQuery(params.court);
  const { sort, order } = resolveSort(params.sort, params.order);

  return {
    q,
    year: parseInteger(params.year),
    court: court || undefined,
    sort,
    order,
    page: parsePositiveInteger(params.page, 1),
    perPage: parsePositiveInteger(params.per_page, DEFAULT_PER_PAGE, MAX_PER_PAGE),
    highlight: params.highlight === "true" || params.highlight === "1",
  };
}

export async function searchPrecedents(storage: IStorage, request: SearchRequest): Promise<SearchPage> {
  const { rows, total } = await storage.searchPrecedents({
    text: request.q,
    year: request.year,
    court: request.court,
    sort: request.sort,
    order: request.order,
    limit: request.perPage,
    offset: pageOffset(request.page, request.perPage),
  });

  return {
    results: rows.map((row) => {
      const result = toPrecedentResponse(row);
      if (!request.highlight) return result;
      const terms = [request.q];
      return {
        ...result,
        highlighted: {
          title: highlightSearchTerms(row.title, terms),
          description: highlightSearchTerms(row.description, terms),
        },
      };
    }),
    total,
    page: request.page,
    per_page: request.perPage,
    pages: countPages(total, request.perPage),
  };
}

export async function runSearch(storage: IStorage, params: SearchParams): Promise<SearchPage> {
  return searchPrecedents(storage, parseSearchRequest(params));
}
