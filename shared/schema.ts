import { z } from "zod";
import type { Precedent } from "./models/precedents";

// ============================================
// WIRE SCHEMAS (JSON returned by the API)
// ============================================

export const precedentResponseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  case_number: z.string(),
  year: z.number().int(),
  court: z.string(),
  description: z.string(),
  keywords: z.string().nullable(),
  section: z.string().nullable(),
  article: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  // Escaped HTML with query matches wrapped in <mark>, only when requested
  highlighted: z.object({ title: z.string(), description: z.string() }).optional(),
});

export const searchPageSchema = z.object({
  results: z.array(precedentResponseSchema),
  total: z.number().int(),
  page: z.number().int(),
  per_page: z.number().int(),
  pages: z.number().int(),
});

export const suggestionsSchema = z.object({
  suggestions: z.array(z.string()),
});

export const statsSchema = z.object({
  total_precedents: z.number().int(),
  by_year: z.array(z.object({ year: z.number().int(), count: z.number().int() })),
  by_court: z.array(z.object({ court: z.string(), count: z.number().int() })),
});

const requiredText = z.string().trim().min(1);

// Body of POST /api/precedent. `year` may arrive as a JSON integer or as a
// string of digits.
export const createPrecedentBodySchema = z.object({
  title: requiredText.max(255),
  case_number: requiredText.max(100),
  year: z.union([
    z.number().int().refine(Number.isSafeInteger),
    z.string()
      .trim()
      .regex(/^[+-]?\d+$/)
      .transform((value) => Number.parseInt(value, 10))
      .refine(Number.isSafeInteger),
  ]),
  court: requiredText.max(200),
  description: requiredText,
  keywords: z.string().max(500).nullish(),
  section: z.string().nullish(),
  article: z.string().nullish(),
});

export const REQUIRED_PRECEDENT_FIELDS = ["title", "case_number", "year", "court", "description"] as const;

// ============================================
// TYPES
// ============================================
export type PrecedentResponse = z.infer<typeof precedentResponseSchema>;
export type SearchPage = z.infer<typeof searchPageSchema>;
export type Suggestions = z.infer<typeof suggestionsSchema>;
export type Stats = z.infer<typeof statsSchema>;
export type CreatePrecedentBody = z.infer<typeof createPrecedentBodySchema>;

export function toPrecedentResponse(row: Precedent): PrecedentResponse {
  return {
    id: row.id,
    title: row.title,
    case_number: row.caseNumber,
    year: row.year,
    court: row.court,
    description: row.description,
    keywords: row.keywords,
    section: row.section,
    article: row.article,
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

// ============================================
// DATABASE MODELS (Re-export from models)
// ============================================
export * from "./models/precedents";
