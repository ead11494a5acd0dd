import type { Express } from "express";
import { api } from "@shared/routes";
import {
  REQUIRED_PRECEDENT_FIELDS,
  toPrecedentResponse,
  type CreatePrecedentBody,
  type Stats,
  type Suggestions,
} from "@shared/schema";
import {
  HttpError,
  INVALID_YEAR_MESSAGE,
  MISSING_FIELDS_MESSAGE,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "./errors";
import { runSearch } from "./search";
import { parseInteger } from "./searchUtils";
import type { IStorage } from "./storage";
import { suggestTerms } from "./suggestions";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function parseCreateBody(body: unknown): CreatePrecedentBody {
  if (!isRecord(body) || REQUIRED_PRECEDENT_FIELDS.some((field) => isBlank(body[field]))) {
    throw new ValidationError(MISSING_FIELDS_MESSAGE);
  }

  const parsed = api.precedents.create.input.safeParse(body);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue ? String(issue.path[0]) : "body";
    throw new ValidationError(field === "year" ? INVALID_YEAR_MESSAGE : `Invalid value for ${field}`);
  }
  return parsed.data;
}

export function registerRoutes(app: Express, storage: IStorage): Express {
  app.get(api.search.path, async (req, res) => {
    const page = await runSearch(storage, req.query);
    res.json(page);
  });

  app.get(api.suggestions.path, async (req, res) => {
    const payload: Suggestions = { suggestions: await suggestTerms(storage, req.query.q) };
    res.json(payload);
  });

  app.get(api.precedents.get.path, async (req, res) => {
    const id = parseInteger(req.params.id);
    const precedent = id === undefined ? undefined : await storage.getPrecedent(id);

    if (!precedent) {
      throw new NotFoundError("Precedent not found");
    }

    res.json(toPrecedentResponse(precedent));
  });

  app.post(api.precedents.create.path, async (req, res) => {
    const body = parseCreateBody(req.body);

    try {
      const created = await storage.createPrecedent({
        title: body.title,
        caseNumber: body.case_number,
        year: body.year,
        court: body.court,
        description: body.description,
        keywords: body.keywords ?? "",
        section: body.section ?? null,
        article: body.article ?? null,
      });
      res.status(201).json(toPrecedentResponse(created));
    } catch (error) {
      if (error instanceof HttpError) throw error;
      // The insert transaction has already rolled back; report the store's reason
      console.error("Error creating precedent:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get(api.stats.path, async (_req, res) => {
    const stats = await storage.getStats();
    const payload: Stats = {
      total_precedents: stats.total,
      by_year: stats.byYear,
      by_court: stats.byCourt,
    };
    res.json(payload);
  });

  return app;
}
