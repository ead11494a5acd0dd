import { z } from 'zod';
import {
  precedentResponseSchema,
  searchPageSchema,
  suggestionsSchema,
  statsSchema,
  createPrecedentBodySchema,
} from './schema';

export const errorSchemas = {
  validation: z.object({
    error: z.string(),
  }),
  notFound: z.object({
    error: z.string(),
  }),
  internal: z.object({
    error: z.string(),
  }),
};

export const api = {
  search: {
    method: 'GET' as const,
    path: '/api/search',
    responses: {
      200: searchPageSchema,
      400: errorSchemas.validation,
    },
  },
  suggestions: {
    method: 'GET' as const,
    path: '/api/suggestions',
    responses: {
      200: suggestionsSchema,
    },
  },
  precedents: {
    get: {
      method: 'GET' as const,
      path: '/api/precedent/:id',
      responses: {
        200: precedentResponseSchema,
        404: errorSchemas.notFound,
      },
    },
    create: {
      method: 'POST' as const,
      path: '/api/precedent',
      input: createPrecedentBodySchema,
      responses: {
        201: precedentResponseSchema,
        400: errorSchemas.validation,
        500: errorSchemas.internal,
      },
    },
  },
  stats: {
    method: 'GET' as const,
    path: '/stats',
    responses: {
      200: statsSchema,
    },
  },
};

export function buildUrl(path: string, params?: Record<string, string | number>): string {
  let url = path;
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (url.includes(`:${key}`)) {
        url = url.replace(`:${key}`, String(value));
      }
    });
  }
  return url;
}
