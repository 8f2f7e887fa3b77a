import { z } from 'zod';

import { ENGINE_FILTERS } from '../services/searxng.js';

export const SAFE_SEARCH_LEVELS = ['none', 'moderate', 'strict'] as const;

export const pingInputSchema = {
  message: z.string().optional().describe('Optional message to echo back'),
};

export const searchInputSchema = {
  query: z.string().describe('The search query'),
  categories: z
    .string()
    .optional()
    .describe('Comma-separated SearXNG categories'),
  engines: z.string().optional().describe('Comma-separated SearXNG engines'),
  language: z.string().optional().describe('Language code, e.g. "en"'),
  pageno: z.number().int().positive().optional().describe('Page number (1-based)'),
  time_range: z
    .string()
    .optional()
    .describe('SearXNG time_range, e.g. "day", "month" or "year"'),
  safe_search: z
    .enum(SAFE_SEARCH_LEVELS)
    .optional()
    .describe('Safe search level'),
  num_results: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Maximum number of results; 0 returns everything'),
};

export const browseInputSchema = {
  url: z.string().describe('The http(s) URL to fetch and convert to Markdown'),
};

export const enginesInputSchema = {
  filter: z
    .enum(ENGINE_FILTERS)
    .optional()
    .describe('Which engines to return (default: enabled)'),
};

export const healthInputSchema = {
  include_engines: z
    .boolean()
    .optional()
    .describe('Also count the enabled engines'),
};

export type PingInput = z.infer<z.ZodObject<typeof pingInputSchema>>;
export type SearchInput = z.infer<z.ZodObject<typeof searchInputSchema>>;
export type BrowseInput = z.infer<z.ZodObject<typeof browseInputSchema>>;
export type EnginesInput = z.infer<z.ZodObject<typeof enginesInputSchema>>;
export type HealthInput = z.infer<z.ZodObject<typeof healthInputSchema>>;
