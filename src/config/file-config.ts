import { readFile } from 'node:fs/promises';

import * as yaml from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../errors/app-error.js';
import { getErrorMessage } from '../utils/error-utils.js';

import { LOG_LEVELS } from './types.js';

const nonNegativeInt = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

const searxngSectionSchema = z
  .object({
    base_url: z.string().url().optional(),
    default_categories: z.array(z.string()).optional(),
    default_engines: z.array(z.string()).optional(),
    language: z.string().min(1).optional(),
    safe_search: nonNegativeInt.optional(),
    user_agent: z.string().min(1).optional(),
    num_results: nonNegativeInt.optional(),
    timeout_secs: positiveInt.optional(),
  })
  .strict();

const browseSectionSchema = z
  .object({
    follow_redirects: z.boolean().optional(),
    max_redirects: nonNegativeInt.optional(),
    max_bytes: positiveInt.optional(),
    timeout_secs: positiveInt.optional(),
    user_agent: z.string().min(1).optional(),
    allowed_hosts: z.array(z.string()).optional(),
    allow_private: z.boolean().optional(),
  })
  .strict();

const streamableHttpSectionSchema = z
  .object({
    stateful_mode: z.boolean().optional(),
    session_ttl_secs: positiveInt.optional(),
    max_sessions: positiveInt.optional(),
    sse_retry_secs: positiveInt.optional(),
  })
  .strict();

const loggingSectionSchema = z
  .object({
    level: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

export const fileConfigSchema = z
  .object({
    tools: z.array(z.string()).optional(),
    searxng: searxngSectionSchema.optional(),
    browse: browseSectionSchema.optional(),
    streamable_http: streamableHttpSectionSchema.optional(),
    logging: loggingSectionSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Parses YAML (or JSON, which is valid YAML) configuration text. An empty
 * document is an empty configuration.
 */
export function parseConfigText(text: string, source: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config ${source}: ${getErrorMessage(error)}`,
      source,
      { cause: error }
    );
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config ${source}: ${formatIssues(result.error)}`,
      source
    );
  }
  return result.data;
}

export async function loadConfigFile(path: string): Promise<FileConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read config ${path}: ${getErrorMessage(error)}`,
      path,
      { cause: error }
    );
  }
  return parseConfigText(text, path);
}
