import { LOG_LEVELS, type LogLevel, type SafeSearchLevel } from './types.js';

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

/**
 * A set variable is true only for 1/true/yes/on; anything else it holds,
 * including garbage, reads as false.
 */
export function parseBoolean(
  value: string | undefined,
  fallback: boolean
): boolean {
  if (value === undefined) return fallback;
  return TRUTHY_VALUES.has(value.trim().toLowerCase());
}

export function parseInteger(
  value: string | undefined,
  fallback: number,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return fallback;
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min || parsed > max) return fallback;
  return parsed;
}

export function parseString(
  value: string | undefined,
  fallback: string
): string {
  if (value === undefined || value.trim() === '') return fallback;
  return value;
}

export function parseCsv(value: string, lowerCase = false): string[] {
  return value
    .split(',')
    .map((part) => (lowerCase ? part.trim().toLowerCase() : part.trim()))
    .filter((part) => part.length > 0);
}

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel
): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function parseSafeSearch(value: string): SafeSearchLevel {
  switch (value.trim()) {
    case '0':
      return 0;
    case '2':
      return 2;
    default:
      return 1;
  }
}

export function safeSearchFromNumber(value: number): SafeSearchLevel {
  if (value === 0) return 0;
  if (value === 2) return 2;
  return 1;
}
