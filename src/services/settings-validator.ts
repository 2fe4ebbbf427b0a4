/**
 * SettingsValidator - Validates and sanitizes heuristic settings
 *
 * PURPOSE
 * ───────
 * Ensures the tunable heuristic constants loaded from a settings file are
 * valid and within acceptable ranges. Missing or mistyped values fall back to
 * DEFAULT_SETTINGS; out-of-range numbers are clamped instead of rejected.
 *
 * USAGE
 * ─────
 * ```typescript
 * const raw = JSON.parse(await readFile(path, 'utf8'));
 * const settings = validateSettings(raw);
 * ```
 */

import { readFile } from 'fs/promises';
import { ConfigError } from '../errors';
import { DEFAULT_SETTINGS, type OutlineSettings } from '../types';

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  lineTolerance: { min: 0.05, max: 1 },
  boldSizeRatio: { min: 1, max: 3 },
  isolationGapRatio: { min: 1, max: 5 },
  topOfPageBand: { min: 0, max: 0.5 },
  shortLineRatio: { min: 0.1, max: 2 },
  shortLineMinChars: { min: 5, max: 200 },
  minHeadingChars: { min: 1, max: 20 },
  maxHeadingChars: { min: 20, max: 1000 },
  acceptScore: { min: 1, max: 10 },
  wrapGapRatio: { min: 0, max: 3 },
  maxTitleLines: { min: 1, max: 6 },
  pageChromeBand: { min: 0, max: 0.25 },
} as const;

type NumericKey = keyof typeof LIMITS;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Validates a number and clamps it to the specified range
 */
function validateNumber(value: unknown, defaultValue: number, min: number, max: number): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return defaultValue;
  }
  return clamp(value, min, max);
}

function validateBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  return defaultValue;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates and sanitizes outline settings
 *
 * @param partial - Settings object as parsed from JSON (any shape)
 * @returns Fully valid OutlineSettings with defaults applied
 */
export function validateSettings(partial: unknown): OutlineSettings {
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS };
  }

  const num = (key: NumericKey): number =>
    validateNumber(partial[key], DEFAULT_SETTINGS[key], LIMITS[key].min, LIMITS[key].max);

  return {
    lineTolerance: num('lineTolerance'),
    boldSizeRatio: num('boldSizeRatio'),
    isolationGapRatio: num('isolationGapRatio'),
    topOfPageBand: num('topOfPageBand'),
    shortLineRatio: num('shortLineRatio'),
    shortLineMinChars: Math.round(num('shortLineMinChars')),
    minHeadingChars: Math.round(num('minHeadingChars')),
    maxHeadingChars: Math.round(num('maxHeadingChars')),
    acceptScore: num('acceptScore'),
    wrapGapRatio: num('wrapGapRatio'),
    maxTitleLines: Math.round(num('maxTitleLines')),
    pageChromeBand: num('pageChromeBand'),

    excludePageChrome: validateBoolean(partial.excludePageChrome, DEFAULT_SETTINGS.excludePageChrome),
    preferNativeOutline: validateBoolean(partial.preferNativeOutline, DEFAULT_SETTINGS.preferNativeOutline),
    resolveFontNames: validateBoolean(partial.resolveFontNames, DEFAULT_SETTINGS.resolveFontNames),
  };
}

/**
 * Reads a JSON settings file. Unreadable files and invalid JSON are
 * configuration errors; individual bad values are clamped by validateSettings.
 */
export async function loadSettingsFile(path: string): Promise<OutlineSettings> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read settings file ${path}`, error);
  }

  try {
    return validateSettings(JSON.parse(raw));
  } catch (error) {
    throw new ConfigError(`Settings file ${path} is not valid JSON`, error);
  }
}
