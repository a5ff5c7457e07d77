/**
 * Curation Rules Configuration
 *
 * Loads the category map, blacklist and filtering mode from a JSON file
 * and validates it into a frozen CurationRules value.
 *
 * File format:
 * {
 *   "mode": "strict" | "permissive",        // default "strict"
 *   "fallbackCategory": "Other",            // used in permissive mode
 *   "preserveEpgUrl": false,
 *   "preserveExtraAttributes": false,       // keep non-standard EXTINF attributes
 *   "blacklist": ["VOD", "Series"],
 *   "includeKeywords": ["Live", "HD"],      // optional gate
 *   "categories": [{ "name": "Sports", "keywords": ["Star Sports"] }]
 * }
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DEFAULT_FALLBACK_CATEGORY,
  type CategoryRule,
  type CurationMode,
  type CurationRules,
} from '../iptv/types';

/**
 * Custom error class for invalid or missing configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCurationMode(value: unknown): value is CurationMode {
  return value === 'strict' || value === 'permissive';
}

/**
 * Category labels end up inside group-title="..." on a single EXTINF line
 */
function assertWritableLabel(label: string, field: string): void {
  if (/["\r\n]/.test(label)) {
    throw new ConfigurationError(`${field} must not contain double quotes or line breaks`);
  }
}

function readKeywords(value: unknown, field: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array of strings`);
  }

  return value.map((keyword, index) => {
    if (typeof keyword !== 'string') {
      throw new ConfigurationError(`${field}[${index}] must be a string`);
    }
    return keyword;
  });
}

function readCategories(value: unknown): CategoryRule[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError('categories must be an array of { name, keywords }');
  }

  const seen = new Set<string>();

  return value.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigurationError(`categories[${index}] must be an object`);
    }

    const name = typeof entry.name === 'string' ? entry.name.trim() : '';
    if (!name) {
      throw new ConfigurationError(`categories[${index}].name must be a non-empty string`);
    }
    assertWritableLabel(name, `categories[${index}].name`);
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate category: ${name}`);
    }
    seen.add(name);

    return Object.freeze({
      name,
      keywords: Object.freeze(readKeywords(entry.keywords, `categories[${index}].keywords`)),
    });
  });
}

/**
 * Validates a parsed configuration object into curation rules
 */
export function parseCurationRules(value: unknown): CurationRules {
  if (!isRecord(value)) {
    throw new ConfigurationError('Curation config must be a JSON object');
  }

  const mode = value.mode ?? 'strict';
  if (!isCurationMode(mode)) {
    throw new ConfigurationError(`mode must be "strict" or "permissive", got ${JSON.stringify(mode)}`);
  }

  const fallback = value.fallbackCategory ?? DEFAULT_FALLBACK_CATEGORY;
  if (typeof fallback !== 'string' || !fallback.trim()) {
    throw new ConfigurationError('fallbackCategory must be a non-empty string');
  }
  assertWritableLabel(fallback, 'fallbackCategory');

  const preserveEpgUrl = value.preserveEpgUrl ?? false;
  if (typeof preserveEpgUrl !== 'boolean') {
    throw new ConfigurationError('preserveEpgUrl must be a boolean');
  }

  const preserveExtraAttributes = value.preserveExtraAttributes ?? false;
  if (typeof preserveExtraAttributes !== 'boolean') {
    throw new ConfigurationError('preserveExtraAttributes must be a boolean');
  }

  return Object.freeze({
    mode,
    fallbackCategory: fallback.trim(),
    blacklist: Object.freeze(readKeywords(value.blacklist, 'blacklist')),
    includeKeywords: Object.freeze(readKeywords(value.includeKeywords, 'includeKeywords')),
    categories: Object.freeze(readCategories(value.categories)),
    preserveEpgUrl,
    preserveExtraAttributes,
  });
}

/**
 * Reads and validates a curation rules file
 */
export async function loadCurationRules(filePath: string): Promise<CurationRules> {
  const absolutePath = resolve(filePath);

  let raw: string;
  try {
    raw = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read curation config ${absolutePath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid JSON in curation config ${absolutePath}: ${reason}`);
  }

  return parseCurationRules(parsed);
}
