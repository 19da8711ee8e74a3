/**
 * Parsing of command-line query parameters and numeric options
 */

import type { FuzzyField, QueryParamValue, QueryParams } from '../query/types.js';
import { InvalidArgumentError } from './errors.js';

const FUZZY_FIELDS: readonly FuzzyField[] = ['title', 'headings', 'content'];

/**
 * Literal text to a parameter value: numbers, true/false and null are typed,
 * anything else stays a string. Quote a value ('"42"') to keep it a string.
 */
export function parseParamValue(raw: string): QueryParamValue {
  if (raw === 'null') return null;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) {
    const num = Number(raw);
    if (Number.isSafeInteger(num) || !Number.isInteger(num)) return num;
    return BigInt(raw);
  }
  const quoted = /^"(.*)"$/s.exec(raw);
  return quoted?.[1] ?? raw;
}

/**
 * Build query parameters from `--param name=value` and `--arg value` lists
 *
 * @throws InvalidArgumentError on a malformed pair or when both kinds are given
 */
export function parseQueryParams(
  named: readonly string[] = [],
  positional: readonly string[] = []
): QueryParams | undefined {
  if (named.length > 0 && positional.length > 0) {
    throw new InvalidArgumentError('Use either --param or --arg, not both');
  }
  if (positional.length > 0) {
    return positional.map(parseParamValue);
  }
  if (named.length === 0) {
    return undefined;
  }

  const params: Record<string, QueryParamValue> = {};
  for (const pair of named) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Expected name=value, got "${pair}"`);
    }
    params[pair.slice(0, eq)] = parseParamValue(pair.slice(eq + 1));
  }
  return params;
}

export function parsePositiveInt(raw: string | undefined, option: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${option} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseThreshold(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError(`--threshold must be between 0 and 1, got "${raw}"`);
  }
  return value;
}

export function parseFuzzyFields(raw: string | undefined): FuzzyField[] | undefined {
  if (raw === undefined) return undefined;
  const fields: FuzzyField[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    const field = FUZZY_FIELDS.find((candidate) => candidate === name);
    if (field === undefined) {
      throw new InvalidArgumentError(
        `Unknown field "${name}"; expected one of ${FUZZY_FIELDS.join(', ')}`
      );
    }
    if (!fields.includes(field)) fields.push(field);
  }
  return fields;
}
