import { normalizeHash } from '../services/crypto/hashing.js';
import { Errors } from '../utils/errors.js';

export type Fields = Record<string, unknown>;

/**
 * Narrow a parsed JSON body (or nested object) to a field map
 */
export function asFields(value: unknown, field?: string): Fields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw Errors.badRequest(
      field ? `${field} must be an object` : 'Request body must be a JSON object',
      field
    );
  }
  return Object.fromEntries(Object.entries(value));
}

export function requireString(fields: Fields, field: string): string {
  const value = fields[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw Errors.badRequest(`${field} is required`, field);
  }
  return value;
}

/**
 * Required SHA-256 hex digest, returned lowercased
 */
export function requireHash(fields: Fields, field: string): string {
  const value = fields[field];
  if (value === undefined || value === null || value === '') {
    throw Errors.badRequest(`${field} is required`, field);
  }
  const hash = normalizeHash(value);
  if (!hash) {
    throw Errors.badRequest(`Invalid ${field} format`, field);
  }
  return hash;
}

export function optionalHash(fields: Fields, field: string): string | null {
  const value = fields[field];
  if (value === undefined || value === null) {
    return null;
  }
  const hash = normalizeHash(value);
  if (!hash) {
    throw Errors.badRequest(`Invalid ${field} format`, field);
  }
  return hash;
}

export function requireInteger(
  fields: Fields,
  field: string,
  range: { min?: number; max?: number } = {}
): number {
  const value = fields[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw Errors.badRequest(`${field} must be an integer`, field);
  }
  if (range.min !== undefined && value < range.min) {
    throw Errors.badRequest(`${field} must be at least ${range.min}`, field);
  }
  if (range.max !== undefined && value > range.max) {
    throw Errors.badRequest(`${field} must be at most ${range.max}`, field);
  }
  return value;
}

export function optionalInteger(
  fields: Fields,
  field: string,
  fallback: number,
  range: { min?: number; max?: number } = {}
): number {
  return fields[field] === undefined ? fallback : requireInteger(fields, field, range);
}

/** Block heights are stored in a 32-bit integer column */
export const MAX_BLOCK_HEIGHT = 2_147_483_647;

/**
 * Route parameter that must be a block height
 */
export function parseHeightParam(value: string | undefined, field = 'height'): number {
  if (!value || !/^\d+$/.test(value)) {
    throw Errors.badRequest(`${field} must be a non-negative integer`, field);
  }
  const height = Number(value);
  if (!Number.isSafeInteger(height) || height > MAX_BLOCK_HEIGHT) {
    throw Errors.badRequest(`${field} must not exceed ${MAX_BLOCK_HEIGHT}`, field);
  }
  return height;
}
