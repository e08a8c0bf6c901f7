/**
 * Utility functions for the Maintenance Connection client
 */

import type { JsonObject, JsonPrimitive, JsonValue } from '../models/types.js';

/**
 * Check that a JSON value is a plain object (not an array or null).
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A JSON primitive passes through; objects, arrays and absent values become null.
 */
export function asPrimitive(value: JsonValue | undefined): JsonPrimitive {
  if (value === undefined || (typeof value === 'object' && value !== null)) return null;
  return value;
}

/**
 * Singular noun for a module name, used in log lines ("assets" -> "asset").
 */
export function singularModule(module: string): string {
  return module.endsWith('s') ? module.slice(0, -1) : module;
}

/**
 * Encode a username/password pair for an HTTP Basic Authorization header.
 */
export function basicAuthHeader(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`, 'utf8').toString('base64')}`;
}
