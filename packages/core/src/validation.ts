/**
 * @module validation
 * @description Narrowing helpers for data read back from storage or received over the wire.
 */

import type { JsonObject, JsonValue } from '#types';

/**
 * checks if a value is a plain object
 * @param value value to check
 * @returns true when value is a non-null, non-array object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * checks if a value is an array of strings
 * @param value value to check
 * @returns true when every element is a string
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * checks if a value is undefined or a string
 * @param value value to check
 * @returns true for an absent or string value
 */
export function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * checks if a value is representable as json
 * @param value value to check
 * @returns true for json primitives, arrays and objects made of them
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : isJsonObject(value);
    default:
      return false;
  }
}

/**
 * checks if a value is a json object
 * @param value value to check
 * @returns true when value is an object whose members are all json
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

/**
 * parses stored json and narrows it with a guard
 * @param raw serialised value
 * @param guard shape check
 * @returns the typed value, or null when the text is not json or fails the guard
 */
export function parseJson<T>(
  raw: string,
  guard: (value: unknown) => value is T,
): T | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  return guard(parsed) ? parsed : null;
}

/**
 * splits a space-delimited scope string
 * @param scope scope parameter
 * @returns distinct scope tokens in order
 */
export function parseScope(scope: string | undefined): string[] {
  if (!scope) {
    return [];
  }

  return [...new Set(scope.split(' ').filter(Boolean))];
}
