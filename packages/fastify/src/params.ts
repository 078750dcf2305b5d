import {
  InvalidClientMetadataError,
  InvalidRequestError,
  isRecord,
} from '@dcrbridge/core';

/**
 * reads a single string parameter out of a query or body
 * @param source parsed query string, form or json body
 * @param name parameter name
 * @returns the value, or undefined when absent or empty
 * @throws {InvalidRequestError} when the parameter is repeated or not a string
 */
export function readParam(source: unknown, name: string): string | undefined {
  const value = isRecord(source) ? source[name] : undefined;
  if (value === undefined || value === '') {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${name} must be a single string`);
  }

  return value;
}

/**
 * reads a string array out of a registration body
 * @param source parsed json body
 * @param name field name
 * @returns the values, or undefined when absent
 * @throws {InvalidClientMetadataError} when the field is not an array of strings
 */
export function readStringList(
  source: unknown,
  name: string,
): string[] | undefined {
  const value = isRecord(source) ? source[name] : undefined;
  if (value === undefined) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidClientMetadataError(`${name} must be an array of strings`);
  }

  return value;
}

/**
 * reads an optional string field out of a registration body
 * @param source parsed json body
 * @param name field name
 * @returns the value, or undefined when absent
 * @throws {InvalidClientMetadataError} when the field is not a string
 */
export function readMetadataString(
  source: unknown,
  name: string,
): string | undefined {
  const value = isRecord(source) ? source[name] : undefined;
  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new InvalidClientMetadataError(`${name} must be a string`);
  }

  return value;
}
