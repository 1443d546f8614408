/**
 * Type Guards
 *
 * Runtime type checking utilities for webservice payloads.
 */

import type { AttributeValue } from "./types";

// =============================================================================
// Basic Type Guards
// =============================================================================

/**
 * Checks if a value is a non-null, non-array object.
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Directory Payload Type Guards
// =============================================================================

/**
 * Checks if a value is a single LDAP value or a list of them.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (typeof value === "string") return true;
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Whether the server gave anything back. `null`, `undefined`, `false`, `""`, `[]` and `{}` count as nothing.
 */
export function isEmptyResult(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Renders an error payload or an `errors` entry as text.
 */
export function describePayload(payload: unknown): string {
  if (typeof payload === "string") return payload;
  if (isObject(payload) && typeof payload["message"] === "string") return payload["message"];
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
