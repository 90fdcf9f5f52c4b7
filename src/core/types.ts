import type { JsonArray, JsonObject, JsonValue } from 'type-fest'

export type { JsonObject, JsonValue, JsonArray } from 'type-fest'

/**
 * Opaque Terraform module record: field name to JSON value. Undefined fields are dropped
 * when the record enters a document.
 * Only the fields this project reads (hostname, cluster linkage) are typed elsewhere.
 */
export type ModuleRecord = { [field: string]: JsonValue | undefined };

/**
 * Plain JSON object, not an array nor null
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON array, readonly ones included
 */
export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}
