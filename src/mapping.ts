/**
 * Session-scoped reversible mapping between original values and counter
 * placeholders. The mapping is append-only: a value keeps its placeholder
 * for the whole session and indices are never reused.
 */

import { MappingNotFoundError } from "./errors.js";
import { formatPlaceholder, parsePlaceholder } from "./placeholders.js";
import { SerializedMappingEntriesSchema, describeZodError } from "./schemas.js";
import type { EntityMapping, SerializedMapping } from "./types.js";

export function createMapping(): EntityMapping {
  return new Map();
}

function nextIndex(placeholders: Iterable<string>): number {
  let highest = -1;
  for (const placeholder of placeholders) {
    const parsed = parsePlaceholder(placeholder);
    if (parsed?.index != null && parsed.index > highest) {
      highest = parsed.index;
    }
  }
  return highest + 1;
}

/**
 * Return the placeholder for `value`, assigning `{{TYPE_N}}` on first sight.
 * N starts at 0 per entity type and is one above the highest index in use.
 */
export function anonymizeValue(value: string, entityType: string, mapping: EntityMapping): string {
  let byValue = mapping.get(entityType);
  if (!byValue) {
    byValue = new Map();
    mapping.set(entityType, byValue);
  }

  const existing = byValue.get(value);
  if (existing !== undefined) return existing;

  const placeholder = formatPlaceholder(entityType, nextIndex(byValue.values()));
  byValue.set(value, placeholder);
  return placeholder;
}

export function deanonymizeValue(
  placeholder: string,
  entityType: string,
  mapping: EntityMapping,
): string {
  const byValue = mapping.get(entityType);
  if (!byValue) {
    throw new MappingNotFoundError(entityType);
  }

  for (const [original, candidate] of byValue) {
    if (candidate === placeholder) return original;
  }

  throw new MappingNotFoundError(entityType, placeholder);
}

export function serializeMapping(mapping: EntityMapping): SerializedMapping {
  const serialized: SerializedMapping = {};
  for (const [entityType, byValue] of mapping) {
    serialized[entityType] = Object.fromEntries(byValue);
  }
  return serialized;
}

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deserializeMapping(value: unknown): EntityMapping {
  if (!isPlainObject(value)) {
    throw new Error("Invalid entity mapping: expected an object of entity types");
  }

  const parsed = SerializedMappingEntriesSchema.safeParse(
    Object.entries(value).map(([entityType, byValue]: [string, unknown]) => [
      entityType,
      isPlainObject(byValue) ? Object.entries(byValue) : byValue,
    ]),
  );
  if (!parsed.success) {
    throw new Error(`Invalid entity mapping: ${describeZodError(parsed.error)}`);
  }

  const mapping: EntityMapping = new Map();
  for (const [entityType, byValue] of parsed.data) {
    mapping.set(entityType, new Map(byValue));
  }
  return mapping;
}
