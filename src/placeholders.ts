export const PLACEHOLDER_OPEN = "{{";
export const PLACEHOLDER_CLOSE = "}}";

const ENTITY_TYPE_PATTERN = /^[A-Z][A-Z0-9_]*$/;
const INDEXED_TOKEN = /^\{\{([A-Z][A-Z0-9_]*)_(0|[1-9]\d*)\}\}$/;
const BARE_TOKEN = /^\{\{([A-Z][A-Z0-9_]*)\}\}$/;
const ANY_TOKEN = /\{\{[A-Z][A-Z0-9_]*\}\}/g;
const INDEXED_TOKEN_GLOBAL = /\{\{([A-Z][A-Z0-9_]*)_(?:0|[1-9]\d*)\}\}/g;

export interface ParsedPlaceholder {
  entityType: string;
  index: number | null;
}

export interface PlaceholderOccurrence {
  token: string;
  entityType: string;
  index: number | null;
  start: number;
  end: number;
}

/** Whether `entityType` can appear inside a placeholder token. */
export function isPlaceholderType(entityType: string): boolean {
  return ENTITY_TYPE_PATTERN.test(entityType);
}

export function formatPlaceholder(entityType: string, index?: number): string {
  if (!isPlaceholderType(entityType)) {
    throw new Error(`Entity type "${entityType}" is not upper-snake-case`);
  }

  if (index === undefined) {
    return `${PLACEHOLDER_OPEN}${entityType}${PLACEHOLDER_CLOSE}`;
  }

  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`Placeholder index must be a non-negative integer, got ${index}`);
  }

  return `${PLACEHOLDER_OPEN}${entityType}_${index}${PLACEHOLDER_CLOSE}`;
}

/**
 * Parse a placeholder token. A trailing `_<digits>` is read as the index,
 * so an entity type that itself ends in digits cannot round-trip through
 * the indexed form.
 */
export function parsePlaceholder(token: string): ParsedPlaceholder | null {
  const indexed = INDEXED_TOKEN.exec(token);
  if (indexed) {
    return { entityType: indexed[1], index: Number(indexed[2]) };
  }

  const bare = BARE_TOKEN.exec(token);
  if (bare) {
    return { entityType: bare[1], index: null };
  }

  return null;
}

/** Every placeholder token in a masked text, in reading order. */
export function findPlaceholders(masked: string): PlaceholderOccurrence[] {
  const occurrences: PlaceholderOccurrence[] = [];
  for (const match of masked.matchAll(ANY_TOKEN)) {
    const parsed = parsePlaceholder(match[0]);
    if (!parsed || match.index === undefined) continue;
    occurrences.push({
      token: match[0],
      entityType: parsed.entityType,
      index: parsed.index,
      start: match.index,
      end: match.index + match[0].length,
    });
  }
  return occurrences;
}

/** `{{PERSON_3}}` → `{{PERSON}}`, the lossy form some downstream maskers emit. */
export function stripPlaceholderIndices(masked: string): string {
  return masked.replace(INDEXED_TOKEN_GLOBAL, `${PLACEHOLDER_OPEN}$1${PLACEHOLDER_CLOSE}`);
}
