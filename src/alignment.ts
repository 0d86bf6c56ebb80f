/**
 * Recovers original-text offsets for entities whose positions are only
 * known in a masked text, e.g. after a masker rewrote `{{PERSON_3}}` as
 * `{{PERSON}}` and offset bookkeeping no longer lines up.
 *
 * Each entity is anchored on the literal text around it. This is a
 * heuristic: when the same context repeats, the first occurrence after the
 * cursor wins, which may not be the right one.
 */

import { PLACEHOLDER_CLOSE, PLACEHOLDER_OPEN, findPlaceholders } from "./placeholders.js";
import type { Logger } from "./types.js";

export const DEFAULT_CONTEXT_WINDOW = 20;

export interface MaskedEntity {
  entity_type: string;
  /** Offsets into the masked text. */
  start: number;
  end: number;
  span_id?: string;
}

interface AlignedBase {
  entity_type: string;
  masked_start: number;
  masked_end: number;
  masked_entity_value: string;
  span_id?: string;
}

export type AlignedEntity =
  | (AlignedBase & {
      status: "resolved";
      strategy: "context" | "token";
      start_position: number;
      end_position: number;
      entity_value: string;
    })
  | (AlignedBase & { status: "unresolved" });

export interface AlignmentOptions {
  contextWindow?: number;
  logger?: Logger;
}

interface Range {
  start: number;
  end: number;
}

interface EntityContext {
  before: string;
  after: string;
  /** Nothing but the end of the masked text follows the "after" context. */
  reachesEnd: boolean;
  /** Another placeholder ends exactly where this entity starts. */
  followsPlaceholder: boolean;
}

/**
 * Literal text around [start, end), at most `window` characters on each
 * side and cut at the nearest neighbouring placeholder so that no
 * delimiter or placeholder name ends up in the context.
 */
function extractContext(masked: string, start: number, end: number, window: number): EntityContext {
  const previousClose = start >= PLACEHOLDER_CLOSE.length
    ? masked.lastIndexOf(PLACEHOLDER_CLOSE, start - PLACEHOLDER_CLOSE.length)
    : -1;
  const beforeFrom = Math.max(
    start - window,
    previousClose >= 0 ? previousClose + PLACEHOLDER_CLOSE.length : 0,
  );

  const nextOpen = masked.indexOf(PLACEHOLDER_OPEN, end);
  const afterTo = Math.min(end + window, nextOpen >= 0 ? nextOpen : masked.length);

  return {
    before: masked.slice(beforeFrom, start),
    after: masked.slice(end, afterTo),
    reachesEnd: afterTo === masked.length,
    followsPlaceholder:
      previousClose >= 0 && previousClose + PLACEHOLDER_CLOSE.length === start,
  };
}

function anchorByContext(original: string, context: EntityContext, cursor: number): Range | null {
  const { before, after, reachesEnd } = context;

  const beforePos = before ? original.indexOf(before, cursor) : cursor;
  if (beforePos < 0) return null;
  const start = beforePos + before.length;

  let end: number;
  if (after) {
    end = original.indexOf(after, start);
    if (end < 0) return null;
  } else if (reachesEnd) {
    end = original.length;
  } else {
    return null;
  }

  return end > start ? { start, end } : null;
}

function tokens(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

function anchorByTokens(original: string, context: EntityContext, cursor: number): Range | null {
  const beforeTokens = tokens(context.before);
  const afterTokens = tokens(context.after);

  let start = cursor;
  const lastBefore = beforeTokens[beforeTokens.length - 1];
  if (lastBefore !== undefined) {
    const pos = original.indexOf(lastBefore, cursor);
    if (pos < 0) return null;
    start = pos + lastBefore.length;
  }

  let end: number;
  const firstAfter = afterTokens[0];
  if (firstAfter !== undefined) {
    end = original.indexOf(firstAfter, start);
    if (end < 0) return null;
  } else if (context.reachesEnd) {
    end = original.length;
  } else {
    return null;
  }

  while (start < end && /\s/.test(original[start])) start++;
  while (end > start && /\s/.test(original[end - 1])) end--;

  return end > start ? { start, end } : null;
}

export function alignEntities(
  original: string,
  masked: string,
  entities: readonly MaskedEntity[],
  options: AlignmentOptions = {},
): AlignedEntity[] {
  const window = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
  const ordered = [...entities].sort((a, b) => a.start - b.start || a.end - b.end);

  let cursor = 0;
  return ordered.map((entity): AlignedEntity => {
    const base: AlignedBase = {
      entity_type: entity.entity_type,
      masked_start: entity.start,
      masked_end: entity.end,
      masked_entity_value: masked.slice(entity.start, entity.end),
      ...(entity.span_id !== undefined ? { span_id: entity.span_id } : {}),
    };

    const context = extractContext(masked, entity.start, entity.end, window);

    // Directly after another placeholder there is no literal to anchor on,
    // and the cursor does not mark where that placeholder's text ended.
    let strategy: "context" | "token" = "context";
    let range = context.followsPlaceholder ? null : anchorByContext(original, context, cursor);
    if (!range && !context.followsPlaceholder) {
      strategy = "token";
      range = anchorByTokens(original, context, cursor);
    }

    if (!range) {
      options.logger?.warn(
        `[spanveil] Could not align ${entity.entity_type} at masked offsets ${entity.start}-${entity.end}; emitting it unresolved`,
      );
      return { ...base, status: "unresolved" };
    }

    cursor = range.end;
    return {
      ...base,
      status: "resolved",
      strategy,
      start_position: range.start,
      end_position: range.end,
      entity_value: original.slice(range.start, range.end),
    };
  });
}

/** Align every `{{...}}` placeholder found in `masked` against `original`. */
export function alignPlaceholders(
  original: string,
  masked: string,
  options: AlignmentOptions = {},
): AlignedEntity[] {
  const entities = findPlaceholders(masked).map((occurrence) => ({
    entity_type: occurrence.entityType,
    start: occurrence.start,
    end: occurrence.end,
  }));
  return alignEntities(original, masked, entities, options);
}
