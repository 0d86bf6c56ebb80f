/**
 * Span aggregation: turns the raw detections of one or more recognizers
 * for a single text unit into one canonical span set.
 *
 * Only strict containment is resolved here. Two spans that partially
 * overlap both survive, and the substitution step decides between them.
 */

import { isPlaceholderType } from "./placeholders.js";
import { RawSpanSchema, describeZodError } from "./schemas.js";
import { canonicalType } from "./types.js";
import type { ResolvedSpan } from "./types.js";

export interface SpanLike {
  start: number;
  end: number;
  score: number;
}

export interface RejectedSpan {
  span: unknown;
  reason: string;
}

export interface ValidatedSpans {
  accepted: ResolvedSpan[];
  rejected: RejectedSpan[];
}

/**
 * Check raw detector output against the text it was produced for.
 * Malformed spans are rejected individually; the rest keep their input
 * order and receive a `span-<n>` id.
 */
export function validateSpans(text: string, spans: readonly unknown[]): ValidatedSpans {
  const accepted: ResolvedSpan[] = [];
  const rejected: RejectedSpan[] = [];

  spans.forEach((span, index) => {
    const parsed = RawSpanSchema.safeParse(span);
    if (!parsed.success) {
      rejected.push({ span, reason: describeZodError(parsed.error) });
      return;
    }

    const { entity_type, start, end, score, source_id } = parsed.data;
    if (end > text.length) {
      rejected.push({
        span,
        reason: `end ${end} is beyond the text length ${text.length}`,
      });
      return;
    }

    const canonical = canonicalType(entity_type);
    if (!isPlaceholderType(canonical)) {
      rejected.push({
        span,
        reason: `entity_type "${entity_type}" does not canonicalize to an upper-snake name`,
      });
      return;
    }

    accepted.push({
      id: `span-${index}`,
      entity_type: canonical,
      start,
      end,
      score,
      source_id,
    });
  });

  return { accepted, rejected };
}

function compareByOffsets(a: SpanLike, b: SpanLike): number {
  if (a.start !== b.start) return a.start - b.start;
  return a.end - b.end;
}

function spanLength(span: SpanLike): number {
  return span.end - span.start;
}

/**
 * Merge detections into a longest-match-wins span set:
 *
 * 1. spans with identical offsets collapse to one (highest score, first seen on a tie),
 *    whatever recognizer or entity type produced them;
 * 2. a span fully contained in a strictly longer span is dropped;
 * 3. survivors are sorted by (start, end).
 */
export function aggregateSpans<T extends SpanLike>(spans: readonly T[]): T[] {
  const byOffsets = new Map<string, T>();
  for (const span of spans) {
    const key = `${span.start}:${span.end}`;
    const existing = byOffsets.get(key);
    if (!existing || span.score > existing.score) {
      byOffsets.set(key, span);
    }
  }

  const unique = [...byOffsets.values()];
  const survivors = unique.filter(
    (candidate) =>
      !unique.some(
        (other) =>
          other !== candidate &&
          other.start <= candidate.start &&
          other.end >= candidate.end &&
          spanLength(other) > spanLength(candidate),
      ),
  );

  return survivors.sort(compareByOffsets);
}

export function spansOverlap(a: SpanLike, b: SpanLike): boolean {
  return a.start < b.end && b.start < a.end;
}
