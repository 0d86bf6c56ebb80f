import { spansOverlap } from "./aggregator.js";
import { deanonymizeValue } from "./mapping.js";
import type { Operator } from "./operators.js";
import type {
  EntityMapping,
  ResolvedSpan,
  ReversibleSpanRecord,
  SubstitutionItem,
} from "./types.js";

export interface SubstitutionResult {
  masked: string;
  items: SubstitutionItem[];
  /** Spans left untouched because they overlap an earlier span. */
  skipped: ResolvedSpan[];
}

interface Replacement {
  start: number;
  end: number;
  value: string;
}

function compareByOffsets(a: ResolvedSpan, b: ResolvedSpan): number {
  if (a.start !== b.start) return a.start - b.start;
  return a.end - b.end;
}

/**
 * Splice replacements into `text`. They are applied from the highest
 * start to the lowest so that no splice moves a range not yet replaced.
 */
function applyReplacements(text: string, replacements: readonly Replacement[]): string {
  const descending = [...replacements].sort((a, b) => b.start - a.start);
  let result = text;
  for (const { start, end, value } of descending) {
    result = result.slice(0, start) + value + result.slice(end);
  }
  return result;
}

/**
 * Replace each span with the output of its entity type's operator.
 *
 * Partial overlaps are settled greedily in (start, end) order: a span that
 * overlaps one already chosen is skipped and returned in `skipped`.
 * Operator values are computed in reading order, so counter indices follow
 * the text.
 */
export function substitute(
  text: string,
  spans: readonly ResolvedSpan[],
  operatorFor: (entityType: string) => Operator,
  mapping: EntityMapping,
): SubstitutionResult {
  const chosen: ResolvedSpan[] = [];
  const skipped: ResolvedSpan[] = [];

  for (const span of [...spans].sort(compareByOffsets)) {
    const last = chosen[chosen.length - 1];
    if (last && spansOverlap(last, span)) {
      skipped.push(span);
    } else {
      chosen.push(span);
    }
  }

  const replacements = chosen.map((span) => {
    const operator = operatorFor(span.entity_type);
    return {
      span,
      operator,
      value: operator.apply(text.slice(span.start, span.end), span.entity_type, mapping),
    };
  });

  const masked = applyReplacements(text, replacements.map(({ span, value }) => ({
    start: span.start,
    end: span.end,
    value,
  })));

  let shift = 0;
  const items: SubstitutionItem[] = replacements.map(({ span, operator, value }) => {
    const start = span.start + shift;
    shift += value.length - (span.end - span.start);
    return {
      span_id: span.id,
      entity_type: span.entity_type,
      start,
      end: start + value.length,
      text: value,
      operator: operator.name,
    };
  });

  return { masked, items, skipped };
}

/**
 * Rebuild the original text of a reversible record. Each span's masked
 * offset is derived from the original offsets of the spans before it, and
 * the placeholder found there must match the record.
 */
export function deanonymizeText(
  masked: string,
  spans: readonly ReversibleSpanRecord[],
  mapping: EntityMapping,
): string {
  const ordered = [...spans].sort((a, b) => a.start_position - b.start_position);

  let shift = 0;
  const replacements: Replacement[] = ordered.map((span) => {
    const start = span.start_position + shift;
    const end = start + span.masked_entity_value.length;
    shift += span.masked_entity_value.length - (span.end_position - span.start_position);

    const found = masked.slice(start, end);
    if (found !== span.masked_entity_value) {
      throw new Error(
        `Expected "${span.masked_entity_value}" at masked offset ${start}, found "${found}"`,
      );
    }

    return {
      start,
      end,
      value: deanonymizeValue(span.masked_entity_value, span.entity_type, mapping),
    };
  });

  return applyReplacements(masked, replacements);
}
