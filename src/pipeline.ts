/**
 * Paragraph pipeline: validate → aggregate → substitute → assemble, once
 * per non-blank paragraph.
 *
 * Substitution items are paired with the spans they came from by span id,
 * never by position. Items that carry no known id are located through the
 * alignment resolver, and anything that still cannot be placed is reported
 * on the record instead of being paired with the wrong span.
 */

import { aggregateSpans, validateSpans } from "./aggregator.js";
import { alignEntities } from "./alignment.js";
import { deanonymizeText, substitute } from "./codec.js";
import { createMapping, deserializeMapping, serializeMapping } from "./mapping.js";
import { createOperator, type Operator } from "./operators.js";
import { resolveOperator } from "./types.js";
import type {
  AnonymizationRecord,
  AnonymizerConfig,
  EntityMapping,
  Logger,
  OperatorName,
  PipelineIssue,
  ResolvedSpan,
  ReversibleRecord,
  SubstitutionItem,
} from "./types.js";

export interface ParagraphOptions {
  config: AnonymizerConfig;
  /** Pass a mapping to share placeholders across paragraphs; a fresh one is used otherwise. */
  mapping?: EntityMapping;
  logger?: Logger;
}

export interface AssembledSpan {
  entity_type: string;
  entity_value: string;
  masked_entity_value: string;
  start_position: number;
  end_position: number;
  operator: OperatorName;
}

export interface AssembleOptions {
  contextWindow?: number;
  logger?: Logger;
}

export type Detect = (paragraph: string) => readonly unknown[] | Promise<readonly unknown[]>;

export function splitParagraphs(text: string): string[] {
  return text
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line))
    .filter((line) => line.trim().length > 0);
}

/**
 * Pair substitution items with the resolved spans they replaced.
 */
export function assembleSpans(
  original: string,
  masked: string,
  resolved: readonly ResolvedSpan[],
  items: readonly SubstitutionItem[],
  options: AssembleOptions = {},
): { spans: AssembledSpan[]; issues: PipelineIssue[] } {
  const byId = new Map(resolved.map((span) => [span.id, span]));
  const matched = new Set<string>();
  const spans: AssembledSpan[] = [];
  const orphans: SubstitutionItem[] = [];
  const issues: PipelineIssue[] = [];

  for (const item of items) {
    const span = item.span_id !== undefined ? byId.get(item.span_id) : undefined;
    if (!span || matched.has(span.id)) {
      orphans.push(item);
      continue;
    }

    matched.add(span.id);
    spans.push({
      entity_type: span.entity_type,
      entity_value: original.slice(span.start, span.end),
      masked_entity_value: item.text,
      start_position: span.start,
      end_position: span.end,
      operator: item.operator,
    });
  }

  if (resolved.length !== items.length || orphans.length > 0) {
    const unmatched = resolved.filter((span) => !matched.has(span.id)).map((span) => span.id);
    issues.push({
      kind: "span_correspondence_mismatch",
      resolved: resolved.length,
      substituted: items.length,
      unmatched_span_ids: unmatched,
    });
    options.logger?.warn(
      `[spanveil] ${resolved.length} resolved span(s) but ${items.length} substitution(s); ${orphans.length} substitution(s) need alignment`,
    );
  }

  if (orphans.length > 0) {
    const aligned = alignEntities(
      original,
      masked,
      orphans.map((item) => ({ entity_type: item.entity_type, start: item.start, end: item.end })),
      { contextWindow: options.contextWindow, logger: options.logger },
    );
    const operatorAt = new Map(orphans.map((item) => [item.start, item.operator]));

    for (const entity of aligned) {
      if (entity.status === "unresolved") {
        issues.push({
          kind: "alignment_unresolved",
          entity_type: entity.entity_type,
          masked_start: entity.masked_start,
          masked_end: entity.masked_end,
        });
        continue;
      }

      spans.push({
        entity_type: entity.entity_type,
        entity_value: entity.entity_value,
        masked_entity_value: entity.masked_entity_value,
        start_position: entity.start_position,
        end_position: entity.end_position,
        operator: operatorAt.get(entity.masked_start) ?? "placeholder",
      });
    }
  }

  spans.sort((a, b) => a.start_position - b.start_position || a.end_position - b.end_position);
  return { spans, issues };
}

export function anonymizeParagraph(
  text: string,
  rawSpans: readonly unknown[],
  options: ParagraphOptions,
): AnonymizationRecord {
  const { config, logger } = options;
  const issues: PipelineIssue[] = [];

  const { accepted, rejected } = validateSpans(text, rawSpans);
  for (const { span, reason } of rejected) {
    issues.push({ kind: "invalid_span", reason, span });
    logger?.warn(`[spanveil] Rejected span: ${reason}`);
  }

  const resolved = aggregateSpans(accepted);
  const mapping = options.mapping ?? createMapping();

  const operators = new Map<string, Operator>();
  const operatorFor = (entityType: string): Operator => {
    let operator = operators.get(entityType);
    if (!operator) {
      operator = createOperator(resolveOperator(entityType, config));
      operators.set(entityType, operator);
    }
    return operator;
  };

  const { masked, items, skipped } = substitute(text, resolved, operatorFor, mapping);
  for (const span of skipped) {
    issues.push({
      kind: "overlap_skipped",
      span_id: span.id,
      entity_type: span.entity_type,
      start: span.start,
      end: span.end,
    });
    logger?.warn(
      `[spanveil] Skipped ${span.entity_type} at ${span.start}-${span.end}: overlaps an earlier span`,
    );
  }

  // Spans skipped for overlap are already reported and are not owed an item.
  const skippedIds = new Set(skipped.map((span) => span.id));
  const substituted = resolved.filter((span) => !skippedIds.has(span.id));

  const assembled = assembleSpans(text, masked, substituted, items, {
    contextWindow: config.contextWindow,
    logger,
  });
  issues.push(...assembled.issues);

  if (config.auditEnabled && logger) {
    logger.info(
      `[SPANVEIL AUDIT] paragraph_anonymized ${JSON.stringify({
        mode: config.mode,
        totalSpans: assembled.spans.length,
        labels: [...new Set(assembled.spans.map((span) => span.entity_type))],
        issues: issues.length,
      })}`,
    );
  }

  if (config.mode === "reversible") {
    return {
      mode: "reversible",
      text,
      masked,
      spans: assembled.spans.map((span) => ({
        entity_type: span.entity_type,
        entity_value: span.entity_value,
        masked_entity_value: span.masked_entity_value,
        start_position: span.start_position,
        end_position: span.end_position,
      })),
      entity_mapping: serializeMapping(mapping),
      issues,
    };
  }

  return {
    mode: "irreversible",
    full_text: text,
    masked,
    spans: assembled.spans.map((span) => ({
      entity_type: span.entity_type,
      entity_value: span.entity_value,
      start_position: span.start_position,
      end_position: span.end_position,
      operator: span.operator,
    })),
    issues,
  };
}

/**
 * Anonymize every non-blank paragraph of `text`. Paragraphs are detected
 * one after another; with `shareMapping` they also share one mapping.
 */
export async function anonymizeText(
  text: string,
  detect: Detect,
  options: Omit<ParagraphOptions, "mapping">,
): Promise<AnonymizationRecord[]> {
  const shared = options.config.shareMapping ? createMapping() : undefined;
  const records: AnonymizationRecord[] = [];

  for (const paragraph of splitParagraphs(text)) {
    const spans = await detect(paragraph);
    records.push(anonymizeParagraph(paragraph, spans, { ...options, mapping: shared }));
  }

  return records;
}

export function deanonymizeRecord(record: ReversibleRecord): string {
  return deanonymizeText(record.masked, record.spans, deserializeMapping(record.entity_mapping));
}
