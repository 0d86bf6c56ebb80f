export interface RawSpan {
  entity_type: string;
  start: number;
  end: number;
  score: number;
  source_id: string;
}

/** A validated span carrying the identifier it keeps through every pipeline stage. */
export interface ResolvedSpan extends RawSpan {
  id: string;
}

export type AnonymizationMode = "irreversible" | "reversible";

export type OperatorName = "keep" | "replace" | "placeholder" | "counter" | "mask";

export type OperatorConfig =
  | { type: "keep" }
  | { type: "replace"; new_value: string }
  | { type: "placeholder"; new_value?: string }
  | { type: "counter" }
  | { type: "mask"; masking_char?: string };

/** entity_type → original value → placeholder */
export type EntityMapping = Map<string, Map<string, string>>;

export type SerializedMapping = Record<string, Record<string, string>>;

export interface SubstitutionItem {
  span_id?: string;
  entity_type: string;
  /** Offsets into the masked text. */
  start: number;
  end: number;
  text: string;
  operator: OperatorName;
}

export interface IrreversibleSpanRecord {
  entity_type: string;
  entity_value: string;
  start_position: number;
  end_position: number;
  operator: OperatorName;
}

export interface ReversibleSpanRecord {
  entity_type: string;
  entity_value: string;
  masked_entity_value: string;
  start_position: number;
  end_position: number;
}

export type PipelineIssue =
  | { kind: "invalid_span"; reason: string; span: unknown }
  | { kind: "overlap_skipped"; span_id: string; entity_type: string; start: number; end: number }
  | {
      kind: "span_correspondence_mismatch";
      resolved: number;
      substituted: number;
      unmatched_span_ids: string[];
    }
  | { kind: "alignment_unresolved"; entity_type: string; masked_start: number; masked_end: number };

export interface IrreversibleRecord {
  mode: "irreversible";
  full_text: string;
  masked: string;
  spans: IrreversibleSpanRecord[];
  issues: PipelineIssue[];
}

export interface ReversibleRecord {
  mode: "reversible";
  text: string;
  masked: string;
  spans: ReversibleSpanRecord[];
  entity_mapping: SerializedMapping;
  issues: PipelineIssue[];
}

export type AnonymizationRecord = IrreversibleRecord | ReversibleRecord;

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
}

export interface Recognizer {
  readonly id: string;
  readonly supportedEntities: readonly string[];
  initialize?(): Promise<void>;
  analyze(text: string, entities: readonly string[]): RawSpan[] | Promise<RawSpan[]>;
}

export interface EntityConfidenceThresholds {
  [entityType: string]: number;
}

export interface EntityAllowlist {
  values: string[];
  patterns: string[];
  entities: Record<string, string[]>;
}

export interface AnonymizerConfig {
  enabled: boolean;
  mode: AnonymizationMode;
  language: string;
  entities: string[];
  operators: Record<string, OperatorConfig>;
  defaultOperator: OperatorConfig;
  confidence_threshold: number;
  entityConfidenceThresholds: EntityConfidenceThresholds;
  allowlist: EntityAllowlist;
  shareMapping: boolean;
  contextWindow: number;
  auditEnabled: boolean;
}

export const CANONICAL_TYPE_MAP: Record<string, string> = {
  PER: "PERSON",
  ORG: "ORGANIZATION",
  GPE: "LOCATION",
  LOC: "LOCATION",
  FAC: "ADDRESS",
  PHONE: "PHONE_NUMBER",
  EMAIL: "EMAIL_ADDRESS",
  IBAN: "IBAN_CODE",
  CREDIT_CARD_NUMBER: "CREDIT_CARD",
};

/**
 * Upper-snake-case an entity label and fold known aliases onto one name,
 * so "phone", "Phone Number" and "PHONE" all land on PHONE_NUMBER.
 */
export function canonicalType(entityType: string): string {
  const normalized = entityType
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return CANONICAL_TYPE_MAP[normalized] ?? normalized;
}

export function resolveOperator(entityType: string, config: AnonymizerConfig): OperatorConfig {
  if (config.mode === "reversible") return { type: "counter" };
  return config.operators[entityType] ?? config.defaultOperator;
}
