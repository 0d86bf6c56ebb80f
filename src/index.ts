export { Anonymizer } from "./anonymizer.js";
export type { AnonymizerOptions } from "./anonymizer.js";
export { loadConfig, DEFAULT_CONFIG } from "./config.js";
export { Scanner } from "./scanner.js";
export type { ScanResult } from "./scanner.js";
export { RegexEngine, ibanValid, luhnValid } from "./engines/regex.js";
export { aggregateSpans, validateSpans } from "./aggregator.js";
export type { RejectedSpan, ValidatedSpans } from "./aggregator.js";
export {
  anonymizeValue,
  createMapping,
  deanonymizeValue,
  deserializeMapping,
  serializeMapping,
} from "./mapping.js";
export { createOperator } from "./operators.js";
export type { Operator } from "./operators.js";
export { deanonymizeText, substitute } from "./codec.js";
export type { SubstitutionResult } from "./codec.js";
export {
  findPlaceholders,
  formatPlaceholder,
  parsePlaceholder,
  stripPlaceholderIndices,
} from "./placeholders.js";
export { alignEntities, alignPlaceholders, DEFAULT_CONTEXT_WINDOW } from "./alignment.js";
export type { AlignedEntity, AlignmentOptions, MaskedEntity } from "./alignment.js";
export {
  anonymizeParagraph,
  anonymizeText,
  assembleSpans,
  deanonymizeRecord,
  splitParagraphs,
} from "./pipeline.js";
export type { AssembledSpan, Detect, ParagraphOptions } from "./pipeline.js";
export { MappingNotFoundError } from "./errors.js";
export { canonicalType } from "./types.js";
export type {
  AnonymizationMode,
  AnonymizationRecord,
  AnonymizerConfig,
  EntityAllowlist,
  EntityMapping,
  IrreversibleRecord,
  IrreversibleSpanRecord,
  Logger,
  OperatorConfig,
  OperatorName,
  PipelineIssue,
  RawSpan,
  Recognizer,
  ResolvedSpan,
  ReversibleRecord,
  ReversibleSpanRecord,
  SerializedMapping,
  SubstitutionItem,
} from "./types.js";
