import type { AnonymizerConfig, Logger, RawSpan, Recognizer } from "./types.js";
import { canonicalType } from "./types.js";

type AllowlistPatternCache = {
  values: Set<string>;
  patterns: RegExp[];
  entityValues: Map<string, Set<string>>;
};

export interface ScanResult {
  spans: RawSpan[];
  text: string;
}

function normalizeAllowlistValue(value: string): string {
  return value.trim().toLowerCase();
}

function buildPatternMaps(value: string[] | undefined): RegExp[] {
  if (!value || value.length === 0) {
    return [];
  }

  return value.map((pattern) => new RegExp(pattern, "i"));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs the configured recognizers over a text unit and applies the
 * detection policy (entity list, confidence thresholds, allowlist).
 * Overlaps and duplicates are left for the span aggregator.
 */
export class Scanner {
  private recognizers: Recognizer[];
  private available = new Set<string>();
  private config: AnonymizerConfig;
  private allowlist: AllowlistPatternCache;
  private entities: Set<string>;
  private logger: Logger;

  constructor(config: AnonymizerConfig, recognizers: Recognizer[], logger: Logger = console) {
    this.config = config;
    this.recognizers = recognizers;
    this.logger = logger;
    this.entities = new Set(config.entities.map((entity) => canonicalType(entity)));
    this.allowlist = this.buildAllowlistCache(config.allowlist);

    for (const recognizer of recognizers) {
      if (!recognizer.initialize) this.available.add(recognizer.id);
    }
  }

  async initialize(): Promise<void> {
    for (const recognizer of this.recognizers) {
      if (!recognizer.initialize || this.available.has(recognizer.id)) continue;

      try {
        await recognizer.initialize();
        this.available.add(recognizer.id);
      } catch (err) {
        this.logger.warn(
          `[spanveil] Recognizer "${recognizer.id}" failed to initialize, continuing without it: ${errorMessage(err)}`,
        );
      }
    }
  }

  async scan(text: string): Promise<ScanResult> {
    if (!text) return { spans: [], text };

    const spans: RawSpan[] = [];
    for (const recognizer of this.recognizers) {
      if (!this.available.has(recognizer.id)) continue;

      const requested = recognizer.supportedEntities
        .map((entity) => canonicalType(entity))
        .filter((entity) => this.entities.has(entity));
      if (requested.length === 0) continue;

      try {
        const detected = await recognizer.analyze(text, requested);
        spans.push(...this.applyPolicy(text, detected, recognizer.id));
      } catch (err) {
        this.logger.warn(
          `[spanveil] Recognizer "${recognizer.id}" failed, using the remaining recognizers: ${errorMessage(err)}`,
        );
      }
    }

    return { spans, text };
  }

  isAvailable(recognizerId: string): boolean {
    return this.available.has(recognizerId);
  }

  private applyPolicy(text: string, detected: RawSpan[], recognizerId: string): RawSpan[] {
    return detected
      .map((span) => ({
        ...span,
        entity_type: canonicalType(span.entity_type),
        source_id: span.source_id || recognizerId,
      }))
      .filter((span) => this.entities.has(span.entity_type))
      .filter((span) => span.score >= this.getThresholdForLabel(span.entity_type))
      .filter((span) => !this.shouldAllowlist(span.entity_type, text.slice(span.start, span.end)));
  }

  private shouldAllowlist(entityType: string, value: string): boolean {
    const normalizedText = normalizeAllowlistValue(value);

    if (this.allowlist.values.has(normalizedText)) {
      return true;
    }

    if (this.allowlist.patterns.some((pattern) => pattern.test(value))) {
      return true;
    }

    const entityValues = this.allowlist.entityValues.get(entityType);
    if (entityValues && entityValues.has(normalizedText)) {
      return true;
    }

    return false;
  }

  private getThresholdForLabel(label: string): number {
    return this.config.entityConfidenceThresholds[label] ?? this.config.confidence_threshold;
  }

  private buildAllowlistCache(allowlist: AnonymizerConfig["allowlist"]): AllowlistPatternCache {
    const globalValues = new Set(
      allowlist.values.map((value) => normalizeAllowlistValue(value)),
    );

    const globalPatterns = buildPatternMaps(allowlist.patterns);

    const entityValues = new Map<string, Set<string>>();
    for (const [entityType, values] of Object.entries(allowlist.entities)) {
      const canonical = canonicalType(entityType);
      const uniqueValues = values
        .map((value) => normalizeAllowlistValue(value))
        .filter((value) => value.length > 0);
      entityValues.set(canonical, new Set(uniqueValues));
    }

    return {
      values: globalValues,
      patterns: globalPatterns,
      entityValues,
    };
  }
}
