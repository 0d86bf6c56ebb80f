import { alignPlaceholders, type AlignedEntity } from "./alignment.js";
import { loadConfig } from "./config.js";
import { RegexEngine } from "./engines/regex.js";
import { anonymizeParagraph, anonymizeText, deanonymizeRecord } from "./pipeline.js";
import { Scanner } from "./scanner.js";
import type {
  AnonymizationRecord,
  AnonymizerConfig,
  Logger,
  Recognizer,
  ReversibleRecord,
} from "./types.js";

export interface AnonymizerOptions {
  /** Defaults to the bundled regex recognizer alone. */
  recognizers?: Recognizer[];
  logger?: Logger;
}

/**
 * Entry point tying the recognizers to the paragraph pipeline.
 *
 * Every `anonymize` call is its own session: mappings are created per
 * paragraph (or once per call with `shareMapping`) and handed back on the
 * records, never kept here.
 */
export class Anonymizer {
  readonly config: AnonymizerConfig;
  private scanner: Scanner;
  private logger: Logger;

  constructor(overrides: Partial<AnonymizerConfig> = {}, options: AnonymizerOptions = {}) {
    this.config = loadConfig(overrides);
    this.logger = options.logger ?? console;
    this.scanner = new Scanner(
      this.config,
      options.recognizers ?? [new RegexEngine()],
      this.logger,
    );

    if (!this.config.enabled) {
      this.logger.info("[spanveil] Anonymization disabled via config; text passes through unmasked");
    }
  }

  initialize(): Promise<void> {
    return this.scanner.initialize();
  }

  async anonymize(text: string): Promise<AnonymizationRecord[]> {
    const detect = this.config.enabled
      ? async (paragraph: string) => (await this.scanner.scan(paragraph)).spans
      : () => [];

    const records = await anonymizeText(text, detect, {
      config: this.config,
      logger: this.logger,
    });

    if (this.config.auditEnabled) {
      this.logger.info(
        `[SPANVEIL AUDIT] text_anonymized ${JSON.stringify({
          paragraphs: records.length,
          totalSpans: records.reduce((total, record) => total + record.spans.length, 0),
          issues: records.reduce((total, record) => total + record.issues.length, 0),
        })}`,
      );
    }

    return records;
  }

  /** Anonymize one text unit against spans detected elsewhere. */
  anonymizeParagraph(text: string, spans: readonly unknown[]): AnonymizationRecord {
    return anonymizeParagraph(text, spans, { config: this.config, logger: this.logger });
  }

  deanonymize(record: ReversibleRecord): string {
    return deanonymizeRecord(record);
  }

  /** Recover original offsets for the placeholders of a masked text. */
  realign(original: string, masked: string): AlignedEntity[] {
    return alignPlaceholders(original, masked, {
      contextWindow: this.config.contextWindow,
      logger: this.logger,
    });
  }
}
