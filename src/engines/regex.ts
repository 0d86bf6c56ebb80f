import { aggregateSpans } from "../aggregator.js";
import type { RawSpan, Recognizer } from "../types.js";

interface PatternDef {
  entityType: string;
  pattern: RegExp;
  score: number;
  validate?: (match: string) => boolean;
}

function digitsOf(value: string): string {
  return value.replace(/\D/g, "");
}

export function luhnValid(value: string): boolean {
  const digits = digitsOf(value);
  if (digits.length < 13 || digits.length > 19) return false;

  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

export function ibanValid(value: string): boolean {
  const compact = value.replace(/\s/g, "").toUpperCase();
  if (!/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/.test(compact)) return false;

  const rearranged = compact.slice(4) + compact.slice(0, 4);
  let remainder = 0;
  for (const char of rearranged) {
    const code = char.charCodeAt(0);
    const chunk = code >= 65 ? String(code - 55) : char;
    for (const digit of chunk) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder === 1;
}

// Several phone shapes overlap on purpose; the longest match of each
// entity type wins once all patterns have run.
const PATTERNS: PatternDef[] = [
  {
    entityType: "PHONE_NUMBER",
    pattern: /(?<![\w+])(?:\+\d{1,3}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/g,
    score: 1.0,
  },
  {
    entityType: "PHONE_NUMBER",
    pattern: /(?<![\w+])(?:\+30[\s-]?)?(?:2\d{9}|69\d{8})(?!\d)/g,
    score: 1.0,
  },
  {
    entityType: "EMAIL_ADDRESS",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    score: 1.0,
  },
  {
    entityType: "IBAN_CODE",
    pattern: /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){2,7}(?: ?[A-Z0-9]{1,4})?\b/g,
    score: 1.0,
    validate: ibanValid,
  },
  {
    entityType: "CREDIT_CARD",
    pattern: /\b(?:\d[ -]?){12,18}\d\b/g,
    score: 1.0,
    validate: luhnValid,
  },
];

/**
 * Pattern recognizer for structured identifiers. Runs synchronously and
 * needs no initialization.
 */
export class RegexEngine implements Recognizer {
  readonly id = "regex";
  readonly supportedEntities: readonly string[] = [
    ...new Set(PATTERNS.map((def) => def.entityType)),
  ];

  analyze(text: string, entities: readonly string[] = this.supportedEntities): RawSpan[] {
    if (!text) return [];

    const byType = new Map<string, RawSpan[]>();
    for (const def of PATTERNS) {
      if (!entities.includes(def.entityType)) continue;

      for (const match of text.matchAll(def.pattern)) {
        if (match.index === undefined) continue;
        if (def.validate && !def.validate(match[0])) continue;

        const spans = byType.get(def.entityType) ?? [];
        spans.push({
          entity_type: def.entityType,
          start: match.index,
          end: match.index + match[0].length,
          score: def.score,
          source_id: this.id,
        });
        byType.set(def.entityType, spans);
      }
    }

    return [...byType.values()].flatMap((spans) => aggregateSpans(spans));
  }
}
