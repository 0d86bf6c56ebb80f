import { describe, it, expect } from "vitest";

import { deanonymizeText, substitute } from "../src/codec.js";
import { MappingNotFoundError } from "../src/errors.js";
import { createMapping } from "../src/mapping.js";
import { createOperator } from "../src/operators.js";
import type { OperatorConfig, ResolvedSpan, ReversibleSpanRecord } from "../src/types.js";

function resolved(id: number, entityType: string, start: number, end: number): ResolvedSpan {
  return { id: `span-${id}`, entity_type: entityType, start, end, score: 1, source_id: "test" };
}

const counter = () => createOperator({ type: "counter" });

function toRecordSpans(
  text: string,
  spans: ResolvedSpan[],
  items: ReturnType<typeof substitute>["items"],
): ReversibleSpanRecord[] {
  return items.map((item) => {
    const span = spans.find((candidate) => candidate.id === item.span_id);
    if (!span) throw new Error(`no span for ${String(item.span_id)}`);
    return {
      entity_type: span.entity_type,
      entity_value: text.slice(span.start, span.end),
      masked_entity_value: item.text,
      start_position: span.start,
      end_position: span.end,
    };
  });
}

describe("substitute", () => {
  it("reuses the placeholder for a repeated value", () => {
    const text = "Γιάννης είπε. Γιάννης έφυγε.";
    const spans = [resolved(0, "PERSON", 0, 7), resolved(1, "PERSON", 14, 21)];

    const result = substitute(text, spans, counter, createMapping());

    expect(result.masked).toBe("{{PERSON_0}} είπε. {{PERSON_0}} έφυγε.");
    expect(result.items).toEqual([
      { span_id: "span-0", entity_type: "PERSON", start: 0, end: 12, text: "{{PERSON_0}}", operator: "counter" },
      { span_id: "span-1", entity_type: "PERSON", start: 19, end: 31, text: "{{PERSON_0}}", operator: "counter" },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it("assigns a new index to a different value of the same type", () => {
    const text = "Γιάννης είπε στη Μαρία: Γιάννης.";
    const spans = [
      resolved(0, "PERSON", 0, 7),
      resolved(1, "PERSON", 17, 22),
      resolved(2, "PERSON", 24, 31),
    ];

    const result = substitute(text, spans, counter, createMapping());

    expect(result.masked).toBe("{{PERSON_0}} είπε στη {{PERSON_1}}: {{PERSON_0}}.");
  });

  it("applies the operator configured for each entity type", () => {
    const text = "Τηλ 6936745127, email gp@example.com τώρα";
    const operators: Record<string, OperatorConfig> = {
      PHONE_NUMBER: { type: "replace", new_value: "<phone>" },
      EMAIL_ADDRESS: { type: "mask" },
    };
    const spans = [resolved(0, "PHONE_NUMBER", 4, 14), resolved(1, "EMAIL_ADDRESS", 22, 36)];

    const result = substitute(
      text,
      spans,
      (entityType) => createOperator(operators[entityType] ?? { type: "keep" }),
      createMapping(),
    );

    expect(result.masked).toBe("Τηλ <phone>, email ************** τώρα");
    expect(result.items.map(({ start, end, operator }) => [start, end, operator])).toEqual([
      [4, 11, "replace"],
      [19, 33, "mask"],
    ]);
  });

  it("uses the bare type name for the placeholder operator", () => {
    const text = "Ο Γιάννης πήγε στην Αθήνα.";
    const spans = [resolved(0, "PERSON", 2, 9), resolved(1, "LOCATION", 20, 25)];

    const result = substitute(text, spans, () => createOperator({ type: "placeholder" }), createMapping());

    expect(result.masked).toBe("Ο {{PERSON}} πήγε στην {{LOCATION}}.");
  });

  it("skips a span that partially overlaps an earlier one", () => {
    const text = "abcdefghijklmnop";
    const spans = [resolved(0, "PERSON", 0, 8), resolved(1, "LOCATION", 5, 12)];

    const result = substitute(text, spans, () => createOperator({ type: "placeholder" }), createMapping());

    expect(result.masked).toBe("{{PERSON}}ijklmnop");
    expect(result.items.map((item) => item.span_id)).toEqual(["span-0"]);
    expect(result.skipped.map((span) => span.id)).toEqual(["span-1"]);
  });

  it("returns the text unchanged without spans", () => {
    const result = substitute("καμία αναφορά", [], counter, createMapping());
    expect(result).toEqual({ masked: "καμία αναφορά", items: [], skipped: [] });
  });
});

describe("deanonymizeText", () => {
  const cases: Array<{ text: string; spans: ResolvedSpan[] }> = [
    {
      text: "Γιάννης είπε στη Μαρία: Γιάννης.",
      spans: [resolved(0, "PERSON", 0, 7), resolved(1, "PERSON", 17, 22), resolved(2, "PERSON", 24, 31)],
    },
    {
      text: "Τηλ 6936745127, email gp@example.com",
      spans: [resolved(0, "PHONE_NUMBER", 4, 14), resolved(1, "EMAIL_ADDRESS", 22, 36)],
    },
    {
      text: "ΑΒ",
      spans: [resolved(0, "PERSON", 0, 1), resolved(1, "LOCATION", 1, 2)],
    },
  ];

  for (const { text, spans } of cases) {
    it(`restores "${text}" exactly`, () => {
      const mapping = createMapping();
      const { masked, items } = substitute(text, spans, counter, mapping);

      expect(masked).not.toBe(text);
      expect(deanonymizeText(masked, toRecordSpans(text, spans, items), mapping)).toBe(text);
    });
  }

  it("rejects a masked text whose placeholders moved", () => {
    const text = "Γιάννης είπε στη Μαρία.";
    const spans = [resolved(0, "PERSON", 0, 7), resolved(1, "PERSON", 17, 22)];
    const mapping = createMapping();
    const { masked, items } = substitute(text, spans, counter, mapping);

    expect(() => deanonymizeText(`>${masked}`, toRecordSpans(text, spans, items), mapping)).toThrow(
      'Expected "{{PERSON_0}}" at masked offset 0, found ">{{PERSON_0"',
    );
  });

  it("propagates MappingNotFoundError for an entity type the mapping lacks", () => {
    const spans: ReversibleSpanRecord[] = [
      {
        entity_type: "LOCATION",
        entity_value: "Αθήνα",
        masked_entity_value: "{{LOCATION_0}}",
        start_position: 0,
        end_position: 5,
      },
    ];

    expect(() => deanonymizeText("{{LOCATION_0}}.", spans, createMapping())).toThrow(MappingNotFoundError);
  });
});
