import { describe, it, expect, vi } from "vitest";

import { alignEntities, alignPlaceholders } from "../src/alignment.js";

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn() };
}

describe("alignPlaceholders", () => {
  it("anchors each placeholder on the text around it", () => {
    const result = alignPlaceholders("Γιάννης πήγε στην Αθήνα.", "{{PERSON}} πήγε στην {{LOCATION}}.");

    expect(result).toEqual([
      {
        entity_type: "PERSON",
        masked_start: 0,
        masked_end: 10,
        masked_entity_value: "{{PERSON}}",
        status: "resolved",
        strategy: "context",
        start_position: 0,
        end_position: 7,
        entity_value: "Γιάννης",
      },
      {
        entity_type: "LOCATION",
        masked_start: 21,
        masked_end: 33,
        masked_entity_value: "{{LOCATION}}",
        status: "resolved",
        strategy: "context",
        start_position: 18,
        end_position: 23,
        entity_value: "Αθήνα",
      },
    ]);
  });

  it("resolves indexed placeholders the same way", () => {
    const result = alignPlaceholders("Ο Γιάννης είδε τη Μαρία.", "Ο {{PERSON_0}} είδε τη {{PERSON_1}}.");

    expect(result.map((entity) => (entity.status === "resolved" ? entity.entity_value : null))).toEqual([
      "Γιάννης",
      "Μαρία",
    ]);
  });

  it("falls back to token anchoring when whitespace differs", () => {
    const result = alignPlaceholders("Γιάννης  πήγε   στην Αθήνα.", "{{PERSON}} πήγε στην {{LOCATION}}.");

    expect(
      result.map((entity) =>
        entity.status === "resolved"
          ? [entity.strategy, entity.start_position, entity.end_position, entity.entity_value]
          : null,
      ),
    ).toEqual([
      ["token", 0, 7, "Γιάννης"],
      ["token", 21, 26, "Αθήνα"],
    ]);
  });

  it("uses a cursor so repeated context resolves in reading order", () => {
    const result = alignPlaceholders(
      "Ο Γιάννης είπε ναι. Ο Νίκος είπε ναι.",
      "Ο {{PERSON}} είπε ναι. Ο {{PERSON}} είπε ναι.",
    );

    expect(
      result.map((entity) =>
        entity.status === "resolved" ? [entity.start_position, entity.end_position, entity.entity_value] : null,
      ),
    ).toEqual([
      [2, 9, "Γιάννης"],
      [22, 27, "Νίκος"],
    ]);
  });

  it("matches the first repetition of a short context", () => {
    const original = "στην Αθήνα και στην Πάτρα";
    const masked = "στην Αθήνα και στην {{LOCATION}}";

    const [wide] = alignPlaceholders(original, masked);
    const [narrow] = alignPlaceholders(original, masked, { contextWindow: 5 });

    expect(wide.status === "resolved" && wide.entity_value).toBe("Πάτρα");
    expect(narrow.status === "resolved" && narrow.entity_value).toBe("Αθήνα και στην Πάτρα");
  });
});

describe("alignEntities", () => {
  it("emits adjacent placeholders as unresolved and warns for each", () => {
    const logger = makeLogger();
    const result = alignEntities(
      "Γιάννης Μαρία ήρθαν.",
      "{{PERSON}}{{PERSON}} ήρθαν.",
      [
        { entity_type: "PERSON", start: 0, end: 10, span_id: "span-0" },
        { entity_type: "PERSON", start: 10, end: 20, span_id: "span-1" },
      ],
      { logger },
    );

    expect(result[0]).toEqual({
      entity_type: "PERSON",
      masked_start: 0,
      masked_end: 10,
      masked_entity_value: "{{PERSON}}",
      span_id: "span-0",
      status: "unresolved",
    });
    expect(result[1]).toMatchObject({ status: "unresolved", span_id: "span-1", masked_start: 10, masked_end: 20 });
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "[spanveil] Could not align PERSON at masked offsets 0-10; emitting it unresolved",
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "[spanveil] Could not align PERSON at masked offsets 10-20; emitting it unresolved",
    );
  });

  it("processes entities in masked order whatever the input order", () => {
    const result = alignEntities("Γιάννης πήγε στην Αθήνα.", "{{PERSON}} πήγε στην {{LOCATION}}.", [
      { entity_type: "LOCATION", start: 21, end: 33 },
      { entity_type: "PERSON", start: 0, end: 10 },
    ]);

    expect(result.map((entity) => entity.entity_type)).toEqual(["PERSON", "LOCATION"]);
    expect(result.every((entity) => entity.status === "resolved")).toBe(true);
  });

  it("returns nothing for no entities", () => {
    expect(alignEntities("κείμενο", "κείμενο", [])).toEqual([]);
  });
});
