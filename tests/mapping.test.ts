import { describe, it, expect } from "vitest";

import { MappingNotFoundError } from "../src/errors.js";
import {
  anonymizeValue,
  createMapping,
  deanonymizeValue,
  deserializeMapping,
  serializeMapping,
} from "../src/mapping.js";

describe("anonymizeValue", () => {
  it("memoizes values per entity type", () => {
    const mapping = createMapping();

    expect(anonymizeValue("Γιάννης", "PERSON", mapping)).toBe("{{PERSON_0}}");
    expect(anonymizeValue("Γιάννης", "PERSON", mapping)).toBe("{{PERSON_0}}");
    expect(anonymizeValue("Μαρία", "PERSON", mapping)).toBe("{{PERSON_1}}");
    expect(anonymizeValue("Αθήνα", "LOCATION", mapping)).toBe("{{LOCATION_0}}");
  });

  it("keeps counters independent across entity types", () => {
    const mapping = createMapping();

    anonymizeValue("Αθήνα", "LOCATION", mapping);
    anonymizeValue("Πάτρα", "LOCATION", mapping);
    expect(anonymizeValue("Γιάννης", "PERSON", mapping)).toBe("{{PERSON_0}}");
  });

  it("continues from the highest index already in the mapping", () => {
    const mapping = deserializeMapping({ PERSON: { Νίκος: "{{PERSON_4}}", Ελένη: "{{PERSON_1}}" } });
    expect(anonymizeValue("Κώστας", "PERSON", mapping)).toBe("{{PERSON_5}}");
  });

  it("treats the same text under two entity types as two entries", () => {
    const mapping = createMapping();

    expect(anonymizeValue("Ζωή", "PERSON", mapping)).toBe("{{PERSON_0}}");
    expect(anonymizeValue("Ζωή", "LOCATION", mapping)).toBe("{{LOCATION_0}}");
  });
});

describe("deanonymizeValue", () => {
  it("returns the original value for a known placeholder", () => {
    const mapping = createMapping();
    anonymizeValue("Γιάννης", "PERSON", mapping);
    anonymizeValue("Μαρία", "PERSON", mapping);

    expect(deanonymizeValue("{{PERSON_1}}", "PERSON", mapping)).toBe("Μαρία");
  });

  it("throws MappingNotFoundError for an entity type never seen", () => {
    const mapping = createMapping();
    anonymizeValue("Γιάννης", "PERSON", mapping);

    expect(() => deanonymizeValue("{{LOCATION_0}}", "LOCATION", mapping)).toThrow(MappingNotFoundError);
    expect(() => deanonymizeValue("{{LOCATION_0}}", "LOCATION", mapping)).toThrow(
      'No mapping recorded for entity type "LOCATION".',
    );
  });

  it("throws MappingNotFoundError for an unknown placeholder", () => {
    const mapping = createMapping();
    anonymizeValue("Γιάννης", "PERSON", mapping);

    let caught: unknown;
    try {
      deanonymizeValue("{{PERSON_7}}", "PERSON", mapping);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MappingNotFoundError);
    expect(caught).toMatchObject({ entityType: "PERSON", placeholder: "{{PERSON_7}}" });
  });

  it("does not modify the mapping", () => {
    const mapping = createMapping();
    anonymizeValue("Γιάννης", "PERSON", mapping);
    const before = serializeMapping(mapping);

    deanonymizeValue("{{PERSON_0}}", "PERSON", mapping);
    expect(serializeMapping(mapping)).toEqual(before);
  });
});

describe("mapping serialization", () => {
  it("serializes to nested records and back", () => {
    const mapping = createMapping();
    anonymizeValue("Γιάννης", "PERSON", mapping);
    anonymizeValue("gp@example.com", "EMAIL_ADDRESS", mapping);

    const serialized = serializeMapping(mapping);
    expect(serialized).toEqual({
      PERSON: { Γιάννης: "{{PERSON_0}}" },
      EMAIL_ADDRESS: { "gp@example.com": "{{EMAIL_ADDRESS_0}}" },
    });
    expect(deanonymizeValue("{{EMAIL_ADDRESS_0}}", "EMAIL_ADDRESS", deserializeMapping(serialized))).toBe(
      "gp@example.com",
    );
  });

  it("keeps values that collide with object keys such as __proto__", () => {
    const mapping = createMapping();
    anonymizeValue("__proto__", "PERSON", mapping);
    anonymizeValue("constructor", "PERSON", mapping);

    const restored = deserializeMapping(JSON.parse(JSON.stringify(serializeMapping(mapping))));

    expect(deanonymizeValue("{{PERSON_0}}", "PERSON", restored)).toBe("__proto__");
    expect(deanonymizeValue("{{PERSON_1}}", "PERSON", restored)).toBe("constructor");
    expect(anonymizeValue("Μαρία", "PERSON", restored)).toBe("{{PERSON_2}}");
  });

  it("rejects malformed serialized mappings", () => {
    expect(() => deserializeMapping({ PERSON: { Γιάννης: 3 } })).toThrow(/^Invalid entity mapping: /);
    expect(() => deserializeMapping(["PERSON"])).toThrow(/^Invalid entity mapping: /);
    expect(() => deserializeMapping({ PERSON: ["Γιάννης"] })).toThrow(/^Invalid entity mapping: /);
    expect(() => deserializeMapping(null)).toThrow(/^Invalid entity mapping: /);
  });
});
