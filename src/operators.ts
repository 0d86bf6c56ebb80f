import { anonymizeValue } from "./mapping.js";
import { formatPlaceholder } from "./placeholders.js";
import type { EntityMapping, OperatorConfig, OperatorName } from "./types.js";

export interface Operator {
  readonly name: OperatorName;
  apply(value: string, entityType: string, mapping: EntityMapping): string;
}

const keep: Operator = {
  name: "keep",
  apply: (value) => value,
};

const counter: Operator = {
  name: "counter",
  apply: (value, entityType, mapping) => anonymizeValue(value, entityType, mapping),
};

export function createOperator(config: OperatorConfig): Operator {
  switch (config.type) {
    case "keep":
      return keep;
    case "counter":
      return counter;
    case "replace": {
      const newValue = config.new_value;
      return { name: "replace", apply: () => newValue };
    }
    case "placeholder": {
      const newValue = config.new_value;
      return {
        name: "placeholder",
        apply: (_value, entityType) => (newValue ? newValue : formatPlaceholder(entityType)),
      };
    }
    case "mask": {
      const maskingChar = config.masking_char ?? "*";
      // Code points, so a masked emoji or astral letter stays one mask character.
      return {
        name: "mask",
        apply: (value) => maskingChar.repeat([...value].length),
      };
    }
  }
}
