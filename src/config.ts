import { DEFAULT_CONTEXT_WINDOW } from "./alignment.js";
import {
  canonicalType,
  type AnonymizationMode,
  type AnonymizerConfig,
  type EntityAllowlist,
  type OperatorConfig,
} from "./types.js";

const VALID_MODES: AnonymizationMode[] = ["irreversible", "reversible"];
const VALID_OPERATORS: OperatorConfig["type"][] = ["keep", "replace", "placeholder", "counter", "mask"];

const DEFAULT_ENTITIES = [
  "PERSON",
  "LOCATION",
  "IBAN_CODE",
  "CREDIT_CARD",
  "PHONE_NUMBER",
  "EMAIL_ADDRESS",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureStringList(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array of strings`);
  }

  const entries = value.filter((entry): entry is string => {
    if (typeof entry !== "string") {
      throw new Error(`${path} must contain only strings`);
    }

    return true;
  });

  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

function ensureEntityAllowlist(value: unknown): EntityAllowlist {
  if (value == null) {
    return { values: [], patterns: [], entities: {} };
  }

  if (!isRecord(value)) {
    throw new Error("allowlist must be an object");
  }

  const values = ensureStringList(value.values ?? [], "allowlist.values");
  const patterns = ensureStringList(value.patterns ?? [], "allowlist.patterns");

  for (const pattern of patterns) {
    try {
      new RegExp(pattern);
    } catch {
      throw new Error(`allowlist.patterns contains invalid regex pattern: "${pattern}"`);
    }
  }

  const entitiesValue = value.entities ?? {};
  if (!isRecord(entitiesValue)) {
    throw new Error("allowlist.entities must be an object mapping entity labels to string arrays");
  }

  const entities: Record<string, string[]> = {};
  for (const [entityType, entryValue] of Object.entries(entitiesValue)) {
    const normalizedType = canonicalType(entityType);
    entities[normalizedType] = ensureStringList(entryValue, `allowlist.entities.${entityType}`);
  }

  return {
    values: [...new Set(values)],
    patterns: [...new Set(patterns)],
    entities,
  };
}

function ensureEntityConfidenceThresholds(
  value: unknown,
): Record<string, number> {
  if (!value) {
    return {};
  }

  if (!isRecord(value)) {
    throw new Error("entityConfidenceThresholds must be an object");
  }

  const normalized: Record<string, number> = {};

  for (const [entityType, rawThreshold] of Object.entries(value)) {
    if (typeof rawThreshold !== "number" || Number.isNaN(rawThreshold)) {
      throw new Error(
        `entityConfidenceThresholds["${entityType}"] must be a number between 0 and 1, got ${String(
          rawThreshold,
        )}`,
      );
    }

    if (rawThreshold < 0 || rawThreshold > 1) {
      throw new Error(
        `entityConfidenceThresholds["${entityType}"] must be between 0 and 1, got ${rawThreshold}`,
      );
    }

    normalized[canonicalType(entityType)] = rawThreshold;
  }

  return normalized;
}

function ensureOperator(value: unknown, path: string): OperatorConfig {
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object with a "type" field`);
  }

  switch (value.type) {
    case "keep":
      return { type: "keep" };
    case "counter":
      return { type: "counter" };
    case "replace":
      if (typeof value.new_value !== "string") {
        throw new Error(`${path}.new_value must be a string for the "replace" operator`);
      }
      return { type: "replace", new_value: value.new_value };
    case "placeholder":
      if (value.new_value !== undefined && typeof value.new_value !== "string") {
        throw new Error(`${path}.new_value must be a string when given`);
      }
      return value.new_value === undefined
        ? { type: "placeholder" }
        : { type: "placeholder", new_value: value.new_value };
    case "mask":
      if (
        value.masking_char !== undefined &&
        (typeof value.masking_char !== "string" || [...value.masking_char].length !== 1)
      ) {
        throw new Error(`${path}.masking_char must be a single character`);
      }
      return value.masking_char === undefined
        ? { type: "mask" }
        : { type: "mask", masking_char: value.masking_char };
    default:
      throw new Error(
        `Invalid operator "${String(value.type)}" at ${path}. Must be one of: ${VALID_OPERATORS.join(", ")}`,
      );
  }
}

function ensureOperators(value: unknown): Record<string, OperatorConfig> {
  if (!isRecord(value)) {
    throw new Error("operators must be an object mapping entity labels to operator configs");
  }

  const normalized: Record<string, OperatorConfig> = {};
  for (const [entityType, operator] of Object.entries(value)) {
    normalized[canonicalType(entityType)] = ensureOperator(operator, `operators.${entityType}`);
  }
  return normalized;
}

export const DEFAULT_CONFIG: AnonymizerConfig = {
  enabled: true,
  mode: "irreversible",
  language: "el",
  entities: DEFAULT_ENTITIES,
  operators: Object.fromEntries(
    DEFAULT_ENTITIES.map((entity): [string, OperatorConfig] => [entity, { type: "placeholder" }]),
  ),
  defaultOperator: { type: "keep" },
  confidence_threshold: 0.5,
  entityConfidenceThresholds: {},
  allowlist: {
    values: [],
    patterns: [],
    entities: {},
  },
  shareMapping: false,
  contextWindow: DEFAULT_CONTEXT_WINDOW,
  auditEnabled: false,
};

export function loadConfig(overrides: Partial<AnonymizerConfig>): AnonymizerConfig {
  const config: AnonymizerConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    operators: {
      ...DEFAULT_CONFIG.operators,
      ...(overrides.operators ?? {}),
    },
    entityConfidenceThresholds: {
      ...DEFAULT_CONFIG.entityConfidenceThresholds,
      ...(overrides.entityConfidenceThresholds ?? {}),
    },
  };

  config.allowlist = ensureEntityAllowlist(overrides.allowlist ?? DEFAULT_CONFIG.allowlist);
  config.entityConfidenceThresholds = ensureEntityConfidenceThresholds(
    config.entityConfidenceThresholds,
  );
  config.operators = ensureOperators(config.operators);
  config.defaultOperator = ensureOperator(config.defaultOperator, "defaultOperator");

  if (typeof config.enabled !== "boolean") {
    throw new Error(`enabled must be true or false`);
  }

  if (!VALID_MODES.includes(config.mode)) {
    throw new Error(
      `Invalid mode "${config.mode}". Must be one of: ${VALID_MODES.join(", ")}`,
    );
  }

  if (typeof config.language !== "string" || config.language.trim().length === 0) {
    throw new Error(`language must be a non-empty string`);
  }

  config.entities = [
    ...new Set(ensureStringList(config.entities, "entities").map((entity) => canonicalType(entity))),
  ];

  if (typeof config.confidence_threshold !== "number" || Number.isNaN(config.confidence_threshold)) {
    throw new Error(
      `confidence_threshold must be a number between 0 and 1, got ${String(config.confidence_threshold)}`,
    );
  }

  if (config.confidence_threshold < 0 || config.confidence_threshold > 1) {
    throw new Error(
      `confidence_threshold must be between 0 and 1, got ${config.confidence_threshold}`,
    );
  }

  if (typeof config.shareMapping !== "boolean") {
    throw new Error(`shareMapping must be true or false`);
  }

  if (typeof config.auditEnabled !== "boolean") {
    throw new Error(`auditEnabled must be true or false`);
  }

  if (
    typeof config.contextWindow !== "number" ||
    !Number.isInteger(config.contextWindow) ||
    config.contextWindow < 1
  ) {
    throw new Error(
      `contextWindow must be a positive integer, got ${String(config.contextWindow)}`,
    );
  }

  return config;
}
