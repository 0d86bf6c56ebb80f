/**
 * Command line front end: anonymize text given inline or read from a
 * UTF-8 file and print the records as JSON.
 */

import fs from "node:fs/promises";
import { parseArgs } from "node:util";

import { Anonymizer } from "./anonymizer.js";
import type { AnonymizationMode, Logger } from "./types.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

type LogLevel = "info" | "warn" | "silent";

const LOG_LEVELS: LogLevel[] = ["info", "warn", "silent"];
const MODES: AnonymizationMode[] = ["irreversible", "reversible"];

export const USAGE = `Usage: spanveil (--text "TEXT" | --input-file FILE) [options]

Options:
  --text TEXT           Text to anonymize
  --input-file FILE     Read the text from a UTF-8 file
  --output-file FILE    Write the JSON results here instead of stdout
  --mode MODE           irreversible (default) or reversible
  --share-mapping       Share one placeholder mapping across paragraphs
  --audit               Emit audit log lines
  --log-level LEVEL     info (default), warn or silent
  -h, --help            Show this help
`;

const OPTIONS = {
  text: { type: "string" },
  "input-file": { type: "string" },
  "output-file": { type: "string" },
  mode: { type: "string" },
  "share-mapping": { type: "boolean" },
  audit: { type: "boolean" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function parseOptions(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: false, strict: true });
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isMode(value: string): value is AnonymizationMode {
  return MODES.some((mode) => mode === value);
}

export function createConsoleLogger(level: LogLevel, io: CliIO): Logger {
  const silent = (): void => undefined;
  return {
    info: level === "info" ? (msg) => io.stderr(`${msg}\n`) : silent,
    warn: level === "silent" ? silent : (msg) => io.stderr(`${msg}\n`),
  };
}

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return 2;
  }

  const { values } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const text = values.text;
  const inputFile = values["input-file"];
  if (text !== undefined && inputFile !== undefined) {
    io.stderr(`Provide exactly one of --text or --input-file.\n\n${USAGE}`);
    return 2;
  }

  const mode = values.mode ?? "irreversible";
  if (!isMode(mode)) {
    io.stderr(`Invalid --mode "${mode}". Must be one of: ${MODES.join(", ")}\n`);
    return 2;
  }

  const logLevel = values["log-level"] ?? "info";
  if (!isLogLevel(logLevel)) {
    io.stderr(`Invalid --log-level "${logLevel}". Must be one of: ${LOG_LEVELS.join(", ")}\n`);
    return 2;
  }

  const logger = createConsoleLogger(logLevel, io);

  try {
    let input: string;
    if (text !== undefined) {
      input = text;
    } else if (inputFile !== undefined) {
      input = await fs.readFile(inputFile, "utf8");
      logger.info(`[spanveil] Read text from ${inputFile}`);
    } else {
      io.stderr(`Provide exactly one of --text or --input-file.\n\n${USAGE}`);
      return 2;
    }

    const anonymizer = new Anonymizer(
      {
        mode,
        shareMapping: values["share-mapping"] ?? false,
        auditEnabled: values.audit ?? false,
      },
      { logger },
    );
    await anonymizer.initialize();

    const records = await anonymizer.anonymize(input);
    const json = `${JSON.stringify(records, null, 4)}\n`;

    const outputFile = values["output-file"];
    if (outputFile !== undefined) {
      await fs.writeFile(outputFile, json, "utf8");
      logger.info(`[spanveil] Wrote ${records.length} record(s) to ${outputFile}`);
    } else {
      io.stdout(json);
    }

    return 0;
  } catch (err) {
    io.stderr(`[spanveil] ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
