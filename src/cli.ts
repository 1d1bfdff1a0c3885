#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadSettings, type Settings } from "./config/settings.js";
import { EditDistanceEngine } from "./editDistance/engine.js";
import { formatGrid, labelDistanceMatrix } from "./editDistance/render.js";
import { normaliseError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { SEARCH_STRATEGIES, type SearchStrategy } from "./spelling/candidateIndex.js";
import { SpellingCorrector } from "./spelling/corrector.js";
import { BUNDLED_VOCABULARY_PATH, loadVocabularyFile } from "./vocabulary/loader.js";

type OutputFormat = "text" | "json";

interface DistanceCommand {
  readonly command: "distance";
  readonly source: string;
  readonly target: string;
  readonly format: OutputFormat;
  readonly insertCost?: number;
  readonly deleteCost?: number;
  readonly replaceCost?: number;
}

interface CorrectCommand {
  readonly command: "correct";
  readonly text: string;
  readonly format: OutputFormat;
  readonly vocabularyPath?: string;
  readonly maxEdits?: number;
  readonly searchStrategy?: SearchStrategy;
}

type CliCommand = DistanceCommand | CorrectCommand;

/** Sink receiving the lines printed by a command. */
export type CliOutput = (line: string) => void;

function parseNumberFlag(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.startsWith("--")) {
    throw new Error(`${flag} expects a number`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${flag} expects a number, received '${raw}'`);
  }
  return value;
}

function parseFormat(raw: string | undefined): OutputFormat {
  if (raw !== "json" && raw !== "text") {
    throw new Error("--format must be 'json' or 'text'");
  }
  return raw;
}

function parseStrategy(raw: string | undefined): SearchStrategy {
  const match = SEARCH_STRATEGIES.find((strategy) => strategy === raw);
  if (match === undefined) {
    throw new Error(`--strategy must be one of ${SEARCH_STRATEGIES.join(", ")}`);
  }
  return match;
}

function parseDistanceArgs(rest: string[]): DistanceCommand {
  const positionals: string[] = [];
  let format: OutputFormat = "text";
  const costs: { insertCost?: number; deleteCost?: number; replaceCost?: number } = {};

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--insert-cost":
        costs.insertCost = parseNumberFlag(token, rest[++i]);
        break;
      case "--delete-cost":
        costs.deleteCost = parseNumberFlag(token, rest[++i]);
        break;
      case "--replace-cost":
        costs.replaceCost = parseNumberFlag(token, rest[++i]);
        break;
      case "--format":
        format = parseFormat(rest[++i]);
        break;
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        positionals.push(token);
    }
  }

  if (positionals.length !== 2) {
    throw new Error("distance requires <source> and <target>");
  }
  const [source, target] = positionals;
  return { command: "distance", source, target, format, ...costs };
}

function parseCorrectArgs(rest: string[]): CorrectCommand {
  const words: string[] = [];
  let format: OutputFormat = "text";
  let vocabularyPath: string | undefined;
  let maxEdits: number | undefined;
  let searchStrategy: SearchStrategy | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--vocabulary": {
        const value = rest[++i];
        if (!value || value.startsWith("--")) {
          throw new Error("--vocabulary expects a file path");
        }
        vocabularyPath = value;
        break;
      }
      case "--max-edits":
        maxEdits = parseNumberFlag(token, rest[++i]);
        break;
      case "--strategy":
        searchStrategy = parseStrategy(rest[++i]);
        break;
      case "--format":
        format = parseFormat(rest[++i]);
        break;
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        words.push(token);
    }
  }

  if (words.length === 0) {
    throw new Error("correct requires the text to check");
  }
  return {
    command: "correct",
    text: words.join(" "),
    format,
    ...(vocabularyPath === undefined ? {} : { vocabularyPath }),
    ...(maxEdits === undefined ? {} : { maxEdits }),
    ...(searchStrategy === undefined ? {} : { searchStrategy }),
  };
}

function parseArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case "distance":
      return parseDistanceArgs(rest);
    case "correct":
      return parseCorrectArgs(rest);
    default:
      throw new Error(`Unknown command '${command ?? ""}'`);
  }
}

function runDistance(options: DistanceCommand, print: CliOutput): void {
  const engine = new EditDistanceEngine(options.source, options.target, {
    ...(options.insertCost === undefined ? {} : { insertCost: options.insertCost }),
    ...(options.deleteCost === undefined ? {} : { deleteCost: options.deleteCost }),
    ...(options.replaceCost === undefined ? {} : { replaceCost: options.replaceCost }),
  });

  if (options.format === "json") {
    print(
      JSON.stringify(
        {
          source: engine.source,
          target: engine.target,
          costs: engine.costs,
          distance: engine.getEditDistance(),
          distanceMatrix: engine.distanceMatrix,
          backtrace: engine.backtraceToAscii(),
          operations: engine.operationsHistory(),
        },
        null,
        2,
      ),
    );
    return;
  }

  print("Levenshtein matrix");
  print(formatGrid(labelDistanceMatrix(engine.distanceMatrix, engine.source, engine.target)));
  print("");
  print("Backtrace matrix");
  print(formatGrid(engine.backtraceToAscii()));
  print("");
  print(`Minimum edit distance: ${engine.getEditDistance()}`);
  print("");
  print("Operation history");
  for (const step of engine.operationsHistory()) {
    const source = step.sourceIndex === null ? "-" : `${step.sourceIndex}:${step.sourceChar ?? ""}`;
    const target = step.targetIndex === null ? "-" : `${step.targetIndex}:${step.targetChar ?? ""}`;
    print(`  ${step.operation.padEnd(9)} source=${source} target=${target}`);
  }
}

async function runCorrect(options: CorrectCommand, settings: Settings, logger: StructuredLogger, print: CliOutput): Promise<void> {
  const vocabularyPath = options.vocabularyPath ?? settings.vocabularyPath ?? BUNDLED_VOCABULARY_PATH;
  const vocabulary = await loadVocabularyFile(vocabularyPath);
  logger.info("vocabulary_loaded", { path: vocabularyPath, words: vocabulary.size });

  const corrector = new SpellingCorrector(options.text, {
    vocabulary,
    maxEdits: options.maxEdits ?? settings.maxEdits,
    searchStrategy: options.searchStrategy ?? settings.searchStrategy,
    logger,
  });
  const corrected = corrector.retrieveCorrected();

  if (options.format === "json") {
    print(JSON.stringify({ query: options.text, corrected, misspelled: corrector.misspelledWords }, null, 2));
    return;
  }

  print(`Query before correction: ${options.text}`);
  print(`Query after correction: ${corrected}`);
}

/** Runs one command; resolves once its output has been printed. */
export async function run(argv: string[], print: CliOutput = console.log, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const options = parseArgs(argv);
  const settings = loadSettings(env);
  const logger = new StructuredLogger({ level: settings.logLevel, logFile: settings.logFile });
  try {
    if (options.command === "distance") {
      runDistance(options, print);
    } else {
      await runCorrect(options, settings, logger, print);
    }
  } finally {
    await logger.flush();
  }
}

function printUsage(): void {
  console.log("Usage:");
  console.log("  spellwright distance <source> <target> [--insert-cost n] [--delete-cost n] [--replace-cost n] [--format json|text]");
  console.log("  spellwright correct <text...> [--vocabulary file] [--max-edits n] [--strategy linear|length-bucket] [--format json|text]");
  console.log("");
  console.log("Examples:");
  console.log("  spellwright distance Elephant relevant");
  console.log("  spellwright correct Iranin financal banks are strongss");
}

async function main(argv: string[]): Promise<void> {
  if (argv.length === 0) {
    printUsage();
    process.exit(1);
  }
  await run(argv);
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  // npm links the bin through a symlink, so compare resolved paths.
  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return realpathSync(executedFromCli) === thisModulePath;
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    const normalised = normaliseError(error);
    console.error(`${normalised.code}: ${normalised.message}`);
    process.exit(1);
  });
}

/**
 * Exposes the argument parser to the test suite without making it part of the
 * package's public API.
 */
export const __testing = {
  parseArgs,
};
