import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { VocabularyLoadError } from "../errors.js";
import { Vocabulary } from "./vocabulary.js";

/** Word list shipped with the package, one lowercase word per line. */
export const BUNDLED_VOCABULARY_PATH = fileURLToPath(new URL("../../data/vocabulary/english.txt", import.meta.url));

/**
 * Splits a newline-delimited word list. Trailing whitespace (including `\r`)
 * is stripped and blank lines are skipped; order and repetitions are kept.
 */
export function parseVocabulary(contents: string): string[] {
  const words: string[] = [];
  for (const line of contents.split("\n")) {
    const word = line.trimEnd().toLowerCase();
    if (word.trim().length > 0) {
      words.push(word);
    }
  }
  return words;
}

export async function loadVocabularyFile(path: string): Promise<Vocabulary> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new VocabularyLoadError(path, error);
  }
  return Vocabulary.from(parseVocabulary(contents));
}

export function loadVocabularyFileSync(path: string): Vocabulary {
  let contents: string;
  try {
    contents = readFileSync(path, "utf8");
  } catch (error) {
    throw new VocabularyLoadError(path, error);
  }
  return Vocabulary.from(parseVocabulary(contents));
}

/**
 * Vocabulary read from disk on first use and cached by the instance. Callers
 * hand the instance around explicitly instead of relying on a module-level
 * word list, so tests can point correctors at their own files.
 */
export class LazyVocabulary {
  private cached: Vocabulary | null = null;

  constructor(readonly path: string) {}

  get loaded(): boolean {
    return this.cached !== null;
  }

  get(): Vocabulary {
    if (this.cached === null) {
      this.cached = loadVocabularyFileSync(this.path);
    }
    return this.cached;
  }
}

/** Lazily loaded view over {@link BUNDLED_VOCABULARY_PATH}. */
export const BUNDLED_VOCABULARY = new LazyVocabulary(BUNDLED_VOCABULARY_PATH);
