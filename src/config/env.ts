/**
 * Helpers reading environment variables with consistent coercion rules.
 * Unset or blank variables yield `undefined`; values that are present but
 * malformed raise {@link InvalidConfigurationError} rather than being ignored,
 * so a typo in an override never silently falls back to a default.
 */
import { InvalidConfigurationError } from "../errors.js";

export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Trims the raw value, mapping blank strings to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function reject(name: string, raw: string, expectation: string): never {
  throw new InvalidConfigurationError(
    `environment variable ${name}=${JSON.stringify(raw)} ${expectation}`,
    [{ path: name, message: expectation }],
    `unset ${name} or fix its value`,
  );
}

function checkBounds(name: string, raw: string, value: number, options: NumberOptions | undefined): number {
  if (options?.min !== undefined && value < options.min) {
    reject(name, raw, `must be at least ${options.min}`);
  }
  if (options?.max !== undefined && value > options.max) {
    reject(name, raw, `must be at most ${options.max}`);
  }
  return value;
}

/** Reads a base-10 integer. */
export function readOptionalInt(env: EnvSource, name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (normalised === undefined) {
    return undefined;
  }
  if (!/^[-+]?\d+$/.test(normalised)) {
    reject(name, normalised, "must be an integer");
  }
  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe integer range would be rounded silently.
  if (!Number.isSafeInteger(value)) {
    reject(name, normalised, "must be a safe integer");
  }
  return checkBounds(name, normalised, value, options);
}

/** Returns the trimmed value, or `undefined` when unset or blank. */
export function readOptionalString(env: EnvSource, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like value, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readOptionalEnum<T extends string>(env: EnvSource, name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (normalised === undefined) {
    return undefined;
  }
  const match = allowed.find((value) => value.toLowerCase() === normalised.toLowerCase());
  if (match === undefined) {
    reject(name, normalised, `must be one of ${allowed.join(", ")}`);
  }
  return match;
}
