import { z } from "zod";

/** Maximum number of characters preserved in normalised messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/** Stable code surfaced when costs, thresholds or overrides are rejected. */
export const INVALID_CONFIGURATION_CODE = "E-CONFIG-INVALID";

/** Stable code surfaced when a vocabulary file cannot be read. */
export const VOCABULARY_LOAD_CODE = "E-VOCAB-LOAD";

/** Code attached to errors that carry no code of their own. */
export const UNEXPECTED_ERROR_CODE = "E-UNEXPECTED";

/**
 * Raised when edit costs, correction thresholds or environment overrides fail
 * validation. Negative costs would break the non-negativity of the distance
 * matrix, so they are refused here instead of being carried into the engine.
 */
export class InvalidConfigurationError extends Error {
  public readonly code = INVALID_CONFIGURATION_CODE;
  public readonly hint: string;
  /** Validation issues reported for the rejected input. */
  public readonly details: { issues: ReadonlyArray<{ path: string; message: string }> };

  constructor(message: string, issues: ReadonlyArray<{ path: string; message: string }> = [], hint = "check the supplied options") {
    super(message);
    this.name = "InvalidConfigurationError";
    this.hint = hint;
    this.details = { issues };
  }

  /** Converts a zod failure into a configuration error keeping the issue paths. */
  static fromZod(subject: string, error: z.ZodError): InvalidConfigurationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
    return new InvalidConfigurationError(`invalid ${subject}: ${summary}`, issues);
  }
}

export class VocabularyLoadError extends Error {
  public readonly code = VOCABULARY_LOAD_CODE;
  public readonly hint = "point the vocabulary path at a readable newline-delimited word list";
  public readonly details: { path: string };

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`unable to load vocabulary from ${path}: ${reason}`, { cause });
    this.name = "VocabularyLoadError";
    this.details = { path };
  }
}

/** Machine readable representation of any thrown value. */
export interface NormalisedError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty messages fall back to a generic literal.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Normalises an optional hint; blank hints collapse to `undefined`. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

function readStringField(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

/**
 * Normalises an arbitrary error into `{ code, message, hint?, details? }`.
 * Zod validation errors map to {@link INVALID_CONFIGURATION_CODE}; errors
 * exposing a string `code` keep it, everything else becomes
 * {@link UNEXPECTED_ERROR_CODE}.
 */
export function normaliseError(error: unknown): NormalisedError {
  const message = error instanceof Error ? error.message : String(error);
  let code = UNEXPECTED_ERROR_CODE;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = INVALID_CONFIGURATION_CODE;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else {
    code = readStringField(error, "code") ?? UNEXPECTED_ERROR_CODE;
    hint = readStringField(error, "hint");
    if (typeof error === "object" && error !== null && Object.prototype.hasOwnProperty.call(error, "details")) {
      details = Reflect.get(error, "details");
    }
  }

  const normalisedHint = normaliseErrorHint(hint);
  return {
    code,
    message: normaliseErrorMessage(message),
    ...(normalisedHint !== undefined ? { hint: normalisedHint } : {}),
    ...(details !== undefined ? { details } : {}),
  };
}
