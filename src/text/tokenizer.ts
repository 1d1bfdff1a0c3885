/**
 * Word runs (letters and digits, optionally joined by an inner apostrophe or
 * hyphen) or a single punctuation character. Whitespace separates tokens and
 * is never returned.
 */
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu;

const ALPHABETIC_PATTERN = /^\p{L}+$/u;

/** Splits free text into lowercase tokens. */
export function tokenizeText(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/** True when the token is made of letters only and may be spell-checked. */
export function isAlphabeticToken(token: string): boolean {
  return ALPHABETIC_PATTERN.test(token);
}
