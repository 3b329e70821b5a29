/**
 * Regular expressions shared by the tokenizer pipeline and its presets.
 *
 * Every pattern is global; they are only used through `replace` and
 * `matchAll`, which leave `lastIndex` at 0, so sharing them is safe.
 */

/** Letters, combining marks, digits and underscore */
export const WORD_CHARS = '\\p{L}\\p{M}\\p{N}_';

/** Runs of word characters. */
export const DEFAULT_TOKEN_PATTERN = `[${WORD_CHARS}]+`;

// A `#` inside a word is not a hashtag marker
export const HASHTAG_RE = new RegExp(`(?<![${WORD_CHARS}])#([${WORD_CHARS}]+)`, 'gu');

export const URL_RE = /https?:\/\/\S+/gu;

/** URLs including the scheme-less `www.` form */
export const LOOSE_URL_RE = /(?:https?:\/\/|www\.)\S+/gu;

// Not preceded by a handle character or by one of !@#$%&* (e-mail addresses, "@@")
export const HANDLE_RE = /(?<![A-Za-z0-9_!@#$%&*])@[A-Za-z0-9_]+/gu;

// `\b` is ASCII-only, so "RTÉ" would count as standalone
export const RETWEET_MARKER_RE = new RegExp(`(?<![${WORD_CHARS}])RT(?![${WORD_CHARS}])`, 'gu');

/**
 * Compile a regular expression from a source string with the given flags,
 * returning the syntax error rather than throwing it.
 */
export function tryCompile(source: string, flags: string): RegExp | SyntaxError {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    if (error instanceof SyntaxError) return error;
    throw error;
  }
}
