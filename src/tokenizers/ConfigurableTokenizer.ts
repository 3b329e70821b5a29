import contractionTable from './data/contractions.json';
import { BaseTokenizer, BaseTokenizerOptions } from './BaseTokenizer.js';
import {
  DEFAULT_TOKEN_PATTERN,
  HANDLE_RE,
  HASHTAG_RE,
  RETWEET_MARKER_RE,
  URL_RE,
  WORD_CHARS,
  tryCompile
} from './patterns.js';
import { ConfigurationError, LanguageNotSupportedError } from '../utils/errors.js';

export const SUPPORTED_LANGUAGES: readonly string[] = ['en'];

export interface TokenizerOptions extends BaseTokenizerOptions {
  language?: string;
  /**
   * What counts as a token. Strings are compiled with the `gu` flags, so
   * Unicode property escapes work:
   * - `[\p{L}\p{M}\p{N}_]+` (default): letters, digits and underscore
   * - `\p{L}+`: only letters
   * - `\p{L}[\p{L}\p{N}]+`: starts with a letter, may contain digits
   */
  tokenPattern?: string | RegExp;
  /** Tokens to drop after extraction, compared exactly */
  stopwords?: Iterable<string> | null;
  /** Delete `#tag` entirely instead of keeping `tag` */
  removeHashtags?: boolean;
  lowercase?: boolean;
  /** Rewrite English contractions ("can't" → "can not") before extraction; needs lowercase text */
  expandContractions?: boolean;
}

/**
 * Knobs the presets pin; not part of the user-facing options.
 */
export interface PipelineRules {
  /** Leave `#` on hashtags so the token pattern can keep it */
  preserveHashtagMarker?: boolean;
  /** Exact strings that noise removal must not delete, such as `@USER` */
  reservedTokens?: Iterable<string>;
}

export interface TokenizerConfig {
  readonly language: string;
  readonly tokenPattern: string;
  readonly stopwords: ReadonlySet<string> | null;
  readonly removeHashtags: boolean;
  readonly lowercase: boolean;
  readonly expandContractions: boolean;
  readonly includeRetweetedAndQuotedContent: boolean;
}

const CONTRACTIONS: ReadonlyMap<string, string> = new Map(Object.entries(contractionTable));

// Longest first so "can't've" wins over "can't"
const CONTRACTION_RE = new RegExp(
  `(?<![${WORD_CHARS}'])(?:${[...CONTRACTIONS.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|')})(?![${WORD_CHARS}'])`,
  'gu'
);

/**
 * Tokenizer built from a fixed sequence of steps:
 *
 * 1. hashtags: remove `#tag`, or strip the `#`
 * 2. noise: URLs, @handles and `RT` markers
 * 3. lowercase
 * 4. contraction expansion (optional)
 * 5. extraction of every token-pattern match, left to right
 * 6. stopword filtering
 *
 * Presets hook in before step 1 through {@link preTokenize}.
 */
export class ConfigurableTokenizer extends BaseTokenizer {
  readonly config: TokenizerConfig;

  private readonly tokenRe: RegExp;
  private readonly preserveHashtagMarker: boolean;
  private readonly reservedTokens: ReadonlySet<string>;

  constructor(options: TokenizerOptions = {}, rules: PipelineRules = {}) {
    super(options);

    const language = options.language ?? 'en';
    if (!SUPPORTED_LANGUAGES.includes(language)) {
      throw new LanguageNotSupportedError(language, SUPPORTED_LANGUAGES);
    }

    this.tokenRe = compileTokenPattern(options.tokenPattern ?? DEFAULT_TOKEN_PATTERN);
    this.preserveHashtagMarker = rules.preserveHashtagMarker ?? false;
    this.reservedTokens = new Set(rules.reservedTokens ?? []);

    this.config = Object.freeze({
      language,
      tokenPattern: this.tokenRe.source,
      stopwords: toStopwordSet(options.stopwords),
      removeHashtags: requireBoolean('removeHashtags', options.removeHashtags, false),
      lowercase: requireBoolean('lowercase', options.lowercase, true),
      expandContractions: requireBoolean('expandContractions', options.expandContractions, false),
      includeRetweetedAndQuotedContent: requireBoolean(
        'includeRetweetedAndQuotedContent',
        options.includeRetweetedAndQuotedContent,
        true
      )
    });
  }

  tokenize(text: string | null | undefined): string[] {
    if (typeof text !== 'string' || text.length === 0) return [];

    let processed = this.preTokenize(text);
    processed = this.handleHashtags(processed);
    processed = this.removeNoise(processed);

    if (this.config.lowercase) {
      processed = processed.toLowerCase();
    }
    if (this.config.expandContractions) {
      processed = processed.replace(CONTRACTION_RE, match => CONTRACTIONS.get(match) ?? match);
    }

    const tokens: string[] = [];
    for (const match of processed.matchAll(this.tokenRe)) {
      if (match[0].length > 0) tokens.push(match[0]);
    }

    const { stopwords } = this.config;
    return stopwords ? tokens.filter(token => !stopwords.has(token)) : tokens;
  }

  /**
   * Rewrites raw text before the shared steps run. Identity here; presets
   * use it to insert their marker tokens.
   */
  protected preTokenize(text: string): string {
    return text;
  }

  private handleHashtags(text: string): string {
    if (this.config.removeHashtags) {
      return text.replace(HASHTAG_RE, ' ');
    }
    return this.preserveHashtagMarker ? text : text.replace(HASHTAG_RE, '$1');
  }

  private removeNoise(text: string): string {
    const strip = (match: string): string => (this.reservedTokens.has(match) ? match : ' ');
    return text.replace(URL_RE, strip).replace(HANDLE_RE, strip).replace(RETWEET_MARKER_RE, strip);
  }
}

function compileTokenPattern(pattern: string | RegExp): RegExp {
  let source: string;
  let flags: string;
  if (pattern instanceof RegExp) {
    source = pattern.source;
    // Sticky matching would stop extraction at the first gap
    flags = pattern.flags.replace(/[gy]/g, '');
  } else if (typeof pattern === 'string') {
    source = pattern;
    flags = '';
  } else {
    throw new ConfigurationError('tokenPattern must be a string or a RegExp', { tokenPattern: String(pattern) });
  }

  if (source.length === 0) {
    throw new ConfigurationError('tokenPattern must not be empty');
  }
  if (!flags.includes('u') && !flags.includes('v')) {
    flags += 'u';
  }

  const compiled = tryCompile(source, `${flags}g`);
  if (compiled instanceof SyntaxError) {
    throw new ConfigurationError(`Invalid token pattern: ${compiled.message}`, { tokenPattern: source });
  }
  return compiled;
}

function toStopwordSet(stopwords: Iterable<string> | null | undefined): ReadonlySet<string> | null {
  if (stopwords === undefined || stopwords === null) return null;
  if (typeof stopwords === 'string' || typeof stopwords[Symbol.iterator] !== 'function') {
    throw new ConfigurationError('stopwords must be an iterable of strings');
  }

  const set = new Set<string>();
  for (const word of stopwords) {
    if (typeof word !== 'string') {
      throw new ConfigurationError('stopwords must only contain strings', { stopword: String(word) });
    }
    set.add(word);
  }
  return set.size > 0 ? set : null;
}

function requireBoolean(name: string, value: boolean | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${name} must be a boolean`, { [name]: String(value) });
  }
  return value;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
