import { BaseTokenizerOptions } from '../BaseTokenizer.js';
import { ConfigurableTokenizer } from '../ConfigurableTokenizer.js';
import { HANDLE_RE, LOOSE_URL_RE, WORD_CHARS } from '../patterns.js';

// Eyes never follow a digit, so "(2018)" is not a smiley
const EYES = '(?<!\\p{N})[8:=;]';
const NOSE = "['`\\-]?";

/**
 * Ordered rewrites of the Stanford GloVe Twitter preprocessing script.
 * Order matters: URLs go before emoticons (":/" in "http://"), emoticons
 * before "/" is split off, hashtags before numbers.
 */
const GLOVE_RULES: ReadonlyArray<[RegExp, string | ((match: string, ...groups: string[]) => string)]> = [
  [LOOSE_URL_RE, ' <url> '],
  [new RegExp(`${EYES}${NOSE}[)dD]+(?![\\p{L}])|\\(+${NOSE}${EYES}`, 'gu'), ' <smile> '],
  [new RegExp(`${EYES}${NOSE}[pP]+(?![\\p{L}])`, 'gu'), ' <lolface> '],
  [new RegExp(`${EYES}${NOSE}\\(+|\\)+${NOSE}${EYES}`, 'gu'), ' <sadface> '],
  [new RegExp(`${EYES}${NOSE}[/|lL*](?![\\p{L}])`, 'gu'), ' <neutralface> '],
  [/\//gu, ' / '],
  [HANDLE_RE, ' <user> '],
  [/<3/gu, ' <heart> '],
  [new RegExp(`#([${WORD_CHARS}]+)`, 'gu'), (_match, body) => ` <hashtag> ${splitHashtag(body)} `],
  [new RegExp(`(?<![${WORD_CHARS}<])[-+]?[.\\d]*\\d+[:,.\\d]*(?![${WORD_CHARS}])`, 'gu'), ' <number> '],
  [/([!?.]){2,}/gu, '$1 <repeat> '],
  [new RegExp(`(?<![${WORD_CHARS}])([${WORD_CHARS}]*?)(\\p{L})\\2{2,}(?![${WORD_CHARS}])`, 'gu'), '$1$2 <elong> '],
  [new RegExp(`(?<![${WORD_CHARS}<])(?!RT(?![${WORD_CHARS}]))(\\p{Lu}{2,})(?![${WORD_CHARS}>])`, 'gu'), (_match, word) => `${word.toLowerCase()} <allcaps> `]
];

// Marker tokens, words (with inner apostrophes) and single punctuation marks; emoji are dropped
const GLOVE_TOKEN_PATTERN = new RegExp(`<[a-z]+>|[${WORD_CHARS}]+(?:'[\\p{L}\\p{M}]+)*|\\p{P}`, 'u');

/**
 * "#BigData" becomes "big data"; an all-caps tag is kept whole and flagged.
 */
function splitHashtag(body: string): string {
  if (/\p{Lu}/u.test(body) && body === body.toUpperCase()) {
    return `${body.toLowerCase()} <allcaps>`;
  }
  return body.split(/(?=\p{Lu})/u).join(' ');
}

/**
 * Preprocessing used to train the GloVe Twitter embeddings: URLs, handles,
 * emoticons, hashtags and numbers become marker tokens such as `<url>`,
 * shouting and elongation are flagged, text is lowercased, punctuation is
 * kept and emoji are stripped.
 */
export class GloVeTweetTokenizer extends ConfigurableTokenizer {
  constructor(options: BaseTokenizerOptions = {}) {
    super({
      includeRetweetedAndQuotedContent: options.includeRetweetedAndQuotedContent,
      tokenPattern: GLOVE_TOKEN_PATTERN,
      lowercase: true,
      removeHashtags: false
    });
  }

  protected preTokenize(text: string): string {
    return GLOVE_RULES.reduce(
      (current, [pattern, replacement]) =>
        typeof replacement === 'string' ? current.replace(pattern, replacement) : current.replace(pattern, replacement),
      text
    );
  }
}
