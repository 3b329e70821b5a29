import { BaseTokenizerOptions } from '../BaseTokenizer.js';
import { ConfigurableTokenizer } from '../ConfigurableTokenizer.js';
import { HANDLE_RE, LOOSE_URL_RE, WORD_CHARS } from '../patterns.js';

export const USER_MARKER = '@USER';
export const URL_MARKER = 'HTTPURL';

const EMOTICON = "(?<![\\p{L}\\p{N}])[:;=]['\\-]?[)(DPp/|]+(?![\\p{L}\\p{N}])";
const EMOJI = '\\p{Regional_Indicator}{2}|\\p{Extended_Pictographic}(?:\\u{FE0F}|\\u{200D}\\p{Extended_Pictographic})*';

const BERTWEET_TOKEN_PATTERN = new RegExp(
  [
    USER_MARKER,
    URL_MARKER,
    EMOTICON,
    `#[${WORD_CHARS}]+`,
    `[${WORD_CHARS}]+(?:'[\\p{L}\\p{M}]+)*`,
    EMOJI,
    '\\.{3}',
    '\\p{P}'
  ].join('|'),
  'u'
);

/**
 * Tweet normalization used to pre-train BERTweet: handles become `@USER`,
 * links become `HTTPURL`, case is preserved, hashtags keep their `#`, and
 * emoji, emoticons and punctuation stay as tokens of their own.
 */
export class BERTweetTokenizer extends ConfigurableTokenizer {
  constructor(options: BaseTokenizerOptions = {}) {
    super(
      {
        includeRetweetedAndQuotedContent: options.includeRetweetedAndQuotedContent,
        tokenPattern: BERTWEET_TOKEN_PATTERN,
        lowercase: false,
        removeHashtags: false
      },
      {
        preserveHashtagMarker: true,
        reservedTokens: [USER_MARKER]
      }
    );
  }

  protected preTokenize(text: string): string {
    return text
      .replace(/’/gu, "'")
      .replace(/…/gu, '...')
      .replace(LOOSE_URL_RE, ` ${URL_MARKER} `)
      .replace(HANDLE_RE, ` ${USER_MARKER} `);
  }
}
