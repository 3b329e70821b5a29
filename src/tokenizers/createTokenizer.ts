import { ConfigurableTokenizer } from './ConfigurableTokenizer.js';
import { BERTweetTokenizer } from './presets/BERTweetTokenizer.js';
import { GloVeTweetTokenizer } from './presets/GloVeTweetTokenizer.js';
import { TokenizerSettings } from '../config/environment.js';

export function createTokenizer(settings: TokenizerSettings): ConfigurableTokenizer {
  const { includeRetweetedAndQuotedContent } = settings.options;
  switch (settings.preset) {
    case 'glove':
      return new GloVeTweetTokenizer({ includeRetweetedAndQuotedContent });
    case 'bertweet':
      return new BERTweetTokenizer({ includeRetweetedAndQuotedContent });
    case 'default':
      return new ConfigurableTokenizer(settings.options);
  }
}
