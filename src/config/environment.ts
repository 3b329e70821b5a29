import { config } from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import { TokenizerOptions } from '../tokenizers/ConfigurableTokenizer.js';

export const TOKENIZER_PRESETS = ['default', 'glove', 'bertweet'] as const;
export type TokenizerPreset = (typeof TOKENIZER_PRESETS)[number];

export interface TokenizerSettings {
  preset: TokenizerPreset;
  /** Used by the default preset; the others only read includeRetweetedAndQuotedContent */
  options: TokenizerOptions;
}

/**
 * Environment variable names
 */
const ENV = {
  TOKENIZER_PRESET: 'TOKENIZER_PRESET',
  TOKENIZER_LANGUAGE: 'TOKENIZER_LANGUAGE',
  TOKENIZER_TOKEN_PATTERN: 'TOKENIZER_TOKEN_PATTERN',
  TOKENIZER_STOPWORDS: 'TOKENIZER_STOPWORDS',
  TOKENIZER_REMOVE_HASHTAGS: 'TOKENIZER_REMOVE_HASHTAGS',
  TOKENIZER_LOWERCASE: 'TOKENIZER_LOWERCASE',
  TOKENIZER_EXPAND_CONTRACTIONS: 'TOKENIZER_EXPAND_CONTRACTIONS',
  TOKENIZER_INCLUDE_REPOSTS: 'TOKENIZER_INCLUDE_REPOSTS'
} as const;

/**
 * Load a .env file into process.env. A missing file is not an error.
 *
 * @returns process.env after loading
 */
export function loadEnvironment(path?: string): NodeJS.ProcessEnv {
  const result = config(path ? { path } : {});
  if (result.error && !isMissingFile(result.error)) {
    throw new ConfigurationError(`Failed to load environment file: ${result.error.message}`, { path });
  }
  return process.env;
}

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Helper function to get environment variable, treating blank as unset
 */
function getEnvVar(env: NodeJS.ProcessEnv, name: keyof typeof ENV): string | undefined {
  const value = env[ENV[name]];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Helper function to parse boolean environment variable
 */
function getEnvBool(env: NodeJS.ProcessEnv, name: keyof typeof ENV): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${ENV[name]} must be true or false`, { value });
  }
}

function isPreset(value: string): value is TokenizerPreset {
  return TOKENIZER_PRESETS.some(preset => preset === value);
}

/**
 * Read tokenizer settings from environment variables. Unset variables leave
 * the tokenizer defaults in place.
 */
export function loadTokenizerSettings(env: NodeJS.ProcessEnv = process.env): TokenizerSettings {
  const preset = (getEnvVar(env, 'TOKENIZER_PRESET') ?? 'default').toLowerCase();
  if (!isPreset(preset)) {
    throw new ConfigurationError(`${ENV.TOKENIZER_PRESET} must be one of ${TOKENIZER_PRESETS.join(', ')}`, {
      value: preset
    });
  }

  const stopwords = getEnvVar(env, 'TOKENIZER_STOPWORDS')
    ?.split(',')
    .map(word => word.trim())
    .filter(word => word.length > 0);

  return {
    preset,
    options: {
      language: getEnvVar(env, 'TOKENIZER_LANGUAGE'),
      tokenPattern: getEnvVar(env, 'TOKENIZER_TOKEN_PATTERN'),
      stopwords: stopwords && stopwords.length > 0 ? stopwords : undefined,
      removeHashtags: getEnvBool(env, 'TOKENIZER_REMOVE_HASHTAGS'),
      lowercase: getEnvBool(env, 'TOKENIZER_LOWERCASE'),
      expandContractions: getEnvBool(env, 'TOKENIZER_EXPAND_CONTRACTIONS'),
      includeRetweetedAndQuotedContent: getEnvBool(env, 'TOKENIZER_INCLUDE_REPOSTS')
    }
  };
}
