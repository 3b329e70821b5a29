import 'reflect-metadata';

// Message files
export { MessageReader, ReadOptions } from './io/MessageReader.js';
export { MessageWriter, WriteOptions } from './io/MessageWriter.js';
export { CompressionCodec, gzipCodec, plainCodec, resolveCodec, isCompressed } from './io/compression.js';

// Tokenizers
export { Tokenizer, BaseTokenizer, BaseTokenizerOptions, TokenizeFileOptions } from './tokenizers/BaseTokenizer.js';
export {
  ConfigurableTokenizer,
  TokenizerOptions,
  TokenizerConfig,
  PipelineRules,
  SUPPORTED_LANGUAGES
} from './tokenizers/ConfigurableTokenizer.js';
export { GloVeTweetTokenizer } from './tokenizers/presets/GloVeTweetTokenizer.js';
export { BERTweetTokenizer, USER_MARKER, URL_MARKER } from './tokenizers/presets/BERTweetTokenizer.js';
export { createTokenizer } from './tokenizers/createTokenizer.js';
export { DEFAULT_TOKEN_PATTERN } from './tokenizers/patterns.js';

// Corpus processing
export { CorpusProcessor, CorpusOptions, CorpusSummary } from './corpus/CorpusProcessor.js';

// Configuration
export { createContainer, ContainerOptions } from './config/container.js';
export {
  loadEnvironment,
  loadTokenizerSettings,
  TokenizerSettings,
  TokenizerPreset,
  TOKENIZER_PRESETS
} from './config/environment.js';
export { LoggingConfig, LoggingSettings, LogFormat } from './config/loggingConfig.js';

// Logging
export { LoggerFactory } from './logging/LoggerFactory.js';
export { DefaultLogService } from './logging/DefaultLogService.js';
export { CorrelationContext } from './logging/CorrelationContext.js';
export { LogTransport, ConsoleTransport, FileTransport } from './logging/transports/LogTransport.js';
export { Logger, LogLevel, LogContext, LogEntry, parseLogLevel } from './types/logger.js';

// Types and errors
export { TYPES } from './types/di.js';
export { MessageRecord, MessageEntities, HashtagEntity } from './types/message.js';
export {
  AppError,
  ConfigurationError,
  LanguageNotSupportedError,
  NotImplementedError,
  MalformedRecordError,
  MessageFileError,
  ReaderStateError,
  ErrorCodes
} from './utils/errors.js';
