const TYPES = {
  // Logging
  Logger: Symbol.for('Logger'),
  LoggerFactory: Symbol.for('LoggerFactory'),
  LoggingConfig: Symbol.for('LoggingConfig'),

  // Configuration
  Environment: Symbol.for('Environment'),
  TokenizerSettings: Symbol.for('TokenizerSettings'),

  // Corpus processing
  Tokenizer: Symbol.for('Tokenizer'),
  MessageWriter: Symbol.for('MessageWriter'),
  CorpusProcessor: Symbol.for('CorpusProcessor'),
};

export { TYPES };
