import { Container, interfaces } from 'inversify';
import { loadEnvironment, loadTokenizerSettings, TokenizerSettings } from './environment.js';
import { LoggingConfig } from './loggingConfig.js';
import { CorpusProcessor } from '../corpus/CorpusProcessor.js';
import { MessageWriter } from '../io/MessageWriter.js';
import { LoggerFactory } from '../logging/LoggerFactory.js';
import { BaseTokenizer } from '../tokenizers/BaseTokenizer.js';
import { createTokenizer } from '../tokenizers/createTokenizer.js';
import { TYPES } from '../types/di.js';
import { Logger } from '../types/logger.js';

export interface ContainerOptions {
  /** Variables to configure from; defaults to process.env after loading .env */
  env?: NodeJS.ProcessEnv;
  /** Path of the .env file to load when `env` is not given */
  envFile?: string;
  /** Use this tokenizer instead of one built from TOKENIZER_* settings */
  tokenizer?: BaseTokenizer;
}

function componentName(identifier: interfaces.ServiceIdentifier | undefined): string {
  if (typeof identifier === 'symbol') return identifier.description ?? 'default';
  if (typeof identifier === 'string') return identifier;
  if (typeof identifier === 'function') return identifier.name;
  return 'default';
}

export function createContainer(options: ContainerOptions = {}): Container {
  const env = options.env ?? loadEnvironment(options.envFile);

  // Set default scope to singleton
  const container = new Container({ defaultScope: 'Singleton' });

  // Configuration
  container.bind<NodeJS.ProcessEnv>(TYPES.Environment).toConstantValue(env);
  container.bind<LoggingConfig>(TYPES.LoggingConfig).toDynamicValue(() => new LoggingConfig().applyEnvironment(env));
  container
    .bind<TokenizerSettings>(TYPES.TokenizerSettings)
    .toDynamicValue(context => loadTokenizerSettings(context.container.get<NodeJS.ProcessEnv>(TYPES.Environment)));

  // Configure LoggerFactory with LoggingConfig
  container.bind<LoggerFactory>(TYPES.LoggerFactory).toDynamicValue(context => {
    const loggingConfig = context.container.get<LoggingConfig>(TYPES.LoggingConfig);
    const factory = LoggerFactory.getInstance();
    factory.configure(loggingConfig.getFullConfig());
    return factory;
  });

  // Logger - named after the component that requests it
  container
    .bind<Logger>(TYPES.Logger)
    .toDynamicValue(context => {
      const factory = context.container.get<LoggerFactory>(TYPES.LoggerFactory);
      return factory.createLogger(componentName(context.currentRequest.parentRequest?.serviceIdentifier));
    })
    .inTransientScope();

  // Corpus processing
  if (options.tokenizer) {
    container.bind<BaseTokenizer>(TYPES.Tokenizer).toConstantValue(options.tokenizer);
  } else {
    container
      .bind<BaseTokenizer>(TYPES.Tokenizer)
      .toDynamicValue(context => createTokenizer(context.container.get<TokenizerSettings>(TYPES.TokenizerSettings)));
  }
  container.bind<MessageWriter>(TYPES.MessageWriter).to(MessageWriter);
  container.bind<CorpusProcessor>(TYPES.CorpusProcessor).to(CorpusProcessor);

  return container;
}
