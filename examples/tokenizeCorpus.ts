import 'reflect-metadata';
import chalk from 'chalk';
import { createContainer } from '../src/config/container.js';
import { CorpusProcessor } from '../src/corpus/CorpusProcessor.js';
import { LoggerFactory } from '../src/logging/LoggerFactory.js';
import { TYPES } from '../src/types/di.js';

// Usage: tokenizeCorpus <input.jsonl[.gz]> <output.jsonl[.gz]>
// Pick the tokenizer with TOKENIZER_PRESET=default|glove|bertweet in .env
async function main(): Promise<void> {
  const [input, output] = process.argv.slice(2);
  if (!input || !output) {
    console.error(chalk.red('Usage: tokenizeCorpus <input> <output>'));
    process.exitCode = 1;
    return;
  }

  const container = createContainer();
  const processor = container.get<CorpusProcessor>(TYPES.CorpusProcessor);

  try {
    const summary = await processor.tokenizeCorpus(input, output, { skipInvalid: true });
    console.log(chalk.green(`\n✓ ${summary.records} records, ${summary.tokens} tokens`));
    console.log(chalk.gray(`  ${summary.emptyRecords} records without tokens, ${summary.durationMs}ms`));
    console.log(chalk.gray(`  written to ${summary.output}`));
  } catch (error) {
    console.error(chalk.red('Tokenization failed:'), error);
    process.exitCode = 1;
  } finally {
    await LoggerFactory.getInstance().flushAll();
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
