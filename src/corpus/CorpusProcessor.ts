import { inject, injectable } from 'inversify';
import { MessageReader } from '../io/MessageReader.js';
import { MessageWriter } from '../io/MessageWriter.js';
import { CorrelationContext } from '../logging/CorrelationContext.js';
import { BaseTokenizer } from '../tokenizers/BaseTokenizer.js';
import { TYPES } from '../types/di.js';
import { Logger } from '../types/logger.js';
import { MessageRecord } from '../types/message.js';
import { ConfigurationError } from '../utils/errors.js';

export interface CorpusOptions {
  /** Record field that receives the token array (default `tokens`) */
  field?: string;
  skipRepostedAndQuoted?: boolean;
  skipInvalid?: boolean;
  /** Records buffered per write (default 10000) */
  batchSize?: number;
}

export interface CorpusSummary {
  input: string;
  output: string;
  correlationId: string;
  records: number;
  tokens: number;
  /** Records that produced no tokens; still written */
  emptyRecords: number;
  durationMs: number;
}

const DEFAULT_FIELD = 'tokens';
const DEFAULT_BATCH_SIZE = 10_000;

/**
 * Tokenizes a whole corpus file and writes each record back out with its
 * tokens attached.
 */
@injectable()
export class CorpusProcessor {
  constructor(
    @inject(TYPES.Tokenizer) private readonly tokenizer: BaseTokenizer,
    @inject(TYPES.MessageWriter) private readonly writer: MessageWriter,
    @inject(TYPES.Logger) private readonly logger: Logger
  ) {}

  async tokenizeCorpus(input: string, output: string, options: CorpusOptions = {}): Promise<CorpusSummary> {
    const field = options.field ?? DEFAULT_FIELD;
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (field.length === 0) {
      throw new ConfigurationError('field must not be empty');
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError('batchSize must be a positive integer', { batchSize });
    }

    const context = CorrelationContext.createContext({ input, output });
    const correlationId = String(context.correlationId);
    return CorrelationContext.run(context, () => this.process(input, output, field, batchSize, correlationId, options));
  }

  private async process(
    input: string,
    output: string,
    field: string,
    batchSize: number,
    correlationId: string,
    options: CorpusOptions
  ): Promise<CorpusSummary> {
    const startedAt = Date.now();
    const reader = new MessageReader(input, this.logger.child('MessageReader'));
    this.logger.info(`Tokenizing ${input}`, { output, field });

    let records = 0;
    let tokens = 0;
    let emptyRecords = 0;
    let written = 0;
    let batch: MessageRecord[] = [];

    const flush = async (): Promise<void> => {
      // The first write truncates the output; later batches append to it
      written += await this.writer.write(output, batch, { append: written > 0 });
      batch = [];
    };

    for await (const record of reader.readMessages({
      skipRepostedAndQuoted: options.skipRepostedAndQuoted,
      skipInvalid: options.skipInvalid
    })) {
      const sequence = this.tokenizer.getTokenizedMessageText(record);
      records++;
      tokens += sequence.length;
      if (sequence.length === 0) emptyRecords++;

      const enriched: MessageRecord = { ...record };
      enriched[field] = sequence;
      batch.push(enriched);
      if (batch.length >= batchSize) {
        await flush();
      }
    }
    if (batch.length > 0 || written === 0) {
      await flush();
    }

    const summary: CorpusSummary = {
      input,
      output,
      correlationId,
      records,
      tokens,
      emptyRecords,
      durationMs: Date.now() - startedAt
    };
    this.logger.info(`Tokenized ${records} records from ${input}`, {
      tokens,
      emptyRecords,
      durationMs: summary.durationMs
    });
    return summary;
  }
}
