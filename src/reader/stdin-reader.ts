/**
 * Pass-through reader for piped input
 */

import * as readline from 'readline';
import { Readable } from 'stream';
import { ReaderOptions } from '../types';
import { lineToRecord } from './normalizer';
import { BaseReader } from './reader';
import { RecordChannel } from './record-channel';

/**
 * Emits every line of the input as a record and ends at EOF
 */
export class StdinReader extends BaseReader {
  readonly type = 'stdin';

  private readonly input: Readable;
  private lines?: readline.Interface;

  constructor(channel?: RecordChannel<string>, options: ReaderOptions = {}, input: Readable = process.stdin) {
    super(channel, options);
    this.input = input;
  }

  protected async prepare(): Promise<void> {
    this.lines = readline.createInterface({
      input: this.input,
      crlfDelay: Infinity,
    });
  }

  protected async produce(): Promise<void> {
    const lines = this.lines;
    if (!lines) {
      return;
    }

    // readline does not forward input errors to the async iterator
    let stopListening: () => void = () => undefined;
    const inputFailed = new Promise<never>((_, reject) => {
      this.input.once('error', reject);
      stopListening = () => {
        this.input.off('error', reject);
      };
    });

    try {
      await Promise.race([this.forward(lines), inputFailed]);
    } finally {
      stopListening();
      lines.close();
    }
    this.log.debug('Standard input reached end of stream');
  }

  protected onClose(): void {
    this.lines?.close();
  }

  private async forward(lines: readline.Interface): Promise<void> {
    for await (const line of lines) {
      if (this.stopped) {
        return;
      }
      const record = lineToRecord(line);
      if (record !== undefined && !(await this.emit(record))) {
        return;
      }
    }
  }
}
