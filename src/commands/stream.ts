/**
 * Command handler for `logstream stream`
 */

import { parseOutputFormat, parsePollInterval } from '../config';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { RecordFormatter } from '../logs/record-formatter';
import { makeReader } from '../reader';
import { runReader } from './stream-helpers';

/**
 * Options for the stream command
 */
export interface StreamCommandOptions {
  /** File to follow; stdin when omitted */
  file?: string;
  /** Polling interval in milliseconds, as typed */
  pollInterval?: string;
  /** Output format: raw, pretty, json */
  format: string;
}

/**
 * Main handler for the `logstream stream` subcommand
 */
export async function streamCommand(options: StreamCommandOptions): Promise<void> {
  let pollIntervalMs: number | undefined;
  let formatter: RecordFormatter;
  try {
    pollIntervalMs = parsePollInterval(options.pollInterval);
    formatter = new RecordFormatter({ format: parseOutputFormat(options.format) });
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }

  const fileName = options.file?.trim() || undefined;
  if (fileName) {
    logger.info(`Streaming ${fileName}`);
  } else {
    logger.debug('Streaming standard input');
  }

  const reader = makeReader({ kind: 'file', fileName, pollIntervalMs });
  const ok = await runReader(reader, formatter);
  if (!ok) {
    process.exit(1);
  }
}
