/**
 * Shared consumer loop for the streaming commands
 */

import { errorMessage } from '../errors';
import { logger } from '../logger';
import { RecordFormatter } from '../logs/record-formatter';
import { Reader } from '../reader';

export type OutputWriter = (text: string) => void;

const writeStdout: OutputWriter = text => {
  process.stdout.write(text);
};

/**
 * Starts the reader and writes every record until the stream ends.
 * SIGINT and SIGTERM close the reader.
 *
 * @returns true when the stream ended cleanly
 */
export async function runReader(
  reader: Reader,
  formatter: RecordFormatter,
  write: OutputWriter = writeStdout
): Promise<boolean> {
  const stop = () => {
    logger.debug('Received stop signal');
    reader.close();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  try {
    try {
      await reader.streamInto();
    } catch (error) {
      logger.error(`Failed to start ${reader.type} reader: ${errorMessage(error)}`);
      return false;
    }

    for await (const record of reader.channel) {
      write(formatter.formatRecord(record));
    }

    const result = await reader.done;
    if (!result.ok) {
      logger.error(`Log stream failed: ${result.error.message}`);
      return false;
    }
    return true;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}
