/**
 * Readers turning files, stdin and Cloud Logging into record streams
 */

import { ReaderConfig } from '../types';
import { FileReader } from './file-reader';
import { GcpReader, GcpReaderOptions } from './gcp-reader';
import { Reader } from './reader';
import { RecordChannel } from './record-channel';
import { StdinReader } from './stdin-reader';

export { RecordChannel } from './record-channel';
export { Reader, BaseReader, StreamResult } from './reader';
export { FileReader, DEFAULT_POLL_INTERVAL_MS } from './file-reader';
export { StdinReader } from './stdin-reader';
export { GcpReader, GcpReaderMode, GcpReaderOptions, advanceWatermark, buildHistoricalFilter } from './gcp-reader';
export { parseFrom } from './time-range';
export { normalizeEntry, lineToRecord, classifyEntry, RawLogEntry } from './normalizer';

/**
 * Dependencies only the Cloud Logging reader uses
 */
export type MakeReaderOptions = Pick<GcpReaderOptions, 'backendFactory' | 'onModeChange'>;

/**
 * Creates the reader for a source configuration.
 * A file configuration without a file name reads standard input.
 */
export function makeReader(
  config: ReaderConfig,
  channel?: RecordChannel<string>,
  options: MakeReaderOptions = {}
): Reader {
  const { onError, capacity } = config;

  if (config.kind === 'gcp') {
    return new GcpReader(
      { projectId: config.projectId, filter: config.filter, timeRange: config.timeRange },
      channel,
      { onError, capacity, ...options }
    );
  }

  if (config.fileName) {
    return new FileReader(config.fileName, channel, {
      onError,
      capacity,
      pollIntervalMs: config.pollIntervalMs,
    });
  }

  return new StdinReader(channel, { onError, capacity });
}
