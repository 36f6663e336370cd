/**
 * Command handler for `logstream gcp-stream`
 */

import { parseOutputFormat, resolveCredentialEnvironment } from '../config';
import { errorMessage } from '../errors';
import { checkAuth } from '../gcp/auth-gate';
import { LoggingBackendFactory, createGcpBackend } from '../gcp/logging-backend';
import { logger } from '../logger';
import { RecordFormatter } from '../logs/record-formatter';
import { makeReader, parseFrom } from '../reader';
import { TimeRange } from '../types';
import { runReader } from './stream-helpers';

/**
 * Options for the gcp-stream command
 */
export interface GcpStreamCommandOptions {
  /** Project whose logs are streamed */
  project: string;
  /** Cloud Logging filter expression */
  filter?: string;
  /** "tail", a relative duration (10m, 2h, 1d) or YYYY-MM-DDTHH:MM:SS */
  from: string;
  /** Force login through the gcloud CLI */
  gcloudAuth?: boolean;
  /** Output format: raw, pretty, json */
  format: string;
}

/**
 * Main handler for the `logstream gcp-stream` subcommand
 */
export async function gcpStreamCommand(options: GcpStreamCommandOptions): Promise<void> {
  let timeRange: TimeRange;
  let formatter: RecordFormatter;
  try {
    timeRange = parseFrom(options.from);
    formatter = new RecordFormatter({ format: parseOutputFormat(options.format) });
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }

  const environment = await resolveCredentialEnvironment({ gcloudAuth: options.gcloudAuth });
  const backendFactory: LoggingBackendFactory = () =>
    createGcpBackend({ credentialsFile: environment.credentialsFile });

  try {
    await checkAuth(options.project, { backendFactory, environment });
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }

  if (timeRange.mode === 'tail') {
    logger.info(`Tailing logs of project ${options.project}`);
  } else {
    logger.info(`Streaming logs of project ${options.project} from ${timeRange.watermark}`);
  }

  const reader = makeReader(
    { kind: 'gcp', projectId: options.project, filter: options.filter, timeRange },
    undefined,
    { backendFactory }
  );
  const ok = await runReader(reader, formatter);
  if (!ok) {
    process.exit(1);
  }
}
