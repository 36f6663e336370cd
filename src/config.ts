/**
 * Option and environment parsing for the CLI
 */

import * as os from 'os';
import * as path from 'path';
import execa from 'execa';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { CredentialEnvironment, LogLevel, OutputFormat } from './types';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['raw', 'pretty', 'json'];

/**
 * Default location of credentials stored by the browser login
 */
export function defaultCredentialsFile(): string {
  return path.join(os.homedir(), '.config', 'logstream', 'gcp-credentials.json');
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new ConfigurationError(`Invalid log level: ${value} (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new ConfigurationError(`Invalid format: ${value} (expected one of ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

/**
 * Parses the file polling interval from the option, falling back to
 * LOGSTREAM_POLL_INTERVAL_MS
 *
 * @returns undefined when neither is set
 */
export function parsePollInterval(
  value: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): number | undefined {
  const raw = value ?? env.LOGSTREAM_POLL_INTERVAL_MS;
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`Invalid poll interval: ${raw} (expected milliseconds)`);
  }
  const interval = Number.parseInt(raw.trim(), 10);
  if (interval <= 0) {
    throw new ConfigurationError(`Invalid poll interval: ${raw} (must be greater than 0)`);
  }
  return interval;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Checks whether the gcloud CLI is installed
 */
export async function isGcloudAvailable(): Promise<boolean> {
  const result = await execa('gcloud', ['--version'], { reject: false });
  return !result.failed && result.exitCode === 0;
}

export interface CredentialEnvironmentOptions {
  /** --gcloud-auth */
  gcloudAuth?: boolean;
  env?: NodeJS.ProcessEnv;
  detectGcloud?: () => Promise<boolean>;
}

/**
 * Works out how credentials are acquired when the access probe fails.
 * The flag or LOGSTREAM_USE_GCLOUD force the gcloud CLI, otherwise it is
 * used when installed.
 */
export async function resolveCredentialEnvironment(
  options: CredentialEnvironmentOptions = {}
): Promise<CredentialEnvironment> {
  const env = options.env ?? process.env;
  const detect = options.detectGcloud ?? isGcloudAvailable;

  let usesGcloud = options.gcloudAuth === true || isTruthy(env.LOGSTREAM_USE_GCLOUD);
  if (!usesGcloud) {
    usesGcloud = await detect();
  }
  logger.debug(`Credential acquisition: ${usesGcloud ? 'gcloud CLI' : 'browser login'}`);

  return {
    usesGcloud,
    credentialsFile: env.LOGSTREAM_CREDENTIALS_FILE || defaultCredentialsFile(),
    oauthClientId: env.LOGSTREAM_OAUTH_CLIENT_ID || undefined,
    oauthClientSecret: env.LOGSTREAM_OAUTH_CLIENT_SECRET || undefined,
  };
}
