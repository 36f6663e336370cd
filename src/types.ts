/**
 * Shared types for the log streaming readers and the CLI
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Output format for records written to stdout
 */
export type OutputFormat = 'raw' | 'pretty' | 'json';

/**
 * Kind of source a reader pulls entries from
 */
export type ReaderType = 'file' | 'stdin' | 'gcp';

/**
 * Resolved "from" specification: either live-only, or a resume point
 */
export type TimeRange =
  | { mode: 'tail' }
  | { mode: 'from'; watermark: string };

/**
 * Callback invoked once when a reader fails after it has started
 */
export type ErrorCallback = (error: Error) => void;

/**
 * Options shared by every reader
 */
export interface ReaderOptions {
  /** Error sink. Without one, failures are only visible through `done` */
  onError?: ErrorCallback;
  /** Channel capacity when the reader allocates its own channel. Default: 1 */
  capacity?: number;
}

/**
 * Configuration for tailing a local file (or stdin when fileName is empty)
 */
export interface FileReaderConfig extends ReaderOptions {
  kind: 'file';
  /** Path of the file to follow. Empty or undefined reads stdin */
  fileName?: string;
  /** Rotation/append polling interval in milliseconds. Default: 1000 */
  pollIntervalMs?: number;
}

/**
 * Configuration for streaming entries from Cloud Logging
 */
export interface GcpReaderConfig extends ReaderOptions {
  kind: 'gcp';
  /** Project ID whose logs are read */
  projectId: string;
  /** Optional Cloud Logging filter expression */
  filter?: string;
  /** Resolved time range (see parseFrom) */
  timeRange: TimeRange;
}

export type ReaderConfig = FileReaderConfig | GcpReaderConfig;

/**
 * Capabilities of the environment used by the authentication gate
 */
export interface CredentialEnvironment {
  /** True when credentials are managed by the gcloud CLI */
  usesGcloud: boolean;
  /** Where the browser login stores authorized-user credentials */
  credentialsFile: string;
  /** OAuth client used by the browser login */
  oauthClientId?: string;
  oauthClientSecret?: string;
}
