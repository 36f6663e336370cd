/**
 * Cloud Logging access used by the remote reader and the auth gate
 */

import * as fs from 'fs';
import { v2 } from '@google-cloud/logging';
import { logger } from '../logger';
import { RawLogEntry } from '../reader/normalizer';

/**
 * Read permissions needed to query entries and to list logs for the access probe
 */
export const LOGGING_SCOPES = [
  'https://www.googleapis.com/auth/logging.read',
  'https://www.googleapis.com/auth/cloud-platform.read-only',
];

export const HISTORICAL_PAGE_SIZE = 100;

export interface ListEntriesRequest {
  resourceNames: string[];
  filter: string;
  pageSize: number;
  orderBy: string;
}

export interface TailEntriesRequest {
  resourceNames: string[];
  filter?: string;
}

/**
 * A bidirectional live-tail session. Iterating yields the entries of each
 * response batch in arrival order, and ends when the server closes the stream.
 */
export interface TailSession extends AsyncIterable<RawLogEntry[]> {
  send(request: TailEntriesRequest): Promise<void>;
  /** Half-closes the session (no more requests) */
  end(): void;
  /** Aborts the session; a pending iteration ends or rejects */
  cancel(): void;
}

export interface LoggingBackend {
  /** Entries matching the request, across every page */
  listEntries(request: ListEntriesRequest): AsyncIterable<RawLogEntry>;
  tailEntries(): TailSession;
  /** Lightweight read-only call that fails when credentials are missing or lack access */
  probe(resourceName: string): Promise<void>;
  close(): Promise<void>;
}

export type LoggingBackendFactory = () => Promise<LoggingBackend>;

export interface GcpBackendOptions {
  /** Authorized-user credentials written by the browser login, used when present */
  credentialsFile?: string;
}

type LoggingClient = InstanceType<typeof v2.LoggingServiceV2Client>;
type TailStream = ReturnType<LoggingClient['tailLogEntries']>;

export function projectResource(projectId: string): string {
  return `projects/${projectId}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function isEntry(value: unknown): value is RawLogEntry {
  return isRecord(value) && !Array.isArray(value);
}

/**
 * Pulls the entries out of one TailLogEntriesResponse
 */
export function entriesOf(response: unknown): RawLogEntry[] {
  if (!isRecord(response) || !Array.isArray(response.entries)) {
    return [];
  }
  return response.entries.filter(isEntry);
}

class GcpTailSession implements TailSession {
  private failure?: Error;

  constructor(private readonly stream: TailStream) {
    // A failed write or a cancel emits 'error' before anything iterates
    this.stream.on('error', (error: Error) => {
      if (!this.failure) {
        this.failure = error;
      }
    });
  }

  send(request: TailEntriesRequest): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(request, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  end(): void {
    this.stream.end();
  }

  cancel(): void {
    this.stream.cancel();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawLogEntry[]> {
    if (this.failure) {
      throw this.failure;
    }
    for await (const response of this.stream) {
      yield entriesOf(response);
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

class GcpLoggingBackend implements LoggingBackend {
  constructor(private readonly client: LoggingClient) {}

  listEntries(request: ListEntriesRequest): AsyncIterable<RawLogEntry> {
    return this.client.listLogEntriesAsync(request);
  }

  tailEntries(): TailSession {
    return new GcpTailSession(this.client.tailLogEntries());
  }

  async probe(resourceName: string): Promise<void> {
    await this.client.listLogs({ resourceNames: [resourceName], pageSize: 1 }, { autoPaginate: false });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * Creates a backend on the Cloud Logging v2 gRPC client.
 *
 * Application default credentials are used unless the browser login has
 * stored credentials and GOOGLE_APPLICATION_CREDENTIALS is not set.
 */
export async function createGcpBackend(options: GcpBackendOptions = {}): Promise<LoggingBackend> {
  const keyFilename =
    options.credentialsFile && !process.env.GOOGLE_APPLICATION_CREDENTIALS && fs.existsSync(options.credentialsFile)
      ? options.credentialsFile
      : undefined;

  if (keyFilename) {
    logger.debug(`Using stored credentials from ${keyFilename}`);
  }

  const client = new v2.LoggingServiceV2Client({ scopes: LOGGING_SCOPES, keyFilename });
  return new GcpLoggingBackend(client);
}
