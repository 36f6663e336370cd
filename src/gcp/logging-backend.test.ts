/**
 * Unit tests for logging-backend.ts
 *
 * The gRPC client is mocked; tail sessions run over an in-process Duplex.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Duplex } from 'stream';
import { TransportError } from '../errors';
import { GcpReader } from '../reader/gcp-reader';
import { RawLogEntry } from '../reader/normalizer';
import { LOGGING_SCOPES, createGcpBackend, entriesOf, projectResource } from './logging-backend';

const mockClientOptions: unknown[] = [];
const mockGcp = {
  client: {
    listLogEntriesAsync: jest.fn(),
    tailLogEntries: jest.fn(),
    listLogs: jest.fn(),
    close: jest.fn(),
  },
};

jest.mock('@google-cloud/logging', () => ({
  v2: {
    LoggingServiceV2Client: jest.fn().mockImplementation((options: unknown) => {
      mockClientOptions.push(options);
      return mockGcp.client;
    }),
  },
}));

interface FakeTailStreamOptions {
  /** Fails every write with this error */
  writeError?: Error;
  /** Destroys the stream with this error on cancel, as a cancelled gRPC call does */
  cancelError?: Error;
}

/** Bidi stream: writes are captured as requests, pushes become responses */
class FakeTailStream extends Duplex {
  readonly requests: unknown[] = [];
  readonly cancel = jest.fn(() => {
    if (this.failures.cancelError) {
      this.destroy(this.failures.cancelError);
    }
  });

  constructor(private readonly failures: FakeTailStreamOptions = {}) {
    super({ objectMode: true });
  }

  _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.failures.writeError) {
      callback(this.failures.writeError);
      return;
    }
    this.requests.push(chunk);
    callback();
  }

  _read(): void {
    // Responses are pushed by the test
  }
}

describe('logging-backend', () => {
  const savedCredentials = process.env.GOOGLE_APPLICATION_CREDENTIALS;

  beforeEach(() => {
    jest.clearAllMocks();
    mockClientOptions.length = 0;
    delete process.env.GOOGLE_APPLICATION_CREDENTIALS;
  });

  afterAll(() => {
    if (savedCredentials === undefined) {
      delete process.env.GOOGLE_APPLICATION_CREDENTIALS;
    } else {
      process.env.GOOGLE_APPLICATION_CREDENTIALS = savedCredentials;
    }
  });

  describe('projectResource', () => {
    it('should name the project resource', () => {
      expect(projectResource('demo')).toBe('projects/demo');
    });
  });

  describe('entriesOf', () => {
    it('should return the entries of a response', () => {
      expect(entriesOf({ entries: [{ textPayload: 'a' }, { textPayload: 'b' }] })).toEqual([
        { textPayload: 'a' },
        { textPayload: 'b' },
      ]);
    });

    it('should drop values that are not entries', () => {
      expect(entriesOf({ entries: [{ textPayload: 'a' }, 'junk', null, [1]] })).toEqual([{ textPayload: 'a' }]);
    });

    it('should return nothing for responses without entries', () => {
      expect(entriesOf(undefined)).toEqual([]);
      expect(entriesOf({ suppressionInfo: [] })).toEqual([]);
      expect(entriesOf({ entries: 'none' })).toEqual([]);
    });
  });

  describe('createGcpBackend', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logging-backend-test-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should use application default credentials when no file is stored', async () => {
      await createGcpBackend({ credentialsFile: path.join(testDir, 'missing.json') });

      expect(mockClientOptions).toEqual([{ scopes: LOGGING_SCOPES, keyFilename: undefined }]);
    });

    it('should use stored credentials when present', async () => {
      const file = path.join(testDir, 'credentials.json');
      fs.writeFileSync(file, '{}');

      await createGcpBackend({ credentialsFile: file });

      expect(mockClientOptions).toEqual([{ scopes: LOGGING_SCOPES, keyFilename: file }]);
    });

    it('should leave GOOGLE_APPLICATION_CREDENTIALS in charge', async () => {
      const file = path.join(testDir, 'credentials.json');
      fs.writeFileSync(file, '{}');
      process.env.GOOGLE_APPLICATION_CREDENTIALS = '/etc/service-account.json';

      await createGcpBackend({ credentialsFile: file });

      expect(mockClientOptions).toEqual([{ scopes: LOGGING_SCOPES, keyFilename: undefined }]);
    });
  });

  describe('GcpLoggingBackend', () => {
    it('should list entries through the paging iterator', async () => {
      async function* pages(): AsyncGenerator<RawLogEntry> {
        yield { textPayload: 'first' };
        yield { textPayload: 'second' };
      }
      mockGcp.client.listLogEntriesAsync.mockReturnValue(pages());
      const backend = await createGcpBackend();
      const request = {
        resourceNames: ['projects/demo'],
        filter: 'timestamp > "2024-01-01T00:00:00Z"',
        pageSize: 100,
        orderBy: 'timestamp asc',
      };

      const entries: RawLogEntry[] = [];
      for await (const entry of backend.listEntries(request)) {
        entries.push(entry);
      }

      expect(mockGcp.client.listLogEntriesAsync).toHaveBeenCalledWith(request);
      expect(entries).toEqual([{ textPayload: 'first' }, { textPayload: 'second' }]);
    });

    it('should probe with a single unpaginated listLogs call', async () => {
      mockGcp.client.listLogs.mockResolvedValue([[]]);
      const backend = await createGcpBackend();

      await backend.probe('projects/demo');

      expect(mockGcp.client.listLogs).toHaveBeenCalledWith(
        { resourceNames: ['projects/demo'], pageSize: 1 },
        { autoPaginate: false }
      );
    });

    it('should surface probe failures', async () => {
      mockGcp.client.listLogs.mockRejectedValue(new Error('7 PERMISSION_DENIED'));
      const backend = await createGcpBackend();

      await expect(backend.probe('projects/demo')).rejects.toThrow('7 PERMISSION_DENIED');
    });

    it('should close the client', async () => {
      mockGcp.client.close.mockResolvedValue(undefined);
      const backend = await createGcpBackend();

      await backend.close();

      expect(mockGcp.client.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('tail session', () => {
    it('should send requests and yield the entries of each response', async () => {
      const stream = new FakeTailStream();
      mockGcp.client.tailLogEntries.mockReturnValue(stream);
      const backend = await createGcpBackend();
      const session = backend.tailEntries();

      await session.send({ resourceNames: ['projects/demo'], filter: 'severity>=ERROR' });
      stream.push({ entries: [{ textPayload: 'a' }, 'junk'] });
      stream.push({ entries: [] });
      stream.push({ entries: [{ textPayload: 'b' }] });
      stream.push(null);

      const batches: RawLogEntry[][] = [];
      for await (const batch of session) {
        batches.push(batch);
      }

      expect(stream.requests).toEqual([{ resourceNames: ['projects/demo'], filter: 'severity>=ERROR' }]);
      expect(batches).toEqual([[{ textPayload: 'a' }], [], [{ textPayload: 'b' }]]);
    });

    it('should end and cancel the underlying stream', async () => {
      const stream = new FakeTailStream();
      mockGcp.client.tailLogEntries.mockReturnValue(stream);
      const backend = await createGcpBackend();
      const session = backend.tailEntries();

      session.end();
      session.cancel();

      expect(stream.writableEnded).toBe(true);
      expect(stream.cancel).toHaveBeenCalledTimes(1);
    });

    it('should reject a failed request and rethrow the failure when iterated', async () => {
      const stream = new FakeTailStream({ writeError: new Error('7 PERMISSION_DENIED') });
      mockGcp.client.tailLogEntries.mockReturnValue(stream);
      const backend = await createGcpBackend();
      const session = backend.tailEntries();

      await expect(session.send({ resourceNames: ['projects/demo'] })).rejects.toThrow('7 PERMISSION_DENIED');
      await new Promise(resolve => setImmediate(resolve));

      await expect(collectBatches(session)).rejects.toThrow('7 PERMISSION_DENIED');
      expect(stream.destroyed).toBe(true);
    });

    it('should rethrow the error of a cancelled call when iterated', async () => {
      const stream = new FakeTailStream({ cancelError: new Error('1 CANCELLED: Cancelled on client') });
      mockGcp.client.tailLogEntries.mockReturnValue(stream);
      const backend = await createGcpBackend();
      const session = backend.tailEntries();

      session.cancel();
      await new Promise(resolve => setImmediate(resolve));

      await expect(collectBatches(session)).rejects.toThrow('1 CANCELLED: Cancelled on client');
    });

    it('should report a failed first request through the reader once', async () => {
      const stream = new FakeTailStream({ writeError: new Error('7 PERMISSION_DENIED') });
      mockGcp.client.tailLogEntries.mockReturnValue(stream);
      mockGcp.client.close.mockResolvedValue(undefined);
      const onError = jest.fn();
      const reader = new GcpReader({ projectId: 'demo', timeRange: { mode: 'tail' } }, undefined, {
        backendFactory: () => createGcpBackend(),
        onError,
      });

      await reader.streamInto();
      const result = await reader.done;
      await new Promise(resolve => setImmediate(resolve));

      expect(result.ok).toBe(false);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(TransportError));
      expect(onError.mock.calls[0][0].message).toBe('7 PERMISSION_DENIED');
      expect(mockGcp.client.close).toHaveBeenCalledTimes(1);
      expect(reader.channel.closed).toBe(true);
    });
  });
});

async function collectBatches(session: AsyncIterable<RawLogEntry[]>): Promise<RawLogEntry[][]> {
  const batches: RawLogEntry[][] = [];
  for await (const batch of session) {
    batches.push(batch);
  }
  return batches;
}
