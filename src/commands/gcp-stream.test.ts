/**
 * Unit tests for the gcp-stream command handler
 */

import { resolveCredentialEnvironment } from '../config';
import { AccessError } from '../errors';
import { checkAuth } from '../gcp/auth-gate';
import { createGcpBackend } from '../gcp/logging-backend';
import { logger } from '../logger';
import { Reader, makeReader } from '../reader';
import { RecordChannel } from '../reader/record-channel';
import { CredentialEnvironment } from '../types';
import { FakeLoggingBackend } from '../__tests__/fake-logging-backend';
import { gcpStreamCommand } from './gcp-stream';
import { runReader } from './stream-helpers';

jest.mock('../config', () => ({
  ...jest.requireActual<typeof import('../config')>('../config'),
  resolveCredentialEnvironment: jest.fn(),
}));
jest.mock('../reader', () => ({
  ...jest.requireActual<typeof import('../reader')>('../reader'),
  makeReader: jest.fn(),
}));
jest.mock('../gcp/auth-gate');
jest.mock('../gcp/logging-backend', () => ({
  ...jest.requireActual<typeof import('../gcp/logging-backend')>('../gcp/logging-backend'),
  createGcpBackend: jest.fn(),
}));
jest.mock('./stream-helpers');
jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const mockedResolveEnvironment = jest.mocked(resolveCredentialEnvironment);
const mockedCheckAuth = jest.mocked(checkAuth);
const mockedCreateBackend = jest.mocked(createGcpBackend);
const mockedMakeReader = jest.mocked(makeReader);
const mockedRunReader = jest.mocked(runReader);
const mockedLogger = jest.mocked(logger);

describe('gcpStreamCommand', () => {
  let processExitSpy: jest.SpyInstance;
  const environment: CredentialEnvironment = {
    usesGcloud: true,
    credentialsFile: '/tmp/logstream-test/credentials.json',
  };
  const reader: Reader = {
    type: 'gcp',
    channel: new RecordChannel<string>(),
    done: Promise.resolve({ ok: true }),
    streamInto: async () => undefined,
    close: () => undefined,
  };

  beforeEach(() => {
    jest.clearAllMocks();
    processExitSpy = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    mockedResolveEnvironment.mockResolvedValue(environment);
    mockedCheckAuth.mockResolvedValue(undefined);
    mockedCreateBackend.mockResolvedValue(new FakeLoggingBackend());
    mockedMakeReader.mockReturnValue(reader);
    mockedRunReader.mockResolvedValue(true);
  });

  afterEach(() => {
    processExitSpy.mockRestore();
  });

  it('should check access, then stream with the same backend factory', async () => {
    await gcpStreamCommand({ project: 'demo', filter: 'severity>=ERROR', from: 'tail', gcloudAuth: true, format: 'raw' });

    expect(mockedResolveEnvironment).toHaveBeenCalledWith({ gcloudAuth: true });
    expect(mockedCheckAuth).toHaveBeenCalledWith('demo', { backendFactory: expect.any(Function), environment });

    const { backendFactory } = mockedCheckAuth.mock.calls[0][1];
    expect(mockedMakeReader).toHaveBeenCalledWith(
      { kind: 'gcp', projectId: 'demo', filter: 'severity>=ERROR', timeRange: { mode: 'tail' } },
      undefined,
      { backendFactory }
    );
    expect(mockedLogger.info).toHaveBeenCalledWith('Tailing logs of project demo');
    expect(processExitSpy).not.toHaveBeenCalled();

    await backendFactory();
    expect(mockedCreateBackend).toHaveBeenCalledWith({ credentialsFile: environment.credentialsFile });
  });

  it('should pass a resume point for a relative start', async () => {
    await gcpStreamCommand({ project: 'demo', from: '10m', format: 'raw' });

    const [config] = mockedMakeReader.mock.calls[0];
    expect(config).toMatchObject({ kind: 'gcp', projectId: 'demo', timeRange: { mode: 'from' } });
    expect(mockedLogger.info).toHaveBeenCalledWith(expect.stringMatching(/^Streaming logs of project demo from /));
  });

  it('should exit before authenticating for an invalid start', async () => {
    await expect(gcpStreamCommand({ project: 'demo', from: 'yesterday', format: 'raw' })).rejects.toThrow(
      'process.exit called'
    );

    expect(mockedLogger.error).toHaveBeenCalledWith("Invalid parameter for 'from' flag: yesterday");
    expect(mockedCheckAuth).not.toHaveBeenCalled();
  });

  it('should exit when access cannot be established', async () => {
    mockedCheckAuth.mockRejectedValue(new AccessError('Still unable to read logs of demo: PERMISSION_DENIED'));

    await expect(gcpStreamCommand({ project: 'demo', from: 'tail', format: 'raw' })).rejects.toThrow(
      'process.exit called'
    );

    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(mockedLogger.error).toHaveBeenCalledWith('Still unable to read logs of demo: PERMISSION_DENIED');
    expect(mockedMakeReader).not.toHaveBeenCalled();
  });

  it('should exit with status 1 when the stream fails', async () => {
    mockedRunReader.mockResolvedValue(false);

    await expect(gcpStreamCommand({ project: 'demo', from: 'tail', format: 'raw' })).rejects.toThrow(
      'process.exit called'
    );

    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
