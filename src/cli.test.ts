/**
 * Unit tests for the commander program
 */

import { program } from './cli';
import { gcpStreamCommand } from './commands/gcp-stream';
import { streamCommand } from './commands/stream';
import { logger } from './logger';

jest.mock('./commands/stream');
jest.mock('./commands/gcp-stream');

const mockedStreamCommand = jest.mocked(streamCommand);
const mockedGcpStreamCommand = jest.mocked(gcpStreamCommand);

describe('cli', () => {
  afterAll(() => {
    logger.setLevel('info');
  });

  it('should register the streaming commands', () => {
    expect(program.name()).toBe('logstream');
    expect(program.commands.map(command => command.name())).toEqual(['stream', 'gcp-stream']);
  });

  it('should pass stream options to the handler', async () => {
    mockedStreamCommand.mockResolvedValue(undefined);

    await program.parseAsync(['stream', '--file', '/var/log/app.log', '--poll-interval', '250', '--format', 'pretty'], {
      from: 'user',
    });

    expect(mockedStreamCommand).toHaveBeenCalledWith({
      file: '/var/log/app.log',
      pollInterval: '250',
      format: 'pretty',
    });
  });

  it('should pass gcp-stream options and apply the log level', async () => {
    mockedGcpStreamCommand.mockResolvedValue(undefined);

    await program.parseAsync(
      ['--log-level', 'debug', 'gcp-stream', '-p', 'demo', '--filter', 'severity>=ERROR', '--gcloud-auth'],
      { from: 'user' }
    );

    expect(mockedGcpStreamCommand).toHaveBeenCalledWith({
      project: 'demo',
      filter: 'severity>=ERROR',
      gcloudAuth: true,
      from: 'tail',
      format: 'raw',
    });
    expect(logger.getLevel()).toBe('debug');
  });
});
