#!/usr/bin/env node

import { Command } from 'commander';
import { parseLogLevel } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { StreamCommandOptions, streamCommand } from './commands/stream';
import { GcpStreamCommandOptions, gcpStreamCommand } from './commands/gcp-stream';

export const program = new Command();

program
  .name('logstream')
  .description('Stream log entries from files, stdin or Google Cloud Logging as JSON records')
  .version('0.1.0')
  .option('--log-level <level>', 'Log level: trace, debug, info, warn, error', 'info')
  .hook('preAction', thisCommand => {
    const { logLevel } = thisCommand.opts<{ logLevel: string }>();
    try {
      logger.setLevel(parseLogLevel(logLevel));
    } catch (error) {
      console.error(errorMessage(error));
      process.exit(1);
    }
  });

program
  .command('stream')
  .description(
    'Continuously stream a log file or standard input. When reading a file, rotation and truncation are detected and streaming continues.'
  )
  .option('-f, --file <path>', 'Input log file (reads standard input when omitted)')
  .option('--poll-interval <ms>', 'Rotation check interval in milliseconds (env: LOGSTREAM_POLL_INTERVAL_MS)')
  .option('--format <format>', 'Output format: raw, pretty, json', 'raw')
  .addHelpText(
    'after',
    `
Examples:
  logstream stream --file /var/log/app.log
  some-command | logstream stream --format pretty`
  )
  .action(async (options: StreamCommandOptions) => {
    await streamCommand(options);
  });

program
  .command('gcp-stream')
  .description('Stream entries of a Google Cloud project, replaying history before following live')
  .requiredOption('-p, --project <id>', 'Google Cloud project ID')
  .option('--filter <query>', 'Cloud Logging filter expression')
  .option('--from <spec>', 'Start point: "tail", a relative time (30s, 10m, 2h, 1d) or YYYY-MM-DDTHH:MM:SS', 'tail')
  .option('--gcloud-auth', 'Log in through the gcloud CLI when credentials are missing (env: LOGSTREAM_USE_GCLOUD)')
  .option('--format <format>', 'Output format: raw, pretty, json', 'raw')
  .action(async (options: GcpStreamCommandOptions) => {
    await gcpStreamCommand(options);
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
