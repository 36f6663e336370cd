/**
 * Access check run before a Cloud Logging reader is created
 */

import chalk from 'chalk';
import execa from 'execa';
import { AccessError, errorMessage } from '../errors';
import { logger } from '../logger';
import { CredentialEnvironment } from '../types';
import { LoggingBackend, LoggingBackendFactory, projectResource } from './logging-backend';
import { runBrowserLogin } from './oauth';

export const AUTH_MESSAGE = 'Authenticating with gcloud... \nRedirecting to your browser.';

/**
 * Foreground indicator shown while credentials are acquired
 */
export interface AuthIndicator {
  /** `animate` false prints the message only, leaving the terminal to a foreground child */
  start(message: string, animate?: boolean): void;
  stop(): void;
}

const SPINNER_FRAMES = ['|', '/', '-', '\\'];

/**
 * The part of a terminal stream the indicator draws on
 */
export interface IndicatorStream {
  readonly isTTY?: boolean;
  write(text: string): boolean;
}

/**
 * Spinner drawn on stderr until stopped
 */
export class TerminalIndicator implements AuthIndicator {
  private timer?: NodeJS.Timeout;
  private frame = 0;

  constructor(private readonly stream: IndicatorStream = process.stderr) {}

  start(message: string, animate = true): void {
    this.stop();
    this.stream.write(`${chalk.cyan(message)}\n`);
    if (!animate || !this.stream.isTTY) {
      return;
    }
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.stream.write(`\r${chalk.cyan(SPINNER_FRAMES[this.frame])} waiting for credentials`);
    }, 100);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.stream.write('\r\x1b[K');
    }
  }
}

/**
 * Runs `gcloud auth application-default login` in the foreground
 */
export async function gcloudLogin(): Promise<void> {
  await execa('gcloud', ['auth', 'application-default', 'login'], { stdio: 'inherit' });
}

export interface AuthGateDependencies {
  backendFactory: LoggingBackendFactory;
  environment: CredentialEnvironment;
  indicator?: AuthIndicator;
  browserLogin?: (environment: CredentialEnvironment) => Promise<void>;
  gcloudLogin?: () => Promise<void>;
  /** Ends the process when delegated login fails. Default: process.exit */
  exit?: (code: number) => void;
}

async function probe(factory: LoggingBackendFactory, projectId: string): Promise<void> {
  let backend: LoggingBackend | undefined;
  try {
    backend = await factory();
    await backend.probe(projectResource(projectId));
  } finally {
    await backend?.close();
  }
}

/**
 * Verifies that entries of the project can be read, acquiring credentials
 * interactively when they cannot.
 *
 * With the gcloud CLI the login is delegated to it, and a failed login ends
 * the process. Otherwise the browser login runs; its failures, and a probe
 * that still fails afterwards, reject with AccessError.
 */
export async function checkAuth(projectId: string, dependencies: AuthGateDependencies): Promise<void> {
  try {
    await probe(dependencies.backendFactory, projectId);
    logger.debug(`Access to logs of ${projectId} verified`);
    return;
  } catch (error) {
    logger.debug(`Access probe failed: ${errorMessage(error)}`);
  }

  const indicator = dependencies.indicator ?? new TerminalIndicator();
  const exit = dependencies.exit ?? ((code: number) => process.exit(code));

  // gcloud prints its own URL and prompts on the inherited terminal
  indicator.start(AUTH_MESSAGE, !dependencies.environment.usesGcloud);
  try {
    if (dependencies.environment.usesGcloud) {
      try {
        await (dependencies.gcloudLogin ?? gcloudLogin)();
      } catch (error) {
        indicator.stop();
        logger.error(`gcloud login failed: ${errorMessage(error)}`);
        exit(1);
        return;
      }
    } else {
      await (dependencies.browserLogin ?? runBrowserLogin)(dependencies.environment);
    }
  } finally {
    indicator.stop();
  }

  try {
    await probe(dependencies.backendFactory, projectId);
  } catch (error) {
    throw new AccessError(`Still unable to read logs of ${projectId}: ${errorMessage(error)}`, { cause: error });
  }
  logger.success('Authenticated with Google Cloud');
}
