/**
 * Browser-based OAuth login storing authorized-user credentials
 */

import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import execa from 'execa';
import { OAuth2Client } from 'google-auth-library';
import { AccessError, errorMessage } from '../errors';
import { logger } from '../logger';
import { CredentialEnvironment } from '../types';
import { LOGGING_SCOPES } from './logging-backend';

const CALLBACK_PATH = '/oauth2callback';
const LOGIN_TIMEOUT_MS = 5 * 60 * 1000;

export interface BrowserLoginDependencies {
  openUrl: (url: string) => Promise<void>;
  timeoutMs: number;
}

/**
 * Opens a URL with the platform's default handler
 */
export async function openInBrowser(url: string, platform: NodeJS.Platform = process.platform): Promise<void> {
  if (platform === 'darwin') {
    await execa('open', [url]);
  } else if (platform === 'win32') {
    await execa('cmd', ['/c', 'start', '""', url]);
  } else {
    await execa('xdg-open', [url]);
  }
}

interface CallbackServer {
  redirectUri: string;
  code: Promise<string>;
  close: () => void;
}

/**
 * Starts a loopback server that resolves with the authorization code of the
 * first request on the callback path
 */
async function startCallbackServer(timeoutMs: number): Promise<CallbackServer> {
  let resolveCode: (code: string) => void = () => undefined;
  let rejectCode: (error: Error) => void = () => undefined;
  const code = new Promise<string>((resolve, reject) => {
    resolveCode = resolve;
    rejectCode = reject;
  });
  // Awaited later; a rejection may land while the browser is still opening
  code.catch(() => undefined);

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://127.0.0.1');
    if (url.pathname !== CALLBACK_PATH) {
      res.writeHead(404).end();
      return;
    }

    const error = url.searchParams.get('error');
    const authCode = url.searchParams.get('code');
    res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
    if (authCode) {
      res.end('Authentication complete. You can close this window.');
      resolveCode(authCode);
    } else {
      res.end('Authentication failed. You can close this window.');
      rejectCode(new AccessError(`Authorization was not granted: ${error ?? 'no code returned'}`));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const timer = setTimeout(() => {
    rejectCode(new AccessError('Timed out waiting for the browser login to complete'));
  }, timeoutMs);

  const address = server.address();
  if (address === null || typeof address === 'string') {
    clearTimeout(timer);
    server.close();
    throw new AccessError('Could not start the login callback server');
  }

  return {
    redirectUri: `http://127.0.0.1:${address.port}${CALLBACK_PATH}`,
    code,
    close: () => {
      clearTimeout(timer);
      server.close();
    },
  };
}

/**
 * Writes credentials in the application-default "authorized_user" format
 */
export function storeCredentials(file: string, clientId: string, clientSecret: string, refreshToken: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
  const content = {
    type: 'authorized_user',
    client_id: clientId,
    client_secret: clientSecret,
    refresh_token: refreshToken,
  };
  fs.writeFileSync(file, JSON.stringify(content, null, 2), { mode: 0o600 });
}

/**
 * Runs the OAuth consent flow in the user's browser and stores the
 * resulting refresh token in the credentials file
 *
 * @throws AccessError when the client is not configured or consent fails
 */
export async function runBrowserLogin(
  environment: CredentialEnvironment,
  dependencies: Partial<BrowserLoginDependencies> = {}
): Promise<void> {
  const { oauthClientId, oauthClientSecret, credentialsFile } = environment;
  if (!oauthClientId || !oauthClientSecret) {
    throw new AccessError(
      'Browser login requires LOGSTREAM_OAUTH_CLIENT_ID and LOGSTREAM_OAUTH_CLIENT_SECRET (or use --gcloud-auth)'
    );
  }

  const openUrl = dependencies.openUrl ?? openInBrowser;
  const callback = await startCallbackServer(dependencies.timeoutMs ?? LOGIN_TIMEOUT_MS);

  try {
    const client = new OAuth2Client({
      clientId: oauthClientId,
      clientSecret: oauthClientSecret,
      redirectUri: callback.redirectUri,
    });
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: LOGGING_SCOPES,
    });

    logger.debug(`Opening browser for consent: ${authUrl}`);
    try {
      await openUrl(authUrl);
    } catch (error) {
      logger.warn(`Could not open a browser (${errorMessage(error)}). Visit this URL to continue: ${authUrl}`);
    }

    const code = await callback.code;
    const { tokens } = await client.getToken(code);
    if (!tokens.refresh_token) {
      throw new AccessError('Authorization server did not return a refresh token');
    }

    storeCredentials(credentialsFile, oauthClientId, oauthClientSecret, tokens.refresh_token);
    logger.debug(`Stored credentials in ${credentialsFile}`);
  } catch (error) {
    if (error instanceof AccessError) {
      throw error;
    }
    throw new AccessError(`Browser login failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    callback.close();
  }
}
