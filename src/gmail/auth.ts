import { google } from 'googleapis';
import { OAuth2Client, Credentials } from 'google-auth-library';
import fs from 'fs-extra';
import path from 'path';
import readline from 'readline';
import { GmailConfig } from '../config';
import { configurationError } from '../utils/errors';
import { logger } from '../utils/logger';

// Reading messages and adding the Processed label
const SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];

interface ClientSecrets {
  client_id: string;
  client_secret: string;
  redirect_uris: string[];
}

function isClientSecrets(value: unknown): value is ClientSecrets {
  return (
    typeof value === 'object' && value !== null &&
    'client_id' in value && typeof value.client_id === 'string' &&
    'client_secret' in value && typeof value.client_secret === 'string' &&
    'redirect_uris' in value && Array.isArray(value.redirect_uris)
  );
}

async function loadClientSecrets(credentialsPath: string): Promise<ClientSecrets> {
  let credentials: unknown;
  try {
    credentials = await fs.readJson(credentialsPath);
  } catch (err) {
    throw configurationError(
      `Error loading client secret file at ${credentialsPath}. Please create one from Google Cloud Console.`,
      { cause: String(err) }
    );
  }

  const secrets =
    typeof credentials === 'object' && credentials !== null
      ? ('installed' in credentials ? credentials.installed : 'web' in credentials ? credentials.web : undefined)
      : undefined;

  if (!isClientSecrets(secrets)) {
    throw configurationError(`${credentialsPath} does not hold an "installed" or "web" OAuth client`);
  }
  return secrets;
}

export async function authorize(config: GmailConfig, options: { forceNewToken?: boolean } = {}): Promise<OAuth2Client> {
  const { client_secret, client_id, redirect_uris } = await loadClientSecrets(config.oauthCredentialsPath);
  const oAuth2Client = new google.auth.OAuth2(client_id, client_secret, redirect_uris[0]);

  if (!options.forceNewToken && (await fs.pathExists(config.tokenPath))) {
    const token: Credentials = await fs.readJson(config.tokenPath);
    oAuth2Client.setCredentials(token);
    return oAuth2Client;
  }

  return getNewToken(oAuth2Client, config.tokenPath);
}

/**
 * Accepts either the bare code or the whole redirect URL
 */
export function extractAuthCode(input: string): string {
  const code = input.trim();
  const match = code.match(/code=([^&]*)/);
  return match ? decodeURIComponent(match[1]) : code;
}

async function getNewToken(oAuth2Client: OAuth2Client, tokenPath: string): Promise<OAuth2Client> {
  const authUrl = oAuth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
  });
  console.log('Authorize this app by visiting this url:', authUrl);
  console.log('\nNOTE: If you are redirected to "This site can\'t be reached" (localhost),');
  console.log('copy the "code" parameter from the URL in your browser address bar.');
  console.log('Example: http://localhost/?code=4/0Acv...&scope=... -> Copy "4/0Acv..."\n');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const input = await new Promise<string>(resolve => {
    rl.question('Enter the code from that page here: ', answer => {
      rl.close();
      resolve(answer);
    });
  });

  const { tokens } = await oAuth2Client.getToken(extractAuthCode(input));
  oAuth2Client.setCredentials(tokens);
  await fs.ensureDir(path.dirname(tokenPath));
  await fs.writeJson(tokenPath, tokens);
  logger.info(`Token stored to ${tokenPath}`);
  return oAuth2Client;
}
