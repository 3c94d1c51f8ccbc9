/**
 * Google OAuth: read stored credentials and exchange the refresh token
 */

import { readFile } from 'node:fs/promises';
import {
  AuthorizedUserSchema,
  TokenResponseSchema,
  formatValidationErrors,
} from '../../schemas/index.js';
import { AuthError, errorMessage, isFileNotFound } from '../../src/errors.js';
import type { FetchLike, GoogleOAuthCredentials } from './types.js';

export const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

/**
 * Load an "authorized user" credentials file (client id, secret, refresh token)
 */
export async function loadCredentialsFile(path: string): Promise<GoogleOAuthCredentials> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new AuthError(`Credentials file not found: ${path}`, { cause: error });
    }
    throw new AuthError(`Failed to read credentials file ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new AuthError(`Credentials file is not valid JSON: ${path}`, { cause: error });
  }

  const result = AuthorizedUserSchema.safeParse(document);
  if (!result.success) {
    const details = formatValidationErrors(result.error).join('; ');
    throw new AuthError(`Invalid credentials in ${path}: ${details}`, { cause: result.error });
  }

  return {
    clientId: result.data.client_id,
    clientSecret: result.data.client_secret,
    refreshToken: result.data.refresh_token,
  };
}

/**
 * Get access token from refresh token
 */
export async function getAccessToken(
  credentials: GoogleOAuthCredentials,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const params = new URLSearchParams({
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    refresh_token: credentials.refreshToken,
    grant_type: 'refresh_token',
    scope: CALENDAR_SCOPES.join(' '),
  });

  let response: Response;
  try {
    response = await fetchImpl(GOOGLE_TOKEN_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: params.toString(),
    });
  } catch (error) {
    throw new AuthError(`Google OAuth request failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new AuthError(`Google OAuth error: ${response.status} ${response.statusText}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new AuthError('Google OAuth returned invalid JSON', { cause: error });
  }

  const result = TokenResponseSchema.safeParse(body);
  if (!result.success) {
    throw new AuthError('Google OAuth response missing access_token', { cause: result.error });
  }

  return result.data.access_token;
}
