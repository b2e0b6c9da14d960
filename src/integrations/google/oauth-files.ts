import { Auth } from 'googleapis';

export interface OAuthClientInfo {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject => typeof value === 'object' && value !== null;
const optionalString = (value: unknown) => (typeof value === 'string' ? value : undefined);

/** Reads a client secret file as downloaded from the Google console (`installed` or `web`). */
export function readOAuthClient(raw: string): OAuthClientInfo {
  const parsed: unknown = JSON.parse(raw);
  const section = isObject(parsed) ? (parsed.installed ?? parsed.web) : undefined;
  if (!isObject(section) || typeof section.client_id !== 'string' || typeof section.client_secret !== 'string') {
    throw new Error('OAuth client secret file has no client_id/client_secret');
  }
  const redirects = section.redirect_uris;
  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    redirectUri: Array.isArray(redirects) ? optionalString(redirects[0]) : undefined,
  };
}

export function readOAuthToken(raw: string): Auth.Credentials {
  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) {
    throw new Error('OAuth token file is not a JSON object');
  }
  const refreshToken = optionalString(parsed.refresh_token);
  const accessToken = optionalString(parsed.access_token) ?? optionalString(parsed.token);
  if (!refreshToken && !accessToken) {
    throw new Error('OAuth token file has neither refresh_token nor access_token');
  }
  const expiry = parsed.expiry_date;
  return {
    refresh_token: refreshToken,
    access_token: accessToken,
    token_type: optionalString(parsed.token_type),
    scope: optionalString(parsed.scope),
    expiry_date: typeof expiry === 'number' ? expiry : undefined,
  };
}
