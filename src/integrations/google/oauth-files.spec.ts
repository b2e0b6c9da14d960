import { readOAuthClient, readOAuthToken } from './oauth-files';

describe('oauth files', () => {
  it('reads an installed-app client secret', () => {
    const raw = JSON.stringify({
      installed: { client_id: 'client-1', client_secret: 'test-secret', redirect_uris: ['http://localhost'] },
    });

    expect(readOAuthClient(raw)).toEqual({
      clientId: 'client-1',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost',
    });
  });

  it('rejects a client file without credentials', () => {
    expect(() => readOAuthClient('{"web":{}}')).toThrow('no client_id/client_secret');
  });

  it('accepts the token field name written by other tooling', () => {
    expect(readOAuthToken('{"token":"test-access","refresh_token":"test-refresh"}')).toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      token_type: undefined,
      scope: undefined,
      expiry_date: undefined,
    });
  });

  it('rejects a token file without tokens', () => {
    expect(() => readOAuthToken('{}')).toThrow('neither refresh_token nor access_token');
  });
});
