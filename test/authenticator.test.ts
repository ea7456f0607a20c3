import { AuthError } from '@azure/msal-node';
import type {
  AccountInfo,
  AuthorizationCodeRequest,
  AuthorizationUrlRequest,
  InteractiveRequest,
  SilentFlowRequest,
} from '@azure/msal-node';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CredentialStore } from '../src/auth/credential-store.js';
import { MicrosoftAuthenticator, parseRedirectUrl } from '../src/auth/microsoft.js';
import type {
  AuthenticatorOptions,
  IdentityClient,
  TokenCacheLike,
  TokenResult,
} from '../src/auth/microsoft.js';
import { createSilentLogger } from '../src/utils/logger.js';

const account: AccountInfo = {
  homeAccountId: 'home-1',
  environment: 'login.microsoftonline.com',
  tenantId: 'tenant-1',
  username: 'user@example.com',
  localAccountId: 'local-1',
};

function token(accessToken: string): TokenResult {
  return { accessToken, account, expiresOn: null };
}

class MemoryStore implements CredentialStore {
  saved: string[] = [];

  constructor(private content: string | null = null) {}

  async load(): Promise<string | null> {
    return this.content;
  }

  async save(serialized: string): Promise<void> {
    this.saved.push(serialized);
    this.content = serialized;
  }
}

class FakeIdentityClient implements IdentityClient {
  accounts: AccountInfo[] = [];
  deserialized: string[] = [];
  calls: string[] = [];
  authUrlRequest?: AuthorizationUrlRequest;
  codeRequest?: AuthorizationCodeRequest;

  silent: () => Promise<TokenResult | null> = async () => null;
  interactive: () => Promise<TokenResult | null> = async () => {
    throw new AuthError('user_cancelled', 'The user closed the sign-in window');
  };
  byCode: () => Promise<TokenResult | null> = async () => token('manual-token');

  getTokenCache(): TokenCacheLike {
    return {
      getAllAccounts: async () => this.accounts,
      serialize: () => 'serialized-cache',
      deserialize: (cache: string) => {
        this.deserialized.push(cache);
      },
    };
  }

  async acquireTokenSilent(request: SilentFlowRequest): Promise<TokenResult | null> {
    this.calls.push(`silent:${request.account.username}`);
    return this.silent();
  }

  async acquireTokenInteractive(_request: InteractiveRequest): Promise<TokenResult | null> {
    this.calls.push('interactive');
    return this.interactive();
  }

  async getAuthCodeUrl(request: AuthorizationUrlRequest): Promise<string> {
    this.calls.push('authUrl');
    this.authUrlRequest = request;
    return `https://login.test/authorize?state=${request.state ?? ''}`;
  }

  async acquireTokenByCode(request: AuthorizationCodeRequest): Promise<TokenResult | null> {
    this.calls.push('byCode');
    this.codeRequest = request;
    return this.byCode();
  }
}

function options(overrides: Partial<AuthenticatorOptions> = {}): AuthenticatorOptions {
  return {
    scopes: ['Tasks.Read'],
    redirectUri: 'http://localhost',
    interactive: true,
    interactiveTimeoutMs: 1000,
    prompt: async () => {
      throw new Error('prompt should not be called');
    },
    ...overrides,
  };
}

/** Prompt that pastes back a redirect URL carrying the state the client was asked for */
function pasteRedirect(client: FakeIdentityClient, query: (state: string) => string) {
  return async () => `http://localhost/?${query(client.authUrlRequest?.state ?? '')}`;
}

describe('MicrosoftAuthenticator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the cached account without any sign-in', async () => {
    const client = new FakeIdentityClient();
    client.accounts = [account];
    client.silent = async () => token('silent-token');
    const store = new MemoryStore('cached-blob');
    const auth = new MicrosoftAuthenticator(client, store, options(), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toEqual({ ok: true, accessToken: 'silent-token', account, source: 'silent' });
    expect(client.calls).toEqual(['silent:user@example.com']);
    expect(client.deserialized).toEqual(['cached-blob']);
    expect(store.saved).toEqual(['serialized-cache']);
    expect(auth.currentState).toBe('authenticated');
  });

  it('still returns the token when the cache cannot be saved', async () => {
    const client = new FakeIdentityClient();
    client.accounts = [account];
    client.silent = async () => token('silent-token');
    const store = new MemoryStore('cached-blob');
    store.save = async () => {
      throw new Error('EACCES: permission denied');
    };
    const auth = new MicrosoftAuthenticator(client, store, options(), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toEqual({ ok: true, accessToken: 'silent-token', account, source: 'silent' });
    expect(auth.currentState).toBe('authenticated');
  });

  it('falls through to interactive sign-in when the silent attempt fails', async () => {
    const client = new FakeIdentityClient();
    client.accounts = [account];
    client.silent = async () => {
      throw new AuthError('interaction_required', 'Refresh token expired');
    };
    client.interactive = async () => token('interactive-token');
    const store = new MemoryStore('cached-blob');
    const auth = new MicrosoftAuthenticator(client, store, options(), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: true, accessToken: 'interactive-token', source: 'interactive' });
    expect(client.calls).toEqual(['silent:user@example.com', 'interactive']);
    expect(store.saved).toEqual(['serialized-cache']);
  });

  it('goes straight to interactive sign-in without a cached account', async () => {
    const client = new FakeIdentityClient();
    client.interactive = async () => token('interactive-token');
    const store = new MemoryStore();
    const auth = new MicrosoftAuthenticator(client, store, options(), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: true, source: 'interactive' });
    expect(client.calls).toEqual(['interactive']);
    expect(client.deserialized).toEqual([]);
  });

  it('falls back to pasting the redirect URL when interactive sign-in fails', async () => {
    const client = new FakeIdentityClient();
    const store = new MemoryStore();
    const prompt = pasteRedirect(client, (state) => `code=auth-code&state=${state}`);
    const auth = new MicrosoftAuthenticator(client, store, options({ prompt }), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: true, accessToken: 'manual-token', source: 'manual' });
    expect(client.calls).toEqual(['interactive', 'authUrl', 'byCode']);
    expect(client.authUrlRequest).toMatchObject({
      scopes: ['Tasks.Read'],
      redirectUri: 'http://localhost',
      codeChallengeMethod: 'S256',
    });
    expect(client.codeRequest).toMatchObject({
      code: 'auth-code',
      redirectUri: 'http://localhost',
      scopes: ['Tasks.Read'],
      state: client.authUrlRequest?.state,
    });
    expect(client.codeRequest?.codeVerifier).toBeTruthy();
    expect(store.saved).toEqual(['serialized-cache']);
  });

  it('skips interactive sign-in when it is disabled', async () => {
    const client = new FakeIdentityClient();
    const prompt = pasteRedirect(client, (state) => `code=auth-code&state=${state}`);
    const auth = new MicrosoftAuthenticator(
      client,
      new MemoryStore(),
      options({ interactive: false, prompt }),
      createSilentLogger()
    );

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: true, source: 'manual' });
    expect(client.calls).toEqual(['authUrl', 'byCode']);
  });

  it('gives up on interactive sign-in after the timeout', async () => {
    const client = new FakeIdentityClient();
    client.interactive = () => new Promise<TokenResult | null>(() => undefined);
    const prompt = pasteRedirect(client, (state) => `code=auth-code&state=${state}`);
    const auth = new MicrosoftAuthenticator(
      client,
      new MemoryStore(),
      options({ interactiveTimeoutMs: 10, prompt }),
      createSilentLogger()
    );

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: true, source: 'manual' });
  });

  it('aborts on a pasted value that is not a URL', async () => {
    const client = new FakeIdentityClient();
    const store = new MemoryStore();
    const auth = new MicrosoftAuthenticator(
      client,
      store,
      options({ prompt: async () => 'not a url' }),
      createSilentLogger()
    );

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: false, error: { stage: 'manual', code: 'invalid_redirect_url' } });
    expect(client.calls).toEqual(['interactive', 'authUrl']);
    expect(store.saved).toEqual([]);
    expect(auth.currentState).toBe('aborted');
  });

  it('aborts when the pasted state does not match', async () => {
    const client = new FakeIdentityClient();
    const auth = new MicrosoftAuthenticator(
      client,
      new MemoryStore(),
      options({ prompt: async () => 'http://localhost/?code=auth-code&state=other' }),
      createSilentLogger()
    );

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: false, error: { stage: 'manual', code: 'state_mismatch' } });
    expect(client.calls).not.toContain('byCode');
  });

  it('reports the provider error carried by the redirect', async () => {
    const client = new FakeIdentityClient();
    const auth = new MicrosoftAuthenticator(
      client,
      new MemoryStore(),
      options({ prompt: async () => 'http://localhost/?error=access_denied&error_description=User+declined' }),
      createSilentLogger()
    );

    const outcome = await auth.authenticate();

    expect(outcome).toEqual({
      ok: false,
      error: { stage: 'manual', code: 'access_denied', description: 'User declined' },
    });
  });

  it('reports the provider error when the code exchange fails', async () => {
    const client = new FakeIdentityClient();
    client.byCode = async () => {
      throw new AuthError('invalid_grant', 'The code has expired');
    };
    const store = new MemoryStore();
    const prompt = pasteRedirect(client, (state) => `code=auth-code&state=${state}`);
    const auth = new MicrosoftAuthenticator(client, store, options({ prompt }), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toEqual({
      ok: false,
      error: { stage: 'manual', code: 'invalid_grant', description: 'The code has expired' },
    });
    expect(store.saved).toEqual([]);
  });

  it('treats a result without an access token as a failure', async () => {
    const client = new FakeIdentityClient();
    client.byCode = async () => null;
    const prompt = pasteRedirect(client, (state) => `code=auth-code&state=${state}`);
    const auth = new MicrosoftAuthenticator(client, new MemoryStore(), options({ prompt }), createSilentLogger());

    const outcome = await auth.authenticate();

    expect(outcome).toMatchObject({ ok: false, error: { stage: 'manual', code: 'no_token' } });
  });
});

describe('parseRedirectUrl', () => {
  it('extracts code and state', () => {
    expect(parseRedirectUrl('http://localhost/?code=abc&state=xyz')).toEqual({
      ok: true,
      code: 'abc',
      state: 'xyz',
    });
  });

  it('tolerates surrounding whitespace and a missing state', () => {
    expect(parseRedirectUrl('  http://localhost/?code=abc \n')).toEqual({ ok: true, code: 'abc', state: null });
  });

  it('rejects a URL without a code', () => {
    expect(parseRedirectUrl('http://localhost/?state=xyz')).toMatchObject({ ok: false, code: 'missing_code' });
  });
});
