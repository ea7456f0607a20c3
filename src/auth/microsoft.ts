/**
 * Microsoft Authentication using MSAL
 *
 * Token acquisition is a fixed cascade, each stage tried at most once:
 *   silent (cached account) -> interactive (loopback browser) -> manual (paste redirect URL)
 * The first stage that yields a token wins; a failed manual stage aborts the run.
 * The token cache is loaded once before the cascade and saved once after it succeeds.
 */

import {
  AuthError,
  CryptoProvider,
  LogLevel,
  PublicClientApplication,
} from '@azure/msal-node';
import type {
  AccountInfo,
  AuthorizationCodeRequest,
  AuthorizationUrlRequest,
  Configuration,
  InteractiveRequest,
  SilentFlowRequest,
} from '@azure/msal-node';
import type { MicrosoftConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { terminalPrompt } from '../utils/prompt.js';
import type { Prompt } from '../utils/prompt.js';
import type { CredentialStore } from './credential-store.js';

export interface TokenResult {
  accessToken: string;
  account: AccountInfo | null;
  expiresOn?: Date | null;
}

export interface TokenCacheLike {
  getAllAccounts(): Promise<AccountInfo[]>;
  serialize(): string;
  deserialize(cache: string): void;
}

/**
 * The part of MSAL's PublicClientApplication the cascade uses
 */
export interface IdentityClient {
  getTokenCache(): TokenCacheLike;
  acquireTokenSilent(request: SilentFlowRequest): Promise<TokenResult | null>;
  acquireTokenInteractive(request: InteractiveRequest): Promise<TokenResult | null>;
  getAuthCodeUrl(request: AuthorizationUrlRequest): Promise<string>;
  acquireTokenByCode(request: AuthorizationCodeRequest): Promise<TokenResult | null>;
}

export type AttemptStage = 'silent' | 'interactive' | 'manual';
export type AuthState = AttemptStage | 'authenticated' | 'aborted';

export interface AuthFailure {
  stage: AttemptStage;
  code: string;
  description: string;
}

export type AuthOutcome =
  | { ok: true; accessToken: string; account: AccountInfo | null; source: AttemptStage }
  | { ok: false; error: AuthFailure };

type Attempt =
  | { ok: true; result: TokenResult }
  | { ok: false; code: string; description: string };

export type RedirectParseResult =
  | { ok: true; code: string; state: string | null }
  | { ok: false; code: string; description: string };

export interface AuthenticatorOptions {
  scopes: string[];
  /** Redirect URI used by the manual fallback */
  redirectUri: string;
  /** Try the loopback browser flow before the manual fallback */
  interactive: boolean;
  interactiveTimeoutMs: number;
  prompt?: Prompt;
}

const SUCCESS_TEMPLATE =
  '<html><body style="font-family: sans-serif; text-align: center; padding: 50px;">' +
  '<h1>Signed in</h1><p>You can close this window and return to the terminal.</p>' +
  '</body></html>';

const ERROR_TEMPLATE =
  '<html><body style="font-family: sans-serif; text-align: center; padding: 50px;">' +
  '<h1>Sign-in failed</h1><p>Return to the terminal to continue.</p>' +
  '</body></html>';

function printBanner(title: string, lines: string[]): void {
  console.log('\n==========================================');
  console.log(title);
  console.log('==========================================');
  for (const line of lines) {
    console.log(`\n${line}`);
  }
  console.log('\n==========================================\n');
}

function describeError(error: unknown): { code: string; description: string } {
  if (error instanceof AuthError) {
    return { code: error.errorCode, description: error.errorMessage };
  }
  if (error instanceof Error) {
    return { code: error.name, description: error.message };
  }
  return { code: 'unknown_error', description: String(error) };
}

function toAttempt(result: TokenResult | null): Attempt {
  if (result?.accessToken) {
    return { ok: true, result };
  }
  return { ok: false, code: 'no_token', description: 'Identity provider returned no access token' };
}

async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Pull the authorization code and state out of the URL the browser was
 * redirected to after sign-in.
 */
export function parseRedirectUrl(input: string): RedirectParseResult {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch (error) {
    const { description } = describeError(error);
    return { ok: false, code: 'invalid_redirect_url', description: `Could not parse "${input}": ${description}` };
  }

  const error = url.searchParams.get('error');
  if (error) {
    return {
      ok: false,
      code: error,
      description: url.searchParams.get('error_description') ?? 'Sign-in was not completed',
    };
  }

  const code = url.searchParams.get('code');
  if (!code) {
    return { ok: false, code: 'missing_code', description: 'Redirect URL has no "code" parameter' };
  }

  return { ok: true, code, state: url.searchParams.get('state') };
}

export class MicrosoftAuthenticator {
  private client: IdentityClient;
  private store: CredentialStore;
  private options: AuthenticatorOptions;
  private prompt: Prompt;
  private logger: Logger;
  private state: AuthState = 'silent';

  constructor(
    client: IdentityClient,
    store: CredentialStore,
    options: AuthenticatorOptions,
    logger: Logger
  ) {
    this.client = client;
    this.store = store;
    this.options = options;
    this.prompt = options.prompt ?? terminalPrompt;
    this.logger = logger;
  }

  /** Current position in the cascade */
  get currentState(): AuthState {
    return this.state;
  }

  async authenticate(): Promise<AuthOutcome> {
    const cache = this.client.getTokenCache();
    await this.loadCache(cache);

    const accounts = await cache.getAllAccounts();
    const account: AccountInfo | undefined = accounts[0];
    let stage: AttemptStage = account ? 'silent' : this.afterSilent();
    if (!account) {
      this.logger.info('No cached Microsoft account found, sign-in required');
    }

    for (;;) {
      this.state = stage;
      const attempt = await this.runStage(stage, account);

      if (attempt.ok) {
        this.state = 'authenticated';
        await this.saveCache(cache);
        this.logger.info(
          { stage, account: attempt.result.account?.username },
          'Microsoft authentication successful'
        );
        return {
          ok: true,
          accessToken: attempt.result.accessToken,
          account: attempt.result.account,
          source: stage,
        };
      }

      this.logger.debug({ stage, code: attempt.code, description: attempt.description }, 'Token acquisition failed');
      const next = this.nextStage(stage);
      if (next === 'aborted') {
        this.state = 'aborted';
        return { ok: false, error: { stage, code: attempt.code, description: attempt.description } };
      }
      stage = next;
    }
  }

  private afterSilent(): AttemptStage {
    return this.options.interactive ? 'interactive' : 'manual';
  }

  private nextStage(stage: AttemptStage): AttemptStage | 'aborted' {
    switch (stage) {
      case 'silent':
        return this.afterSilent();
      case 'interactive':
        return 'manual';
      case 'manual':
        return 'aborted';
    }
  }

  private runStage(stage: AttemptStage, account: AccountInfo | undefined): Promise<Attempt> {
    switch (stage) {
      case 'silent':
        return this.acquireSilent(account);
      case 'interactive':
        return this.acquireInteractive();
      case 'manual':
        return this.acquireManual();
    }
  }

  private async loadCache(cache: TokenCacheLike): Promise<void> {
    const serialized = await this.store.load();
    if (!serialized) return;

    try {
      cache.deserialize(serialized);
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to load Microsoft token cache, continuing without it');
    }
  }

  private async saveCache(cache: TokenCacheLike): Promise<void> {
    try {
      await this.store.save(cache.serialize());
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to save Microsoft token cache, sign-in will be required next run');
    }
  }

  private async acquireSilent(account: AccountInfo | undefined): Promise<Attempt> {
    if (!account) {
      return { ok: false, code: 'no_account', description: 'No cached account' };
    }

    try {
      const result = await this.client.acquireTokenSilent({ account, scopes: this.options.scopes });
      if (result?.accessToken) {
        this.logger.info('Token found in cache');
      }
      return toAttempt(result);
    } catch (error) {
      this.logger.info('No suitable token found in cache, acquiring a new one');
      return { ok: false, ...describeError(error) };
    }
  }

  private async acquireInteractive(): Promise<Attempt> {
    const request: InteractiveRequest = {
      scopes: this.options.scopes,
      openBrowser: async (url: string) => {
        printBanner('Microsoft Sign-in Required', ['Open this URL in a browser to sign in:', url]);
      },
      successTemplate: SUCCESS_TEMPLATE,
      errorTemplate: ERROR_TEMPLATE,
    };

    try {
      const result = await withTimeout(
        this.client.acquireTokenInteractive(request),
        this.options.interactiveTimeoutMs,
        'Timed out waiting for browser sign-in'
      );
      return toAttempt(result);
    } catch (error) {
      const failure = describeError(error);
      this.logger.warn(failure, 'Browser sign-in failed, falling back to manual sign-in');
      return { ok: false, ...failure };
    }
  }

  private async acquireManual(): Promise<Attempt> {
    const crypto = new CryptoProvider();
    const { verifier, challenge } = await crypto.generatePkceCodes();
    const expectedState = crypto.createNewGuid();
    const { scopes, redirectUri } = this.options;

    try {
      const authUrl = await this.client.getAuthCodeUrl({
        scopes,
        redirectUri,
        state: expectedState,
        codeChallenge: challenge,
        codeChallengeMethod: 'S256',
      });

      printBanner('Microsoft Sign-in Required', ['Please go to this URL and sign in:', authUrl]);

      const answer = await this.prompt(
        'After signing in, paste the full URL of the page you were redirected to: '
      );

      const parsed = parseRedirectUrl(answer);
      if (!parsed.ok) {
        return parsed;
      }
      if (parsed.state !== expectedState) {
        return {
          ok: false,
          code: 'state_mismatch',
          description: 'The "state" parameter does not match this sign-in request',
        };
      }

      const result = await this.client.acquireTokenByCode({
        scopes,
        redirectUri,
        code: parsed.code,
        codeVerifier: verifier,
        state: expectedState,
      });
      return toAttempt(result);
    } catch (error) {
      return { ok: false, ...describeError(error) };
    }
  }
}

/**
 * Build the MSAL public client application, forwarding MSAL's own
 * warnings and errors to the pino logger.
 */
export function createMsalClient(config: MicrosoftConfig, logger: Logger): PublicClientApplication {
  const msalConfig: Configuration = {
    auth: {
      clientId: config.client_id,
      authority: `https://login.microsoftonline.com/${config.tenant_id || 'common'}`,
    },
    system: {
      loggerOptions: {
        logLevel: LogLevel.Warning,
        piiLoggingEnabled: false,
        loggerCallback: (level, message) => {
          if (level === LogLevel.Error) {
            logger.error({ msal: true }, message);
          } else {
            logger.warn({ msal: true }, message);
          }
        },
      },
    },
  };

  return new PublicClientApplication(msalConfig);
}

export function authenticatorOptions(config: MicrosoftConfig, prompt?: Prompt): AuthenticatorOptions {
  return {
    scopes: config.scopes,
    redirectUri: config.redirect_uri,
    interactive: config.interactive,
    interactiveTimeoutMs: config.interactive_timeout_seconds * 1000,
    prompt,
  };
}
