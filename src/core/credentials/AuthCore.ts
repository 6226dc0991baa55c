// src/core/credentials/AuthCore.ts

import { Issuer, Client, TokenSet, generators, errors } from 'openid-client';
import type {
  AuthorizationRequest,
  CredentialSet,
  GoogleOAuthConfig,
  PKCEChallenge,
  TokenExchanger,
} from './types';
import type { Logger } from '../../observability/Logger';
import { CredentialRefreshError, OAuthError, RefreshTokenRejectedError, errorMessage } from '../../utils/errors';
import { withCredentialSpan } from '../../observability/tracing';

const GOOGLE_AUTHORIZATION_ENDPOINT = 'https://accounts.google.com/o/oauth2/v2/auth';
const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
const GOOGLE_REVOCATION_ENDPOINT = 'https://oauth2.googleapis.com/revoke';

const PKCE_TTL_MS = 10 * 60 * 1000;

/**
 * Delegated Google identity over plain OAuth 2.0 (explicit endpoints, no
 * discovery). Offline access is requested so a refresh token is issued.
 */
export class AuthCore implements TokenExchanger {
  private client: Client;
  private pending: Map<string, PKCEChallenge & { createdAt: number }> = new Map();

  constructor(
    private config: GoogleOAuthConfig,
    private logger: Logger
  ) {
    const issuer = new Issuer({
      issuer: 'https://accounts.google.com',
      authorization_endpoint: config.authorizationEndpoint ?? GOOGLE_AUTHORIZATION_ENDPOINT,
      token_endpoint: config.tokenEndpoint ?? GOOGLE_TOKEN_ENDPOINT,
      revocation_endpoint: config.revocationEndpoint ?? GOOGLE_REVOCATION_ENDPOINT,
      token_endpoint_auth_methods_supported: ['client_secret_post', 'client_secret_basic'],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: [config.redirectUri],
      response_types: ['code'],
    });
  }

  createAuthorizationUrl(opts: { loginHint?: string } = {}): AuthorizationRequest {
    this.dropExpiredChallenges();

    const state = generators.state();
    const codeVerifier = generators.codeVerifier();
    const pkce: PKCEChallenge = {
      codeVerifier,
      codeChallenge: generators.codeChallenge(codeVerifier),
      method: 'S256',
    };
    this.pending.set(state, { ...pkce, createdAt: Date.now() });

    const url = this.client.authorizationUrl({
      scope: this.config.scopes.join(' '),
      state,
      code_challenge: pkce.codeChallenge,
      code_challenge_method: pkce.method,
      access_type: 'offline',
      prompt: 'consent',
      ...(opts.loginHint ? { login_hint: opts.loginHint } : {}),
    });

    this.logger.debug('Created authorization URL', { state });
    return { url, state };
  }

  async exchangeCode(code: string, state: string): Promise<CredentialSet> {
    return withCredentialSpan('exchangeCode', 'google', async () => {
      const pkce = this.pending.get(state);
      if (!pkce) throw new OAuthError('Invalid or expired state parameter');
      this.pending.delete(state);

      if (Date.now() - pkce.createdAt > PKCE_TTL_MS) {
        throw new OAuthError('PKCE challenge expired, restart authorization flow');
      }

      let tokenSet: TokenSet;
      try {
        tokenSet = await this.client.oauthCallback(
          this.config.redirectUri,
          { code, state },
          { code_verifier: pkce.codeVerifier, state }
        );
      } catch (error: unknown) {
        this.logger.error('Authorization code exchange failed', { error: errorMessage(error) });
        throw new OAuthError('Failed to exchange authorization code', { cause: errorMessage(error) });
      }

      this.logger.debug('Authorization code exchanged', {
        hasRefreshToken: tokenSet.refresh_token !== undefined,
        tokenType: tokenSet.token_type,
        expiresIn: tokenSet.expires_in,
      });
      return this.toCredentialSet(tokenSet);
    });
  }

  /**
   * Rejects with RefreshTokenRejectedError on `invalid_grant` (the refresh
   * token is dead) and CredentialRefreshError for everything else.
   */
  async refresh(refreshToken: string): Promise<CredentialSet> {
    return withCredentialSpan('refresh', 'google', async () => {
      let tokenSet: TokenSet;
      try {
        tokenSet = await this.client.refresh(refreshToken);
      } catch (error: unknown) {
        this.logger.error('Token refresh failed', { error: errorMessage(error) });

        if (error instanceof errors.OPError && error.error === 'invalid_grant') {
          throw new RefreshTokenRejectedError('Refresh token rejected, reauthorization required', {
            reason: error.error,
          });
        }
        throw new CredentialRefreshError('Failed to refresh access token', {
          cause: errorMessage(error),
          errorType: error instanceof errors.OPError ? error.error : 'unknown',
        });
      }

      // Google omits the refresh token on refresh responses; keep the old one
      return this.toCredentialSet(tokenSet, refreshToken);
    });
  }

  async revoke(token: string): Promise<void> {
    await this.client.revoke(token);
    this.logger.info('Token revoked');
  }

  private toCredentialSet(tokenSet: TokenSet, previousRefreshToken?: string): CredentialSet {
    if (!tokenSet.access_token) {
      throw new OAuthError('Token response did not include an access token');
    }
    return {
      accessToken: tokenSet.access_token,
      refreshToken: tokenSet.refresh_token ?? previousRefreshToken,
      expiresAt: tokenSet.expires_at !== undefined ? new Date(tokenSet.expires_at * 1000) : undefined,
      scope: tokenSet.scope,
      tokenType: tokenSet.token_type,
    };
  }

  private dropExpiredChallenges(): void {
    const now = Date.now();
    for (const [state, challenge] of this.pending.entries()) {
      if (now - challenge.createdAt > PKCE_TTL_MS) {
        this.pending.delete(state);
      }
    }
  }
}
