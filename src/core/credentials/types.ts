// src/core/credentials/types.ts

export interface CredentialSet {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  scope?: string;
  tokenType?: string;
}

export type CredentialState = 'unauthenticated' | 'authenticated' | 'expired' | 'revoked';

export interface StoredCredential {
  identity: string;
  credentials: CredentialSet;
  createdAt: Date;
  updatedAt: Date;
}

export interface CredentialStoreConfig {
  backend: 'memory' | 'file' | 'redis' | 'postgres';
  url?: string; // redis / postgres connection string
  path?: string; // file backend location
  encryption?: {
    key: string; // 64 hex chars
    previousKeys?: string[];
  };
}

export interface GoogleOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
  revocationEndpoint?: string;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
}

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  method: 'S256';
}

/**
 * Authorization-code and refresh exchanges against the identity provider.
 * AuthCore is the openid-client implementation.
 */
export interface TokenExchanger {
  createAuthorizationUrl(opts?: { loginHint?: string }): AuthorizationRequest;
  exchangeCode(code: string, state: string): Promise<CredentialSet>;
  refresh(refreshToken: string): Promise<CredentialSet>;
  revoke(token: string): Promise<void>;
}
