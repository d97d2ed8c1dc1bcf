/**
 * Credentials seam.
 *
 * Acquiring and refreshing OAuth2 tokens happens outside this package; the
 * streams only need a bearer token (or none, against an emulator).
 */

import type { GcpCredentials } from "../config/index.js";

/**
 * GCP authentication provider interface.
 */
export interface GcpAuthProvider {
  /**
   * Get a valid access token, or `undefined` for anonymous access.
   */
  getAccessToken(): Promise<string | undefined>;
}

/**
 * Fixed access token supplied by the application.
 */
export class StaticTokenAuthProvider implements GcpAuthProvider {
  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string | undefined> {
    return this.token;
  }
}

/**
 * Anonymous access, for emulators and public objects.
 */
export class AnonymousAuthProvider implements GcpAuthProvider {
  async getAccessToken(): Promise<string | undefined> {
    return undefined;
  }
}

/**
 * Token provider backed by an application callback (e.g. google-auth-library).
 */
export class CallbackAuthProvider implements GcpAuthProvider {
  constructor(private readonly fetchToken: () => Promise<string>) {}

  async getAccessToken(): Promise<string | undefined> {
    return this.fetchToken();
  }
}

/**
 * Create an auth provider from credentials configuration.
 */
export function createAuthProvider(credentials: GcpCredentials): GcpAuthProvider {
  switch (credentials.type) {
    case "access_token":
      return new StaticTokenAuthProvider(credentials.token);
    case "token_callback":
      return new CallbackAuthProvider(credentials.fetchToken);
    case "anonymous":
      return new AnonymousAuthProvider();
  }
}

/**
 * Build the `Authorization` header for a request, if a token is available.
 */
export async function authorizationHeaders(provider: GcpAuthProvider): Promise<Record<string, string>> {
  const token = await provider.getAccessToken();
  return token ? { Authorization: `Bearer ${token}` } : {};
}
