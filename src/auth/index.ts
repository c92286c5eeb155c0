/**
 * Authentication for the Orangic client.
 */

import { AuthenticationError } from '../errors';

/**
 * Authentication provider interface.
 */
export interface AuthProvider {
  /**
   * Returns the Authorization header value.
   */
  getAuthHeader(): string;

  /**
   * Returns a hint of the API key for debugging (last 4 chars).
   */
  getApiKeyHint(): string;
}

/**
 * Bearer token authentication provider.
 */
export class BearerAuthProvider implements AuthProvider {
  private readonly apiKey: string;

  constructor(apiKey: string) {
    if (apiKey.length === 0) {
      throw new AuthenticationError('API key cannot be empty');
    }
    this.apiKey = apiKey;
  }

  getAuthHeader(): string {
    return `Bearer ${this.apiKey}`;
  }

  getApiKeyHint(): string {
    if (this.apiKey.length > 4) {
      return `...${this.apiKey.slice(-4)}`;
    }
    return '****';
  }
}
