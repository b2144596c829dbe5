/**
 * Credential chain.
 */

import { AuthResolutionError, CredentialUnavailableError } from '../../errors/index.js';
import type { AccessToken, TokenCredential } from './types.js';

/**
 * Tries each source in order. The first token wins; sources that are
 * unavailable in this environment are skipped, any other failure stops the
 * chain.
 */
export class ChainedTokenCredential implements TokenCredential {
  private readonly sources: readonly TokenCredential[];

  constructor(...sources: TokenCredential[]) {
    this.sources = sources;
  }

  async getToken(scope: string): Promise<AccessToken> {
    const unavailable: string[] = [];

    for (const source of this.sources) {
      try {
        return await source.getToken(scope);
      } catch (error) {
        if (error instanceof CredentialUnavailableError) {
          unavailable.push(`${source.constructor.name}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    throw new AuthResolutionError({
      message: `No credential in the chain could provide a token. ${unavailable.join('; ')}`,
    });
  }
}
