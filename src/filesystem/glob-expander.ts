/**
 * Glob expansion over container listings.
 */

import type { ContainerClient } from '../client/client.js';
import { firstWildcardIndex, matchSegments, splitPath } from '../glob/index.js';
import type { Logger } from '../observability/index.js';
import type { ListBlobsPage } from '../types/index.js';
import type { ParsedUrl } from '../url/index.js';
import { formatContainerUrl } from '../url/index.js';
import { readFailure } from './failures.js';

/**
 * Expands a wildcard object path into the fully qualified paths of the
 * matching blobs.
 */
export class GlobExpander {
  constructor(
    private readonly container: ContainerClient,
    private readonly logger: Logger
  ) {}

  /**
   * List every blob under the fixed prefix of `parsed.path` and keep the ones
   * whose segments match the pattern. Pages are requested until the service
   * stops returning a continuation token.
   *
   * @throws {TransportError} If any page fails; nothing is returned in that case
   */
  async expand(path: string, parsed: ParsedUrl): Promise<string[]> {
    const wildcard = firstWildcardIndex(parsed.path);
    const prefix = wildcard === -1 ? parsed.path : parsed.path.slice(0, wildcard);
    const pattern = splitPath(parsed.path);
    const base = formatContainerUrl(parsed);

    const results: string[] = [];
    let continuationToken: string | undefined;
    let pages = 0;

    do {
      const page = await this.listPage(path, prefix, continuationToken);
      pages++;
      for (const blob of page.blobs) {
        if (matchSegments(splitPath(blob.name), pattern)) {
          results.push(`${base}/${blob.name}`);
        }
      }
      continuationToken = page.continuationToken;
    } while (continuationToken);

    this.logger.debug('Expanded glob', { path, prefix, pages, matches: results.length });
    return results;
  }

  private async listPage(path: string, prefix: string, continuationToken: string | undefined): Promise<ListBlobsPage> {
    try {
      return await this.container.listBlobs({ prefix, continuationToken });
    } catch (error) {
      throw readFailure(path, error);
    }
  }
}
