/**
 * Storage URL parsing.
 *
 * Two forms are accepted:
 * - `azure://<container>/[<path>]`
 * - `azure://<account>.<endpoint>/<container>/[<path>]`
 *
 * `az://` is an alias for `azure://`.
 */

import { MalformedUrlError } from '../errors/index.js';

/** Recognized scheme prefixes */
export const STORAGE_URL_PREFIXES = ['azure://', 'az://'] as const;

/**
 * Parsed storage URL. `accountName` and `endpoint` are empty strings for the
 * short form.
 */
export interface ParsedUrl {
  readonly prefix: string;
  readonly accountName: string;
  readonly endpoint: string;
  readonly container: string;
  readonly path: string;
}

/**
 * Check whether a path uses one of the storage URL schemes
 */
export function canHandleStorageUrl(path: string): boolean {
  return STORAGE_URL_PREFIXES.some((prefix) => path.startsWith(prefix));
}

function invalidFormat(url: string): MalformedUrlError {
  return new MalformedUrlError({
    message:
      `The URL ${url} does not match the expected formats: (azure|az)://<container>/[<path>] ` +
      'or the fully qualified one: (azure|az)://<storage account>.<endpoint>/<container>/[<path>]',
    path: url,
  });
}

/**
 * Parse a storage URL.
 *
 * A `.` before the first `/` after the scheme selects the fully-qualified form.
 *
 * @throws {MalformedUrlError} If the URL matches neither form
 */
export function parseStorageUrl(url: string): ParsedUrl {
  const prefix = STORAGE_URL_PREFIXES.find((candidate) => url.startsWith(candidate));
  if (!prefix) {
    throw new MalformedUrlError({ message: 'URL needs to start with azure:// or az://', path: url });
  }

  const start = prefix.length;
  const slashPos = url.indexOf('/', start);
  if (slashPos === -1) {
    throw invalidFormat(url);
  }
  const dotPos = url.indexOf('.', start);

  if (dotPos !== -1 && dotPos < slashPos) {
    const pathSlashPos = url.indexOf('/', slashPos + 1);
    if (pathSlashPos === -1) {
      throw invalidFormat(url);
    }

    const parsed: ParsedUrl = {
      prefix,
      accountName: url.slice(start, dotPos),
      endpoint: url.slice(dotPos + 1, slashPos),
      container: url.slice(slashPos + 1, pathSlashPos),
      path: url.slice(pathSlashPos + 1),
    };
    if (!parsed.accountName || !parsed.endpoint || !parsed.container) {
      throw invalidFormat(url);
    }
    return Object.freeze(parsed);
  }

  const container = url.slice(start, slashPos);
  if (!container) {
    throw invalidFormat(url);
  }

  return Object.freeze({
    prefix,
    accountName: '',
    endpoint: '',
    container,
    path: url.slice(slashPos + 1),
  });
}

/**
 * Display prefix used for expanded paths: the scheme, the optional
 * `<account>.<endpoint>/` part and the container, without a trailing slash.
 */
export function formatContainerUrl(parsed: ParsedUrl): string {
  const authority = parsed.accountName ? `${parsed.accountName}.${parsed.endpoint}/` : '';
  return `${parsed.prefix}${authority}${parsed.container}`;
}
