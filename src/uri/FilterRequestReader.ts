import { debugLog } from '../utils/logger.js';
import { InvalidUriError, ensureTrailingSlash, isAbsoluteUri, uriToAbsoluteUri } from './UriUtils.js';

export interface FilterRequest {
  /** First path segment after the service root */
  entitySet: string;
  /** Decoded `$filter` value, or null when the request has none */
  filter: string | null;
}

function parseServiceRoot(serviceRoot: URL | string): URL {
  if (typeof serviceRoot !== 'string') {
    return ensureTrailingSlash(serviceRoot);
  }
  try {
    return ensureTrailingSlash(new URL(serviceRoot));
  } catch (error) {
    throw new InvalidUriError(
      `Service root '${serviceRoot}' is not an absolute URI`,
      serviceRoot,
      { cause: error }
    );
  }
}

/**
 * Pull the entity set and `$filter` out of a request URL.
 *
 * @param requestUrl - Absolute, or relative to `serviceRoot`
 * @throws InvalidUriError when the request is outside the service root or names no entity set
 *
 * @example
 * ```typescript
 * readFilterRequest('http://host/svc/', 'Customers?$filter=Age+gt+30');
 * // { entitySet: 'Customers', filter: 'Age gt 30' }
 * ```
 */
export function readFilterRequest(serviceRoot: URL | string, requestUrl: string): FilterRequest {
  const root = parseServiceRoot(serviceRoot);

  let request: URL;
  try {
    request = isAbsoluteUri(requestUrl) ? new URL(requestUrl) : uriToAbsoluteUri(root, requestUrl);
  } catch (error) {
    if (error instanceof InvalidUriError) throw error;
    throw new InvalidUriError(`Request URI '${requestUrl}' is not valid`, requestUrl, {
      cause: error,
    });
  }

  if (request.origin !== root.origin || !request.pathname.startsWith(root.pathname)) {
    throw new InvalidUriError(
      `Request URI '${request.href}' is not under service root '${root.href}'`,
      requestUrl
    );
  }

  const [segment = ''] = request.pathname.slice(root.pathname.length).split('/');
  let entitySet: string;
  try {
    entitySet = decodeURIComponent(segment);
  } catch (error) {
    throw new InvalidUriError(`Request URI '${requestUrl}' has a malformed path`, requestUrl, {
      cause: error,
    });
  }
  if (!entitySet) {
    throw new InvalidUriError(
      `Request URI '${request.href}' does not address an entity set`,
      requestUrl
    );
  }

  // URLSearchParams decodes percent escapes and '+' as a space
  const filter = request.searchParams.get('$filter');
  debugLog('parser', 'Read filter request', { entitySet, hasFilter: filter !== null });
  return { entitySet, filter };
}
