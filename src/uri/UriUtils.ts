/**
 * Small helpers around WHATWG URLs used when reading filter requests.
 *
 * Relative references stay plain strings; only absolute URIs become `URL`
 * instances.
 */

export class InvalidUriError extends Error {
  public readonly value: string;

  constructor(message: string, value: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidUriError';
    this.value = value;
  }
}

function tryParseAbsolute(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    // Not absolute; callers decide whether a relative reference is acceptable
    return null;
  }
}

export function isAbsoluteUri(value: string): boolean {
  return tryParseAbsolute(value) !== null;
}

/**
 * Resolve a relative reference against an absolute base.
 *
 * @throws InvalidUriError when `relativeUri` is already absolute
 */
export function uriToAbsoluteUri(baseUri: URL, relativeUri: string): URL {
  if (isAbsoluteUri(relativeUri)) {
    throw new InvalidUriError(`Expected a relative URI, got '${relativeUri}'`, relativeUri);
  }
  return new URL(relativeUri, baseUri);
}

/**
 * Parse an entry or feed id.
 *
 * Returns null for a missing value, and for an empty one unless
 * `swallowEmpty` is false. Relative ids are resolved against `baseUri`.
 *
 * @throws InvalidUriError when the value is not a valid URI
 */
export function createUriAsEntryOrFeedId(
  value: string | null | undefined,
  baseUri?: URL,
  swallowEmpty = true
): URL | null {
  if (value === null || value === undefined || (swallowEmpty && value === '')) {
    return null;
  }

  const absolute = tryParseAbsolute(value);
  if (absolute) return absolute;

  if (baseUri && value !== '') {
    return uriToAbsoluteUri(baseUri, value);
  }
  throw new InvalidUriError(
    `The value '${value}' is not a valid URI for an entry or feed id`,
    value
  );
}

/** `#x y` becomes `#x%20y`; the leading `#` is kept as is */
export function ensureEscapedFragment(fragment: string): string {
  if (!fragment.startsWith('#')) {
    throw new InvalidUriError(`A fragment must start with '#', got '${fragment}'`, fragment);
  }
  return `#${encodeURIComponent(fragment.slice(1))}`;
}

export function uriToString(uri: URL | string): string {
  return typeof uri === 'string' ? uri : uri.href;
}

export function ensureTrailingSlash(uri: URL): URL;
export function ensureTrailingSlash(uri: string): string;
export function ensureTrailingSlash(uri: URL | string): URL | string {
  const text = uriToString(uri);
  if (text.endsWith('/')) {
    return uri;
  }
  return typeof uri === 'string' ? `${text}/` : new URL(`${text}/`);
}
