/**
 * URL tokenizer used by filter rules.
 *
 * Tokens, in order: host labels, path segments, the query string, the
 * fragment. Positions in filter rules index into this sequence, so the order
 * is part of the persisted filter format and must stay stable.
 */

// RFC 3986, appendix B. Matches every string.
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

const TRAILING_CLOSERS = /[)\]}'"]+$/;

export interface NormalizeOptions {
  trimTrailingClosers?: boolean;
}

/**
 * Produces the identity key of a link from raw input.
 */
export function normalizeUrl(raw: string, options: NormalizeOptions = {}): string {
  const trimmed = raw.trim();
  if (!options.trimTrailingClosers) {
    return trimmed;
  }

  const stripped = trimmed.replace(TRAILING_CLOSERS, '');
  return stripped.length > 0 ? stripped : trimmed;
}

function hostLabels(authority: string): string[] {
  const atIndex = authority.lastIndexOf('@');
  const hostPort = atIndex >= 0 ? authority.slice(atIndex + 1) : authority;
  const host = hostPort.replace(/:\d*$/, '');
  return host.split('.').filter((label) => label.length > 0);
}

export function tokenizeUrl(url: string): string[] {
  const match = URI_PATTERN.exec(url);
  if (!match) {
    return [];
  }

  const [, , authority, path, query, fragment] = match;
  const tokens: string[] = [];

  if (authority) {
    tokens.push(...hostLabels(authority));
  }

  if (path) {
    tokens.push(...path.split('/').filter((segment) => segment.length > 0));
  }

  if (query) {
    tokens.push(query);
  }

  if (fragment) {
    tokens.push(fragment);
  }

  return tokens;
}
