/**
 * The subset of cookie syntax the sticky header middleware needs:
 * the leading name/value pair of a `Set-Cookie` line, lookup in a request
 * `Cookie` header, and serialization of the cookies it writes itself.
 *
 * Values are never URL-decoded; the affinity token is opaque and must
 * round-trip byte for byte.
 */
import type { OutgoingHttpHeader } from 'http';

export interface CookiePair {
  name: string;
  value: string;
}

export interface SetCookieAttributes {
  path?: string;
  expires?: Date;
}

/**
 * Leading `name=value` of a `Set-Cookie` line. Only the first `=` separates
 * name from value; attributes after the first `;` are ignored.
 */
export const parseSetCookiePair = (line: string): CookiePair | undefined => {
  const [first = ''] = line.trim().split(';');
  const pair = first.trim();
  if (pair === '') return undefined;

  const eq = pair.indexOf('=');
  if (eq < 0) return undefined;

  return { name: pair.slice(0, eq), value: pair.slice(eq + 1) };
};

export const setCookieLines = (header: OutgoingHttpHeader | undefined): string[] => {
  if (header === undefined) return [];
  if (Array.isArray(header)) return header;
  return [String(header)];
};

/** Value of the first `Set-Cookie` line named `name`; later duplicates are ignored. */
export const findSetCookieValue = (lines: readonly string[], name: string): string | undefined => {
  for (const line of lines) {
    const pair = parseSetCookiePair(line);
    if (pair?.name === name) return pair.value;
  }
  return undefined;
};

/**
 * Value of cookie `name` in a request `Cookie` header, `undefined` when the
 * name is absent. A present name with an empty value yields `''`.
 */
export const readRequestCookie = (cookieHeader: string | undefined, name: string): string | undefined => {
  if (!cookieHeader) return undefined;

  for (const part of cookieHeader.split(';')) {
    const trimmed = part.trim();
    if (trimmed === '') continue;

    const eq = trimmed.indexOf('=');
    const key = eq < 0 ? trimmed : trimmed.slice(0, eq);
    if (key !== name) continue;

    const value = eq < 0 ? '' : trimmed.slice(eq + 1);
    return value.length > 1 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
  }
  return undefined;
};

const INVALID_COOKIE_VALUE_BYTES = /[^\x20-\x7e]|[";\\]/g;

/** Drops bytes a cookie-value may not hold; quotes values with edge spaces or commas. */
export const sanitizeCookieValue = (value: string): string => {
  const clean = value.replace(INVALID_COOKIE_VALUE_BYTES, '');
  if (/^[ ,]|[ ,]$/.test(clean)) return `"${clean}"`;
  return clean;
};

export const appendRequestCookie = (cookieHeader: string | undefined, name: string, value: string): string => {
  const pair = `${name}=${sanitizeCookieValue(value)}`;
  return cookieHeader ? `${cookieHeader}; ${pair}` : pair;
};

export const serializeSetCookie = (name: string, value: string, attributes: SetCookieAttributes = {}): string => {
  const parts = [`${name}=${sanitizeCookieValue(value)}`];
  if (attributes.path) parts.push(`Path=${attributes.path}`);
  if (attributes.expires) parts.push(`Expires=${attributes.expires.toUTCString()}`);
  return parts.join('; ');
};
