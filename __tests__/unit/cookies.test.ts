import {
  appendRequestCookie,
  findSetCookieValue,
  parseSetCookiePair,
  readRequestCookie,
  sanitizeCookieValue,
  serializeSetCookie,
  setCookieLines,
} from '../../src/sticky/cookies';

describe('parseSetCookiePair', () => {
  it('returns the leading name and value', () => {
    expect(parseSetCookiePair('_TRAEFIK_BACKEND=http://1.2.3.4')).toEqual({
      name: '_TRAEFIK_BACKEND',
      value: 'http://1.2.3.4',
    });
  });

  it('ignores attributes after the first ;', () => {
    expect(parseSetCookiePair('_TRAEFIK_BACKEND=http://1.2.3.4; Path=/path; HttpOnly')).toEqual({
      name: '_TRAEFIK_BACKEND',
      value: 'http://1.2.3.4',
    });
  });

  it('splits on the first = only', () => {
    expect(parseSetCookiePair('token=a=b==')).toEqual({ name: 'token', value: 'a=b==' });
  });

  it('trims surrounding whitespace', () => {
    expect(parseSetCookiePair('   session=abc ; Secure')).toEqual({ name: 'session', value: 'abc' });
  });

  it('yields nothing for an empty line', () => {
    expect(parseSetCookiePair('')).toBeUndefined();
    expect(parseSetCookiePair('   ')).toBeUndefined();
    expect(parseSetCookiePair('; Path=/')).toBeUndefined();
  });

  it('yields nothing when the pair has no =', () => {
    expect(parseSetCookiePair('garbage; Path=/')).toBeUndefined();
  });

  it('keeps an empty value', () => {
    expect(parseSetCookiePair('_TRAEFIK_BACKEND=; Path=/')).toEqual({ name: '_TRAEFIK_BACKEND', value: '' });
  });
});

describe('setCookieLines', () => {
  it('normalizes every header shape to a list', () => {
    expect(setCookieLines(undefined)).toEqual([]);
    expect(setCookieLines('a=1')).toEqual(['a=1']);
    expect(setCookieLines(['a=1', 'b=2'])).toEqual(['a=1', 'b=2']);
    expect(setCookieLines(42)).toEqual(['42']);
  });
});

describe('findSetCookieValue', () => {
  it('finds the named cookie among others', () => {
    const lines = ['session=abc; HttpOnly', '_TRAEFIK_BACKEND=http://10.0.0.7; Path=/'];
    expect(findSetCookieValue(lines, '_TRAEFIK_BACKEND')).toBe('http://10.0.0.7');
  });

  it('uses the first match when the cookie is set twice', () => {
    const lines = ['_TRAEFIK_BACKEND=http://first', '_TRAEFIK_BACKEND=http://second'];
    expect(findSetCookieValue(lines, '_TRAEFIK_BACKEND')).toBe('http://first');
  });

  it('skips malformed lines', () => {
    const lines = ['', 'nonsense', '_TRAEFIK_BACKEND=http://10.0.0.8'];
    expect(findSetCookieValue(lines, '_TRAEFIK_BACKEND')).toBe('http://10.0.0.8');
  });

  it('does not match on a name prefix', () => {
    expect(findSetCookieValue(['_TRAEFIK_BACKEND_OLD=x'], '_TRAEFIK_BACKEND')).toBeUndefined();
  });

  it('returns undefined when absent', () => {
    expect(findSetCookieValue([], '_TRAEFIK_BACKEND')).toBeUndefined();
  });
});

describe('readRequestCookie', () => {
  it('reads a cookie from a multi-cookie header', () => {
    expect(readRequestCookie('theme=dark; _TRAEFIK_BACKEND=http://0.0.0.2; lang=en', '_TRAEFIK_BACKEND')).toBe(
      'http://0.0.0.2',
    );
  });

  it('treats a present name with an empty value as present', () => {
    expect(readRequestCookie('_TRAEFIK_BACKEND=', '_TRAEFIK_BACKEND')).toBe('');
  });

  it('strips surrounding double quotes', () => {
    expect(readRequestCookie('_TRAEFIK_BACKEND="http://0.0.0.3"', '_TRAEFIK_BACKEND')).toBe('http://0.0.0.3');
  });

  it('returns undefined without a header or without the cookie', () => {
    expect(readRequestCookie(undefined, '_TRAEFIK_BACKEND')).toBeUndefined();
    expect(readRequestCookie('theme=dark', '_TRAEFIK_BACKEND')).toBeUndefined();
  });
});

describe('sanitizeCookieValue', () => {
  it('keeps URL-shaped tokens intact', () => {
    expect(sanitizeCookieValue('http://1.2.3.4:8080/path')).toBe('http://1.2.3.4:8080/path');
  });

  it('drops bytes a cookie value cannot carry', () => {
    expect(sanitizeCookieValue('a;b"c\\d\ne')).toBe('abcde');
  });

  it('quotes values with leading or trailing spaces and commas', () => {
    expect(sanitizeCookieValue(' backend')).toBe('" backend"');
    expect(sanitizeCookieValue('backend,')).toBe('"backend,"');
  });
});

describe('appendRequestCookie', () => {
  it('creates the header when none exists', () => {
    expect(appendRequestCookie(undefined, '_TRAEFIK_BACKEND', 'http://1.2.3.4')).toBe('_TRAEFIK_BACKEND=http://1.2.3.4');
  });

  it('appends after existing cookies', () => {
    expect(appendRequestCookie('theme=dark', '_TRAEFIK_BACKEND', 'http://1.2.3.4')).toBe(
      'theme=dark; _TRAEFIK_BACKEND=http://1.2.3.4',
    );
  });
});

describe('serializeSetCookie', () => {
  it('writes the pair with a path', () => {
    expect(serializeSetCookie('_TRAEFIK_BACKEND', 'http://1.2.3.4', { path: '/' })).toBe(
      '_TRAEFIK_BACKEND=http://1.2.3.4; Path=/',
    );
  });

  it('writes an expiry date in HTTP date format', () => {
    expect(serializeSetCookie('_TRAEFIK_BACKEND', '', { path: '/socket.io', expires: new Date(0) })).toBe(
      '_TRAEFIK_BACKEND=; Path=/socket.io; Expires=Thu, 01 Jan 1970 00:00:00 GMT',
    );
  });

  it('writes the bare pair without attributes', () => {
    expect(serializeSetCookie('a', 'b')).toBe('a=b');
  });
});
