/**
 * Response decorator that reconciles the backend affinity cookie with the
 * `X-Traefik-Backend` header at the moment the header block is finalized.
 *
 * Node emits headers through `res.writeHead`, either explicitly or from the
 * implicit header write on the first `write`/`end`, so the decorator
 * intercepts that single call on the response instance. Body bytes go
 * straight to the underlying response and are never buffered here.
 */
import type { OutgoingHttpHeader, OutgoingHttpHeaders, ServerResponse } from 'http';
import type { Socket } from 'net';
import { BACKEND_COOKIE, BACKEND_HEADER, EXPOSE_HEADERS } from './constants';
import { findSetCookieValue, serializeSetCookie, setCookieLines } from './cookies';

type HeaderBlock = OutgoingHttpHeaders | OutgoingHttpHeader[];

export type AffinityResolution =
  | { source: 'response-cookie'; backend: string }
  | { source: 'query'; backend: string }
  | { source: 'none' };

export interface BackendHeaderWriterOptions {
  /** Token taken from the request query string, used when the handler sets no affinity cookie. */
  backendFromQuery?: string;
  /** Cookie path whose affinity cookie is expired whenever a token is resolved. */
  legacyCookiePath?: string;
  onResolve?: (resolution: AffinityResolution) => void;
}

export interface StreamingCapabilities {
  /** Push buffered output to the client before the response completes. */
  flush: () => void;
  /** Detach and return the connection, e.g. for a protocol upgrade. */
  hijack: () => Socket;
}

export type Capability = keyof StreamingCapabilities;

export class CapabilityNotSupportedError extends Error {
  constructor(readonly capability: Capability) {
    super(`Response does not support ${capability}`);
    this.name = 'CapabilityNotSupportedError';
  }
}

const EXPIRED = new Date(0);

const writers = new WeakMap<ServerResponse, BackendHeaderWriter>();

/** Decorator installed on `res` by the sticky header middleware, if any. */
export const backendHeaderWriterFor = (res: ServerResponse): BackendHeaderWriter | undefined =>
  writers.get(res);

const hasFlush = (res: ServerResponse): res is ServerResponse & { flush: () => void } =>
  'flush' in res && typeof res.flush === 'function';

const headerText = (value: OutgoingHttpHeader | undefined): string => {
  if (value === undefined) return '';
  return Array.isArray(value) ? value.join(', ') : String(value);
};

const headerValue = (value: OutgoingHttpHeader): string | string[] =>
  typeof value === 'number' ? String(value) : value;

/** Moves headers passed inline to `writeHead` onto the response, as Node itself would. */
const foldHeaders = (res: ServerResponse, headers: HeaderBlock): void => {
  if (!Array.isArray(headers)) {
    for (const [name, value] of Object.entries(headers)) {
      if (value !== undefined) res.setHeader(name, headerValue(value));
    }
    return;
  }
  // Inline entries replace earlier values but may repeat among themselves.
  for (let i = 0; i < headers.length; i += 2) {
    const name = headers[i];
    if (typeof name === 'string' && name !== '') res.removeHeader(name);
  }
  for (let i = 0; i < headers.length; i += 2) {
    const name = headers[i];
    const value = headers[i + 1];
    if (typeof name === 'string' && name !== '' && value !== undefined) res.appendHeader(name, headerValue(value));
  }
};

// Node rejects a flat header list of odd length; such a call is passed through untouched.
const isMalformedList = (headers: HeaderBlock | undefined): boolean =>
  Array.isArray(headers) && headers.length % 2 !== 0;

/** Bytes of the UTF-8 encoding, as the latin1 string Node writes to the wire unchanged. */
const toHeaderValue = (value: string): string =>
  /[^\x00-\x7f]/.test(value) ? Buffer.from(value, 'utf8').toString('latin1') : value;

export class BackendHeaderWriter {
  private readonly capabilities: Partial<StreamingCapabilities> = {};
  private finalized = false;
  private hijacked = false;

  private constructor(
    readonly response: ServerResponse,
    private readonly options: BackendHeaderWriterOptions,
  ) {
    this.detectCapabilities();
    this.interceptWriteHead();
  }

  static wrap(response: ServerResponse, options: BackendHeaderWriterOptions = {}): BackendHeaderWriter {
    const writer = new BackendHeaderWriter(response, options);
    writers.set(response, writer);
    return writer;
  }

  capability<K extends Capability>(name: K): StreamingCapabilities[K] | undefined {
    return this.capabilities[name];
  }

  supports(name: Capability): boolean {
    return this.capabilities[name] !== undefined;
  }

  flush(): void {
    const flush = this.capabilities.flush;
    if (!flush) throw new CapabilityNotSupportedError('flush');
    flush();
  }

  hijack(): Socket {
    const hijack = this.capabilities.hijack;
    if (!hijack) throw new CapabilityNotSupportedError('hijack');
    return hijack();
  }

  private detectCapabilities(): void {
    const res = this.response;

    if (hasFlush(res)) {
      this.capabilities.flush = () => res.flush();
    }

    const socket = res.socket;
    if (socket) {
      this.capabilities.hijack = () => {
        if (this.hijacked) throw new Error('Connection has already been hijacked');
        if (res.headersSent) throw new Error('Cannot hijack a connection after headers were sent');
        this.hijacked = true;
        res.detachSocket(socket);
        return socket;
      };
    }
  }

  private interceptWriteHead(): void {
    const res = this.response;
    const writeHead = res.writeHead.bind(res);

    res.writeHead = (
      statusCode: number,
      reasonOrHeaders?: string | HeaderBlock,
      headers?: HeaderBlock,
    ) => {
      const reason = typeof reasonOrHeaders === 'string' ? reasonOrHeaders : undefined;
      const inline = typeof reasonOrHeaders === 'string' ? headers : reasonOrHeaders;

      if (this.finalized || isMalformedList(inline)) {
        return reason === undefined ? writeHead(statusCode, inline) : writeHead(statusCode, reason, inline);
      }
      this.finalized = true;

      if (inline) foldHeaders(res, inline);
      this.reconcile();

      return reason === undefined ? writeHead(statusCode) : writeHead(statusCode, reason);
    };
  }

  private reconcile(): void {
    const res = this.response;
    const { backendFromQuery, onResolve } = this.options;
    const fromResponse = findSetCookieValue(setCookieLines(res.getHeader('set-cookie')), BACKEND_COOKIE);

    let resolution: AffinityResolution = { source: 'none' };
    if (fromResponse) {
      this.expireLegacyCookie();
      res.setHeader(BACKEND_HEADER, toHeaderValue(fromResponse));
      resolution = { source: 'response-cookie', backend: fromResponse };
    } else if (backendFromQuery) {
      this.expireLegacyCookie();
      res.appendHeader('Set-Cookie', serializeSetCookie(BACKEND_COOKIE, backendFromQuery, { path: '/' }));
      res.setHeader(BACKEND_HEADER, toHeaderValue(backendFromQuery));
      resolution = { source: 'query', backend: backendFromQuery };
    }

    this.exposeBackendHeader();
    onResolve?.(resolution);
  }

  private expireLegacyCookie(): void {
    const path = this.options.legacyCookiePath;
    if (!path) return;
    this.response.appendHeader('Set-Cookie', serializeSetCookie(BACKEND_COOKIE, '', { path, expires: EXPIRED }));
  }

  private exposeBackendHeader(): void {
    const res = this.response;
    const current = headerText(res.getHeader(EXPOSE_HEADERS));

    if (current === '') {
      res.setHeader(EXPOSE_HEADERS, BACKEND_HEADER);
      return;
    }
    const listed = current.split(',').some((name) => name.trim().toLowerCase() === BACKEND_HEADER.toLowerCase());
    if (!listed) res.setHeader(EXPOSE_HEADERS, `${current}, ${BACKEND_HEADER}`);
  }
}
