import type { IncomingHttpHeaders, IncomingMessage } from 'http';

/**
 * A view of `req` whose `headers` include `overrides`.
 *
 * Every other property read goes to the original request, and every write
 * made through the view lands on it, so the view can be handed to code that
 * pipes the request body or rewrites `req.url`. The original's own headers
 * are left untouched.
 */
export const withHeaders = <T extends IncomingMessage>(req: T, overrides: IncomingHttpHeaders): T => {
  const headers: IncomingHttpHeaders = { ...req.headers, ...overrides };

  return new Proxy(req, {
    get(target, property, receiver) {
      if (property === 'headers') return headers;
      return Reflect.get(target, property, receiver);
    },
  });
};
