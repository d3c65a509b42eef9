/**
 * Sticky header middleware.
 *
 * Wraps the handler that routes to a backend (typically the upstream proxy)
 * and keeps the `_TRAEFIK_BACKEND` affinity cookie in sync with the
 * `X-Traefik-Backend` response header:
 *
 *  - request: when the client sent no affinity cookie, a non-empty
 *    `X-Traefik-Backend` query parameter is handed to the wrapped handler
 *    as if it had arrived as that cookie;
 *  - response: the affinity cookie the handler set (or, failing that, the
 *    query value) is echoed in `X-Traefik-Backend`, and the header name is
 *    added to `Access-Control-Expose-Headers` so browsers can read it.
 */
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../infra/logger';
import { affinityResolutionCounter } from '../infra/metrics';
import { AffinityResolution, BackendHeaderWriter } from '../sticky/backend-header-writer';
import { BACKEND_COOKIE, BACKEND_QUERY_PARAM } from '../sticky/constants';
import { appendRequestCookie, readRequestCookie } from '../sticky/cookies';
import { withHeaders } from '../sticky/request-view';

export type AffinityHandler = (req: Request, res: Response, next: NextFunction) => unknown;

export interface StickyHeaderOptions {
  /** Expire the affinity cookie on this path whenever a token is resolved. */
  legacyCookiePath?: string;
}

// Control characters cannot travel in a header value in any encoding.
const CONTROL_CHAR = /[\x00-\x08\x0a-\x1f\x7f]/;

/** First `X-Traefik-Backend` query value, or undefined when missing or empty. */
export const backendFromQueryString = (url: string | undefined): string | undefined => {
  if (!url) return undefined;
  const start = url.indexOf('?');
  if (start < 0) return undefined;

  const value = new URLSearchParams(url.slice(start + 1)).get(BACKEND_QUERY_PARAM);
  if (!value || CONTROL_CHAR.test(value)) return undefined;
  return value;
};

export const stickyHeader = (handler: AffinityHandler, options: StickyHeaderOptions = {}): RequestHandler =>
  (req, res, next) => {
    let forwarded: Request = req;
    let backendFromQuery: string | undefined;

    // An affinity cookie already on the request is never overridden by the query string.
    if (readRequestCookie(req.headers.cookie, BACKEND_COOKIE) === undefined) {
      backendFromQuery = backendFromQueryString(req.url);
      if (backendFromQuery) {
        forwarded = withHeaders(req, {
          cookie: appendRequestCookie(req.headers.cookie, BACKEND_COOKIE, backendFromQuery),
        });
      }
    }

    const requestId = req.headers['x-request-id'];
    BackendHeaderWriter.wrap(res, {
      backendFromQuery,
      legacyCookiePath: options.legacyCookiePath,
      onResolve: (resolution: AffinityResolution) => {
        affinityResolutionCounter.inc({ source: resolution.source });
        logger.debug('Sticky backend resolved', { ...resolution, requestId });
      },
    });

    Promise.resolve(handler(forwarded, res, next)).catch(next);
  };
