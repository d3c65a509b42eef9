import { createProxyMiddleware, Options, RequestHandler } from 'http-proxy-middleware';
import { logger } from '../infra/logger';

// Proxy configuration options. Failures are logged once, by onError.
export const createProxyOptions = (target: string): Options => ({
  target,
  changeOrigin: true,
  logLevel: 'silent',
  onProxyReq: (proxyReq, req) => {
    // Forward the correlation ID so the upstream can include it in logs.
    const requestId = req.headers['x-request-id'];
    if (requestId) {
      proxyReq.setHeader('x-request-id', requestId);
    }
  },
  onError: (err, req, res) => {
    logger.error('Upstream proxy error', {
      message: err.message,
      method: req.method,
      url: req.originalUrl,
      requestId: req.headers['x-request-id'],
    });
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(502).json({
      success: false,
      error: {
        code: 'BAD_GATEWAY',
        message: 'Upstream service unavailable',
      },
    });
  },
});

/**
 * Forwards every request to the load-balancing upstream. The upstream owns
 * backend selection and may answer with its own affinity cookie.
 */
export const createUpstreamProxy = (target: string): RequestHandler =>
  createProxyMiddleware(createProxyOptions(target));
