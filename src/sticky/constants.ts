/** Response header carrying the backend a request was routed to. */
export const BACKEND_HEADER = 'X-Traefik-Backend';

/** Query parameter a caller may use to pick a backend. Same literal as the header. */
export const BACKEND_QUERY_PARAM = 'X-Traefik-Backend';

/** Cookie the load balancer reads and writes for session affinity. */
export const BACKEND_COOKIE = '_TRAEFIK_BACKEND';

export const EXPOSE_HEADERS = 'Access-Control-Expose-Headers';
