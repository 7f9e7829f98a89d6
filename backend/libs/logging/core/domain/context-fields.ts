import { randomUUID } from 'crypto';
import { LogFieldKey } from '../value-objects';
import { LogFields } from './error-chain';
import { HttpRequestLike, HttpResponseLike, headerValue } from './http-request';
import { RouteNormalizer } from './route.normalizer';

export const REQUEST_ID_HEADER = 'X-Request-Id';
export const HOST_HEADER = 'X-Host';
export const FORWARDED_HOST_HEADER = 'X-Forwarded-Host';

/**
 * Ordered from most to least trusted; the socket address is the last resort.
 */
export const REMOTE_ADDR_HEADERS = [
  'X-Forwarded-For',
  'X-Real-Ip',
  'X-Remote-Addr',
] as const;

/**
 * Produces the fields every record of a request carries.
 * Collectors run in order; a later collector overwrites earlier keys.
 */
export type ContextFieldCollector = (
  request: HttpRequestLike,
  response: HttpResponseLike,
) => LogFields;

/**
 * Request id from `X-Request-Id`, or a fresh UUID.
 * The id is written back to the request and echoed on the response.
 */
export function resolveRequestId(
  request: HttpRequestLike,
  response: HttpResponseLike,
): string {
  const requestId = headerValue(request.headers, REQUEST_ID_HEADER) || randomUUID();
  request.headers[REQUEST_ID_HEADER.toLowerCase()] = requestId;
  response.setHeader(REQUEST_ID_HEADER, requestId);
  return requestId;
}

/**
 * Host from `X-Host`, else from `X-Forwarded-Host` with any port dropped.
 * A host taken from the forwarded header is stored back as `X-Host`.
 */
export function resolveHost(request: HttpRequestLike): string {
  const host = headerValue(request.headers, HOST_HEADER);
  if (host) {
    return host;
  }

  const forwarded = headerValue(request.headers, FORWARDED_HOST_HEADER);
  if (!forwarded) {
    return '';
  }
  const [hostname] = forwarded.split(':');
  request.headers[HOST_HEADER.toLowerCase()] = hostname;
  return hostname;
}

export function resolveRemoteAddr(request: HttpRequestLike): string {
  for (const header of REMOTE_ADDR_HEADERS) {
    const value = headerValue(request.headers, header);
    if (value) {
      return value;
    }
  }
  return request.socket.remoteAddress ?? '';
}

/**
 * Default collector: request id, host, remote address, method, URI and route.
 */
export const requestContextFields: ContextFieldCollector = (
  request,
  response,
) => ({
  [LogFieldKey.REQUEST_ID]: resolveRequestId(request, response),
  [LogFieldKey.HOST]: resolveHost(request),
  [LogFieldKey.REMOTE_ADDR]: resolveRemoteAddr(request),
  [LogFieldKey.METHOD]: request.method,
  [LogFieldKey.URI]: request.originalUrl,
  [LogFieldKey.ROUTER_PATH]: RouteNormalizer.routePath(request),
});
