import { IncomingHttpHeaders } from 'http';

/**
 * The parts of an Express request the logging layer reads.
 */
export interface HttpRequestLike {
  headers: IncomingHttpHeaders;
  method: string;
  originalUrl: string;
  path: string;
  route?: { path?: unknown };
  socket: { remoteAddress?: string };
}

/**
 * The parts of an Express response the logging layer touches.
 */
export interface HttpResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
}

/**
 * First value of a request header, or an empty string.
 */
export function headerValue(
  headers: IncomingHttpHeaders,
  name: string,
): string {
  const value = headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() ?? '';
}
