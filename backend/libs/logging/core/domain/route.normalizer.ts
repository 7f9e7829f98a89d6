import { HttpRequestLike } from './http-request';

/**
 * RouteNormalizer - Route identifiers for the `router_path` field.
 *
 * Prefers the template path (`/users/:id`) so records aggregate per route;
 * falls back to the request path (Express keeps the query string out of it).
 *
 * @example
 * RouteNormalizer.routePath(request) // "/users/:id"
 */
export class RouteNormalizer {
  static routePath(request: HttpRequestLike): string {
    return this.getTemplatePath(request) ?? request.path;
  }

  /**
   * Template path of the matched Express route, if any.
   */
  private static getTemplatePath(request: HttpRequestLike): string | null {
    const routePath: unknown = request.route?.path;

    // Route arrays are rare but possible
    if (Array.isArray(routePath)) {
      const [first]: unknown[] = routePath;
      return typeof first === 'string' && first ? first : null;
    }

    return typeof routePath === 'string' && routePath ? routePath : null;
  }
}
