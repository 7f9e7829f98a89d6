import { HttpRequestLike } from './http-request';
import { RouteNormalizer } from './route.normalizer';

function fakeRequest(route?: { path?: unknown }): HttpRequestLike {
  return {
    headers: {},
    method: 'GET',
    originalUrl: '/users/42?verbose=1',
    path: '/users/42',
    route,
    socket: {},
  };
}

describe('RouteNormalizer', () => {
  it('should prefer the matched route template', () => {
    expect(RouteNormalizer.routePath(fakeRequest({ path: '/users/:id' }))).toBe(
      '/users/:id',
    );
  });

  it('should take the first path of a route array', () => {
    expect(
      RouteNormalizer.routePath(fakeRequest({ path: ['/users/:id', '/u/:id'] })),
    ).toBe('/users/:id');
  });

  it('should fall back to the request path', () => {
    expect(RouteNormalizer.routePath(fakeRequest())).toBe('/users/42');
    expect(RouteNormalizer.routePath(fakeRequest({ path: '' }))).toBe(
      '/users/42',
    );
  });
});
