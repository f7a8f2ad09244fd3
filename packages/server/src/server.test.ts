// ============================================================================
// @routeconf/server: Test suite
// ============================================================================

import { describe, it, expect, vi } from 'vitest';
import { IncomingMessage, ServerResponse } from 'node:http';
import type { IncomingHttpHeaders } from 'node:http';
import { Socket } from 'node:net';
import { createRouteStore, loadRoutes, matchRoute } from '@routeconf/router';
import type { RouteTable } from '@routeconf/router';
import { adaptRequest } from './request.js';
import { resolveFormat } from './format.js';
import {
  assertActionsRegistered,
  createActionRegistry,
  UnregisteredActionError,
} from './registry.js';
import type { ActionRegistry } from './registry.js';
import { dispatch } from './dispatch.js';
import { createRouteHandler } from './handler.js';
import type { RouteRequest } from './types.js';

const load = (source: string): RouteTable => loadRoutes(source, { logger: null });

const ROUTES = load(
  [
    'GET    /page/{id}                    PageController.showPage',
    "GET    /home                         PageController.showPage(id:'home')",
    "GET    /api/customers/{<[0-9]+>id}   CustomerController.show(format:'json')",
    'DELETE /api/customers/{<[0-9]+>id}   CustomerController.remove',
    'POST   /feed/{format}                FeedController.publish',
    'GET    /boom                         ErrorController.fail',
  ].join('\n'),
);

function createIncoming(method: string, url: string, headers: IncomingHttpHeaders = {}): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  req.headers = headers;
  return req;
}

function makeRequest(method: string, url: string, headers: IncomingHttpHeaders = {}): RouteRequest {
  return adaptRequest(createIncoming(method, url, headers));
}

function createRegistry(): ActionRegistry {
  return createActionRegistry()
    .registerController('PageController', {
      showPage: ({ params, args, format }) => `page:${params.id ?? args.id}:${format}`,
    })
    .registerController('CustomerController', {
      show: ({ params }) => ({ body: { id: Number(params.id) } }),
      remove: () => undefined,
    })
    .register('FeedController', 'publish', ({ format }) => ({
      status: 201,
      headers: { 'X-Feed': format },
      body: 'ok',
    }))
    .register('ErrorController', 'fail', () => {
      throw new Error('boom');
    });
}

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// =========================================================================
// Request adapter
// =========================================================================

describe('adaptRequest', () => {
  it('splits the path from the query string', () => {
    const request = makeRequest('get', '/page/x?lang=en&b=1');
    expect(request.method).toBe('GET');
    expect(request.path).toBe('/page/x');
    expect(request.url).toBe('/page/x?lang=en&b=1');
    expect(request.query.get('lang')).toBe('en');
    expect(request.format).toBeNull();
  });

  it('treats an empty target as the root', () => {
    expect(makeRequest('GET', '').path).toBe('/');
  });

  it('honours a method override on POST only', () => {
    expect(makeRequest('POST', '/x', { 'x-http-method-override': 'put' }).method).toBe('PUT');
    expect(makeRequest('GET', '/x', { 'x-http-method-override': 'put' }).method).toBe('GET');
  });
});

// =========================================================================
// Format resolution
// =========================================================================

describe('resolveFormat', () => {
  const formatFor = (url: string, accept?: string): string => {
    const request = makeRequest('GET', url, accept === undefined ? {} : { accept });
    const match = matchRoute(ROUTES, request.method, request.path);
    if (!match.found) throw new Error(`no route for ${url}`);
    return resolveFormat(request, match);
  };

  it('defaults to html', () => {
    expect(formatFor('/page/x')).toBe('html');
    expect(formatFor('/page/x', 'image/png')).toBe('html');
  });

  it('reads the Accept header', () => {
    expect(formatFor('/page/x', 'text/html,application/xhtml+xml')).toBe('html');
    expect(formatFor('/page/x', '*/*')).toBe('html');
    expect(formatFor('/page/x', 'text/xml')).toBe('xml');
    expect(formatFor('/page/x', 'text/plain')).toBe('txt');
    expect(formatFor('/page/x', 'application/json, */*')).toBe('json');
  });

  it('prefers a format static argument over the Accept header', () => {
    expect(formatFor('/api/customers/7', 'text/html')).toBe('json');
  });

  it('ignores a format left on the request by an earlier dispatch', () => {
    const request: RouteRequest = { ...makeRequest('GET', '/page/x', { accept: 'text/plain' }), format: 'xml' };
    const match = matchRoute(ROUTES, request.method, request.path);
    expect(match.found && resolveFormat(request, match)).toBe('txt');
  });
});

// =========================================================================
// Action registry
// =========================================================================

describe('createActionRegistry', () => {
  it('resolves registered handlers by descriptor', () => {
    const handler = () => 'ok';
    const registry = createActionRegistry().register('A', 'b', handler);
    expect(registry.resolve({ target: 'A', methodName: 'b', staticArgs: {} })).toBe(handler);
    expect(registry.resolve({ target: 'A', methodName: 'c', staticArgs: {} })).toBeUndefined();
  });

  it('rejects duplicate registrations', () => {
    const registry = createActionRegistry().register('A', 'b', () => 'one');
    expect(() => registry.register('A', 'b', () => 'two')).toThrow("Action 'A.b' is already registered");
  });

  it('lists each unregistered action once, in route order', () => {
    const table = load('GET /a Nope.none\nGET /b PageController.showPage\nGET /c Other.thing\nPOST /a Nope.none');
    const missing = createRegistry().missing(table);
    expect(missing.map((a) => `${a.target}.${a.methodName}`)).toEqual(['Nope.none', 'Other.thing']);
    expect(() => assertActionsRegistered(table, createRegistry())).toThrow(
      'No handler registered for Nope.none, Other.thing',
    );
  });
});

// =========================================================================
// Dispatcher
// =========================================================================

describe('dispatch', () => {
  const registry = createRegistry();

  it('runs the matched action with params and the resolved format', async () => {
    const result = await dispatch(makeRequest('GET', '/page/intro', { accept: 'text/html' }), {
      routes: ROUTES,
      registry,
    });
    expect(result.found && result.response).toEqual({
      status: 200,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
      body: 'page:intro:html',
    });
  });

  it('passes static arguments to the action', async () => {
    const result = await dispatch(makeRequest('GET', '/home'), { routes: ROUTES, registry });
    expect(result.found && result.response.body).toBe('page:home:html');
  });

  it('serializes object bodies as JSON', async () => {
    const result = await dispatch(makeRequest('GET', '/api/customers/42'), { routes: ROUTES, registry });
    expect(result.found && result.response).toEqual({
      status: 200,
      headers: { 'Content-Type': 'application/json; charset=utf-8' },
      body: '{"id":42}',
    });
  });

  it('answers 204 when the action returns nothing', async () => {
    const request = makeRequest('POST', '/api/customers/42', { 'x-http-method-override': 'DELETE' });
    const result = await dispatch(request, { routes: ROUTES, registry });
    expect(result.found && result.response).toEqual({ status: 204, headers: {}, body: '' });
  });

  it('keeps action status and headers', async () => {
    const result = await dispatch(makeRequest('POST', '/feed/xml'), { routes: ROUTES, registry });
    expect(result.found && result.response).toEqual({
      status: 201,
      headers: { 'Content-Type': 'application/xml; charset=utf-8', 'X-Feed': 'xml' },
      body: 'ok',
    });
  });

  it('returns the miss for the caller to handle', async () => {
    const result = await dispatch(makeRequest('GET', '/missing?x=1'), { routes: ROUTES, registry });
    expect(result).toEqual({ found: false, miss: { found: false, method: 'GET', path: '/missing' } });
  });

  it('reads the current table of a store on every request', async () => {
    const store = createRouteStore(load('GET /old PageController.showPage'));
    expect((await dispatch(makeRequest('GET', '/new'), { routes: store, registry })).found).toBe(false);

    store.swap(load('GET /new PageController.showPage'));
    expect((await dispatch(makeRequest('GET', '/new'), { routes: store, registry })).found).toBe(true);
  });

  it('rejects a matched route whose action is not registered', async () => {
    const request = makeRequest('GET', '/x');
    await expect(
      dispatch(request, { routes: load('GET /x Nope.none'), registry }),
    ).rejects.toThrow(UnregisteredActionError);
  });
});

// =========================================================================
// HTTP handler
// =========================================================================

describe('createRouteHandler', () => {
  function createExchange(method: string, url: string, headers: IncomingHttpHeaders = {}) {
    const req = createIncoming(method, url, headers);
    const res = new ServerResponse(req);
    const writeHead = vi.spyOn(res, 'writeHead').mockReturnValue(res);
    const end = vi.spyOn(res, 'end').mockReturnValue(res);
    return { req, res, writeHead, end };
  }

  it('writes the action response', async () => {
    const handler = createRouteHandler({ routes: ROUTES, registry: createRegistry(), logger: createLogger() });
    const { req, res, writeHead, end } = createExchange('GET', '/page/intro');

    await handler(req, res);

    expect(writeHead).toHaveBeenCalledWith(200, { 'Content-Type': 'text/html; charset=utf-8' });
    expect(end).toHaveBeenCalledWith('page:intro:html');
  });

  it('logs a miss at debug level and answers 404', async () => {
    const logger = createLogger();
    const handler = createRouteHandler({ routes: ROUTES, registry: createRegistry(), logger });
    const { req, res, writeHead, end } = createExchange('GET', '/nope');

    await handler(req, res);

    expect(logger.debug).toHaveBeenCalledWith('[routeconf] no route found for method[GET] and path[/nope]');
    expect(writeHead).toHaveBeenCalledWith(404, { 'Content-Type': 'text/plain; charset=utf-8' });
    expect(end).toHaveBeenCalledWith('Not Found');
  });

  it('hands misses to the notFound fallback', async () => {
    const notFound = vi.fn();
    const handler = createRouteHandler({
      routes: ROUTES,
      registry: createRegistry(),
      notFound,
      logger: createLogger(),
    });
    const { req, res, writeHead } = createExchange('GET', '/nope');

    await handler(req, res);

    expect(notFound).toHaveBeenCalledWith(req, res, { found: false, method: 'GET', path: '/nope' });
    expect(writeHead).not.toHaveBeenCalled();
  });

  it('logs action errors and answers 500', async () => {
    const logger = createLogger();
    const handler = createRouteHandler({ routes: ROUTES, registry: createRegistry(), logger });
    const { req, res, writeHead, end } = createExchange('GET', '/boom');

    await handler(req, res);

    expect(logger.error).toHaveBeenCalledWith('[routeconf] error handling GET /boom:', expect.any(Error));
    expect(writeHead).toHaveBeenCalledWith(500, { 'Content-Type': 'text/plain; charset=utf-8' });
    expect(end).toHaveBeenCalledWith('Internal Server Error');
  });

  it('refuses to start with unregistered actions', () => {
    expect(() =>
      createRouteHandler({
        routes: load('GET /x Nope.none'),
        registry: createActionRegistry(),
        logger: createLogger(),
      }),
    ).toThrow(UnregisteredActionError);
  });

  it('serves a reloaded table', async () => {
    const store = createRouteStore(load('GET /old PageController.showPage'));
    const handler = createRouteHandler({ routes: store, registry: createRegistry(), logger: createLogger() });

    await store.reload(() => load('GET /fresh/{id} PageController.showPage'));
    const { req, res, writeHead, end } = createExchange('GET', '/fresh/v2');
    await handler(req, res);

    expect(writeHead).toHaveBeenCalledWith(200, { 'Content-Type': 'text/html; charset=utf-8' });
    expect(end).toHaveBeenCalledWith('page:v2:html');
  });
});
