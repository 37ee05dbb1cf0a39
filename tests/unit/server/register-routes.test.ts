/**
 * Route handler tests against an in-memory store
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { registerRoutes, type RouteStore } from '../../../src/server/register-routes.js';
import { HandlerRegistryBuilder, type EngineRequest } from '../../../src/server/router.js';
import { StoreError, StoreErrorCode } from '../../../src/services/storage/index.js';
import type { Collection, ItemRecord } from '../../../src/models/index.js';

const collections: Collection[] = [
  { id: 1, title: 'abc', items: [{ hash: 'a1b2c3', ext: 'mp4' }] },
  { id: 2, title: 'def', items: [] },
];

const records: ItemRecord[] = [
  { hash: 'a1b2c3', ext: 'mp4', collectionId: 1, title: 'abc', tags: ['x', 'y'] },
];

function get(store: RouteStore, target: string) {
  const registry = registerRoutes(new HandlerRegistryBuilder(), store).build();
  const request: EngineRequest = {
    method: 'GET',
    target,
    httpVersion: '1.1',
    headers: {},
    body: '',
    keepAlive: true,
  };
  return registry.resolve('GET', target).handler(request);
}

const memoryStore: RouteStore = {
  getCollections: () => collections,
  getItems: () => records,
};

describe('registerRoutes', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers the three routes', () => {
    const registry = registerRoutes(new HandlerRegistryBuilder(), memoryStore).build();
    expect(registry.routes()).toEqual(['GET /', 'GET /collections', 'GET /items']);
  });

  it('GET / greets', () => {
    expect(get(memoryStore, '/')).toEqual({ kind: 'json', payload: { message: 'Hello world!' } });
  });

  it('GET /collections lists collections with item paths', () => {
    expect(get(memoryStore, '/collections')).toEqual({
      kind: 'json',
      payload: {
        collections: [
          { id: 1, title: 'abc', items: [{ path: 'a1/b2c3.mp4' }] },
          { id: 2, title: 'def', items: [] },
        ],
      },
    });
  });

  it('GET /items lists items with title and tags', () => {
    expect(get(memoryStore, '/items')).toEqual({
      kind: 'json',
      payload: { items: [{ path: 'a1/b2c3.mp4', title: 'abc', tags: ['x', 'y'] }] },
    });
  });

  it('answers server_error with the store message when the store fails', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: RouteStore = {
      getCollections: () => {
        throw new StoreError('Failed reading collections: disk I/O error', StoreErrorCode.STORE_IO_ERROR);
      },
      getItems: () => [],
    };

    expect(get(failing, '/collections')).toEqual({
      kind: 'server_error',
      message: 'Failed reading collections: disk I/O error',
    });
    expect(log).toHaveBeenCalledWith(
      '[Router] GET /collections failed: STORE_IO_ERROR: Failed reading collections: disk I/O error'
    );
  });

  it('lets other errors propagate to the engine', () => {
    const broken: RouteStore = {
      getCollections: () => [],
      getItems: () => {
        throw new TypeError('unexpected');
      },
    };
    expect(() => get(broken, '/items')).toThrow(TypeError);
  });
});
