/**
 * Route Registration
 *
 * The HTTP routes, each closing over the repository store.
 *
 * @module server/register-routes
 */

import { collectionToJson, itemRecordToJson } from '../models/json.js';
import { StoreError, type RepositoryStore } from '../services/storage/index.js';
import { Responses, type HandlerResponse } from './responses.js';
import type { HandlerRegistryBuilder } from './router.js';

/** Store queries the routes depend on */
export type RouteStore = Pick<RepositoryStore, 'getCollections' | 'getItems'>;

/**
 * Run a store query, turning a StoreError into server_error
 */
function withStore(route: string, query: () => HandlerResponse): HandlerResponse {
  try {
    return query();
  } catch (error) {
    if (error instanceof StoreError) {
      console.error(`[Router] ${route} failed: ${error.code}: ${error.message}`);
      return Responses.serverError(error.message);
    }
    throw error;
  }
}

/**
 * Register every route on the builder
 * @returns the same builder
 */
export function registerRoutes(
  builder: HandlerRegistryBuilder,
  store: RouteStore
): HandlerRegistryBuilder {
  builder.register('GET', '/', () => Responses.json({ message: 'Hello world!' }));

  builder.register('GET', '/collections', () =>
    withStore('GET /collections', () =>
      Responses.json({ collections: store.getCollections().map(collectionToJson) })
    )
  );

  builder.register('GET', '/items', () =>
    withStore('GET /items', () =>
      Responses.json({ items: store.getItems().map(itemRecordToJson) })
    )
  );

  return builder;
}
