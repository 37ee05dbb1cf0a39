/**
 * Handler Registry
 *
 * Routes are registered on a builder during startup. `build()` produces a
 * read-only registry, which is the only form the engine accepts.
 *
 * @module server/router
 */

import type { IncomingHttpHeaders } from 'http';
import { Responses, type HandlerResponse } from './responses.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type HttpVerb = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * A fully read request, owned by the handler that receives it
 */
export interface EngineRequest {
  method: string;
  /** Raw request-target, including any query string */
  target: string;
  httpVersion: string;
  headers: IncomingHttpHeaders;
  body: string;
  keepAlive: boolean;
}

export type Handler = (request: EngineRequest) => HandlerResponse;

export interface ResolvedHandler {
  /** Registry key that matched, or null for the not-found fallback */
  key: string | null;
  handler: Handler;
}

export function handlerKey(method: string, target: string): string {
  return `${method} ${target}`;
}

/**
 * Handler used when no registered route matches
 */
export const unknownRoute: Handler = (request) =>
  Responses.notFound(`Route ${request.target} is not found.`);

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export class HandlerRegistry {
  private readonly handlers: ReadonlyMap<string, Handler>;

  constructor(handlers: ReadonlyMap<string, Handler>) {
    this.handlers = new Map(handlers);
  }

  /**
   * Exact (method, target) lookup. HEAD falls back to the GET handler of
   * the same target; anything else unmatched gets the not-found handler.
   */
  resolve(method: string, target: string): ResolvedHandler {
    const key = handlerKey(method, target);
    const handler = this.handlers.get(key);
    if (handler) {
      return { key, handler };
    }

    if (method === 'HEAD') {
      const getKey = handlerKey('GET', target);
      const getHandler = this.handlers.get(getKey);
      if (getHandler) {
        return { key: getKey, handler: getHandler };
      }
    }

    return { key: null, handler: unknownRoute };
  }

  /** Registered keys, sorted */
  routes(): string[] {
    return [...this.handlers.keys()].sort();
  }

  get size(): number {
    return this.handlers.size;
  }
}

export class HandlerRegistryBuilder {
  private readonly handlers = new Map<string, Handler>();

  /**
   * Register a handler. Registering the same verb and route again replaces
   * the earlier handler.
   */
  register(verb: HttpVerb, route: string, handler: Handler): this {
    const key = handlerKey(verb, route);
    if (this.handlers.has(key)) {
      console.error(`[Router] Handler for ${key} registered more than once; using the latest`);
    }
    this.handlers.set(key, handler);
    return this;
  }

  build(): HandlerRegistry {
    return new HandlerRegistry(this.handlers);
  }
}
