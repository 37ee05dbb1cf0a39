/**
 * Handler Responses
 *
 * The closed set of responses a route handler can return, and the single
 * place that turns each variant into a status, content type and body.
 *
 * @module server/responses
 */

import type { JsonObject } from '../models/json.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE VARIANTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface NotFoundResponse {
  kind: 'not_found';
  message: string;
}

export interface ServerErrorResponse {
  kind: 'server_error';
  message: string;
}

export interface InvalidRequestResponse {
  kind: 'invalid_request';
  message: string;
}

export interface JsonResponse {
  kind: 'json';
  payload: JsonObject;
}

export type HandlerResponse =
  | NotFoundResponse
  | ServerErrorResponse
  | InvalidRequestResponse
  | JsonResponse;

export const Responses = {
  notFound: (message: string): NotFoundResponse => ({ kind: 'not_found', message }),
  serverError: (message: string): ServerErrorResponse => ({ kind: 'server_error', message }),
  invalidRequest: (message: string): InvalidRequestResponse => ({
    kind: 'invalid_request',
    message,
  }),
  json: (payload: JsonObject): JsonResponse => ({ kind: 'json', payload }),
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

export interface RenderedResponse {
  status: number;
  contentType: string;
  body: string;
}

const TEXT_HTML = 'text/html';
const APPLICATION_JSON = 'application/json';

/**
 * Status of the json variant. Kept at 400 so existing clients that key on
 * it keep working.
 */
export const JSON_RESPONSE_STATUS = 400;

function assertNever(value: never): never {
  throw new Error(`Unhandled response variant: ${JSON.stringify(value)}`);
}

export function renderResponse(response: HandlerResponse): RenderedResponse {
  switch (response.kind) {
    case 'not_found':
      return { status: 404, contentType: TEXT_HTML, body: response.message };
    case 'server_error':
      return { status: 500, contentType: TEXT_HTML, body: response.message };
    case 'invalid_request':
      return { status: 400, contentType: TEXT_HTML, body: response.message };
    case 'json':
      return {
        status: JSON_RESPONSE_STATUS,
        contentType: APPLICATION_JSON,
        body: JSON.stringify(response.payload),
      };
    default:
      return assertNever(response);
  }
}
