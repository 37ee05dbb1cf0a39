/**
 * Response rendering tests
 */

import { describe, it, expect } from 'vitest';
import { Responses, renderResponse } from '../../../src/server/responses.js';

describe('renderResponse', () => {
  it('renders not_found as 404 text/html', () => {
    expect(renderResponse(Responses.notFound('Route /x is not found.'))).toEqual({
      status: 404,
      contentType: 'text/html',
      body: 'Route /x is not found.',
    });
  });

  it('renders server_error as 500 text/html', () => {
    expect(renderResponse(Responses.serverError('boom'))).toEqual({
      status: 500,
      contentType: 'text/html',
      body: 'boom',
    });
  });

  it('renders invalid_request as 400 text/html', () => {
    expect(renderResponse(Responses.invalidRequest('bad'))).toEqual({
      status: 400,
      contentType: 'text/html',
      body: 'bad',
    });
  });

  it('renders json as 400 application/json with the serialized payload', () => {
    expect(renderResponse(Responses.json({ message: 'Hello world!', n: [1, null] }))).toEqual({
      status: 400,
      contentType: 'application/json',
      body: '{"message":"Hello world!","n":[1,null]}',
    });
  });
});
