/**
 * HTTP/1.1 Protocol Engine
 *
 * Accepts connections, runs one Session per connection, reads each request
 * fully, dispatches it through a built HandlerRegistry and writes the
 * rendered response:
 * - Content-Type, Content-Length, Server and Connection headers on every response
 * - HEAD responses keep status and headers but carry no body
 * - bodies above maxBodyBytes are refused with invalid_request
 * - malformed requests get invalid_request on the raw socket
 *
 * CRITICAL: NEVER use console.log() for logging - stderr only.
 *
 * @module server/transports/protocol-engine
 */

import http from 'http';
import type { AddressInfo } from 'net';
import type { Duplex } from 'stream';
import { Session } from './session.js';
import type { EngineRequest, HandlerRegistry } from '../router.js';
import { Responses, renderResponse, type HandlerResponse } from '../responses.js';
import { handlerFailure, transportError } from '../errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProtocolEngineConfig {
  host: string;
  /** 0 binds an ephemeral port */
  port: number;
  sessionTimeoutMs: number;
  maxBodyBytes: number;
}

export const DEFAULT_ENGINE_CONFIG: ProtocolEngineConfig = {
  host: 'localhost',
  port: 8000,
  sessionTimeoutMs: 30_000,
  maxBodyBytes: 1_048_576,
};

/** Value of the Server header */
export const SERVER_NAME = 'vorg-server';

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
};

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * HTTP/1.1 keeps the connection unless the client sends `Connection: close`;
 * HTTP/1.0 keeps it only with `Connection: keep-alive`.
 */
export function wantsKeepAlive(httpVersion: string, connection: string | undefined): boolean {
  const tokens = (connection ?? '')
    .toLowerCase()
    .split(',')
    .map((token) => token.trim());
  if (httpVersion === '1.0') {
    return tokens.includes('keep-alive');
  }
  return !tokens.includes('close');
}

/**
 * Read the whole request body. Resolves null once more than `maxBytes`
 * have arrived.
 */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer | null> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return Promise.resolve(null);
  }

  return new Promise<Buffer | null>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;
    req.on('data', (chunk: Buffer) => {
      if (overflow) {
        return;
      }
      size += chunk.length;
      if (size > maxBytes) {
        overflow = true;
        resolve(null);
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!overflow) {
        resolve(Buffer.concat(chunks));
      }
    });
    req.on('error', reject);
  });
}

/**
 * Serialize a response for a socket the HTTP layer has given up on
 */
function rawResponse(response: HandlerResponse): string {
  const rendered = renderResponse(response);
  return (
    `HTTP/1.1 ${rendered.status} ${STATUS_TEXT[rendered.status] ?? ''}\r\n` +
    `Content-Type: ${rendered.contentType}\r\n` +
    `Content-Length: ${Buffer.byteLength(rendered.body)}\r\n` +
    `Server: ${SERVER_NAME}\r\n` +
    'Connection: close\r\n' +
    '\r\n' +
    rendered.body
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class ProtocolEngine {
  private server: http.Server | null = null;
  private readonly sessions = new Map<Duplex, Session>();
  private readonly config: ProtocolEngineConfig;

  constructor(
    private readonly registry: HandlerRegistry,
    config?: Partial<ProtocolEngineConfig>
  ) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
  }

  /**
   * Bind and start accepting connections
   * @returns the bound address
   */
  async listen(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('[Engine] Already listening');
    }

    const server = http.createServer((req, res) => {
      this.serve(req, res).catch((error: unknown) => {
        this.sessions.get(req.socket)?.reportError(error);
        req.socket.destroy();
      });
    });
    server.keepAliveTimeout = this.config.sessionTimeoutMs;
    server.headersTimeout = this.config.sessionTimeoutMs;
    server.requestTimeout = this.config.sessionTimeoutMs;

    server.on('connection', (socket: Duplex) => this.openSession(socket));
    server.on('clientError', (error: Error, socket: Duplex) => this.handleClientError(error, socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error: Error) => {
      console.error(`[Engine] Listener error: ${error.message}`);
    });
    this.server = server;

    const address = this.address();
    console.error(`[Engine] Listening on ${address.address}:${address.port}`);
    return address;
  }

  /** Stop accepting connections and destroy open sessions */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    for (const session of this.sessions.values()) {
      session.destroy();
    }
    this.sessions.clear();
    await closed;
    console.error('[Engine] Stopped');
  }

  address(): AddressInfo {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('[Engine] Not listening on a TCP address');
    }
    return address;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Dispatch one request and return exactly one response. A throwing
   * handler is logged and answered with server_error.
   */
  handleRequest(request: EngineRequest): HandlerResponse {
    const { key, handler } = this.registry.resolve(request.method, request.target);
    try {
      return handler(request);
    } catch (error) {
      const failure = handlerFailure(key ?? `${request.method} ${request.target}`, error);
      console.error(`[Engine] ${failure.category}: ${failure.message}`);
      return Responses.serverError('Internal server error.');
    }
  }

  private openSession(socket: Duplex): void {
    const session = new Session(socket, this.config.sessionTimeoutMs);
    this.sessions.set(socket, session);
    socket.once('close', () => {
      session.handleClosed();
      this.sessions.delete(socket);
    });
  }

  private async serve(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const session = this.sessions.get(req.socket);
    const method = req.method ?? 'GET';
    const keepAlive = wantsKeepAlive(req.httpVersion, req.headers.connection);

    const body = await readBody(req, this.config.maxBodyBytes);
    if (body === null) {
      this.write(
        res,
        session,
        method,
        Responses.invalidRequest(`Request body exceeds ${this.config.maxBodyBytes} bytes.`),
        false
      );
      return;
    }

    session?.startDispatch();
    const response = this.handleRequest({
      method,
      target: req.url ?? '/',
      httpVersion: req.httpVersion,
      headers: { ...req.headers },
      body: body.toString('utf8'),
      keepAlive,
    });
    this.write(res, session, method, response, keepAlive);
  }

  private write(
    res: http.ServerResponse,
    session: Session | undefined,
    method: string,
    response: HandlerResponse,
    keepAlive: boolean
  ): void {
    session?.startWriting();
    const rendered = renderResponse(response);
    res.once('finish', () => session?.finishIteration(keepAlive));
    res.writeHead(rendered.status, {
      'Content-Type': rendered.contentType,
      'Content-Length': Buffer.byteLength(rendered.body),
      Server: SERVER_NAME,
      Connection: keepAlive ? 'keep-alive' : 'close',
    });
    res.end(method === 'HEAD' ? '' : rendered.body);
  }

  /**
   * Parser failures, timeouts and socket errors surfaced by the HTTP layer
   */
  private handleClientError(error: Error, socket: Duplex): void {
    const session = this.sessions.get(socket);
    if (session) {
      session.reportError(error);
    } else {
      const failure = transportError(error.message);
      console.error(`[Engine] ${failure.category}: ${failure.message}`);
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const parserFault = code !== undefined && code.startsWith('HPE_');
    if (parserFault && socket.writable) {
      const reply = rawResponse(Responses.invalidRequest('Malformed request.'));
      if (session) {
        session.close(reply);
      } else {
        socket.end(reply);
      }
      return;
    }
    session?.destroy();
    socket.destroy();
  }
}
