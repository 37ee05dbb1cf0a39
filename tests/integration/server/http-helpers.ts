/**
 * Minimal HTTP and raw-socket clients for engine integration tests
 */

import http from 'http';
import net from 'net';

export interface ClientResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
  reusedSocket: boolean;
}

export interface ClientRequest {
  port: number;
  method?: string;
  path?: string;
  body?: string;
  agent?: http.Agent | false;
  headers?: http.OutgoingHttpHeaders;
}

export function request(options: ClientRequest): Promise<ClientResponse> {
  return new Promise<ClientResponse>((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: options.port,
        method: options.method ?? 'GET',
        path: options.path ?? '/',
        agent: options.agent ?? false,
        headers: options.headers,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString('utf8'),
            reusedSocket: req.reusedSocket,
          });
        });
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    req.end(options.body);
  });
}

/**
 * Write `payload` on a fresh connection and collect everything the server
 * sends until it closes the connection
 */
export function rawExchange(port: number, payload: string | null): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1');
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', reject);
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
    socket.on('connect', () => {
      if (payload !== null) {
        socket.write(payload);
      }
    });
  });
}
