/**
 * Per-connection session
 *
 * Tracks where a connection is in its request/response loop and enforces
 * the per-iteration deadline:
 *
 *   reading -> dispatching -> writing -> reading   (keep-alive)
 *                                     -> closing   (otherwise)
 *
 * Every iteration arms a fresh deadline from its start. When it fires the
 * socket is destroyed.
 *
 * @module server/transports/session
 */

import type { Duplex } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { EngineError } from '../errors.js';

export type SessionState = 'reading' | 'dispatching' | 'writing' | 'closing' | 'closed';

/** Peer hang-ups that are expected once we have started closing */
const BENIGN_CLOSE_CODES = new Set(['EPIPE', 'ECONNRESET']);

export class Session {
  readonly id: string = uuidv4();
  private state: SessionState = 'reading';
  private deadline: NodeJS.Timeout | null = null;
  private iterations = 0;

  constructor(
    private readonly socket: Duplex,
    private readonly timeoutMs: number
  ) {
    this.armDeadline();
  }

  getState(): SessionState {
    return this.state;
  }

  /** Number of requests dispatched on this connection */
  getRequestCount(): number {
    return this.iterations;
  }

  isClosing(): boolean {
    return this.state === 'closing' || this.state === 'closed';
  }

  startDispatch(): void {
    if (this.transition('dispatching')) {
      this.iterations++;
    }
  }

  startWriting(): void {
    this.transition('writing');
  }

  /**
   * Response flushed. Keep-alive starts the next iteration; otherwise the
   * write side is half-closed.
   */
  finishIteration(keepAlive: boolean): void {
    if (this.isClosing()) {
      return;
    }
    if (keepAlive) {
      this.state = 'reading';
      this.armDeadline();
      return;
    }
    this.close();
  }

  /**
   * Half-close the connection, optionally flushing a last chunk first
   */
  close(finalData?: string): void {
    if (!this.transition('closing')) {
      return;
    }
    this.clearDeadline();
    if (finalData === undefined) {
      this.socket.end();
    } else {
      this.socket.end(finalData);
    }
  }

  destroy(): void {
    if (this.state !== 'closed') {
      this.state = 'closing';
    }
    this.clearDeadline();
    this.socket.destroy();
  }

  /** Socket fully closed */
  handleClosed(): void {
    this.clearDeadline();
    this.state = 'closed';
  }

  /**
   * Log a socket-level failure for this session only. Resets and broken
   * pipes after closing began are expected and not logged.
   */
  reportError(error: unknown): void {
    const failure = EngineError.fromUnknown(error, 'TRANSPORT_ERROR');
    const code = failure.details?.errorCode;
    if (this.isClosing() && typeof code === 'string' && BENIGN_CLOSE_CODES.has(code)) {
      return;
    }
    console.error(`[Session ${this.id}] ${failure.category}: ${failure.message}`);
  }

  private transition(next: SessionState): boolean {
    if (this.isClosing()) {
      return false;
    }
    this.state = next;
    return true;
  }

  private armDeadline(): void {
    this.clearDeadline();
    this.deadline = setTimeout(() => {
      console.error(
        `[Session ${this.id}] Deadline of ${this.timeoutMs}ms expired while ${this.state}; closing`
      );
      this.destroy();
    }, this.timeoutMs);
    this.deadline.unref();
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }
  }
}
