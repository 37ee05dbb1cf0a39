/**
 * Transport Layer Index
 * Re-exports the HTTP engine and its per-connection session
 *
 * @module server/transports
 */

export {
  ProtocolEngine,
  DEFAULT_ENGINE_CONFIG,
  SERVER_NAME,
  wantsKeepAlive,
  type ProtocolEngineConfig,
} from './protocol-engine.js';
export { Session, type SessionState } from './session.js';
