export { HttpTransport } from './HttpTransport.js';
export type { HttpTransportConfig } from './HttpTransport.js';

export { WebSocketTransport } from './WebSocketTransport.js';
export type {
  WebSocketTransportConfig,
  WebSocketMethod,
  WebSocketRequestFrame,
} from './WebSocketTransport.js';
