import { WebSocket as WsWebSocket, type RawData } from 'ws';
import type { WireCountTokensRequest, WireGenerateContentRequest } from '../types/wire.js';
import type { StreamTransport, TransportCallOptions, TransportLogger } from '../types/plugin.js';
import { GenAIError } from '../errors/GenAIError.js';
import { isRecord } from '../codec/guards.js';

export interface WebSocketTransportConfig {
  /** Idle timeout in ms (default: 30000). */
  timeout?: number;
  /** Extra headers sent with the upgrade request. */
  headers?: Record<string, string>;
  /** Optional logger for diagnostic events. */
  logger?: TransportLogger;
}

export type WebSocketMethod = 'streamGenerateContent' | 'countTokens';

/** First and only frame sent by the client on a socket. */
export interface WebSocketRequestFrame {
  method: WebSocketMethod;
  request: WireGenerateContentRequest | WireCountTokensRequest;
}

/** Frames sent by the server: `{ chunk }`, `{ result }`, `{ error }` or `{ done: true }`. */
type ServerFrame =
  | { kind: 'chunk'; chunk: unknown }
  | { kind: 'result'; result: unknown }
  | { kind: 'error'; error: GenAIError }
  | { kind: 'done' };

const NORMAL_CLOSURE = 1000;
const NO_STATUS_RECEIVED = 1005;

/** WebSocket transport: one socket per call, JSON frames in both directions. */
export class WebSocketTransport implements StreamTransport {
  readonly name = 'websocket';

  private readonly config: Required<Omit<WebSocketTransportConfig, 'logger'>> & { logger?: TransportLogger };

  constructor(config?: WebSocketTransportConfig) {
    this.config = {
      timeout: config?.timeout ?? 30_000,
      headers: config?.headers ?? {},
      logger: config?.logger,
    };
  }

  /** Send the request and yield each `chunk` frame until `done` or a normal close. */
  async *streamGenerateContent(
    request: WireGenerateContentRequest,
    options: TransportCallOptions,
  ): AsyncIterable<unknown> {
    const ws = await this.connect(options.endpoint, options.signal);
    const timeout = options.timeout ?? this.config.timeout;

    const queue: unknown[] = [];
    let done = false;
    let error: unknown = null;
    let resolveWait: (() => void) | null = null;

    const fail = (err: unknown) => {
      if (done) return;
      error = err;
      done = true;
      resolveWait?.();
    };

    const startTimer = () => setTimeout(() => fail(GenAIError.timeout(timeout)), timeout);
    let timer = startTimer();

    // The signal may have fired between the open event and this point.
    const onAbort = () => fail(options.signal?.reason);
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) onAbort();

    ws.on('message', (data: RawData) => {
      clearTimeout(timer);
      timer = startTimer();
      let frame: ServerFrame;
      try {
        frame = parseFrame(data);
      } catch (err) {
        fail(err);
        return;
      }
      switch (frame.kind) {
        case 'chunk':
          queue.push(frame.chunk);
          break;
        case 'done':
          done = true;
          break;
        case 'error':
          fail(frame.error);
          return;
        case 'result':
          this.config.logger?.('warn', 'Ignoring unary result frame on a stream');
          break;
      }
      resolveWait?.();
    });

    ws.on('error', (err) => fail(GenAIError.websocket(err.message)));

    ws.on('close', (code: number) => {
      if (code !== NORMAL_CLOSURE && code !== NO_STATUS_RECEIVED) {
        fail(GenAIError.websocket(`WebSocket closed with code ${code}`, { closeCode: code }));
        return;
      }
      done = true;
      resolveWait?.();
    });

    const frame: WebSocketRequestFrame = { method: 'streamGenerateContent', request };
    ws.send(JSON.stringify(frame));

    try {
      while (true) {
        while (queue.length > 0) {
          yield queue.shift();
        }
        if (error) throw error;
        if (done) break;
        await new Promise<void>((r) => { resolveWait = r; });
        resolveWait = null;
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      ws.close();
    }
  }

  /** Send a unary request and wait for its `result` frame. Any close before it is an error. */
  async countTokens(request: WireCountTokensRequest, options: TransportCallOptions): Promise<unknown> {
    const { signal } = options;
    const ws = await this.connect(options.endpoint, signal);
    const timeout = options.timeout ?? this.config.timeout;
    let cleanup = (): void => undefined;

    try {
      return await new Promise<unknown>((resolve, reject) => {
        const timer = setTimeout(() => reject(GenAIError.timeout(timeout)), timeout);
        const onAbort = () => reject(signal?.reason);
        cleanup = () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        };

        ws.on('message', (data: RawData) => {
          try {
            const frame = parseFrame(data);
            if (frame.kind === 'result') resolve(frame.result);
            else if (frame.kind === 'error') reject(frame.error);
            else reject(GenAIError.websocket(`Unexpected ${frame.kind} frame for a unary call`));
          } catch (err) {
            reject(err);
          }
        });

        ws.on('error', (err) => reject(GenAIError.websocket(err.message)));

        ws.on('close', (code: number) => {
          reject(GenAIError.websocket(`WebSocket closed with code ${code}`, { closeCode: code }));
        });

        signal?.addEventListener('abort', onAbort, { once: true });
        if (signal?.aborted) {
          onAbort();
          return;
        }

        const frame: WebSocketRequestFrame = { method: 'countTokens', request };
        ws.send(JSON.stringify(frame));
      });
    } finally {
      cleanup();
      ws.close();
    }
  }

  /** Open a socket. An abort while connecting terminates it and rejects with the signal's reason. */
  private connect(endpoint: string, signal?: AbortSignal): Promise<WsWebSocket> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      this.config.logger?.('debug', 'Opening WebSocket', { endpoint });
      const ws = new WsWebSocket(endpoint, { headers: this.config.headers });

      const onAbort = () => {
        ws.terminate();
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(ws);
      });
      ws.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(GenAIError.websocket(err.message));
      });
    });
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

function parseFrame(data: RawData): ServerFrame {
  const text = rawToString(data);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw GenAIError.decode('WebSocket frame is not JSON', { data: text });
  }
  if (!isRecord(parsed)) {
    throw GenAIError.decode('WebSocket frame must be an object', { data: text });
  }
  if ('chunk' in parsed) return { kind: 'chunk', chunk: parsed.chunk };
  if ('result' in parsed) return { kind: 'result', result: parsed.result };
  const remote = parsed.error;
  if (isRecord(remote)) {
    const message = typeof remote.message === 'string' ? remote.message : 'Remote error';
    const code = typeof remote.code === 'number' ? remote.code : undefined;
    return {
      kind: 'error',
      error: GenAIError.websocket(message, code !== undefined ? { remoteCode: code } : undefined),
    };
  }
  if (parsed.done === true) return { kind: 'done' };
  throw GenAIError.decode('Unknown WebSocket frame', { data: text });
}
