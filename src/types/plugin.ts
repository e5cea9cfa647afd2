import type { Candidate } from './content.js';
import type { WireCountTokensRequest, WireGenerateContentRequest } from './wire.js';

// ---------- Logger ----------

/** Logger callback for diagnostic events. The library never writes to the console itself. */
export type TransportLogger = (level: 'debug' | 'warn' | 'error', message: string, data?: unknown) => void;

// ---------- Transport ----------

export interface TransportCallOptions {
  /** Full URL of the RPC method. */
  endpoint: string;
  /** Idle timeout in milliseconds, reset on every received chunk. */
  timeout?: number;
  /** Cancels the call. The abort error is surfaced to the caller unchanged. */
  signal?: AbortSignal;
}

/**
 * Opens calls against the inference service. `streamGenerateContent` yields the parsed
 * JSON of each chunk; a clean end of the iterable is the end-of-stream signal and a
 * thrown error is a transport failure. Results are undecoded: the caller validates them.
 */
export interface StreamTransport {
  readonly name: string;
  streamGenerateContent(
    request: WireGenerateContentRequest,
    options: TransportCallOptions,
  ): AsyncIterable<unknown>;
  countTokens(
    request: WireCountTokensRequest,
    options: TransportCallOptions,
  ): Promise<unknown>;
  close?(): Promise<void>;
}

// ---------- Session ----------

/** Receives the merged candidates of a stream when it completes. */
export interface HistorySink {
  addToHistory(candidates: Candidate[]): void;
}
