import type { WireCountTokensRequest, WireGenerateContentRequest } from '../types/wire.js';
import type { StreamTransport, TransportCallOptions, TransportLogger } from '../types/plugin.js';
import { GenAIError } from '../errors/GenAIError.js';

export interface HttpTransportConfig {
  /** Idle timeout in milliseconds (default: 30000). */
  timeout?: number;
  /** Extra headers sent with every request, e.g. an authorization header. */
  headers?: Record<string, string>;
  /** Optional logger for diagnostic events. */
  logger?: TransportLogger;
}

/** HTTP transport: POST + SSE for streaming, plain POST for unary calls. */
export class HttpTransport implements StreamTransport {
  readonly name = 'http';

  private readonly config: Required<Omit<HttpTransportConfig, 'logger'>> & { logger?: TransportLogger };

  constructor(config?: HttpTransportConfig) {
    this.config = {
      timeout: config?.timeout ?? 30_000,
      headers: config?.headers ?? {},
      logger: config?.logger,
    };
  }

  /** POST the request and yield the JSON payload of each server-sent event. */
  async *streamGenerateContent(
    request: WireGenerateContentRequest,
    options: TransportCallOptions,
  ): AsyncIterable<unknown> {
    const timeoutMs = options.timeout ?? this.config.timeout;
    const call = new AbortableCall(timeoutMs, options.signal);
    const url = withQuery(options.endpoint, 'alt', 'sse');

    try {
      this.config.logger?.('debug', 'Opening SSE stream', { url });
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          ...this.config.headers,
          'Content-Type': 'application/json',
          Accept: 'text/event-stream',
        },
        body: JSON.stringify(request),
        signal: call.signal,
      });

      if (!response.ok) {
        throw GenAIError.httpStatus(response.status, response.statusText, await response.text());
      }

      if (!response.body) {
        throw GenAIError.transport('Response body is null');
      }

      yield* this.parseSSE(response.body, () => call.touch());
    } catch (err) {
      throw call.translate(err);
    } finally {
      call.dispose();
    }
  }

  /** POST a unary request and return the parsed JSON response. */
  async countTokens(request: WireCountTokensRequest, options: TransportCallOptions): Promise<unknown> {
    const call = new AbortableCall(options.timeout ?? this.config.timeout, options.signal);

    try {
      const response = await fetch(options.endpoint, {
        method: 'POST',
        headers: { ...this.config.headers, 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: call.signal,
      });

      if (!response.ok) {
        throw GenAIError.httpStatus(response.status, response.statusText, await response.text());
      }

      const body = await response.text();
      try {
        return JSON.parse(body);
      } catch {
        throw GenAIError.decode('response body is not JSON', { body });
      }
    } catch (err) {
      throw call.translate(err);
    } finally {
      call.dispose();
    }
  }

  private async *parseSSE(
    body: ReadableStream<Uint8Array>,
    onActivity: () => void,
  ): AsyncIterable<unknown> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        onActivity();

        buffer += decoder.decode(value, { stream: true });
        // A trailing CR may be the first half of a CRLF split across reads.
        const held = buffer.endsWith('\r') ? '\r' : '';
        const events = normalizeNewlines(buffer.slice(0, buffer.length - held.length)).split('\n\n');
        buffer = (events.pop() ?? '') + held;

        for (const event of events) {
          const data = this.eventData(event);
          if (data !== undefined) yield data;
        }
      }

      for (const event of normalizeNewlines(buffer + decoder.decode()).split('\n\n')) {
        if (!event.trim()) continue;
        const data = this.eventData(event);
        if (data !== undefined) yield data;
      }
    } finally {
      reader.releaseLock();
    }
  }

  /** Parse the `data:` lines of one event. Events without data (comments, keep-alives) yield undefined. */
  private eventData(event: string): unknown {
    const lines = event
      .split('\n')
      .filter((line) => line.startsWith('data:'))
      .map((line) => line.slice(line.startsWith('data: ') ? 6 : 5));

    if (lines.length === 0) {
      this.config.logger?.('debug', 'Skipping SSE event without data', { event });
      return undefined;
    }

    const payload = lines.join('\n');
    try {
      return JSON.parse(payload);
    } catch {
      throw GenAIError.decode('event data is not JSON', { data: payload });
    }
  }
}

/**
 * Abort controller for one call: fires on the caller's signal or after
 * `timeoutMs` without activity.
 */
class AbortableCall {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout>;
  private timedOut = false;
  private readonly onCallerAbort = () => this.controller.abort(this.callerSignal?.reason);

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal,
  ) {
    this.timer = this.startTimer();
    if (callerSignal?.aborted) {
      this.onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Reset the idle timeout. */
  touch(): void {
    clearTimeout(this.timer);
    this.timer = this.startTimer();
  }

  /** Idle timeouts become CONNECTION_TIMEOUT errors; a caller abort surfaces its own reason. */
  translate(err: unknown): unknown {
    if (this.timedOut) return GenAIError.timeout(this.timeoutMs);
    if (this.callerSignal?.aborted) return this.callerSignal.reason;
    if (err instanceof GenAIError) return err;
    return GenAIError.transport(err instanceof Error ? err.message : String(err), err);
  }

  /** Stop the timer and drop the connection if the body is still open. */
  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
    this.controller.abort();
  }

  private startTimer(): ReturnType<typeof setTimeout> {
    return setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, this.timeoutMs);
  }
}

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

function withQuery(endpoint: string, key: string, value: string): string {
  const url = new URL(endpoint);
  url.searchParams.set(key, value);
  return url.toString();
}
