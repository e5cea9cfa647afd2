import type { GenerateContentResponse } from '../types/content.js';
import type { HistorySink, TransportLogger } from '../types/plugin.js';
import { BlockedError } from '../errors/BlockedError.js';
import { ResponseDecoder } from '../codec/ResponseDecoder.js';
import { ResponseMerger, type MergeOptions } from './ResponseMerger.js';

export type IteratorStatus = 'active' | 'done' | 'failed' | 'blocked';

type IteratorState =
  | { status: 'active' }
  | { status: 'done' }
  | { status: 'failed'; error: unknown }
  | { status: 'blocked'; error: BlockedError };

export interface ResponseIteratorOptions {
  /** Receives the merged candidates once, when the stream ends cleanly. */
  historySink?: HistorySink;
  merge?: MergeOptions;
  logger?: TransportLogger;
}

/**
 * Pull-based cursor over the chunks of one streaming GenerateContent call.
 *
 * Each `next()` reads one raw chunk from the transport, decodes it, checks it for
 * blocking and folds it into the running aggregate. The caller receives the
 * chunk's own response; the aggregate is available from `response` and is what
 * `collect()` returns.
 *
 * Once the stream ends, fails or is blocked, every later `next()` repeats that
 * outcome without reading from the transport again. Not safe for concurrent
 * `next()` calls.
 */
export class GenerateContentResponseIterator implements AsyncIterableIterator<GenerateContentResponse> {
  private state: IteratorState = { status: 'active' };
  private merged: GenerateContentResponse | undefined;
  private upstream: AsyncIterator<unknown> | null = null;
  private readonly options: ResponseIteratorOptions;

  constructor(
    private readonly source: AsyncIterable<unknown>,
    options?: ResponseIteratorOptions,
  ) {
    this.options = options ?? {};
  }

  get status(): IteratorStatus {
    return this.state.status;
  }

  /** The aggregate of every chunk received so far, or undefined before the first chunk. */
  get response(): GenerateContentResponse | undefined {
    return this.merged;
  }

  async next(): Promise<IteratorResult<GenerateContentResponse, undefined>> {
    switch (this.state.status) {
      case 'done':
        return { done: true, value: undefined };
      case 'failed':
      case 'blocked':
        throw this.state.error;
      case 'active':
        break;
    }

    let result: IteratorResult<unknown>;
    try {
      this.upstream ??= this.source[Symbol.asyncIterator]();
      result = await this.upstream.next();
    } catch (err) {
      this.state = { status: 'failed', error: err };
      this.options.logger?.('error', 'Stream receive failed', err);
      throw err;
    }

    if (result.done) {
      this.state = { status: 'done' };
      this.options.logger?.('debug', 'Stream completed', {
        candidates: this.merged?.candidates.length ?? 0,
      });
      if (this.options.historySink && this.merged) {
        this.options.historySink.addToHistory(this.merged.candidates);
      }
      return { done: true, value: undefined };
    }

    let chunk: GenerateContentResponse;
    try {
      chunk = ResponseDecoder.decode(result.value);
    } catch (err) {
      this.state = { status: 'failed', error: err };
      this.options.logger?.('error', 'Failed to decode stream chunk', err);
      await this.closeUpstream();
      throw err;
    }

    if (ResponseDecoder.isBlocking(chunk.promptFeedback)) {
      throw await this.block(BlockedError.prompt(chunk.promptFeedback));
    }

    const blocked = chunk.candidates.find((c) => c.finishReason === 'safety');
    if (blocked) {
      throw await this.block(BlockedError.candidate(blocked));
    }

    // The aggregate is built from a private copy so the caller's chunk shares nothing with it.
    this.merged = ResponseMerger.merge(this.merged, structuredClone(chunk), this.options.merge);
    return { done: false, value: chunk };
  }

  /** Stop early. The transport stream is closed and the history sink is not notified. */
  async return(): Promise<IteratorResult<GenerateContentResponse, undefined>> {
    if (this.state.status === 'active') {
      this.state = { status: 'done' };
      await this.closeUpstream();
    }
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Drain the stream and return the merged response.
   * Throws the first transport, decode or blocking error encountered.
   */
  async collect(): Promise<GenerateContentResponse> {
    for (;;) {
      const result = await this.next();
      if (result.done) break;
    }
    return this.merged ?? { candidates: [] };
  }

  private async block(error: BlockedError): Promise<BlockedError> {
    this.state = { status: 'blocked', error };
    this.options.logger?.('warn', error.message, error.toJSON());
    await this.closeUpstream();
    return error;
  }

  private async closeUpstream(): Promise<void> {
    const upstream = this.upstream;
    if (!upstream?.return) return;
    try {
      await upstream.return();
    } catch (err) {
      this.options.logger?.('warn', 'Failed to close stream', err);
    }
  }
}
