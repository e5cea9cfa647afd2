import type { StreamTransport, TransportCallOptions } from '../../src/types/plugin.js';
import type {
  WireCountTokensRequest,
  WireCountTokensResponse,
  WireGenerateContentRequest,
} from '../../src/types/wire.js';

/** One scripted step of a fake stream: a raw chunk, or an error thrown at that point. */
export type StreamStep = { chunk: unknown } | { error: unknown };

export interface StreamCall {
  request: WireGenerateContentRequest;
  options: TransportCallOptions;
}

/**
 * In-process transport that replays scripted streams and records every call.
 * Each call to `streamGenerateContent` consumes the next script.
 */
export class FakeTransport implements StreamTransport {
  readonly name = 'fake';
  readonly streamCalls: StreamCall[] = [];
  readonly countCalls: { request: WireCountTokensRequest; options: TransportCallOptions }[] = [];
  /** Number of chunk reads performed across all streams, including the end-of-stream read. */
  pulls = 0;
  /** Number of streams that were closed early by the consumer. */
  returned = 0;
  closed = false;
  countResult: WireCountTokensResponse = { totalTokens: 0, totalBillableCharacters: 0 };

  private readonly scripts: StreamStep[][] = [];

  enqueue(...steps: StreamStep[]): this {
    this.scripts.push(steps);
    return this;
  }

  enqueueChunks(...chunks: unknown[]): this {
    return this.enqueue(...chunks.map((chunk) => ({ chunk })));
  }

  streamGenerateContent(
    request: WireGenerateContentRequest,
    options: TransportCallOptions,
  ): AsyncIterable<unknown> {
    this.streamCalls.push({ request, options });
    const steps = this.scripts.shift() ?? [];
    const transport = this;
    let position = 0;

    return {
      [Symbol.asyncIterator](): AsyncIterator<unknown> {
        return {
          async next(): Promise<IteratorResult<unknown>> {
            transport.pulls++;
            const step = steps[position++];
            if (step === undefined) return { done: true, value: undefined };
            if ('error' in step) throw step.error;
            return { done: false, value: step.chunk };
          },
          async return(): Promise<IteratorResult<unknown>> {
            transport.returned++;
            return { done: true, value: undefined };
          },
        };
      },
    };
  }

  async countTokens(request: WireCountTokensRequest, options: TransportCallOptions): Promise<unknown> {
    this.countCalls.push({ request, options });
    return this.countResult;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
