import type { Content, CountTokensResponse, GenerateContentResponse } from '../types/content.js';
import type { GenerationConfig, SafetySetting } from '../types/config.js';
import type { HistorySink, TransportCallOptions } from '../types/plugin.js';
import { RequestBuilder } from '../codec/RequestBuilder.js';
import { ResponseDecoder } from '../codec/ResponseDecoder.js';
import { newUserContent, toParts, type PromptInput } from '../content/parts.js';
import { GenerateContentResponseIterator } from '../stream/GenerateContentResponseIterator.js';
import { ChatSession } from './ChatSession.js';
import type { GenAIClient } from './GenAIClient.js';

export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
export const DEFAULT_TOP_K = 3;

export interface RequestOptions {
  /** Idle timeout in milliseconds for this call. */
  timeout?: number;
  /** Cancels the call. */
  signal?: AbortSignal;
}

export interface ModelParams {
  generationConfig?: GenerationConfig;
  safetySettings?: SafetySetting[];
  /** Keep candidates whose index first appears after the first chunk (default: false). */
  includeNewCandidates?: boolean;
}

/** Options for one streaming call against a list of contents. */
export interface StreamContentsOptions extends RequestOptions {
  historySink?: HistorySink;
  generationConfig?: GenerationConfig;
}

/**
 * A named model plus the configuration sent with each of its requests.
 * The configuration fields may be changed between calls.
 */
export class GenerativeModel {
  readonly name: string;
  readonly resourceName: string;

  generationConfig: GenerationConfig;
  safetySettings: SafetySetting[];
  includeNewCandidates: boolean;

  constructor(
    private readonly client: GenAIClient,
    name: string,
    params?: ModelParams,
  ) {
    this.name = name;
    this.resourceName = client.modelResourceName(name);
    this.generationConfig = {
      maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
      topK: DEFAULT_TOP_K,
      ...params?.generationConfig,
    };
    this.safetySettings = params?.safetySettings ?? [];
    this.includeNewCandidates = params?.includeNewCandidates ?? false;
  }

  /** Send one prompt and wait for the merged response. */
  async generateContent(prompt: PromptInput, options?: RequestOptions): Promise<GenerateContentResponse> {
    return this.generateContentStream(prompt, options).collect();
  }

  /** Send one prompt and iterate over the response chunks as they arrive. */
  generateContentStream(prompt: PromptInput, options?: RequestOptions): GenerateContentResponseIterator {
    return this.streamContents([newUserContent(toParts(prompt))], options);
  }

  async countTokens(prompt: PromptInput, options?: RequestOptions): Promise<CountTokensResponse> {
    const request = new RequestBuilder()
      .model(this.resourceName)
      .contents([newUserContent(toParts(prompt))])
      .buildCountTokens();

    const raw = await this.client.transport.countTokens(
      request,
      this.callOptions('countTokens', options),
    );
    return ResponseDecoder.decodeCountTokens(raw);
  }

  startChat(history?: Content[]): ChatSession {
    return new ChatSession(this, history);
  }

  /** Open a stream over a full list of contents, e.g. a conversation history. */
  streamContents(contents: Content[], options?: StreamContentsOptions): GenerateContentResponseIterator {
    const request = new RequestBuilder()
      .model(this.resourceName)
      .contents(contents)
      .safetySettings(this.safetySettings)
      .generationConfig(options?.generationConfig ?? this.generationConfig)
      .build();

    this.client.logger?.('debug', 'Starting GenerateContent stream', {
      model: this.name,
      contents: contents.length,
    });

    const source = this.client.transport.streamGenerateContent(
      request,
      this.callOptions('streamGenerateContent', options),
    );

    return new GenerateContentResponseIterator(source, {
      historySink: options?.historySink,
      merge: { includeNewCandidates: this.includeNewCandidates },
      logger: this.client.logger,
    });
  }

  private callOptions(
    method: 'streamGenerateContent' | 'countTokens',
    options?: RequestOptions,
  ): TransportCallOptions {
    const timeout = options?.timeout ?? this.client.timeout;
    return {
      endpoint: this.client.methodUrl(this.resourceName, method),
      ...(timeout !== undefined ? { timeout } : {}),
      ...(options?.signal ? { signal: options.signal } : {}),
    };
  }
}
