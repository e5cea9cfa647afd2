import type { Candidate, Content, GenerateContentResponse } from '../types/content.js';
import type { HistorySink } from '../types/plugin.js';
import type { GenerateContentResponseIterator } from '../stream/GenerateContentResponseIterator.js';
import { newUserContent, toParts, type PromptInput } from '../content/parts.js';
import type { GenerativeModel, RequestOptions } from './GenerativeModel.js';

/**
 * A conversation with a model. Each message is sent together with the whole
 * history, and the model's reply is appended to the history once its stream
 * completes. Replies are requested with a single candidate.
 */
export class ChatSession implements HistorySink {
  readonly history: Content[];

  constructor(
    private readonly model: GenerativeModel,
    history?: Content[],
  ) {
    this.history = history ? [...history] : [];
  }

  async sendMessage(prompt: PromptInput, options?: RequestOptions): Promise<GenerateContentResponse> {
    return this.sendMessageStream(prompt, options).collect();
  }

  /**
   * The user turn joins the history immediately. The model turn joins it when
   * the returned iterator reaches the end of the stream.
   */
  sendMessageStream(prompt: PromptInput, options?: RequestOptions): GenerateContentResponseIterator {
    this.history.push(newUserContent(toParts(prompt)));
    return this.model.streamContents([...this.history], {
      ...options,
      historySink: this,
      generationConfig: { ...this.model.generationConfig, candidateCount: 1 },
    });
  }

  /** Append the first candidate's content as a model turn. */
  addToHistory(candidates: Candidate[]): void {
    const content = candidates[0]?.content;
    if (!content) return;
    this.history.push({ role: 'model', parts: [...content.parts] });
  }
}
