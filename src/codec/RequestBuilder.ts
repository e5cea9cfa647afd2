import type { Content } from '../types/content.js';
import type { GenerationConfig, SafetySetting } from '../types/config.js';
import type { WireCountTokensRequest, WireGenerateContentRequest } from '../types/wire.js';
import { GenAIError } from '../errors/GenAIError.js';
import { ContentCodec } from './ContentCodec.js';

export class RequestBuilder {
  private _model?: string;
  private _contents: Content[] = [];
  private _safetySettings: SafetySetting[] = [];
  private _generationConfig?: GenerationConfig;

  /** Full resource name of the model. */
  model(model: string): this {
    this._model = model;
    return this;
  }

  contents(contents: Content[]): this {
    this._contents = contents;
    return this;
  }

  safetySettings(settings: SafetySetting[]): this {
    this._safetySettings = settings;
    return this;
  }

  generationConfig(config: GenerationConfig): this {
    this._generationConfig = config;
    return this;
  }

  /**
   * Build the GenerateContent request. Throws if the model or the contents are missing.
   */
  build(): WireGenerateContentRequest {
    const model = this.requireModel();

    const request: WireGenerateContentRequest = {
      model,
      contents: this._contents.map((c) => ContentCodec.contentToWire(c)),
    };
    if (this._safetySettings.length > 0) {
      request.safetySettings = this._safetySettings.map((s) => ContentCodec.safetySettingToWire(s));
    }
    if (this._generationConfig) {
      request.generationConfig = ContentCodec.generationConfigToWire(this._generationConfig);
    }
    return request;
  }

  /** Build a CountTokens request over the same model and contents. */
  buildCountTokens(): WireCountTokensRequest {
    const model = this.requireModel();
    return {
      endpoint: model,
      model,
      contents: this._contents.map((c) => ContentCodec.contentToWire(c)),
    };
  }

  private requireModel(): string {
    if (!this._model) throw GenAIError.invalidArgument('model is required');
    if (this._contents.length === 0) throw GenAIError.invalidArgument('contents are required');
    return this._model;
  }
}
