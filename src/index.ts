// Client
export { GenAIClient } from './client/GenAIClient.js';
export type { GenAIClientConfig } from './client/GenAIClient.js';
export { GenerativeModel, DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_TOP_K } from './client/GenerativeModel.js';
export type { ModelParams, RequestOptions, StreamContentsOptions } from './client/GenerativeModel.js';
export { ChatSession } from './client/ChatSession.js';

// Streaming
export { GenerateContentResponseIterator } from './stream/GenerateContentResponseIterator.js';
export type { IteratorStatus, ResponseIteratorOptions } from './stream/GenerateContentResponseIterator.js';
export { ResponseMerger } from './stream/ResponseMerger.js';
export type { MergeOptions } from './stream/ResponseMerger.js';

// Content helpers
export {
  text,
  blob,
  fileData,
  imageData,
  isTextPart,
  newContent,
  newUserContent,
  toParts,
  contentText,
} from './content/parts.js';
export type { PromptInput } from './content/parts.js';

// Codec
export { ResponseDecoder } from './codec/ResponseDecoder.js';
export { RequestBuilder } from './codec/RequestBuilder.js';
export { ContentCodec } from './codec/ContentCodec.js';

// Errors
export { GenAIError } from './errors/GenAIError.js';
export { BlockedError } from './errors/BlockedError.js';

// Transports
export * from './transport/index.js';

// Types
export * from './types/index.js';
