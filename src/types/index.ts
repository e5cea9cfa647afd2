export type { MimeType, TextPart, BlobPart, FileDataPart, Part, PartType } from './part.js';

export type {
  Role,
  Content,
  HarmCategory,
  HarmProbability,
  HarmBlockThreshold,
  FinishReason,
  BlockReason,
  SafetyRating,
  CivilDate,
  Citation,
  CitationMetadata,
  Candidate,
  PromptFeedback,
  UsageMetadata,
  GenerateContentResponse,
  CountTokensResponse,
} from './content.js';

export type { GenerationConfig, SafetySetting } from './config.js';

export type { GenAIErrorData, ErrorCode } from './errors.js';
export { ErrorCodes } from './errors.js';

export type { TransportLogger, TransportCallOptions, StreamTransport, HistorySink } from './plugin.js';

export type {
  WireBlob,
  WireFileData,
  WirePart,
  WireContent,
  WireSafetyRating,
  WireDate,
  WireCitation,
  WireCandidate,
  WirePromptFeedback,
  WireUsageMetadata,
  WireGenerateContentResponse,
  WireSafetySetting,
  WireGenerationConfig,
  WireGenerateContentRequest,
  WireCountTokensRequest,
  WireCountTokensResponse,
} from './wire.js';
