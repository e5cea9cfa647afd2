/**
 * JSON shapes exchanged with the inference service. Field names follow the
 * service's camelCase JSON mapping; enums travel as upper snake case strings
 * and 64-bit counts may arrive as strings.
 */

export interface WireBlob {
  mimeType: string;
  /** Base64-encoded bytes. */
  data: string;
}

export interface WireFileData {
  mimeType: string;
  fileUri: string;
}

export interface WirePart {
  text?: string;
  inlineData?: WireBlob;
  fileData?: WireFileData;
}

export interface WireContent {
  role?: string;
  parts?: WirePart[];
}

export interface WireSafetyRating {
  category?: string;
  probability?: string;
  blocked?: boolean;
}

export interface WireDate {
  year?: number;
  month?: number;
  day?: number;
}

export interface WireCitation {
  startIndex?: number;
  endIndex?: number;
  uri?: string;
  title?: string;
  license?: string;
  publicationDate?: WireDate;
}

export interface WireCandidate {
  index?: number;
  content?: WireContent;
  finishReason?: string;
  finishMessage?: string;
  safetyRatings?: WireSafetyRating[];
  citationMetadata?: { citations?: WireCitation[] };
}

export interface WirePromptFeedback {
  blockReason?: string;
  blockReasonMessage?: string;
  safetyRatings?: WireSafetyRating[];
}

export interface WireUsageMetadata {
  promptTokenCount?: number;
  candidatesTokenCount?: number;
  totalTokenCount?: number;
}

/** One chunk of a streaming GenerateContent call. */
export interface WireGenerateContentResponse {
  candidates?: WireCandidate[];
  promptFeedback?: WirePromptFeedback;
  usageMetadata?: WireUsageMetadata;
}

export interface WireSafetySetting {
  category: string;
  threshold: string;
}

export interface WireGenerationConfig {
  temperature?: number;
  topP?: number;
  topK?: number;
  candidateCount?: number;
  maxOutputTokens?: number;
  stopSequences?: string[];
}

export interface WireGenerateContentRequest {
  model: string;
  contents: WireContent[];
  safetySettings?: WireSafetySetting[];
  generationConfig?: WireGenerationConfig;
}

export interface WireCountTokensRequest {
  endpoint: string;
  model: string;
  contents: WireContent[];
}

export interface WireCountTokensResponse {
  totalTokens?: number | string;
  totalBillableCharacters?: number | string;
}
