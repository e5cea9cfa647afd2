import type { Part } from './part.js';

/** Producer of a Content turn. */
export type Role = 'user' | 'model';

/** An ordered sequence of parts produced by one role. */
export interface Content {
  role: Role;
  parts: Part[];
}

export type HarmCategory =
  | 'unspecified'
  | 'hate_speech'
  | 'dangerous_content'
  | 'harassment'
  | 'sexually_explicit';

export type HarmProbability = 'unspecified' | 'negligible' | 'low' | 'medium' | 'high';

export type HarmBlockThreshold =
  | 'unspecified'
  | 'block_low_and_above'
  | 'block_medium_and_above'
  | 'block_only_high'
  | 'block_none';

/** Why a candidate stopped generating. */
export type FinishReason =
  | 'unspecified'
  | 'stop'
  | 'max_tokens'
  | 'safety'
  | 'recitation'
  | 'other';

/** Why a prompt was rejected. */
export type BlockReason = 'unspecified' | 'safety' | 'other';

export interface SafetyRating {
  category: HarmCategory;
  probability: HarmProbability;
  blocked: boolean;
}

/** Calendar date without time zone. A zero field means "not specified". */
export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

/** Source attribution for a span of generated content. */
export interface Citation {
  startIndex: number;
  endIndex: number;
  uri: string;
  title: string;
  license: string;
  publicationDate?: CivilDate;
}

export interface CitationMetadata {
  citations: Citation[];
}

/** One generation alternative. `index` identifies it across chunks of a stream. */
export interface Candidate {
  index: number;
  content?: Content;
  finishReason: FinishReason;
  finishMessage?: string;
  safetyRatings: SafetyRating[];
  citationMetadata?: CitationMetadata;
}

/** Feedback about the prompt. A non-empty feedback means the prompt was blocked. */
export interface PromptFeedback {
  blockReason: BlockReason;
  blockReasonMessage: string;
  safetyRatings: SafetyRating[];
}

export interface UsageMetadata {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
}

/**
 * Response of a GenerateContent call: either one decoded chunk of a stream,
 * or the merged view of every chunk received so far.
 */
export interface GenerateContentResponse {
  candidates: Candidate[];
  promptFeedback?: PromptFeedback;
  usageMetadata?: UsageMetadata;
}

export interface CountTokensResponse {
  totalTokens: number;
  totalBillableCharacters: number;
}
