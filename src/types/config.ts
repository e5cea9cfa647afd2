import type { HarmBlockThreshold, HarmCategory } from './content.js';

/** Sampling and length parameters sent with every request of a model. */
export interface GenerationConfig {
  temperature?: number;
  topP?: number;
  topK?: number;
  candidateCount?: number;
  maxOutputTokens?: number;
  stopSequences?: string[];
}

/** Overrides the blocking threshold of one harm category. */
export interface SafetySetting {
  category: HarmCategory;
  threshold: HarmBlockThreshold;
}
