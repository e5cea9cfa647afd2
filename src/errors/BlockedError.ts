import { ErrorCodes } from '../types/errors.js';
import type { Candidate, PromptFeedback } from '../types/content.js';
import { GenAIError } from './GenAIError.js';

/**
 * The model's output was withheld by policy. Either the prompt was rejected
 * (`promptFeedback`) or a candidate was stopped for safety (`candidate`).
 */
export class BlockedError extends GenAIError {
  readonly candidate?: Candidate;
  readonly promptFeedback?: PromptFeedback;

  constructor(blocked: { candidate: Candidate; promptFeedback?: PromptFeedback } | { candidate?: Candidate; promptFeedback: PromptFeedback }) {
    super(
      blocked.candidate ? ErrorCodes.BLOCKED_CANDIDATE : ErrorCodes.BLOCKED_PROMPT,
      BlockedError.describe(blocked.candidate, blocked.promptFeedback),
      {
        ...(blocked.candidate ? { candidateIndex: blocked.candidate.index } : {}),
        ...(blocked.promptFeedback ? { blockReason: blocked.promptFeedback.blockReason } : {}),
      },
    );
    this.name = 'BlockedError';
    this.candidate = blocked.candidate;
    this.promptFeedback = blocked.promptFeedback;
  }

  static prompt(feedback: PromptFeedback): BlockedError {
    return new BlockedError({ promptFeedback: feedback });
  }

  static candidate(candidate: Candidate): BlockedError {
    return new BlockedError({ candidate });
  }

  private static describe(candidate?: Candidate, feedback?: PromptFeedback): string {
    const reasons: string[] = [];
    if (candidate) {
      reasons.push(`candidate: ${candidate.finishReason}`);
    }
    if (feedback) {
      reasons.push(`prompt: ${feedback.blockReason} (${feedback.blockReasonMessage})`);
    }
    return `blocked: ${reasons.join(', ')}`;
  }
}
