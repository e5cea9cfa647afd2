import type { Part } from '../types/part.js';
import type {
  Candidate,
  CitationMetadata,
  Content,
  GenerateContentResponse,
} from '../types/content.js';
import { assertNever } from '../content/parts.js';

export interface MergeOptions {
  /**
   * Append candidates whose index first appears in a later chunk.
   * When false (default) only indices present in the first chunk are kept.
   */
  includeNewCandidates?: boolean;
}

/**
 * Folds the chunks of a streaming GenerateContent call into one response.
 *
 * Every method is pure. Inputs are never mutated; values that a merge leaves
 * unchanged are shared between the inputs and the result.
 */
export class ResponseMerger {
  /**
   * Merge `src`, the latest chunk, into `dest`, the aggregate of all earlier chunks.
   * With no aggregate yet, the chunk itself becomes the aggregate.
   */
  static merge(
    dest: GenerateContentResponse | undefined,
    src: GenerateContentResponse,
    options?: MergeOptions,
  ): GenerateContentResponse {
    if (!dest) return src;

    const merged: GenerateContentResponse = {
      candidates: ResponseMerger.mergeCandidates(dest.candidates, src.candidates, options),
    };
    // The first prompt feedback seen is kept for the life of the stream.
    if (dest.promptFeedback) merged.promptFeedback = dest.promptFeedback;
    else if (src.promptFeedback) merged.promptFeedback = src.promptFeedback;

    const usage = src.usageMetadata ?? dest.usageMetadata;
    if (usage) merged.usageMetadata = usage;

    return merged;
  }

  /** Align candidates by index. Destination order is preserved. */
  static mergeCandidates(dest: Candidate[], src: Candidate[], options?: MergeOptions): Candidate[] {
    const srcByIndex = new Map<number, Candidate>();
    for (const s of src) {
      srcByIndex.set(s.index, s);
    }

    const out = dest.map((d) => {
      const s = srcByIndex.get(d.index);
      return s ? ResponseMerger.mergeCandidate(d, s) : d;
    });

    if (options?.includeNewCandidates) {
      const known = new Set(dest.map((d) => d.index));
      for (const s of src) {
        if (!known.has(s.index)) {
          known.add(s.index);
          out.push(s);
        }
      }
    }

    return out;
  }

  /**
   * Content and citations accumulate; finish reason, finish message and
   * safety ratings describe the latest chunk only.
   */
  static mergeCandidate(dest: Candidate, src: Candidate): Candidate {
    const merged: Candidate = {
      index: dest.index,
      finishReason: src.finishReason,
      safetyRatings: src.safetyRatings,
    };

    const content = ResponseMerger.mergeContent(dest.content, src.content);
    if (content) merged.content = content;

    if (src.finishMessage !== undefined) merged.finishMessage = src.finishMessage;

    const citations = ResponseMerger.mergeCitationMetadata(dest.citationMetadata, src.citationMetadata);
    if (citations) merged.citationMetadata = citations;

    return merged;
  }

  /** The destination role wins; chunks of one candidate share a role. */
  static mergeContent(dest: Content | undefined, src: Content | undefined): Content | undefined {
    if (!dest) return src;
    if (!src) return dest;
    return {
      role: dest.role,
      parts: ResponseMerger.collapseTexts([...dest.parts, ...src.parts]),
    };
  }

  static mergeCitationMetadata(
    dest: CitationMetadata | undefined,
    src: CitationMetadata | undefined,
  ): CitationMetadata | undefined {
    if (!dest) return src;
    if (!src) return dest;
    return { citations: [...dest.citations, ...src.citations] };
  }

  /**
   * Replace every maximal run of adjacent text parts with one text part holding
   * their concatenation. Non-text parts end a run and are kept in place.
   */
  static collapseTexts(parts: Part[]): Part[] {
    const out: Part[] = [];
    let run: string[] = [];

    for (const part of parts) {
      switch (part.type) {
        case 'text':
          run.push(part.text);
          break;
        case 'blob':
        case 'file':
          if (run.length > 0) {
            out.push({ type: 'text', text: run.join('') });
            run = [];
          }
          out.push(part);
          break;
        default:
          assertNever(part);
      }
    }
    if (run.length > 0) {
      out.push({ type: 'text', text: run.join('') });
    }

    return out;
  }
}
