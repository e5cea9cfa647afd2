import type {
  Candidate,
  Citation,
  CitationMetadata,
  CountTokensResponse,
  GenerateContentResponse,
  PromptFeedback,
  UsageMetadata,
} from '../types/content.js';
import { ContentCodec } from './ContentCodec.js';
import { blockReasons, finishReasons } from './enums.js';
import {
  expectRecord,
  optionalArray,
  optionalInteger,
  optionalRecord,
  optionalString,
} from './guards.js';

export class ResponseDecoder {
  /**
   * Decode one raw chunk of a GenerateContent stream.
   * @throws GenAIError with code DECODE_ERROR when the chunk is malformed.
   */
  static decode(raw: unknown): GenerateContentResponse {
    const obj = expectRecord(raw, 'response');

    const response: GenerateContentResponse = {
      candidates: optionalArray(obj.candidates, 'candidates').map((c, i) =>
        ResponseDecoder.decodeCandidate(c, `candidates[${i}]`),
      ),
    };

    const promptFeedback = ResponseDecoder.decodePromptFeedback(obj.promptFeedback);
    if (promptFeedback) response.promptFeedback = promptFeedback;

    const usage = ResponseDecoder.decodeUsage(obj.usageMetadata);
    if (usage) response.usageMetadata = usage;

    return response;
  }

  static decodeCountTokens(raw: unknown): CountTokensResponse {
    const obj = expectRecord(raw, 'response');
    return {
      totalTokens: optionalInteger(obj.totalTokens, 'totalTokens') ?? 0,
      totalBillableCharacters: optionalInteger(obj.totalBillableCharacters, 'totalBillableCharacters') ?? 0,
    };
  }

  /** A feedback blocks the prompt when it names a reason or carries a message. */
  static isBlocking(feedback: PromptFeedback | undefined): feedback is PromptFeedback {
    return (
      feedback !== undefined &&
      (feedback.blockReason !== 'unspecified' || feedback.blockReasonMessage !== '')
    );
  }

  private static decodeCandidate(raw: unknown, path: string): Candidate {
    const obj = expectRecord(raw, path);

    const candidate: Candidate = {
      index: optionalInteger(obj.index, `${path}.index`) ?? 0,
      finishReason: finishReasons.fromWire(optionalString(obj.finishReason, `${path}.finishReason`)),
      safetyRatings: ContentCodec.safetyRatingsFromWire(obj.safetyRatings, `${path}.safetyRatings`),
    };

    if (obj.content !== undefined && obj.content !== null) {
      candidate.content = ContentCodec.contentFromWire(obj.content, `${path}.content`, 'model');
    }

    const finishMessage = optionalString(obj.finishMessage, `${path}.finishMessage`);
    if (finishMessage) candidate.finishMessage = finishMessage;

    const citations = ResponseDecoder.decodeCitationMetadata(obj.citationMetadata, `${path}.citationMetadata`);
    if (citations) candidate.citationMetadata = citations;

    return candidate;
  }

  private static decodeCitationMetadata(raw: unknown, path: string): CitationMetadata | undefined {
    const obj = optionalRecord(raw, path);
    if (!obj) return undefined;
    return {
      citations: optionalArray(obj.citations, `${path}.citations`).map((c, i) =>
        ResponseDecoder.decodeCitation(c, `${path}.citations[${i}]`),
      ),
    };
  }

  private static decodeCitation(raw: unknown, path: string): Citation {
    const obj = expectRecord(raw, path);
    const citation: Citation = {
      startIndex: optionalInteger(obj.startIndex, `${path}.startIndex`) ?? 0,
      endIndex: optionalInteger(obj.endIndex, `${path}.endIndex`) ?? 0,
      uri: optionalString(obj.uri, `${path}.uri`) ?? '',
      title: optionalString(obj.title, `${path}.title`) ?? '',
      license: optionalString(obj.license, `${path}.license`) ?? '',
    };
    const date = ContentCodec.civilDateFromWire(obj.publicationDate, `${path}.publicationDate`);
    if (date) citation.publicationDate = date;
    return citation;
  }

  private static decodePromptFeedback(raw: unknown): PromptFeedback | undefined {
    const obj = optionalRecord(raw, 'promptFeedback');
    if (!obj) return undefined;
    return {
      blockReason: blockReasons.fromWire(optionalString(obj.blockReason, 'promptFeedback.blockReason')),
      blockReasonMessage: optionalString(obj.blockReasonMessage, 'promptFeedback.blockReasonMessage') ?? '',
      safetyRatings: ContentCodec.safetyRatingsFromWire(obj.safetyRatings, 'promptFeedback.safetyRatings'),
    };
  }

  private static decodeUsage(raw: unknown): UsageMetadata | undefined {
    const obj = optionalRecord(raw, 'usageMetadata');
    if (!obj) return undefined;
    return {
      promptTokenCount: optionalInteger(obj.promptTokenCount, 'usageMetadata.promptTokenCount') ?? 0,
      candidatesTokenCount: optionalInteger(obj.candidatesTokenCount, 'usageMetadata.candidatesTokenCount') ?? 0,
      totalTokenCount: optionalInteger(obj.totalTokenCount, 'usageMetadata.totalTokenCount') ?? 0,
    };
  }
}
