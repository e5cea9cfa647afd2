import { describe, it, expect } from 'vitest';
import { ResponseDecoder } from '../../src/codec/ResponseDecoder.js';
import { GenAIError } from '../../src/errors/GenAIError.js';
import { ErrorCodes } from '../../src/types/errors.js';
import { blob, fileData, text } from '../../src/content/parts.js';

function decodeError(raw: unknown): GenAIError {
  try {
    ResponseDecoder.decode(raw);
  } catch (err) {
    if (err instanceof GenAIError) return err;
    throw err;
  }
  throw new Error('expected decode to fail');
}

describe('ResponseDecoder', () => {
  describe('decode', () => {
    it('decodes a full candidate', () => {
      const decoded = ResponseDecoder.decode({
        candidates: [
          {
            index: 2,
            content: {
              role: 'model',
              parts: [
                { text: 'Look: ' },
                { inlineData: { mimeType: 'image/png', data: 'AQID' } },
                { fileData: { mimeType: 'application/pdf', fileUri: 'gs://bucket/doc.pdf' } },
              ],
            },
            finishReason: 'MAX_TOKENS',
            finishMessage: 'limit reached',
            safetyRatings: [
              { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', probability: 'LOW', blocked: false },
            ],
            citationMetadata: {
              citations: [
                {
                  startIndex: 1,
                  endIndex: 9,
                  uri: 'https://example.com/a',
                  title: 'A',
                  license: 'mit',
                  publicationDate: { year: 2020, month: 5 },
                },
              ],
            },
          },
        ],
        usageMetadata: { promptTokenCount: 4, candidatesTokenCount: 6, totalTokenCount: 10 },
      });

      expect(decoded).toEqual({
        candidates: [
          {
            index: 2,
            content: {
              role: 'model',
              parts: [
                text('Look: '),
                blob('image/png', new Uint8Array([1, 2, 3])),
                fileData('application/pdf', 'gs://bucket/doc.pdf'),
              ],
            },
            finishReason: 'max_tokens',
            finishMessage: 'limit reached',
            safetyRatings: [{ category: 'dangerous_content', probability: 'low', blocked: false }],
            citationMetadata: {
              citations: [
                {
                  startIndex: 1,
                  endIndex: 9,
                  uri: 'https://example.com/a',
                  title: 'A',
                  license: 'mit',
                  publicationDate: { year: 2020, month: 5, day: 0 },
                },
              ],
            },
          },
        ],
        usageMetadata: { promptTokenCount: 4, candidatesTokenCount: 6, totalTokenCount: 10 },
      });
    });

    it('fills defaults for a sparse candidate', () => {
      expect(ResponseDecoder.decode({ candidates: [{}] })).toEqual({
        candidates: [{ index: 0, finishReason: 'unspecified', safetyRatings: [] }],
      });
    });

    it('decodes an empty object as a response without candidates', () => {
      expect(ResponseDecoder.decode({})).toEqual({ candidates: [] });
    });

    it('defaults a missing content role to model', () => {
      const decoded = ResponseDecoder.decode({ candidates: [{ content: { parts: [{ text: 'x' }] } }] });
      expect(decoded.candidates[0].content?.role).toBe('model');
    });

    it('maps unknown enum names to unspecified', () => {
      const decoded = ResponseDecoder.decode({
        candidates: [{ finishReason: 'SOMETHING_NEW', safetyRatings: [{ category: 'HARM_CATEGORY_NEW' }] }],
      });
      expect(decoded.candidates[0].finishReason).toBe('unspecified');
      expect(decoded.candidates[0].safetyRatings[0].category).toBe('unspecified');
    });

    it('accepts integers encoded as strings', () => {
      const decoded = ResponseDecoder.decode({ candidates: [{ index: '3' }] });
      expect(decoded.candidates[0].index).toBe(3);
    });

    it('decodes prompt feedback', () => {
      const decoded = ResponseDecoder.decode({
        promptFeedback: { blockReason: 'SAFETY', blockReasonMessage: 'no' },
      });
      expect(decoded.promptFeedback).toEqual({
        blockReason: 'safety',
        blockReasonMessage: 'no',
        safetyRatings: [],
      });
    });

    it.each([
      ['a non-object chunk', 'text', 'response must be an object'],
      ['a non-array candidate list', { candidates: {} }, 'candidates must be an array'],
      ['a fractional index', { candidates: [{ index: 1.5 }] }, 'candidates[0].index must be an integer'],
      ['a part with no data', { candidates: [{ content: { parts: [{}] } }] }, 'candidates[0].content.parts[0] has no text, inlineData or fileData'],
      ['an unknown role', { candidates: [{ content: { role: 'system', parts: [] } }] }, 'candidates[0].content.role has unknown value "system"'],
      ['invalid base64', { candidates: [{ content: { parts: [{ inlineData: { mimeType: 'x', data: '@@' } }] } }] }, 'candidates[0].content.parts[0].inlineData.data is not base64'],
      ['a file part without uri', { candidates: [{ content: { parts: [{ fileData: { mimeType: 'x' } }] } }] }, 'candidates[0].content.parts[0].fileData.fileUri is required'],
    ])('rejects %s', (_name, raw, reason) => {
      const err = decodeError(raw);
      expect(err.code).toBe(ErrorCodes.DECODE_ERROR);
      expect(err.message).toBe(`Malformed response chunk: ${reason}`);
    });
  });

  describe('decodeCountTokens', () => {
    it('decodes numeric and string counts', () => {
      expect(ResponseDecoder.decodeCountTokens({ totalTokens: 12, totalBillableCharacters: '48' })).toEqual({
        totalTokens: 12,
        totalBillableCharacters: 48,
      });
    });

    it('defaults missing counts to zero', () => {
      expect(ResponseDecoder.decodeCountTokens({})).toEqual({ totalTokens: 0, totalBillableCharacters: 0 });
    });
  });

  describe('isBlocking', () => {
    it('is false without feedback', () => {
      expect(ResponseDecoder.isBlocking(undefined)).toBe(false);
    });

    it('is true for a block reason', () => {
      expect(
        ResponseDecoder.isBlocking({ blockReason: 'other', blockReasonMessage: '', safetyRatings: [] }),
      ).toBe(true);
    });

    it('is true for a message alone', () => {
      expect(
        ResponseDecoder.isBlocking({ blockReason: 'unspecified', blockReasonMessage: 'why', safetyRatings: [] }),
      ).toBe(true);
    });

    it('is false for ratings alone', () => {
      expect(
        ResponseDecoder.isBlocking({
          blockReason: 'unspecified',
          blockReasonMessage: '',
          safetyRatings: [{ category: 'harassment', probability: 'low', blocked: false }],
        }),
      ).toBe(false);
    });
  });
});
