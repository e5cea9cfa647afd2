/**
 * Fuzz tests for chunk decoding.
 *
 * Random JSON must either decode or fail with a DECODE_ERROR, never with
 * anything else.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ResponseDecoder } from '../../src/codec/ResponseDecoder.js';
import { GenAIError } from '../../src/errors/GenAIError.js';
import { ErrorCodes } from '../../src/types/errors.js';

function decodeOutcome(raw: unknown): 'ok' | number {
  try {
    ResponseDecoder.decode(raw);
    return 'ok';
  } catch (err) {
    if (err instanceof GenAIError) return err.code;
    throw err;
  }
}

describe('ResponseDecoder (fuzz)', () => {
  it('handles arbitrary JSON values', () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        const outcome = decodeOutcome(value);
        expect(outcome === 'ok' || outcome === ErrorCodes.DECODE_ERROR).toBe(true);
      }),
      { numRuns: 300 },
    );
  });

  it('handles arbitrary candidate lists', () => {
    fc.assert(
      fc.property(fc.array(fc.jsonValue(), { maxLength: 5 }), (candidates) => {
        const outcome = decodeOutcome({ candidates });
        expect(outcome === 'ok' || outcome === ErrorCodes.DECODE_ERROR).toBe(true);
      }),
      { numRuns: 300 },
    );
  });

  it('handles arbitrary parts', () => {
    fc.assert(
      fc.property(fc.array(fc.jsonValue(), { maxLength: 5 }), (parts) => {
        const outcome = decodeOutcome({ candidates: [{ index: 0, content: { role: 'model', parts } }] });
        expect(outcome === 'ok' || outcome === ErrorCodes.DECODE_ERROR).toBe(true);
      }),
      { numRuns: 300 },
    );
  });
});
