import type {
  BlockReason,
  FinishReason,
  HarmBlockThreshold,
  HarmCategory,
  HarmProbability,
} from '../types/content.js';

/**
 * Bidirectional mapping between the library's lowercase enum values and the
 * upper snake case names used on the wire. Absent or unknown wire names decode
 * to `fallback`.
 */
export class EnumCodec<T extends string> {
  private readonly fromWireMap = new Map<string, T>();

  constructor(
    private readonly entries: Record<T, string>,
    private readonly fallback: T,
  ) {
    for (const value in entries) {
      this.fromWireMap.set(entries[value], value);
    }
  }

  toWire(value: T): string {
    return this.entries[value];
  }

  fromWire(wire: string | undefined): T {
    if (wire === undefined) return this.fallback;
    return this.fromWireMap.get(wire) ?? this.fallback;
  }
}

export const finishReasons = new EnumCodec<FinishReason>(
  {
    unspecified: 'FINISH_REASON_UNSPECIFIED',
    stop: 'STOP',
    max_tokens: 'MAX_TOKENS',
    safety: 'SAFETY',
    recitation: 'RECITATION',
    other: 'OTHER',
  },
  'unspecified',
);

export const blockReasons = new EnumCodec<BlockReason>(
  {
    unspecified: 'BLOCKED_REASON_UNSPECIFIED',
    safety: 'SAFETY',
    other: 'OTHER',
  },
  'unspecified',
);

export const harmCategories = new EnumCodec<HarmCategory>(
  {
    unspecified: 'HARM_CATEGORY_UNSPECIFIED',
    hate_speech: 'HARM_CATEGORY_HATE_SPEECH',
    dangerous_content: 'HARM_CATEGORY_DANGEROUS_CONTENT',
    harassment: 'HARM_CATEGORY_HARASSMENT',
    sexually_explicit: 'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  },
  'unspecified',
);

export const harmProbabilities = new EnumCodec<HarmProbability>(
  {
    unspecified: 'HARM_PROBABILITY_UNSPECIFIED',
    negligible: 'NEGLIGIBLE',
    low: 'LOW',
    medium: 'MEDIUM',
    high: 'HIGH',
  },
  'unspecified',
);

export const harmBlockThresholds = new EnumCodec<HarmBlockThreshold>(
  {
    unspecified: 'HARM_BLOCK_THRESHOLD_UNSPECIFIED',
    block_low_and_above: 'BLOCK_LOW_AND_ABOVE',
    block_medium_and_above: 'BLOCK_MEDIUM_AND_ABOVE',
    block_only_high: 'BLOCK_ONLY_HIGH',
    block_none: 'BLOCK_NONE',
  },
  'unspecified',
);
