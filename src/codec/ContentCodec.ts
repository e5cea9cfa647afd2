import type { Part } from '../types/part.js';
import type { CivilDate, Content, Role, SafetyRating } from '../types/content.js';
import type { GenerationConfig, SafetySetting } from '../types/config.js';
import type {
  WireContent,
  WireGenerationConfig,
  WirePart,
  WireSafetySetting,
} from '../types/wire.js';
import { GenAIError } from '../errors/GenAIError.js';
import { assertNever } from '../content/parts.js';
import { harmBlockThresholds, harmCategories, harmProbabilities } from './enums.js';
import {
  expectRecord,
  expectString,
  optionalArray,
  optionalBoolean,
  optionalInteger,
  optionalRecord,
  optionalString,
} from './guards.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/** Conversion of content-level values between the domain model and wire JSON. */
export class ContentCodec {
  static partToWire(part: Part): WirePart {
    switch (part.type) {
      case 'text':
        return { text: part.text };
      case 'blob':
        return {
          inlineData: {
            mimeType: part.mimeType,
            data: Buffer.from(part.data).toString('base64'),
          },
        };
      case 'file':
        return { fileData: { mimeType: part.mimeType, fileUri: part.fileUri } };
      default:
        return assertNever(part);
    }
  }

  static partFromWire(raw: unknown, path: string): Part {
    const obj = expectRecord(raw, path);

    const text = optionalString(obj.text, `${path}.text`);
    if (text !== undefined) {
      return { type: 'text', text };
    }

    const inline = optionalRecord(obj.inlineData, `${path}.inlineData`);
    if (inline) {
      const data = expectString(inline.data, `${path}.inlineData.data`);
      if (!BASE64_PATTERN.test(data)) {
        throw GenAIError.decode(`${path}.inlineData.data is not base64`, { path });
      }
      return {
        type: 'blob',
        mimeType: optionalString(inline.mimeType, `${path}.inlineData.mimeType`) ?? '',
        data: new Uint8Array(Buffer.from(data, 'base64')),
      };
    }

    const file = optionalRecord(obj.fileData, `${path}.fileData`);
    if (file) {
      return {
        type: 'file',
        mimeType: optionalString(file.mimeType, `${path}.fileData.mimeType`) ?? '',
        fileUri: expectString(file.fileUri, `${path}.fileData.fileUri`),
      };
    }

    throw GenAIError.decode(`${path} has no text, inlineData or fileData`, { path });
  }

  static contentToWire(content: Content): WireContent {
    return {
      role: content.role,
      parts: content.parts.map((p) => ContentCodec.partToWire(p)),
    };
  }

  static contentFromWire(raw: unknown, path: string, defaultRole: Role): Content {
    const obj = expectRecord(raw, path);
    const role = optionalString(obj.role, `${path}.role`);
    if (role !== undefined && role !== '' && role !== 'user' && role !== 'model') {
      throw GenAIError.decode(`${path}.role has unknown value "${role}"`, { path });
    }
    return {
      role: role === 'user' || role === 'model' ? role : defaultRole,
      parts: optionalArray(obj.parts, `${path}.parts`).map((p, i) =>
        ContentCodec.partFromWire(p, `${path}.parts[${i}]`),
      ),
    };
  }

  static safetyRatingFromWire(raw: unknown, path: string): SafetyRating {
    const obj = expectRecord(raw, path);
    return {
      category: harmCategories.fromWire(optionalString(obj.category, `${path}.category`)),
      probability: harmProbabilities.fromWire(optionalString(obj.probability, `${path}.probability`)),
      blocked: optionalBoolean(obj.blocked, `${path}.blocked`) ?? false,
    };
  }

  static safetyRatingsFromWire(raw: unknown, path: string): SafetyRating[] {
    return optionalArray(raw, path).map((r, i) => ContentCodec.safetyRatingFromWire(r, `${path}[${i}]`));
  }

  /** Missing date fields decode as 0, the "unspecified" value of a civil date. */
  static civilDateFromWire(raw: unknown, path: string): CivilDate | undefined {
    const obj = optionalRecord(raw, path);
    if (!obj) return undefined;
    return {
      year: optionalInteger(obj.year, `${path}.year`) ?? 0,
      month: optionalInteger(obj.month, `${path}.month`) ?? 0,
      day: optionalInteger(obj.day, `${path}.day`) ?? 0,
    };
  }

  static safetySettingToWire(setting: SafetySetting): WireSafetySetting {
    return {
      category: harmCategories.toWire(setting.category),
      threshold: harmBlockThresholds.toWire(setting.threshold),
    };
  }

  /** Only fields that are set are copied. */
  static generationConfigToWire(config: GenerationConfig): WireGenerationConfig {
    const wire: WireGenerationConfig = {};
    if (config.temperature !== undefined) wire.temperature = config.temperature;
    if (config.topP !== undefined) wire.topP = config.topP;
    if (config.topK !== undefined) wire.topK = config.topK;
    if (config.candidateCount !== undefined) wire.candidateCount = config.candidateCount;
    if (config.maxOutputTokens !== undefined) wire.maxOutputTokens = config.maxOutputTokens;
    if (config.stopSequences !== undefined && config.stopSequences.length > 0) {
      wire.stopSequences = [...config.stopSequences];
    }
    return wire;
  }
}
