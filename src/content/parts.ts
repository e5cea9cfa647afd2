import type { BlobPart, FileDataPart, Part, TextPart } from '../types/part.js';
import type { Content, Role } from '../types/content.js';
import { GenAIError } from '../errors/GenAIError.js';

/** A prompt: a string, one part, or an ordered list of strings and parts. */
export type PromptInput = string | Part | Array<string | Part>;

export function text(value: string): TextPart {
  return { type: 'text', text: value };
}

export function blob(mimeType: string, data: Uint8Array): BlobPart {
  return { type: 'blob', mimeType, data };
}

export function fileData(mimeType: string, fileUri: string): FileDataPart {
  return { type: 'file', mimeType, fileUri };
}

/**
 * Image blob for input to a model.
 * @param format Subtype of the MIME type, after "image/" (e.g. "png").
 */
export function imageData(format: string, data: Uint8Array): BlobPart {
  return blob(`image/${format}`, data);
}

export function isTextPart(part: Part): part is TextPart {
  return part.type === 'text';
}

export function newContent(role: Role, parts: Part[]): Content {
  return { role, parts };
}

export function newUserContent(parts: Part[]): Content {
  return newContent('user', parts);
}

/** Normalize a prompt to parts. Strings become text parts. */
export function toParts(prompt: PromptInput): Part[] {
  const items = Array.isArray(prompt) ? prompt : [prompt];
  if (items.length === 0) {
    throw GenAIError.invalidArgument('at least one part is required');
  }
  return items.map((item) => (typeof item === 'string' ? text(item) : item));
}

/** Concatenated text of every text part, in order. */
export function contentText(content: Content | undefined): string {
  if (!content) return '';
  let out = '';
  for (const part of content.parts) {
    switch (part.type) {
      case 'text':
        out += part.text;
        break;
      case 'blob':
      case 'file':
        break;
      default:
        assertNever(part);
    }
  }
  return out;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected part: ${JSON.stringify(value)}`);
}
