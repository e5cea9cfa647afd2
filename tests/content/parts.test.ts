import { describe, it, expect } from 'vitest';
import {
  blob,
  contentText,
  fileData,
  imageData,
  isTextPart,
  newContent,
  newUserContent,
  text,
  toParts,
} from '../../src/content/parts.js';
import { GenAIError } from '../../src/errors/GenAIError.js';

describe('parts', () => {
  it('builds each part variant', () => {
    const bytes = new Uint8Array([7]);
    expect(text('a')).toEqual({ type: 'text', text: 'a' });
    expect(blob('audio/wav', bytes)).toEqual({ type: 'blob', mimeType: 'audio/wav', data: bytes });
    expect(fileData('text/plain', 'gs://b/f.txt')).toEqual({ type: 'file', mimeType: 'text/plain', fileUri: 'gs://b/f.txt' });
    expect(imageData('webp', bytes)).toEqual({ type: 'blob', mimeType: 'image/webp', data: bytes });
  });

  it('narrows text parts', () => {
    expect(isTextPart(text('x'))).toBe(true);
    expect(isTextPart(fileData('text/plain', 'gs://b/f.txt'))).toBe(false);
  });

  it('builds contents with a role', () => {
    expect(newUserContent([text('q')])).toEqual({ role: 'user', parts: [text('q')] });
    expect(newContent('model', [])).toEqual({ role: 'model', parts: [] });
  });

  describe('toParts', () => {
    it('wraps a single string', () => {
      expect(toParts('hello')).toEqual([text('hello')]);
    });

    it('wraps a single part', () => {
      const part = imageData('png', new Uint8Array([1]));
      expect(toParts(part)).toEqual([part]);
    });

    it('keeps the order of a mixed list', () => {
      const part = fileData('application/pdf', 'gs://b/d.pdf');
      expect(toParts(['summarize', part, 'briefly'])).toEqual([text('summarize'), part, text('briefly')]);
    });

    it('rejects an empty list', () => {
      expect(() => toParts([])).toThrow(GenAIError);
      expect(() => toParts([])).toThrow('at least one part is required');
    });
  });

  describe('contentText', () => {
    it('joins text parts and skips media', () => {
      expect(contentText(newContent('model', [text('a'), blob('image/png', new Uint8Array()), text('b')]))).toBe('ab');
    });

    it('is empty without content', () => {
      expect(contentText(undefined)).toBe('');
    });
  });
});
