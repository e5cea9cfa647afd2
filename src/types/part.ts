/** MIME type string (e.g. "image/png", "application/pdf"). */
export type MimeType = string;

/** Part containing plain text. */
export interface TextPart {
  type: 'text';
  text: string;
}

/** Part containing inline binary content. */
export interface BlobPart {
  type: 'blob';
  mimeType: MimeType;
  data: Uint8Array;
}

/** Part referencing content stored elsewhere, by URI. */
export interface FileDataPart {
  type: 'file';
  mimeType: MimeType;
  fileUri: string;
}

/** Content unit within a Content. Discriminated by `type`. */
export type Part = TextPart | BlobPart | FileDataPart;

export type PartType = Part['type'];
