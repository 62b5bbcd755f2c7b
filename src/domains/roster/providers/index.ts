import { InputError } from '../../../utils/errors.js';
import type { RosterFile, TextExtractor } from '../types.js';
import { PdfTextExtractor } from './pdf.js';
import { PlainTextExtractor } from './plain-text.js';

export { PdfTextExtractor, isPdf, groupIntoRows } from './pdf.js';
export type { PdfLoader, PdfDocumentLike, PdfPageLike } from './pdf.js';
export { PlainTextExtractor } from './plain-text.js';

/** PDF first: a PDF uploaded as application/octet-stream is still a PDF. */
export function defaultTextExtractors(): TextExtractor[] {
  return [new PdfTextExtractor(), new PlainTextExtractor()];
}

export function selectTextExtractor(file: RosterFile, extractors: TextExtractor[]): TextExtractor {
  const extractor = extractors.find((candidate) => candidate.supports(file));
  if (!extractor) {
    throw new InputError(`Unsupported roster file type: ${file.mimeType ?? 'unknown'}`, {
      mimeType: file.mimeType,
    });
  }
  return extractor;
}
