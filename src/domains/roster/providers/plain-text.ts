/**
 * Text extractor for rosters that are already text (copied out of a PDF
 * viewer, or exported as .txt).
 */

import { InputError } from '../../../utils/errors.js';
import type { RosterFile, TextExtractor } from '../types.js';

const TEXT_MIME_TYPES = new Set(['text/plain', 'text/csv', 'application/octet-stream']);

function normalizeMimeType(mimeType: string): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

export class PlainTextExtractor implements TextExtractor {
  readonly id = 'plain-text';

  supports(file: RosterFile): boolean {
    if (!file.mimeType) return true;
    return TEXT_MIME_TYPES.has(normalizeMimeType(file.mimeType));
  }

  async extractText(data: Uint8Array): Promise<string> {
    try {
      // fatal: reject binary uploads instead of filling them with U+FFFD
      return new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch (error) {
      throw new InputError('Roster file is not valid UTF-8 text', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
