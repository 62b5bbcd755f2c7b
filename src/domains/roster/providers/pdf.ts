/**
 * @fileoverview PDF text extractor (unpdf / PDF.js).
 *
 * PDF.js hands back positioned text fragments rather than lines. Fragments
 * are grouped into rows by their baseline, rows sorted top to bottom and
 * fragments left to right, which restores the table rows of a roster.
 */

import { getDocumentProxy } from 'unpdf';
import { InputError, withErrorContext } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { RosterFile, TextExtractor } from '../types.js';

const log = createLogger({ domain: 'pdf-extractor' });

const PDF_MAGIC = '%PDF-';

/** Baseline distance (pt) under which two fragments share a row. */
const ROW_TOLERANCE = 3;

/** The parts of a PDF.js document this extractor reads. */
export interface PdfPageLike {
  getTextContent(): Promise<{ items: object[] }>;
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  cleanup(): Promise<unknown>;
  destroy(): Promise<unknown>;
}

export type PdfLoader = (data: Uint8Array) => Promise<PdfDocumentLike>;

type PositionedText = {
  str: string;
  x: number;
  y: number;
};

export function isPdf(file: RosterFile): boolean {
  const head = String.fromCharCode(...file.data.subarray(0, PDF_MAGIC.length));
  if (head === PDF_MAGIC) return true;
  return file.mimeType?.split(';')[0].trim().toLowerCase() === 'application/pdf';
}

function toPositionedText(item: object): PositionedText | null {
  if (!('str' in item) || !('transform' in item)) return null;
  const { str, transform } = item;
  if (typeof str !== 'string' || !Array.isArray(transform)) return null;

  const x: unknown = transform[4];
  const y: unknown = transform[5];
  if (typeof x !== 'number' || typeof y !== 'number') return null;
  return { str, x, y };
}

export function groupIntoRows(items: PositionedText[], tolerance = ROW_TOLERANCE): string[] {
  const rows: PositionedText[][] = [];

  for (const item of items) {
    const row = rows.find((candidate) => Math.abs(candidate[0].y - item.y) <= tolerance);
    if (row) {
      row.push(item);
    } else {
      rows.push([item]);
    }
  }

  // PDF y grows upwards: higher y is higher on the page
  rows.sort((a, b) => b[0].y - a[0].y);

  return rows
    .map((row) =>
      row
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .replace(/\s+/g, ' ')
        .trim()
    )
    .filter(Boolean);
}

export class PdfTextExtractor implements TextExtractor {
  readonly id = 'pdf';

  constructor(private readonly loadDocument: PdfLoader = getDocumentProxy) {}

  supports(file: RosterFile): boolean {
    return isPdf(file);
  }

  async extractText(data: Uint8Array): Promise<string> {
    const document = await this.open(data);

    try {
      if (document.numPages === 0) {
        throw new InputError('PDF file appears to be empty or corrupted');
      }

      const lines: string[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const content = await page.getTextContent();
        const items = content.items
          .map(toPositionedText)
          .filter((item): item is PositionedText => item !== null);
        lines.push(...groupIntoRows(items));
      }

      if (lines.length === 0) {
        throw new InputError('No text could be extracted from the PDF (scanned images are not supported)');
      }

      log.debug('pdf_text_extracted', { pageCount: document.numPages, lineCount: lines.length });
      return lines.join('\n');
    } finally {
      await document.cleanup();
      await document.destroy();
    }
  }

  private async open(data: Uint8Array): Promise<PdfDocumentLike> {
    return withErrorContext(async () => {
      try {
        // PDF.js may transfer the buffer to its worker; keep the caller's copy intact
        return await this.loadDocument(new Uint8Array(data));
      } catch (error) {
        throw new InputError(
          `Error reading PDF file: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }, 'pdf_open');
  }
}
