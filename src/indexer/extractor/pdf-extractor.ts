/**
 * PDF Text Extractor
 *
 * Turns PDF bytes into plain text with LangChain's PDFLoader (pdf-parse).
 * Pages are trimmed and joined with a blank line. Documents that yield no
 * text at all (image-only scans, empty files) are rejected, since indexing
 * them would produce no chunks and make them look up to date forever.
 */

import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';

import { ExtractionError } from '../../errors/index.js';

export interface TextExtractor {
  /**
   * @throws ExtractionError when the document has no readable text
   */
  extract(documentId: string, bytes: Uint8Array): Promise<string>;
}

/** Page text as returned by the PDF loader */
export interface PdfPage {
  pageContent: string;
}

export type PdfPageLoader = (pdf: Blob) => Promise<PdfPage[]>;

/** Separator between pages in the extracted text */
export const PAGE_SEPARATOR = '\n\n';

export const loadPdfPages: PdfPageLoader = (pdf) =>
  new PDFLoader(pdf, { splitPages: true, parsedItemSeparator: ' ' }).load();

function classifyFailure(error: unknown): string {
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  if (message.includes('password') || message.includes('encrypted')) {
    return 'PDF is password-protected';
  }
  return 'PDF is corrupt or not a PDF';
}

export class PdfTextExtractor implements TextExtractor {
  constructor(private readonly loadPages: PdfPageLoader = loadPdfPages) {}

  async extract(documentId: string, bytes: Uint8Array): Promise<string> {
    if (bytes.byteLength === 0) {
      throw new ExtractionError(documentId, 'file is empty');
    }

    let pages: PdfPage[];
    try {
      pages = await this.loadPages(new Blob([bytes], { type: 'application/pdf' }));
    } catch (error) {
      throw new ExtractionError(
        documentId,
        classifyFailure(error),
        error instanceof Error ? error : undefined
      );
    }

    const text = pages
      .map((page) => page.pageContent.replace(/\r\n?/g, '\n').trim())
      .filter((content) => content.length > 0)
      .join(PAGE_SEPARATOR);

    if (text.length === 0) {
      throw new ExtractionError(documentId, 'no extractable text (scanned or image-only PDF?)');
    }
    return text;
  }
}
