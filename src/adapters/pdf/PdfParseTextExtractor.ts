import { DocumentError } from '@/domain/errors';
import type { ExtractedText, IDocumentTextExtractor, UploadedDocument } from '@/ports';
import pdfParse from 'pdf-parse';

const PDF_MIME_TYPES = ['application/pdf', 'application/x-pdf'];

/**
 * Extracts text from PDF uploads with pdf-parse.
 */
export class PdfParseTextExtractor implements IDocumentTextExtractor {
  constructor(private readonly maxPages = 0) {}

  supports(document: Pick<UploadedDocument, 'filename' | 'mimeType'>): boolean {
    return (
      PDF_MIME_TYPES.includes(document.mimeType.toLowerCase()) ||
      document.filename.toLowerCase().endsWith('.pdf')
    );
  }

  async extract(document: UploadedDocument): Promise<ExtractedText> {
    if (!this.hasPdfSignature(document.data)) {
      throw new DocumentError(`${document.filename} is not a valid PDF file`);
    }

    try {
      // max: 0 parses every page
      const result = await pdfParse(document.data, { max: this.maxPages });
      return { text: result.text, pageCount: result.numpages };
    } catch (error) {
      console.error(`[PdfParseTextExtractor] Failed to parse ${document.filename}:`, error);
      throw new DocumentError(`Could not read ${document.filename}`, { cause: error });
    }
  }

  private hasPdfSignature(data: Buffer): boolean {
    return data.subarray(0, 5).toString('latin1') === '%PDF-';
  }
}
