import { DocumentError } from '@/domain/errors';
import type { ExtractedText, IDocumentTextExtractor, UploadedDocument } from '@/ports';

/**
 * In-memory extractor for tests: returns the upload's bytes as text, or a fixed result.
 */
export class FakeTextExtractor implements IDocumentTextExtractor {
  private extracted: UploadedDocument[] = [];

  constructor(private result?: ExtractedText | DocumentError) {}

  supports(document: Pick<UploadedDocument, 'filename' | 'mimeType'>): boolean {
    return document.mimeType === 'application/pdf' || document.filename.endsWith('.pdf');
  }

  async extract(document: UploadedDocument): Promise<ExtractedText> {
    this.extracted.push(document);
    if (this.result instanceof DocumentError) {
      throw this.result;
    }
    return this.result ?? { text: document.data.toString('utf8'), pageCount: 1 };
  }

  _setResult(result: ExtractedText | DocumentError): void {
    this.result = result;
  }

  _getExtracted(): UploadedDocument[] {
    return [...this.extracted];
  }
}
