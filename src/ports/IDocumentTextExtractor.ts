/**
 * Port for turning an uploaded document into plain text.
 */

/**
 * An uploaded file as received by the HTTP layer.
 */
export interface UploadedDocument {
  filename: string;
  mimeType: string;
  data: Buffer;
}

/**
 * Raw text extracted from a document.
 */
export interface ExtractedText {
  text: string;
  pageCount: number;
}

export interface IDocumentTextExtractor {
  /**
   * Whether this extractor understands the given upload.
   */
  supports(document: Pick<UploadedDocument, 'filename' | 'mimeType'>): boolean;

  /**
   * Extract the text content. Rejects with `DocumentError` when the file cannot be read.
   */
  extract(document: UploadedDocument): Promise<ExtractedText>;
}
