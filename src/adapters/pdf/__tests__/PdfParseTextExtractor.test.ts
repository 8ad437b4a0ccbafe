import { DocumentError } from '@/domain/errors';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PdfParseTextExtractor } from '../PdfParseTextExtractor';

const { pdfParseMock } = vi.hoisted(() => ({ pdfParseMock: vi.fn() }));

vi.mock('pdf-parse', () => ({ default: pdfParseMock }));

const pdfBytes = Buffer.from('%PDF-1.4\nfake body');

describe('PdfParseTextExtractor', () => {
  let extractor: PdfParseTextExtractor;

  beforeEach(() => {
    pdfParseMock.mockReset();
    extractor = new PdfParseTextExtractor();
  });

  describe('supports', () => {
    it('accepts the PDF mime type', () => {
      expect(extractor.supports({ filename: 'notes', mimeType: 'application/pdf' })).toBe(true);
    });

    it('accepts a .pdf filename with a generic mime type', () => {
      expect(
        extractor.supports({ filename: 'Chapter1.PDF', mimeType: 'application/octet-stream' }),
      ).toBe(true);
    });

    it('rejects other documents', () => {
      expect(extractor.supports({ filename: 'notes.txt', mimeType: 'text/plain' })).toBe(false);
    });
  });

  describe('extract', () => {
    it('returns text and page count', async () => {
      pdfParseMock.mockResolvedValueOnce({ text: 'Photosynthesis basics', numpages: 3 });

      const result = await extractor.extract({
        filename: 'bio.pdf',
        mimeType: 'application/pdf',
        data: pdfBytes,
      });

      expect(result).toEqual({ text: 'Photosynthesis basics', pageCount: 3 });
      expect(pdfParseMock).toHaveBeenCalledWith(pdfBytes, { max: 0 });
    });

    it('rejects data without a PDF signature before parsing', async () => {
      await expect(
        extractor.extract({
          filename: 'fake.pdf',
          mimeType: 'application/pdf',
          data: Buffer.from('hello'),
        }),
      ).rejects.toThrow('fake.pdf is not a valid PDF file');
      expect(pdfParseMock).not.toHaveBeenCalled();
    });

    it('wraps parser failures in a DocumentError', async () => {
      pdfParseMock.mockRejectedValueOnce(new Error('bad XRef entry'));
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const promise = extractor.extract({
        filename: 'broken.pdf',
        mimeType: 'application/pdf',
        data: pdfBytes,
      });

      await expect(promise).rejects.toBeInstanceOf(DocumentError);
      await expect(promise).rejects.toThrow('Could not read broken.pdf');
    });
  });
});
