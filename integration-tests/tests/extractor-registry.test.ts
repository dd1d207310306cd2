/**
 * Extractor Registry Tests
 */

import {
  ExtractorRegistry,
  ExtractorConflictError,
  PdfExtractor,
  ImageExtractor,
  UnsupportedFormatError,
  createDefaultExtractorRegistry,
  sniffMediaType,
  MEDIA_TYPES,
} from '@doctype/core';
import { FakeOcrEngine, FakePdfReader, gifFile, textFile, textPdf } from './helpers';

describe('ExtractorRegistry', () => {
  const pdf = new FakePdfReader();
  const ocr = new FakeOcrEngine();

  it('should register the four formats and seal', () => {
    const registry = createDefaultExtractorRegistry({ pdfReader: pdf, ocrEngine: ocr });

    expect(registry.isSealed()).toBe(true);
    expect(registry.describe()).toEqual({
      [MEDIA_TYPES.PDF]: 'pdf',
      [MEDIA_TYPES.DOCX]: 'word',
      [MEDIA_TYPES.XLSX]: 'excel',
      [MEDIA_TYPES.PNG]: 'image',
      [MEDIA_TYPES.JPEG]: 'image',
      [MEDIA_TYPES.TIFF]: 'image',
      [MEDIA_TYPES.BMP]: 'image',
    });
    expect(registry.getStats()).toMatchObject({
      totalExtractors: 4,
      byFormat: { PDF: 1, WORD: 1, EXCEL: 1, IMAGE: 1 },
    });
  });

  it('should reject a second extractor for the same media type', () => {
    const registry = new ExtractorRegistry();
    registry.register(new PdfExtractor(pdf));

    expect(() => registry.register(new PdfExtractor(pdf))).toThrow(ExtractorConflictError);
    expect(registry.supportedMediaTypes()).toEqual([MEDIA_TYPES.PDF]);
  });

  it('should refuse registration once sealed', () => {
    const registry = new ExtractorRegistry();
    registry.seal();

    expect(() => registry.register(new ImageExtractor({ engine: ocr }))).toThrow(
      'Extractor registry is sealed; call reset() before registering'
    );

    registry.reset();
    registry.register(new ImageExtractor({ engine: ocr }));
    expect(registry.supportedMediaTypes()).toHaveLength(4);
  });

  describe('resolve', () => {
    const registry = createDefaultExtractorRegistry({ pdfReader: pdf, ocrEngine: ocr });

    it('should pick the extractor from the file bytes, not the filename', async () => {
      const resolved = await registry.resolve(pdf.file(textPdf(['Statement']), 'scan.jpg'));

      expect(resolved.mediaType).toBe(MEDIA_TYPES.PDF);
      expect(resolved.extractor.name).toBe('pdf');
    });

    it('should resolve images to OCR', async () => {
      const resolved = await registry.resolve(ocr.file('PASSPORT'));

      expect(resolved.mediaType).toBe(MEDIA_TYPES.JPEG);
      expect(resolved.extractor.format).toBe('IMAGE');
    });

    it('should reject a recognised but unsupported format', async () => {
      const error = await registry.resolve(gifFile('photo.gif')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error).toMatchObject({ code: 'UNSUPPORTED_FORMAT', reason: 'image/gif' });
    });

    it('should reject bytes without a known signature', async () => {
      await expect(registry.resolve(textFile('Plain notes, nothing more', 'notes.pdf'))).rejects.toMatchObject({
        code: 'UNSUPPORTED_FORMAT',
        reason: 'unrecognized',
      });
    });

    it('should reject empty files before sniffing', async () => {
      await expect(registry.resolve({ bytes: Buffer.alloc(0) })).rejects.toMatchObject({
        code: 'EXTRACTION_FAILED',
        reason: 'empty_file',
      });
    });
  });

  it('should sniff media types from magic bytes', async () => {
    expect(await sniffMediaType(gifFile().bytes)).toBe('image/gif');
    expect(await sniffMediaType(Buffer.from('just text'))).toBeUndefined();
  });
});
