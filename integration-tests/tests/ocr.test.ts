/**
 * OCR Engine Tests
 *
 * tesseract.js is replaced by a module mock; only the worker lifecycle and
 * the options it is created with are checked.
 */

import * as path from 'path';
import { TesseractOcrEngine, bundledLangPath } from '@doctype/core';

const mockCreateWorker = jest.fn();

jest.mock('tesseract.js', () => ({
  createWorker: (...args: unknown[]) => mockCreateWorker(...args),
}));

describe('TesseractOcrEngine', () => {
  beforeEach(() => {
    mockCreateWorker.mockReset();
  });

  it('should load language data from a local directory', async () => {
    const worker = {
      recognize: jest.fn().mockResolvedValue({ data: { text: 'PASSPORT', confidence: 91 } }),
      terminate: jest.fn().mockResolvedValue(undefined),
    };
    mockCreateWorker.mockResolvedValue(worker);

    const engine = new TesseractOcrEngine('eng', { langPath: '/opt/tessdata' });

    await expect(engine.recognize(Buffer.from('image'))).resolves.toBe('PASSPORT');
    expect(mockCreateWorker).toHaveBeenCalledWith('eng', undefined, { langPath: '/opt/tessdata' });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it('should terminate the worker when recognition fails', async () => {
    const worker = {
      recognize: jest.fn().mockRejectedValue(new Error('bad image')),
      terminate: jest.fn().mockResolvedValue(undefined),
    };
    mockCreateWorker.mockResolvedValue(worker);

    const engine = new TesseractOcrEngine('eng', { langPath: '/opt/tessdata', cachePath: '/tmp/ocr' });

    await expect(engine.recognize(Buffer.from('image'))).rejects.toThrow('bad image');
    expect(mockCreateWorker).toHaveBeenCalledWith('eng', undefined, {
      langPath: '/opt/tessdata',
      cachePath: '/tmp/ocr',
    });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });
});

describe('bundledLangPath', () => {
  it('should point into the installed language data package', () => {
    const dir = bundledLangPath('eng');

    expect(path.basename(dir)).toBe('4.0.0_best_int');
    expect(dir.split(path.sep)).toEqual(expect.arrayContaining(['@tesseract.js-data', 'eng']));
  });
});
