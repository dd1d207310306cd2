/**
 * OCR Engine
 *
 * Tesseract.js workers are memory-intensive: one is created per recognition
 * and always terminated afterwards.
 */

import path from 'node:path';
import { logger } from '../logger';
import { config } from '../config';

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
}

export interface TesseractOptions {
  /** Directory holding `<lang>.traineddata.gz` */
  langPath?: string;
  cachePath?: string;
}

/**
 * Trained data installed from the `@tesseract.js-data/<lang>` npm package,
 * the same files tesseract.js would otherwise fetch from a CDN.
 */
export function bundledLangPath(language: string): string {
  const packageJson = require.resolve(`@tesseract.js-data/${language}/package.json`);
  return path.join(path.dirname(packageJson), '4.0.0_best_int');
}

export class TesseractOcrEngine implements OcrEngine {
  private readonly langPath: string;
  private readonly cachePath: string | undefined;

  constructor(private readonly language: string = 'eng', options: TesseractOptions = {}) {
    this.langPath = options.langPath ?? config.ocrLangPath ?? bundledLangPath(language);
    this.cachePath = options.cachePath ?? config.ocrCachePath;
  }

  async recognize(image: Buffer): Promise<string> {
    // Dynamic import keeps tesseract.js out of processes that never OCR
    const { createWorker } = await import('tesseract.js');

    const worker = await createWorker(this.language, undefined, {
      langPath: this.langPath,
      ...(this.cachePath !== undefined && { cachePath: this.cachePath }),
    });
    try {
      const result = await worker.recognize(image);
      logger.debug('OCR recognition complete', {
        language: this.language,
        confidence: result.data.confidence,
        text_length: result.data.text.length,
      });
      return result.data.text;
    } finally {
      await worker.terminate();
    }
  }
}
