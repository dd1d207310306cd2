/**
 * Test Helpers
 *
 * In-process stand-ins for the format readers and the OCR engine, plus a
 * core wired to an in-memory store and queue.
 */

import {
  createCore,
  InProcessWorkQueue,
  type Core,
  type CoreOptions,
  type DocxDocument,
  type DocxReader,
  type FileInput,
  type OcrEngine,
  type PdfDocument,
  type PdfReader,
  type SheetData,
  type WorkbookReader,
} from '@doctype/core';

const PDF_SIGNATURE = '%PDF-1.4\n';
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);
const GIF_SIGNATURE = 'GIF89a';

// file-type skips past the PDF header before confirming it
const MIN_FIXTURE_BYTES = 2048;

const FIXTURE_KEY = /fixture-\d+/;

function pad(buffer: Buffer): Buffer {
  if (buffer.length >= MIN_FIXTURE_BYTES) return buffer;
  return Buffer.concat([buffer, Buffer.alloc(MIN_FIXTURE_BYTES - buffer.length, 0x20)]);
}

function keyOf(data: Uint8Array): string {
  const match = FIXTURE_KEY.exec(Buffer.from(data).toString('latin1'));
  if (!match) {
    throw new Error('Not a test fixture');
  }
  return match[0];
}

/**
 * Registry of fixtures addressed by a key embedded in the file bytes.
 */
class FixtureStore<T> {
  private readonly fixtures = new Map<string, T | Error>();
  private next = 0;

  add(value: T | Error): string {
    const key = `fixture-${this.next++}`;
    this.fixtures.set(key, value);
    return key;
  }

  lookup(data: Uint8Array): T {
    const value = this.fixtures.get(keyOf(data));
    if (value === undefined) {
      throw new Error('Unknown test fixture');
    }
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }
}

export function textPdf(lines: string[], options: Partial<PdfDocument> = {}): PdfDocument {
  return {
    pages: [{ pageNumber: 1, lines, headers: [], footers: [] }],
    imageCount: 0,
    ...options,
  };
}

export class FakePdfReader implements PdfReader {
  private readonly store = new FixtureStore<PdfDocument>();

  /** PDF-signed bytes that this reader decodes to `document` */
  file(document: PdfDocument | Error, filename?: string): FileInput {
    const key = this.store.add(document);
    return { bytes: pad(Buffer.from(`${PDF_SIGNATURE}${key}\n`)), filename };
  }

  async read(data: Uint8Array): Promise<PdfDocument> {
    return this.store.lookup(data);
  }
}

export class FakeOcrEngine implements OcrEngine {
  private readonly store = new FixtureStore<string | Promise<string>>();
  /** Time each recognition takes */
  latencyMs = 0;
  inFlight = 0;
  peakInFlight = 0;

  /** JPEG-signed bytes that this engine recognises as `text` */
  file(text: string | Promise<string> | Error, filename?: string): FileInput {
    const key = this.store.add(text);
    return { bytes: pad(Buffer.concat([JPEG_SIGNATURE, Buffer.from(key)])), filename };
  }

  async recognize(image: Buffer): Promise<string> {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs);
      return await this.store.lookup(image);
    } finally {
      this.inFlight--;
    }
  }
}

export class FakeDocxReader implements DocxReader {
  constructor(private readonly document: DocxDocument) {}

  async read(): Promise<DocxDocument> {
    return this.document;
  }
}

export class FakeWorkbookReader implements WorkbookReader {
  constructor(private readonly sheets: SheetData[]) {}

  async read(): Promise<SheetData[]> {
    return this.sheets;
  }
}

export function gifFile(filename?: string): FileInput {
  return { bytes: pad(Buffer.from(`${GIF_SIGNATURE}fixture-gif`)), filename };
}

export function textFile(text: string, filename?: string): FileInput {
  return { bytes: Buffer.from(text), filename };
}

export interface TestCore extends Core {
  pdf: FakePdfReader;
  ocr: FakeOcrEngine;
  workQueue: InProcessWorkQueue;
}

/**
 * Core with fake readers, an in-memory store and an in-process queue that
 * retries without a noticeable delay.
 */
export function buildCore(options: CoreOptions = {}): TestCore {
  const pdf = new FakePdfReader();
  const ocr = new FakeOcrEngine();
  const workQueue = new InProcessWorkQueue({ concurrency: 2, maxAttempts: 3, backoffBaseMs: 1 });

  const core = createCore({
    extractorOptions: { pdfReader: pdf, ocrEngine: ocr },
    queue: workQueue,
    ...options,
  });

  return { ...core, pdf, ocr, workQueue };
}

/**
 * Sleep helper
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
