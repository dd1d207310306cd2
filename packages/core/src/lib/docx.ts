/**
 * DOCX Reading
 *
 * mammoth gives us the accepted-changes text plus an HTML rendering, which is
 * the only place table structure and images survive.
 */

import mammoth from 'mammoth';

export interface DocxDocument {
  text: string;
  html: string;
  /** Non-fatal conversion warnings reported by mammoth */
  warnings: string[];
}

export interface DocxReader {
  read(buffer: Buffer): Promise<DocxDocument>;
}

export class MammothDocxReader implements DocxReader {
  async read(buffer: Buffer): Promise<DocxDocument> {
    const [raw, converted] = await Promise.all([
      mammoth.extractRawText({ buffer }),
      mammoth.convertToHtml({ buffer }),
    ]);

    const warnings = [...raw.messages, ...converted.messages]
      .filter((m) => m.type === 'warning')
      .map((m) => m.message);

    return { text: raw.value, html: converted.value, warnings };
  }
}
