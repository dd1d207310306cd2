/**
 * Media Type Sniffing
 *
 * Detects the media type of an upload from its magic bytes. Filenames and
 * client-declared content types are never consulted.
 */

import { fromBuffer } from 'file-type';
import { logger } from '../logger';

export const MEDIA_TYPES = {
  PDF: 'application/pdf',
  DOCX: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  XLSX: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  PNG: 'image/png',
  JPEG: 'image/jpeg',
  TIFF: 'image/tiff',
  BMP: 'image/bmp',
} as const;

export type KnownMediaType = (typeof MEDIA_TYPES)[keyof typeof MEDIA_TYPES];

/**
 * Sniff the media type of a buffer.
 *
 * @returns The detected media type, or undefined when the signature is not
 *   recognised (plain text, unknown binary)
 */
export async function sniffMediaType(bytes: Buffer): Promise<string | undefined> {
  try {
    const detected = await fromBuffer(bytes);
    return detected?.mime;
  } catch (error) {
    // Malformed containers (truncated zip) are reported as unrecognised
    logger.warn('Media type detection failed', {
      size_bytes: bytes.length,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
