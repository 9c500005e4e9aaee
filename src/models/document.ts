/**
 * Document interfaces for the OCR comparison pipeline
 *
 * A Document is the file an operator selected. It is immutable for the
 * duration of a request. Pages only exist while a per-page provider works
 * through a rasterized PDF and are discarded afterwards.
 */

import * as path from 'path';

/**
 * Coarse document kind, derived from the file extension
 */
export type DocumentKind = 'pdf' | 'image';

/**
 * Image extensions any provider may accept (lowercase, no dot).
 * Individual providers narrow this further.
 */
export const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'tif', 'tiff'] as const;

/**
 * Every extension the pipeline will open
 */
export const SUPPORTED_EXTENSIONS = ['pdf', ...IMAGE_EXTENSIONS] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export interface Document {
  /** Path as supplied by the caller */
  path: string;

  /** Base name, used in vendor uploads */
  fileName: string;

  /** Lowercase extension without the dot (e.g. 'pdf', 'jpg') */
  extension: SupportedExtension;

  kind: DocumentKind;
}

/**
 * One rasterized page of a PDF
 */
export interface Page {
  /** 1-based page number */
  index: number;

  /** Encoded image (PNG from the rasterizer) */
  imageBytes: Buffer;

  width?: number;
  height?: number;
  dpi?: number;
}

export function isSupportedExtension(value: string): value is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((ext) => ext === value);
}

/**
 * Lowercase extension of a path without the leading dot ('' when absent)
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase().slice(1);
}

export function documentKindOf(extension: SupportedExtension): DocumentKind {
  return extension === 'pdf' ? 'pdf' : 'image';
}
