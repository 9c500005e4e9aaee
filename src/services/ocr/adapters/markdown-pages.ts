/**
 * Markdown-page adapter (Mistral OCR)
 *
 * Payload: {pages: [{index, dimensions: {width, height, dpi}, images: [], markdown}]}.
 * Each page becomes a text section with its dimensions, image count and
 * markdown. The vendor's page index is 0-based; the canonical one is 1-based.
 */

import { z } from 'zod';
import type { Document } from '../../../models/document.js';
import type {
  ExtractionResult,
  PageExtraction,
  RawProviderPayload,
} from '../../../models/extraction.js';
import { finalizeResult } from '../formatter.js';
import {
  lenientNumber,
  lenientText,
  parsePayload,
  toJsonPayload,
  type ProviderAdapter,
} from './types.js';

const API = 'OCR';

const DimensionsSchema = z
  .object({ width: lenientNumber, height: lenientNumber, dpi: lenientNumber })
  .optional()
  .catch(undefined);

const MarkdownPageSchema = z.object({
  index: lenientNumber,
  dimensions: DimensionsSchema,
  images: z.array(z.unknown()).optional().catch(undefined),
  markdown: lenientText,
});

export const MarkdownPagesPayloadSchema = z.object({
  pages: z.array(MarkdownPageSchema),
});

type MarkdownPage = z.infer<typeof MarkdownPageSchema>;

export interface MarkdownPageAdapterOptions {
  providerName?: string;
  /** Keep the pretty-printed payload as the result's appendix (default true) */
  includeFullResponse?: boolean;
}

function orNA(value: number | undefined): string {
  return value === undefined ? 'N/A' : String(value);
}

export function pageSection(page: MarkdownPage): string {
  let text = '';
  if (page.dimensions) {
    const { width, height, dpi } = page.dimensions;
    text += `Dimensions: ${orNA(width)}x${orNA(height)} (DPI: ${orNA(dpi)})\n`;
  }
  if (page.images) {
    text += `Images: ${page.images.length}\n`;
  }
  if (page.markdown !== undefined) {
    text += `\nText Content:\n${page.markdown}\n\n`;
  }
  return text;
}

export function createMarkdownPageAdapter(options: MarkdownPageAdapterOptions = {}): ProviderAdapter {
  const providerName = options.providerName ?? 'Mistral OCR';
  const includeFullResponse = options.includeFullResponse ?? true;

  return {
    providerName,
    api: API,
    extract(document: Document, payload: RawProviderPayload): ExtractionResult {
      const value = toJsonPayload(providerName, payload);
      const parsed = parsePayload(providerName, document, MarkdownPagesPayloadSchema, value);

      const pages: PageExtraction[] = parsed.pages
        .map((page, position) => ({
          pageIndex: (page.index ?? position) + 1,
          documents: [],
          text: pageSection(page),
        }))
        .sort((a, b) => a.pageIndex - b.pageIndex);

      return finalizeResult({
        providerName,
        api: API,
        pages,
        appendix: includeFullResponse ? JSON.stringify(value, null, 2) : undefined,
      });
    },
  };
}

export const markdownPageAdapter = createMarkdownPageAdapter();
