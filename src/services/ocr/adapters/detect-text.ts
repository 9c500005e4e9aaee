/**
 * Plain-text adapter (AWS Textract DetectDocumentText)
 *
 * Used when structured extraction is unavailable or failed. Concatenates
 * the Text of every LINE block, in block order, one line per block.
 * Blocks carrying a Page number are grouped per page; blocks without one
 * belong to page 1.
 */

import { z } from 'zod';
import type { Document } from '../../../models/document.js';
import type {
  ExtractionResult,
  PageExtraction,
  RawProviderPayload,
} from '../../../models/extraction.js';
import { finalizeResult } from '../formatter.js';
import { lenientNumber, lenientText, parsePayload, type ProviderAdapter } from './types.js';

const BlockSchema = z.object({
  BlockType: lenientText,
  Text: lenientText,
  Page: lenientNumber,
});

export const DetectTextPayloadSchema = z.object({
  Blocks: z.array(BlockSchema),
});

type Block = z.infer<typeof BlockSchema>;

const TEXT_LABEL = 'Extracted Text';

export function linesToPages(blocks: Block[]): PageExtraction[] {
  const textByPage = new Map<number, string>();
  for (const block of blocks) {
    if (block.BlockType !== 'LINE') continue;
    const page = block.Page ?? 1;
    textByPage.set(page, (textByPage.get(page) ?? '') + (block.Text ?? '') + '\n');
  }
  if (textByPage.size === 0) {
    return [{ pageIndex: 1, documents: [], text: '', textLabel: TEXT_LABEL }];
  }
  return [...textByPage.entries()]
    .sort(([a], [b]) => a - b)
    .map(([pageIndex, text]) => ({ pageIndex, documents: [], text, textLabel: TEXT_LABEL }));
}

const API = 'DetectDocumentText';

export function createDetectTextAdapter(providerName: string = 'AWS Textract'): ProviderAdapter {
  return {
    providerName,
    api: API,
    extract(document: Document, payload: RawProviderPayload): ExtractionResult {
      const parsed = parsePayload(providerName, document, DetectTextPayloadSchema, payload);
      return finalizeResult({
        providerName,
        api: API,
        pages: linesToPages(parsed.Blocks),
      });
    },
  };
}

export const detectTextAdapter = createDetectTextAdapter();
