/**
 * Pass-through adapter (Landing AI)
 *
 * No structural decomposition: the whole payload, pretty-printed, is both
 * the single page's text and the summary.
 */

import type { Document } from '../../../models/document.js';
import type { ExtractionResult, RawProviderPayload } from '../../../models/extraction.js';
import { finalizeResult } from '../formatter.js';
import { toJsonPayload, type ProviderAdapter } from './types.js';

const API = 'Agentic Document Analysis';

export function createPassThroughAdapter(providerName: string = 'Landing AI'): ProviderAdapter {
  return {
    providerName,
    api: API,
    extract(_document: Document, payload: RawProviderPayload): ExtractionResult {
      const text = JSON.stringify(toJsonPayload(providerName, payload), null, 2);
      return finalizeResult({
        providerName,
        api: API,
        opaque: true,
        pages: [{ pageIndex: 1, documents: [], text }],
      });
    },
  };
}

export const passThroughAdapter = createPassThroughAdapter();
