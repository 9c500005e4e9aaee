/**
 * Expense adapter (AWS Textract AnalyzeExpense)
 *
 * Reads ExpenseDocuments[].SummaryFields[] and
 * LineItemGroups[].LineItems[].LineItemExpenseFields[], each field shaped
 * {Type: {Text}, ValueDetection: {Text}}. One DocumentExtraction per
 * expense document, in source order, on a single page.
 */

import { z } from 'zod';
import type { Document } from '../../../models/document.js';
import type {
  DocumentExtraction,
  ExtractionResult,
  FieldPair,
  RawProviderPayload,
} from '../../../models/extraction.js';
import { finalizeResult } from '../formatter.js';
import { lenientText, parsePayload, type ProviderAdapter } from './types.js';

export const UNKNOWN_FIELD_TYPE = 'Unknown';
export const MISSING_FIELD_VALUE = 'N/A';

const TextHolderSchema = z.object({ Text: lenientText }).optional().catch(undefined);

const ExpenseFieldSchema = z.object({
  Type: TextHolderSchema,
  ValueDetection: TextHolderSchema,
});

const LineItemSchema = z.object({
  LineItemExpenseFields: z.array(ExpenseFieldSchema).optional(),
});

const LineItemGroupSchema = z.object({
  LineItems: z.array(LineItemSchema).optional(),
});

const ExpenseDocumentSchema = z.object({
  SummaryFields: z.array(ExpenseFieldSchema).optional(),
  LineItemGroups: z.array(LineItemGroupSchema).optional(),
});

export const AnalyzeExpensePayloadSchema = z.object({
  ExpenseDocuments: z.array(ExpenseDocumentSchema),
});

type ExpenseField = z.infer<typeof ExpenseFieldSchema>;
type ExpenseDocument = z.infer<typeof ExpenseDocumentSchema>;

function toFieldPair(field: ExpenseField): FieldPair {
  return {
    fieldType: field.Type?.Text ?? UNKNOWN_FIELD_TYPE,
    fieldValue: field.ValueDetection?.Text ?? MISSING_FIELD_VALUE,
  };
}

function toDocumentExtraction(doc: ExpenseDocument): DocumentExtraction {
  return {
    listsSummaryFields: doc.SummaryFields !== undefined,
    summaryFields: (doc.SummaryFields ?? []).map(toFieldPair),
    lineItemGroups: (doc.LineItemGroups ?? []).map((group) =>
      (group.LineItems ?? []).map((item) => (item.LineItemExpenseFields ?? []).map(toFieldPair))
    ),
  };
}

const API = 'AnalyzeExpense';

export function createExpenseAdapter(providerName: string = 'AWS Textract'): ProviderAdapter {
  return {
    providerName,
    api: API,
    extract(document: Document, payload: RawProviderPayload): ExtractionResult {
      const parsed = parsePayload(providerName, document, AnalyzeExpensePayloadSchema, payload);
      return finalizeResult({
        providerName,
        api: API,
        pages: [
          {
            pageIndex: 1,
            documents: parsed.ExpenseDocuments.map(toDocumentExtraction),
            text: '',
          },
        ],
      });
    },
  };
}

export const expenseAdapter = createExpenseAdapter();
