/**
 * Canonical extraction model
 *
 * Every provider adapter converges on ExtractionResult, whatever the shape
 * of the vendor payload it started from. Pure types - no logic.
 */

/**
 * JSON data as produced by JSON.parse
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Untouched vendor response: parsed JSON, or the response body as text
 */
export type RawProviderPayload = JsonValue | string;

/**
 * A (type, value) pair from an expense-style document
 */
export interface FieldPair {
  fieldType: string;
  fieldValue: string;
}

/** Fields of one line item */
export type LineItem = FieldPair[];

/** Ordered line items of one group */
export type LineItemGroup = LineItem[];

export interface DocumentExtraction {
  summaryFields: FieldPair[];
  lineItemGroups: LineItemGroup[];

  /** The vendor sent a SummaryFields list, possibly empty */
  listsSummaryFields?: boolean;
}

export interface PageExtraction {
  /** 1-based page number */
  pageIndex: number;

  /** Expense-style documents found on the page (empty for text providers) */
  documents: DocumentExtraction[];

  /** Free-form extracted text ('' when the provider returns none) */
  text: string;

  /** Heading printed above the text, even when it is empty */
  textLabel?: string;
}

/**
 * Set when the plain-text fallback replaced a failed per-page run
 */
export interface FallbackRecord {
  /** Message of the error that aborted the per-page run */
  reason: string;

  /** Per-page results that had completed and were dropped */
  discardedPages: number;
}

export interface ExtractionResult {
  providerName: string;

  /** Vendor API that produced the result, e.g. 'AnalyzeExpense' */
  api: string;

  /** Ordered by pageIndex ascending */
  pages: PageExtraction[];

  /** Human-readable summary; also the unit fed to the comparison step */
  rawSummaryText: string;

  /** Pass-through result: the summary is the serialized payload itself */
  opaque?: boolean;

  /** Trailing material rendered after the pages (e.g. the full vendor JSON) */
  appendix?: string;

  fallback?: FallbackRecord;
}
