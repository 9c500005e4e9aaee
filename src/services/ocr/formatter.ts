/**
 * Result Formatter
 *
 * Renders an ExtractionResult as the text shown to the operator and fed,
 * verbatim, to the comparison step. Output depends only on the data:
 * no timestamps, and pages, documents and fields keep their order.
 *
 * Layout:
 *
 *   <provider> Analysis Summary (<api>):
 *
 *   --- PAGE 1 ---
 *   Document 1:
 *     Summary Fields:
 *       VENDOR_NAME: Acme
 *     Line Item Group 1:
 *       Item 1:
 *         ITEM: Widget
 *   <text label>:
 *   <page text>
 *
 * @module services/ocr/formatter
 */

import type {
  DocumentExtraction,
  ExtractionResult,
  FieldPair,
  PageExtraction,
} from '../../models/extraction.js';

/** Everything the formatter reads; rawSummaryText is its output */
export type FormattableResult = Omit<ExtractionResult, 'rawSummaryText'>;

function fieldLine(field: FieldPair, indent: string): string {
  return `${indent}${field.fieldType}: ${field.fieldValue}\n`;
}

function formatDocument(doc: DocumentExtraction, position: number): string {
  let out = `Document ${position}:\n`;

  if (doc.listsSummaryFields || doc.summaryFields.length > 0) {
    out += '  Summary Fields:\n';
    for (const field of doc.summaryFields) {
      out += fieldLine(field, '    ');
    }
  }

  doc.lineItemGroups.forEach((group, g) => {
    out += `  Line Item Group ${g + 1}:\n`;
    group.forEach((item, i) => {
      out += `    Item ${i + 1}:\n`;
      for (const field of item) {
        out += fieldLine(field, '      ');
      }
    });
  });

  return out;
}

function formatPage(page: PageExtraction): string {
  let out = `--- PAGE ${page.pageIndex} ---\n`;
  page.documents.forEach((doc, d) => {
    out += formatDocument(doc, d + 1);
  });
  if (page.textLabel !== undefined) {
    out += `${page.textLabel}:\n`;
  }
  if (page.text) {
    out += page.text.endsWith('\n') ? page.text : `${page.text}\n`;
  }
  return out;
}

export function formatResult(result: FormattableResult): string {
  if (result.opaque) {
    return result.pages.map((page) => page.text).join('\n');
  }

  let out = `${result.providerName} Analysis Summary (${result.api}):\n\n`;
  for (const page of result.pages) {
    out += formatPage(page);
  }
  if (result.appendix) {
    out += `\nFull Response:\n${result.appendix}`;
  }
  return out;
}

/**
 * Attach the rendered summary to a result
 */
export function finalizeResult(result: FormattableResult): ExtractionResult {
  return { ...result, rawSummaryText: formatResult(result) };
}
