/**
 * Provider agreement
 *
 * Line-level diff between provider summaries, computed locally with jsdiff.
 * Gives the comparison report a model-independent measure of how far the
 * providers agree.
 */

import { diffLines } from 'diff';
import type { PairwiseAgreement } from '../../models/comparison.js';

/**
 * Compare two summaries line by line
 *
 * @returns counts in lines; similarityRatio = 2 * unchanged chars / total chars
 */
export function compareText(
  left: string,
  right: string
): Omit<PairwiseAgreement, 'left' | 'right'> {
  const changes = diffLines(left, right);

  let insertions = 0;
  let deletions = 0;
  let unchanged = 0;
  let unchangedChars = 0;

  for (const change of changes) {
    const lines = change.count ?? 0;
    if (change.added) {
      insertions += lines;
    } else if (change.removed) {
      deletions += lines;
    } else {
      unchanged += lines;
      unchangedChars += change.value.length;
    }
  }

  const totalChars = left.length + right.length;
  const similarityRatio = totalChars === 0 ? 1.0 : (2 * unchangedChars) / totalChars;

  return {
    similarityRatio: Math.round(similarityRatio * 10000) / 10000,
    insertions,
    deletions,
    unchanged,
  };
}

/**
 * Every unordered pair of providers, in the summaries' insertion order
 */
export function computeAgreement(summaries: Record<string, string>): PairwiseAgreement[] {
  const names = Object.keys(summaries);
  const pairs: PairwiseAgreement[] = [];
  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      pairs.push({
        left: names[i],
        right: names[j],
        ...compareText(summaries[names[i]], summaries[names[j]]),
      });
    }
  }
  return pairs;
}

/**
 * One line per pair, e.g. "AWS Textract vs Mistral OCR: 42% similar (3 added, 5 removed, 10 unchanged lines)"
 */
export function summarizeAgreement(agreement: readonly PairwiseAgreement[]): string {
  return agreement
    .map(
      (a) =>
        `${a.left} vs ${a.right}: ${Math.round(a.similarityRatio * 100)}% similar ` +
        `(${a.insertions} added, ${a.deletions} removed, ${a.unchanged} unchanged lines)`
    )
    .join('\n');
}
