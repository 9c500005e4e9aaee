/**
 * Comparison interfaces
 *
 * Output of the LLM comparison step and the line-level agreement figures
 * computed between provider summaries. Pure types - no logic.
 */

/**
 * Line-level similarity between two provider summaries
 */
export interface PairwiseAgreement {
  left: string;
  right: string;
  /** 2 * unchanged chars / total chars, 0..1 (1 for two empty texts) */
  similarityRatio: number;
  /** Line counts */
  insertions: number;
  deletions: number;
  unchanged: number;
}

export interface ComparisonReport {
  /** Model label as chosen by the caller, e.g. 'OpenAI GPT-4o' */
  modelName: string;

  bodyMarkdown: string;

  /** Characters of provider output sent to the model */
  inputCharacters: number;

  /** Number of prompt segments the input was split into (1 when unsegmented) */
  segments: number;

  agreement: PairwiseAgreement[];
}
