/**
 * Comparison prompts
 *
 * Builds the evaluation prompt from provider summaries, either as one
 * message or as an ordered list of segments for inputs too large for a
 * single turn. Summaries are embedded verbatim.
 *
 * @module services/llm/prompts
 */

export const SYSTEM_PROMPT = [
  'You are an expert in OCR technology evaluation.',
  'You will be given OCR results from different services for the same document.',
  'Your task is to compare these results and determine which service performed best.',
  'Provide a detailed analysis of the strengths and weaknesses of each OCR service.',
  'Format your response in markdown.',
].join('\n');

export const SECTION_SEPARATOR = '-'.repeat(50);

const EVALUATION_FACTORS = [
  'Text accuracy and correctness',
  'Formatting preservation',
  'Handling of special characters and symbols',
  'Recognition of tables and structured data',
  'Overall completeness of the extracted text',
  'Handling of multi-page documents (if applicable)',
];

const ANALYSIS_REQUEST = [
  'Please provide a comprehensive analysis of which OCR service performed best and why.',
  'Consider factors such as:',
  ...EVALUATION_FACTORS.map((factor, i) => `${i + 1}. ${factor}`),
  '',
  'For each service, identify specific strengths and weaknesses with examples from the results.',
  'Conclude with a recommendation of which service would be best for this type of document.',
].join('\n');

export interface ComparisonPrompt {
  system: string;
  user: string;
}

export interface PromptSegment {
  /** 1-based */
  index: number;
  total: number;
  content: string;
  instruction: string;
  final: boolean;
}

/**
 * "OCR Results Summary:" followed by one "- <provider>: <n> characters" line per provider
 */
export function summarizeInputs(summaries: Record<string, string>): string {
  let out = 'OCR Results Summary:\n';
  for (const [name, text] of Object.entries(summaries)) {
    out += `- ${name}: ${text.length} characters\n`;
  }
  return out;
}

/**
 * Labelled sections, one per provider, each followed by the separator rule
 */
export function formatSections(summaries: Record<string, string>): string {
  let out = '';
  for (const [name, text] of Object.entries(summaries)) {
    out += `\n\n### ${name} Results ###\n\n${text}\n\n${SECTION_SEPARATOR}\n\n`;
  }
  return out;
}

function preamble(summaries: Record<string, string>): string {
  return [
    'Compare the following OCR services based on their results:',
    '',
    summarizeInputs(summaries),
    "Below are the detailed OCR results from each service. Each service's results are clearly labeled.",
  ].join('\n');
}

export function buildComparisonPrompt(summaries: Record<string, string>): ComparisonPrompt {
  return {
    system: SYSTEM_PROMPT,
    user: [preamble(summaries), formatSections(summaries), ANALYSIS_REQUEST].join('\n'),
  };
}

/**
 * Pack whole lines into chunks of at most maxChars.
 * A single line longer than maxChars gets a chunk of its own.
 */
function packLines(text: string, maxChars: number): string[] {
  const lines = text.split(/(?<=\n)/);
  const chunks: string[] = [];
  let current = '';
  for (const line of lines) {
    if (current && current.length + line.length > maxChars) {
      chunks.push(current);
      current = '';
    }
    current += line;
  }
  if (current) chunks.push(current);
  return chunks;
}

function continueInstruction(index: number, total: number): string {
  return (
    `This is part ${index} of ${total} of the OCR results. ` +
    'Continue analysis: note what you observe about each service so far, ' +
    'but do not write the final comparison yet.'
  );
}

function finalInstruction(total: number): string {
  return `This is the final part (${total} of ${total}) of the OCR results.\n\n${ANALYSIS_REQUEST}`;
}

/**
 * Split the comparison input into ordered segments of at most segmentChars
 * of result text each. The first segment carries the preamble; every
 * segment but the last asks the model to continue, the last asks for the
 * report.
 */
export function buildPromptSegments(
  summaries: Record<string, string>,
  segmentChars: number
): PromptSegment[] {
  const chunks = packLines(formatSections(summaries), segmentChars);
  if (chunks.length === 0) chunks.push('');
  chunks[0] = `${preamble(summaries)}\n${chunks[0]}`;

  const total = chunks.length;
  return chunks.map((content, i) => {
    const index = i + 1;
    const final = index === total;
    return {
      index,
      total,
      content,
      instruction: final ? finalInstruction(total) : continueInstruction(index, total),
      final,
    };
  });
}

/**
 * Message text for one segment
 */
export function renderSegment(segment: PromptSegment): string {
  return `[Part ${segment.index}/${segment.total}]\n${segment.content}\n${segment.instruction}`;
}
