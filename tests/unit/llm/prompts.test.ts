/**
 * Comparison Prompt Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  SECTION_SEPARATOR,
  SYSTEM_PROMPT,
  buildComparisonPrompt,
  buildPromptSegments,
  formatSections,
  renderSegment,
  summarizeInputs,
} from '../../../src/services/llm/prompts.js';

const summaries = {
  'AWS Textract': 'AWS Textract Analysis Summary (AnalyzeExpense):\n\n--- PAGE 1 ---\nTOTAL: 42.00\n',
  'Mistral OCR': '# Invoice\n\nTotal: 42.00\n',
};

describe('summarizeInputs', () => {
  it('lists each provider with its character count', () => {
    expect(summarizeInputs({ A: 'abc', B: '' })).toBe(
      'OCR Results Summary:\n- A: 3 characters\n- B: 0 characters\n'
    );
  });
});

describe('formatSections', () => {
  it('labels each result and closes it with the separator', () => {
    expect(formatSections({ A: 'x' })).toBe(`\n\n### A Results ###\n\nx\n\n${SECTION_SEPARATOR}\n\n`);
    expect(SECTION_SEPARATOR).toBe('-'.repeat(50));
  });
});

describe('buildComparisonPrompt', () => {
  const prompt = buildComparisonPrompt(summaries);

  it('uses the evaluator system prompt', () => {
    expect(prompt.system).toBe(SYSTEM_PROMPT);
    expect(prompt.system.split('\n')).toHaveLength(5);
  });

  it('opens with the input summary', () => {
    expect(
      prompt.user.startsWith(
        'Compare the following OCR services based on their results:\n\n' +
          'OCR Results Summary:\n' +
          `- AWS Textract: ${summaries['AWS Textract'].length} characters\n` +
          `- Mistral OCR: ${summaries['Mistral OCR'].length} characters\n`
      )
    ).toBe(true);
  });

  it('embeds every summary verbatim, in order', () => {
    const sections = formatSections(summaries);
    expect(prompt.user).toContain(sections);
    expect(prompt.user.indexOf('### AWS Textract Results ###')).toBeLessThan(
      prompt.user.indexOf('### Mistral OCR Results ###')
    );
  });

  it('ends with the analysis request', () => {
    expect(prompt.user).toContain('6. Handling of multi-page documents (if applicable)');
    expect(
      prompt.user.endsWith(
        'Conclude with a recommendation of which service would be best for this type of document.'
      )
    ).toBe(true);
  });
});

describe('buildPromptSegments', () => {
  it('returns a single final segment for small inputs', () => {
    const segments = buildPromptSegments(summaries, 12_000);

    expect(segments).toHaveLength(1);
    expect(segments[0]).toMatchObject({ index: 1, total: 1, final: true });
    expect(segments[0].content.startsWith('Compare the following OCR services')).toBe(true);
    expect(segments[0].instruction.startsWith('This is the final part (1 of 1) of the OCR results.')).toBe(true);
  });

  it('splits on line boundaries and keeps every character', () => {
    const long = { A: 'line of result text\n'.repeat(200), B: 'other provider text\n'.repeat(200) };
    const segments = buildPromptSegments(long, 1000);
    const sections = formatSections(long);

    expect(segments.length).toBeGreaterThan(1);
    expect(segments.map((s) => s.content).join('').endsWith(sections)).toBe(true);
    for (const segment of segments.slice(1)) {
      expect(segment.content.length).toBeLessThanOrEqual(1000);
    }
  });

  it('asks to continue on every segment but the last', () => {
    const long = { A: 'row\n'.repeat(1000) };
    const segments = buildPromptSegments(long, 1000);
    const total = segments.length;

    segments.slice(0, -1).forEach((segment, i) => {
      expect(segment.final).toBe(false);
      expect(segment.index).toBe(i + 1);
      expect(segment.total).toBe(total);
      expect(segment.instruction).toContain(`This is part ${i + 1} of ${total}`);
      expect(segment.instruction).toContain('do not write the final comparison yet');
    });
    const last = segments[total - 1];
    expect(last.final).toBe(true);
    expect(last.instruction).toContain(`This is the final part (${total} of ${total})`);
    expect(last.instruction).toContain('Please provide a comprehensive analysis');
  });

  it('gives an overlong line a segment of its own', () => {
    const line = 'x'.repeat(1500);
    const segments = buildPromptSegments({ A: `short\n${line}\nshort\n` }, 1000);

    expect(segments.some((s) => s.content === `${line}\n`)).toBe(true);
  });
});

describe('renderSegment', () => {
  it('prefixes the part number and appends the instruction', () => {
    expect(
      renderSegment({ index: 2, total: 3, content: 'body\n', instruction: 'Continue.', final: false })
    ).toBe('[Part 2/3]\nbody\n\nContinue.');
  });
});
