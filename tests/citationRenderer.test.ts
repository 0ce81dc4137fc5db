import { describe, expect, it } from 'vitest';
import { citationFor, excerpt, renderCitations, renderLine } from '../src/agents/citationRenderer';
import type { RankedChunk } from '../src/types';
import { makeChunk, makeSource } from './fixtures';

const RULE = '━'.repeat(48);

function ranked(id: string, rank: number, overrides: Partial<RankedChunk> = {}): RankedChunk {
  return { ...makeChunk(id, 0.87), rank, ...overrides };
}

describe('citationFor', () => {
  it('prefers the stored citation', () => {
    expect(citationFor(makeSource({ citation: '  Doe, J. (2020). Bail reform. ' }))).toBe('Doe, J. (2020). Bail reform.');
  });

  it('falls back to title and year, or n.d.', () => {
    expect(citationFor(makeSource())).toBe('Pretrial Detention and Recidivism (2020)');
    expect(citationFor(makeSource({ year: null }))).toBe('Pretrial Detention and Recidivism (n.d.)');
  });
});

describe('excerpt', () => {
  it('flattens whitespace', () => {
    expect(excerpt('cash  bail\n\tlaws')).toBe('cash bail laws');
  });

  it('cuts long text to the limit with an ellipsis', () => {
    const cut = excerpt('a'.repeat(250));
    expect(cut).toBe(`${'a'.repeat(199)}…`);
    expect(cut).toHaveLength(200);
  });
});

describe('renderCitations', () => {
  it('renders one line per chunk in rank order', () => {
    expect(renderLine(ranked('c1', 1), true)).toBe(
      '[1] Pretrial Detention and Recidivism (2020) | relevance 0.87 | "Passage c1 about bail reform outcomes."'
    );
    expect(renderLine(ranked('c1', 3), false)).toBe('[3] Pretrial Detention and Recidivism (2020) | relevance 0.87');
  });

  it('wraps the lines with header and footer', () => {
    expect(renderCitations([ranked('c1', 1)], false).split('\n')).toEqual([
      RULE,
      'CITATION RESULTS (1 citation)',
      RULE,
      '',
      '[1] Pretrial Detention and Recidivism (2020) | relevance 0.87',
      '',
      RULE,
      'Generated by Citeline API',
      RULE
    ]);
  });

  it('says so when there is nothing to render', () => {
    expect(renderCitations([], true)).toBe('No citations found.');
  });
});
