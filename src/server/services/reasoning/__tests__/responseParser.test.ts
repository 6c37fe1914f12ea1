import { describe, it, expect } from 'vitest';
import {
  CITATION_EXCERPT_LENGTH,
  extractCitations,
  extractConfidence,
  extractOutcome,
  parseVerdict,
} from '../responseParser.js';
import { buildChunk } from '../../mocks/fixtures.js';

describe('extractOutcome', () => {
  it('reads the OUTCOME marker', () => {
    expect(extractOutcome('The salary requirement is met [1].\nOUTCOME: eligible\nCONFIDENCE: 0.85')).toBe('eligible');
  });

  it('uses the last marker when several are present', () => {
    const text = 'Draft:\nOUTCOME: eligible\n\nOn reflection the sponsor is not licensed.\nOUTCOME: not_eligible';
    expect(extractOutcome(text)).toBe('not_eligible');
  });

  it('accepts spelled-out and likelihood labels', () => {
    expect(extractOutcome('OUTCOME: Not Eligible')).toBe('not_eligible');
    expect(extractOutcome('OUTCOME: likely')).toBe('eligible');
    expect(extractOutcome('OUTCOME: possible')).toBe('requires_review');
  });

  it('accepts markdown emphasis around the marker', () => {
    expect(extractOutcome('**OUTCOME:** requires_review')).toBe('requires_review');
  });

  it('does not infer an outcome from free text', () => {
    expect(extractOutcome('The applicant is likely eligible for this visa.')).toBe('unknown');
    expect(extractOutcome('OUTCOME: maybe')).toBe('unknown');
  });
});

describe('extractConfidence', () => {
  it('reads decimal values', () => {
    expect(extractConfidence('OUTCOME: eligible\nCONFIDENCE: 0.85')).toBe(0.85);
    expect(extractConfidence('CONFIDENCE: 1')).toBe(1);
    expect(extractConfidence('CONFIDENCE: 0')).toBe(0);
  });

  it('reads percentages', () => {
    expect(extractConfidence('CONFIDENCE: 85%')).toBe(0.85);
    expect(extractConfidence('CONFIDENCE: 72.5 %')).toBe(0.725);
  });

  it('does not read bare values above 1 as percentages', () => {
    expect(extractConfidence('OUTCOME: likely\nCONFIDENCE: 1.5')).toBe('unknown');
    expect(extractConfidence('CONFIDENCE: 5')).toBe('unknown');
    expect(extractConfidence('CONFIDENCE: 72')).toBe('unknown');
  });

  it('treats out-of-range and non-numeric values as unknown', () => {
    expect(extractConfidence('CONFIDENCE: 150%')).toBe('unknown');
    expect(extractConfidence('CONFIDENCE: -0.2')).toBe('unknown');
    expect(extractConfidence('CONFIDENCE: high')).toBe('unknown');
    expect(extractConfidence('No marker at all')).toBe('unknown');
  });
});

describe('parseVerdict', () => {
  it('reports each unparsable field', () => {
    const verdict = parseVerdict('I cannot tell from the information given.');

    expect(verdict.outcome).toBe('unknown');
    expect(verdict.confidence).toBe('unknown');
    expect(verdict.warnings.map(warning => warning.field)).toEqual(['outcome', 'confidence']);
  });

  it('has no warnings for a complete answer', () => {
    const verdict = parseVerdict('OUTCOME: not_eligible\nCONFIDENCE: 0.7');
    expect(verdict).toEqual({ outcome: 'not_eligible', confidence: 0.7, warnings: [] });
  });
});

describe('extractCitations', () => {
  const chunks = [
    buildChunk({ chunkId: 'c1', documentVersionId: 'docv-1', similarity: 0.91 }),
    buildChunk({ chunkId: 'c2', documentVersionId: 'docv-2', similarity: 0.84 }),
    buildChunk({ chunkId: 'c3', documentVersionId: 'docv-3', similarity: 0.77, text: 'x'.repeat(800) }),
  ];

  it('maps markers to context chunks once each, in order of first citation', () => {
    const citations = extractCitations('Salary is sufficient [3]. Sponsor is licensed [1]. See again [3].', chunks);

    expect(citations.map(citation => citation.documentVersionId)).toEqual(['docv-3', 'docv-1']);
    expect(citations[0]?.relevanceScore).toBe(0.77);
    expect(citations[0]?.excerpt).toHaveLength(CITATION_EXCERPT_LENGTH);
    expect(citations[1]?.excerpt).toBe(chunks[0]?.text);
  });

  it('cuts excerpts on code point boundaries', () => {
    const text = 'a' + '\u{1F4C4}'.repeat(CITATION_EXCERPT_LENGTH);
    const [citation] = extractCitations('See [1].', [buildChunk({ text })]);

    expect(Array.from(citation?.excerpt ?? '')).toHaveLength(CITATION_EXCERPT_LENGTH);
    expect(citation?.excerpt.endsWith('\u{1F4C4}')).toBe(true);
    expect(citation?.excerpt).toHaveLength(1 + 2 * (CITATION_EXCERPT_LENGTH - 1));
  });

  it('ignores out-of-range markers', () => {
    expect(extractCitations('See [0] and [4].', chunks)).toEqual([]);
  });
});
