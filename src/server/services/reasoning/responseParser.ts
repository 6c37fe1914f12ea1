/**
 * Model response parsing
 *
 * Reads the verdict from explicit `OUTCOME:` and `CONFIDENCE:` markers and the
 * cited context from `[n]` markers. Nothing is inferred from free text: a field
 * without a usable marker is 'unknown'.
 */

import type { Citation, ContextChunk, EligibilityOutcome } from '../../domain/eligibility/types.js';
import { ParseFailure } from '../../types/errors.js';

export type ParsedOutcome = EligibilityOutcome | 'unknown';
export type ParsedConfidence = number | 'unknown';

/** Excerpt length in code points */
export const CITATION_EXCERPT_LENGTH = 500;

const OUTCOME_SYNONYMS: Record<string, EligibilityOutcome> = {
  eligible: 'eligible',
  likely: 'eligible',
  not_eligible: 'not_eligible',
  'not eligible': 'not_eligible',
  ineligible: 'not_eligible',
  unlikely: 'not_eligible',
  requires_review: 'requires_review',
  'requires review': 'requires_review',
  possible: 'requires_review',
};

const OUTCOME_MARKER = /^\s*\**\s*OUTCOME\s*\**\s*:\s*\**\s*([A-Za-z_ ]+?)\s*\**\s*\.?\s*$/gim;
const CONFIDENCE_MARKER = /^\s*\**\s*CONFIDENCE\s*\**\s*:\s*\**\s*(-?\d+(?:\.\d+)?)\s*(%?)\s*\**\s*\.?\s*$/gim;

function lastMatch(pattern: RegExp, text: string): RegExpExecArray | undefined {
  let last: RegExpExecArray | undefined;
  for (const match of text.matchAll(pattern)) {
    last = match;
  }
  return last;
}

/**
 * Outcome from the last OUTCOME marker
 */
export function extractOutcome(text: string): ParsedOutcome {
  const match = lastMatch(OUTCOME_MARKER, text);
  const label = match?.[1]?.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!label) {
    return 'unknown';
  }
  return OUTCOME_SYNONYMS[label] ?? OUTCOME_SYNONYMS[label.replace(/ /g, '_')] ?? 'unknown';
}

/**
 * Confidence from the last CONFIDENCE marker. Only a value with an explicit `%`
 * is read as a percentage; any other value outside [0, 1] is 'unknown'.
 */
export function extractConfidence(text: string): ParsedConfidence {
  const match = lastMatch(CONFIDENCE_MARKER, text);
  const raw = match?.[1];
  if (raw === undefined) {
    return 'unknown';
  }

  let value = parseFloat(raw);
  if (match?.[2] === '%') {
    value = value / 100;
  }
  return Number.isFinite(value) && value >= 0 && value <= 1 ? value : 'unknown';
}

export interface ParsedVerdict {
  outcome: ParsedOutcome;
  confidence: ParsedConfidence;
  warnings: ParseFailure[];
}

/**
 * Parse both markers, reporting each unparsable field as a ParseFailure
 */
export function parseVerdict(text: string): ParsedVerdict {
  const outcome = extractOutcome(text);
  const confidence = extractConfidence(text);
  const warnings: ParseFailure[] = [];
  if (outcome === 'unknown') {
    warnings.push(new ParseFailure('outcome', 'Model response has no recognizable OUTCOME marker'));
  }
  if (confidence === 'unknown') {
    warnings.push(new ParseFailure('confidence', 'Model response has no CONFIDENCE marker within [0, 1]'));
  }
  return { outcome, confidence, warnings };
}

export type ExtractedCitation = Omit<Citation, 'reasoningLogId'>;

/**
 * Citations for the `[n]` markers in the text, where n is the 1-based index of a
 * context chunk. Repeated markers cite once; out-of-range markers are ignored.
 */
export function extractCitations(text: string, contextChunks: ContextChunk[]): ExtractedCitation[] {
  const cited = new Set<number>();
  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    const index = parseInt(match[1] ?? '', 10);
    if (index >= 1 && index <= contextChunks.length) {
      cited.add(index);
    }
  }

  const citations: ExtractedCitation[] = [];
  for (const index of cited) {
    const chunk = contextChunks[index - 1];
    if (chunk) {
      citations.push({
        documentVersionId: chunk.documentVersionId,
        excerpt: Array.from(chunk.text).slice(0, CITATION_EXCERPT_LENGTH).join(''),
        relevanceScore: chunk.similarity,
      });
    }
  }
  return citations;
}
