/**
 * Prompt construction for eligibility reasoning
 *
 * The same inputs always produce the same prompt: context chunks keep their
 * ranked order and facts are listed by key.
 */

import type { LLMMessage } from '../llm/LLMProvider.js';
import type { ContextChunk, FactMap, RuleEvaluationResult } from '../../domain/eligibility/types.js';
import { formatFactValue } from '../retrieval/ContextRetriever.js';

export interface ReasoningPrompt {
  messages: LLMMessage[];
  /** Messages rendered as one text, stored on the reasoning log */
  text: string;
}

export const NO_CONTEXT_NOTICE = 'No relevant regulatory context was found.';

const SYSTEM_PROMPT = `You are an immigration eligibility analyst. Assess whether the case meets the requirements of the visa type, using only the case facts, the rule evaluation and the regulatory context provided.
Cite the context you rely on with [1], [2], etc. at the end of the relevant sentences. Do not cite anything else.
If the information is insufficient, say so and choose requires_review.

End your answer with exactly these two lines:
OUTCOME: eligible | not_eligible | requires_review
CONFIDENCE: a number between 0 and 1`;

function renderFacts(facts: FactMap): string {
  const keys = [...facts.keys()].sort();
  if (keys.length === 0) {
    return '- (no facts recorded)';
  }
  return keys
    .map(key => {
      const value = facts.get(key);
      return `- ${key}: ${value === undefined ? '' : formatFactValue(value)}`;
    })
    .join('\n');
}

function renderRuleResult(ruleResult: RuleEvaluationResult): string {
  const lines = [
    `- Outcome: ${ruleResult.outcome}`,
    `- Confidence: ${Math.round(ruleResult.confidence * 100)}%`,
    `- Requirements passed: ${ruleResult.passed} of ${ruleResult.total} evaluable`,
  ];
  if (ruleResult.missingFacts.length > 0) {
    lines.push(`- Missing facts: ${ruleResult.missingFacts.join(', ')}`);
  }
  if (ruleResult.evaluations.length > 0) {
    lines.push('- Requirement results:');
    for (const evaluation of ruleResult.evaluations) {
      lines.push(`  - ${evaluation.code} (${evaluation.mandatory ? 'mandatory' : 'optional'}): ${evaluation.status}`);
    }
  }
  return lines.join('\n');
}

function renderContext(contextChunks: ContextChunk[]): string {
  if (contextChunks.length === 0) {
    return NO_CONTEXT_NOTICE;
  }
  return contextChunks
    .map(
      (chunk, index) =>
        `[${index + 1}] Document ${chunk.documentVersionId} (similarity ${chunk.similarity.toFixed(2)})\n${chunk.text}`
    )
    .join('\n\n---\n\n');
}

/**
 * Build the system and user messages for one eligibility assessment
 */
export function constructPrompt(
  contextChunks: ContextChunk[],
  ruleResult: RuleEvaluationResult,
  facts: FactMap,
  visaCode: string
): ReasoningPrompt {
  const userPrompt = `Visa type: ${visaCode}

Case facts:
${renderFacts(facts)}

Rule evaluation:
${renderRuleResult(ruleResult)}

Regulatory context:
${renderContext(contextChunks)}

Assess whether the case is eligible for this visa type. Explain which requirements are met and which are not, citing the context with [1], [2], etc. where relevant.`;

  const messages: LLMMessage[] = [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: userPrompt },
  ];

  return {
    messages,
    text: messages.map(message => `${message.role.toUpperCase()}:\n${message.content}`).join('\n\n'),
  };
}
