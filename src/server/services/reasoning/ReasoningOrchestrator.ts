/**
 * Reasoning Orchestrator
 *
 * Runs the retrieval-augmented assessment of one case: retrieve regulatory
 * context, prompt the language model, parse its verdict and citations.
 *
 * Failures on this path never propagate. Any embedding, retrieval or model
 * failure yields an 'unavailable' result naming the failed stage, and the
 * caller falls back to the rule verdict.
 */

import type { LLMProvider } from '../llm/LLMProvider.js';
import type { ContextRetriever } from '../retrieval/ContextRetriever.js';
import { DEFAULT_REASONING_SETTINGS, type ReasoningSettings } from '../../config/eligibility.js';
import type {
  ContextChunk,
  FactMap,
  RuleEvaluationResult,
  TokenUsage,
} from '../../domain/eligibility/types.js';
import { constructPrompt, type ReasoningPrompt } from './promptBuilder.js';
import {
  extractCitations,
  parseVerdict,
  type ExtractedCitation,
  type ParsedConfidence,
  type ParsedOutcome,
} from './responseParser.js';
import { AIReasoningFailure, ModelFailure, type AIFailureKind } from '../../types/errors.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { aiReasoningTotal, llmCallDuration, llmCalls } from '../../utils/metrics.js';
import { createChildLogger } from '../../utils/logger.js';

const log = createChildLogger({ component: 'ReasoningOrchestrator' });

export interface ReasoningInput {
  caseId: string;
  facts: FactMap;
  ruleResult: RuleEvaluationResult;
  visaCode: string;
  jurisdiction?: string;
}

export interface ModelCallResult {
  responseText: string;
  modelName: string;
  tokenUsage?: TokenUsage;
}

export interface CompletedReasoning {
  status: 'completed';
  outcome: ParsedOutcome;
  confidence: ParsedConfidence;
  /** Whether the confidence was lowered because no context was retrieved */
  confidenceCapped: boolean;
  prompt: ReasoningPrompt;
  response: ModelCallResult;
  contextChunks: ContextChunk[];
  citations: ExtractedCitation[];
  warnings: string[];
}

export interface UnavailableReasoning {
  status: 'unavailable';
  failure: AIFailureKind;
  error: string;
}

export type ReasoningResult = CompletedReasoning | UnavailableReasoning;

export class ReasoningOrchestrator {
  private readonly settings: ReasoningSettings;

  constructor(
    private readonly retriever: ContextRetriever,
    private readonly llm: LLMProvider,
    settings: Partial<ReasoningSettings> = {}
  ) {
    this.settings = { ...DEFAULT_REASONING_SETTINGS, ...settings };
  }

  /**
   * Build the prompt for one assessment
   */
  constructPrompt(
    contextChunks: ContextChunk[],
    ruleResult: RuleEvaluationResult,
    facts: FactMap,
    visaCode: string
  ): ReasoningPrompt {
    return constructPrompt(contextChunks, ruleResult, facts, visaCode);
  }

  /**
   * Call the model at the configured temperature, with timeout and bounded retries
   * @throws {ModelFailure} When the call fails after retries or is not retryable
   */
  async callModel(prompt: ReasoningPrompt): Promise<ModelCallResult> {
    const { timeoutMs, retry } = this.settings.model;
    const provider = this.llm.getName();
    const startTime = Date.now();

    try {
      const response = await retryWithBackoff(
        () =>
          withTimeout(
            this.llm.generate(prompt.messages, {
              temperature: this.settings.temperature,
              max_tokens: this.settings.maxTokens,
            }),
            timeoutMs,
            'Model completion'
          ),
        retry,
        'model-completion'
      );

      llmCalls.inc({ provider, model: response.model, status: 'success' });
      llmCallDuration.observe({ provider, model: response.model }, (Date.now() - startTime) / 1000);
      return { responseText: response.content, modelName: response.model, tokenUsage: response.usage };
    } catch (error) {
      llmCalls.inc({ provider, model: 'unknown', status: 'error' });
      throw new ModelFailure(
        `Model completion failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  /**
   * Retrieve context, call the model and parse the answer
   */
  async reason(input: ReasoningInput): Promise<ReasoningResult> {
    try {
      const { chunks } = await this.retriever.retrieve(input.facts, {
        visaCode: input.visaCode,
        jurisdiction: input.jurisdiction,
      });
      const prompt = this.constructPrompt(chunks, input.ruleResult, input.facts, input.visaCode);
      const response = await this.callModel(prompt);

      const verdict = parseVerdict(response.responseText);
      const warnings = verdict.warnings.map(warning => warning.message);
      let confidence = verdict.confidence;
      let confidenceCapped = false;
      if (chunks.length === 0 && typeof confidence === 'number' && confidence > this.settings.noContextConfidenceCap) {
        confidence = this.settings.noContextConfidenceCap;
        confidenceCapped = true;
        warnings.push(`AI confidence capped at ${this.settings.noContextConfidenceCap} because no regulatory context was found`);
      }

      if (verdict.warnings.length > 0) {
        log.warn(
          { caseId: input.caseId, fields: verdict.warnings.map(warning => warning.field) },
          'Model response could not be fully parsed'
        );
      }
      aiReasoningTotal.inc({ status: 'completed', failure: 'none' });

      return {
        status: 'completed',
        outcome: verdict.outcome,
        confidence,
        confidenceCapped,
        prompt,
        response,
        contextChunks: chunks,
        citations: extractCitations(response.responseText, chunks),
        warnings,
      };
    } catch (error) {
      if (error instanceof AIReasoningFailure) {
        log.warn(
          { caseId: input.caseId, failure: error.kind, error: error.message },
          'AI reasoning unavailable, falling back to rule evaluation'
        );
        aiReasoningTotal.inc({ status: 'unavailable', failure: error.kind });
        return { status: 'unavailable', failure: error.kind, error: error.message };
      }
      throw error;
    }
  }
}
