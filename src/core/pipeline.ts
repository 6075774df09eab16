/**
 * Question → normalize → prompt → Gemini → answer
 *
 * The pipeline only reads the configuration it was built with, so one
 * instance can serve concurrent requests.
 */

import { normalizeQuestion } from './normalize.js';
import { buildPrompt } from './prompt.js';
import { callGemini, type FetchLike } from './gemini.js';
import { extractAnswer } from './extract.js';
import {
  ValidationError,
  type AskOptions,
  type GeminiConfig,
  type NormalizationPolicy,
  type QAPipeline,
  type QAResult,
} from '../types.js';

export interface PipelineConfig {
  gemini: GeminiConfig;
  policy: NormalizationPolicy;
}

export interface PipelineOptions {
  /** Override the HTTP client used for the Gemini call */
  fetch?: FetchLike;
}

export const EMPTY_QUESTION_MESSAGE = 'Please enter a question';
export const UNUSABLE_QUESTION_MESSAGE = 'Question has no usable characters';

export function createQAPipeline(config: PipelineConfig, options: PipelineOptions = {}): QAPipeline {
  const { gemini, policy } = config;

  return {
    model: gemini.model,

    async ask(question: string, askOptions: AskOptions = {}): Promise<QAResult> {
      const original = question.trim();
      if (!original) throw new ValidationError(EMPTY_QUESTION_MESSAGE);

      const processed = normalizeQuestion(original, policy);
      if (!processed) throw new ValidationError(UNUSABLE_QUESTION_MESSAGE);

      askOptions.onNormalized?.(processed);

      const reply = await callGemini(buildPrompt(processed), gemini, { fetch: options.fetch });

      return {
        originalQuestion: original,
        processedQuestion: processed,
        answer: extractAnswer(reply),
        model: gemini.model,
        ok: reply.ok,
      };
    },
  };
}
