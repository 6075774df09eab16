/**
 * ask-gemini - question answering over the Gemini API
 *
 * Main library export
 */

import { loadConfig } from './config.js';
import { createQAPipeline, type PipelineOptions } from './core/pipeline.js';
import { ConfigurationError, type QAResult } from './types.js';

export * from './types.js';
export { loadConfig, GENERATION_CONFIG, DEFAULT_MODEL, API_KEY_ENV } from './config.js';
export { normalizeQuestion, resolvePolicy, NORMALIZATION_POLICIES, DEFAULT_POLICY } from './core/normalize.js';
export { buildPrompt } from './core/prompt.js';
export { callGemini, type FetchLike, type FetchInit, type FetchResponseLike, type GeminiCallOptions } from './core/gemini.js';
export {
  extractAnswer,
  answerFromResponse,
  findAnswerText,
  NO_ANSWER_FALLBACK,
  UNPARSEABLE_FALLBACK,
} from './core/extract.js';
export { createQAPipeline, type PipelineConfig, type PipelineOptions } from './core/pipeline.js';
export { createApp, startServer, type ServerOptions } from './server/app.js';
export { runInteractive, type InteractiveOptions } from './cli-interactive.js';

/**
 * Answer one question using configuration from the environment
 *
 * @example
 * ```typescript
 * import { askQuestion } from 'ask-gemini';
 *
 * const result = await askQuestion('  What is 2+2?  ');
 * console.log(result.processedQuestion); // "what is 2+2?"
 * console.log(result.answer);
 * ```
 */
export async function askQuestion(
  question: string,
  env: Record<string, string | undefined> = process.env,
  options: PipelineOptions = {}
): Promise<QAResult> {
  const config = loadConfig(env);
  if (!config.gemini) {
    throw new ConfigurationError('API key not found. Set GEMINI_API_KEY environment variable');
  }
  return createQAPipeline({ gemini: config.gemini, policy: config.policy }, options).ask(question);
}
