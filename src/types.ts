/**
 * Core types for ask-gemini
 */

/** Punctuation the normalizer keeps on top of letters, digits, underscore and whitespace */
export interface NormalizationPolicy {
  name: NormalizationPolicyName;
  allowedPunctuation: string;
}

export type NormalizationPolicyName = 'extended' | 'basic';

export interface GenerationConfig {
  temperature: number;
  topK: number;
  topP: number;
  maxOutputTokens: number;
}

export interface GeminiConfig {
  apiKey: string;
  /** Model name used in the endpoint path (e.g. gemini-2.5-flash) */
  model: string;
  /** API base, no trailing slash */
  baseUrl: string;
  /** Per-call timeout (ms) */
  timeoutMs: number;
  generation: GenerationConfig;
}

export interface AppConfig {
  /** null when GEMINI_API_KEY is not set */
  gemini: GeminiConfig | null;
  /** Configured model name, known even without a key */
  model: string;
  policy: NormalizationPolicy;
  port: number;
  host: string;
  corsOrigins: string[];
}

/**
 * Outcome of one generateContent call. The adapter never throws; transport
 * failures come back as `ok: false` with a human-readable message.
 */
export type GeminiReply =
  | { ok: true; data: unknown }
  | { ok: false; error: string; status?: number };

/** Result of walking candidates[0].content.parts[0].text */
export type AnswerLookup =
  | { kind: 'text'; text: string }
  | { kind: 'missing' }
  | { kind: 'malformed'; at: string };

export interface QAResult {
  originalQuestion: string;
  processedQuestion: string;
  answer: string;
  model: string;
  /** false when the Gemini call failed and `answer` carries the error */
  ok: boolean;
}

export interface AskOptions {
  /** Called with the normalized question before the remote call */
  onNormalized?: (normalized: string) => void;
}

export interface QAPipeline {
  readonly model: string;
  ask(question: string, options?: AskOptions): Promise<QAResult>;
}

export class QAError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'QAError';
  }
}

export class ConfigurationError extends QAError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends QAError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}
