/**
 * Gemini generateContent adapter
 *
 * One POST per call, no retries. Every failure (network, timeout, non-2xx,
 * unreadable body) is returned as `{ ok: false, error }` instead of thrown.
 */

import { fetch as undiciFetch } from 'undici';
import type { GeminiConfig, GeminiReply } from '../types.js';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface GeminiCallOptions {
  /** Defaults to undici's fetch */
  fetch?: FetchLike;
}

const MAX_ERROR_DETAIL = 500;

export function geminiEndpoint(config: GeminiConfig): string {
  return `${config.baseUrl}/models/${encodeURIComponent(config.model)}:generateContent?key=${encodeURIComponent(config.apiKey)}`;
}

export function buildRequestBody(prompt: string, config: GeminiConfig) {
  const { temperature, topK, topP, maxOutputTokens } = config.generation;
  return {
    contents: [{ parts: [{ text: prompt }] }],
    generationConfig: { temperature, topK, topP, maxOutputTokens },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Prefer the provider's error.message; fall back to the raw body */
function errorDetail(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
      return parsed.error.message;
    }
  } catch {
    // not JSON
  }
  return trimmed.length > MAX_ERROR_DETAIL ? `${trimmed.slice(0, MAX_ERROR_DETAIL)}...` : trimmed;
}

function describeFetchError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return `Gemini API request timed out after ${timeoutMs / 1000}s`;
    }
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    return `Gemini API request failed: ${err.message}${cause && cause !== err.message ? ` (${cause})` : ''}`;
  }
  return `Gemini API request failed: ${String(err)}`;
}

export async function callGemini(
  prompt: string,
  config: GeminiConfig,
  options: GeminiCallOptions = {}
): Promise<GeminiReply> {
  const doFetch: FetchLike = options.fetch ?? undiciFetch;

  let resp: FetchResponseLike;
  let text: string;
  try {
    resp = await doFetch(geminiEndpoint(config), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildRequestBody(prompt, config)),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
    text = await resp.text();
  } catch (err) {
    return { ok: false, error: describeFetchError(err, config.timeoutMs) };
  }

  if (!resp.ok) {
    const detail = errorDetail(text);
    return {
      ok: false,
      status: resp.status,
      error: `Gemini API error: HTTP ${resp.status}${detail ? ` - ${detail}` : ''}`,
    };
  }

  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, status: resp.status, error: 'Gemini API returned invalid JSON' };
  }
}
