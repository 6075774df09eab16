/**
 * Configuration
 *
 * Reads the environment passed in (process.env by default) into an immutable
 * AppConfig. Entry points load .env via dotenv before calling loadConfig().
 */

import { resolvePolicy } from './core/normalize.js';
import { ConfigurationError, type AppConfig, type GenerationConfig } from './types.js';

export const API_KEY_ENV = 'GEMINI_API_KEY';
export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';

export const GENERATION_CONFIG: Readonly<GenerationConfig> = Object.freeze({
  temperature: 0.7,
  topK: 40,
  topP: 0.95,
  maxOutputTokens: 1024,
});

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigurationError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env[API_KEY_ENV]?.trim() || '';
  const baseUrl = (env.GEMINI_API_URL?.trim() || DEFAULT_BASE_URL).replace(/\/+$/, '');
  const model = env.GEMINI_MODEL?.trim() || DEFAULT_MODEL;

  const gemini = apiKey
    ? Object.freeze({
        apiKey,
        model,
        baseUrl,
        timeoutMs: readInt(env, 'GEMINI_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1, 600_000),
        generation: GENERATION_CONFIG,
      })
    : null;

  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(',').map((s) => s.trim()).filter(Boolean)
    : [];

  return Object.freeze({
    gemini,
    model,
    policy: resolvePolicy(env.QA_NORMALIZE_POLICY?.trim() || 'extended'),
    port: readInt(env, 'PORT', DEFAULT_PORT, 0, 65_535),
    host: env.HOST?.trim() || DEFAULT_HOST,
    corsOrigins,
  });
}
