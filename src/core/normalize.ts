/**
 * Question normalization: lowercase, drop disallowed characters, collapse whitespace.
 */

import { ConfigurationError, type NormalizationPolicy, type NormalizationPolicyName } from '../types.js';

export const NORMALIZATION_POLICIES: Record<NormalizationPolicyName, NormalizationPolicy> = {
  extended: { name: 'extended', allowedPunctuation: '?.,!+-*/' },
  basic: { name: 'basic', allowedPunctuation: '?.,!-' },
};

export const DEFAULT_POLICY = NORMALIZATION_POLICIES.extended;

export function resolvePolicy(name: string): NormalizationPolicy {
  const key = name.trim().toLowerCase();
  if (key === 'extended' || key === 'basic') return NORMALIZATION_POLICIES[key];
  throw new ConfigurationError(
    `Unknown normalization policy "${name}" (expected one of: ${Object.keys(NORMALIZATION_POLICIES).join(', ')})`
  );
}

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]\[^-]/g, '\\$&');
}

const disallowedCache = new Map<string, RegExp>();

function disallowedPattern(policy: NormalizationPolicy): RegExp {
  let re = disallowedCache.get(policy.allowedPunctuation);
  if (!re) {
    re = new RegExp(`[^\\p{L}\\p{M}\\p{N}_\\s${escapeForCharClass(policy.allowedPunctuation)}]`, 'gu');
    disallowedCache.set(policy.allowedPunctuation, re);
  }
  return re;
}

/**
 * Canonicalize a question for transmission.
 *
 * Filtering runs before whitespace collapsing so that removing a character
 * between two spaces never leaves a double space behind; this keeps the
 * function idempotent.
 */
export function normalizeQuestion(question: string, policy: NormalizationPolicy = DEFAULT_POLICY): string {
  return question
    .toLowerCase()
    .replace(disallowedPattern(policy), '')
    .replace(/\s+/g, ' ')
    .trim();
}
