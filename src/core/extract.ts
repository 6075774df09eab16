/**
 * Answer extraction from a generateContent response.
 *
 * The walk candidates[0].content.parts[0].text returns an AnswerLookup at
 * every step instead of throwing: absent fields are `missing`, fields of
 * the wrong type are `malformed`.
 */

import type { AnswerLookup, GeminiReply } from '../types.js';

export const NO_ANSWER_FALLBACK = 'Unable to get a valid response from Gemini';
export const UNPARSEABLE_FALLBACK = 'Unable to parse response from Gemini';

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const MISSING: AnswerLookup = { kind: 'missing' };

function malformed(at: string): AnswerLookup {
  return { kind: 'malformed', at };
}

/** First element of an array field, or the lookup that explains why there is none */
function firstOf(value: unknown, at: string): { item: Json } | AnswerLookup {
  if (value === undefined || value === null) return MISSING;
  if (!Array.isArray(value)) return malformed(at);
  if (value.length === 0) return MISSING;
  const first: unknown = value[0];
  if (first === undefined || first === null) return MISSING;
  if (!isRecord(first)) return malformed(`${at}[0]`);
  return { item: first };
}

export function findAnswerText(data: unknown): AnswerLookup {
  if (data === undefined || data === null) return MISSING;
  if (!isRecord(data)) return malformed('response');

  const candidate = firstOf(data.candidates, 'candidates');
  if (!('item' in candidate)) return candidate;

  const content = candidate.item.content;
  if (content === undefined || content === null) return MISSING;
  if (!isRecord(content)) return malformed('candidates[0].content');

  const part = firstOf(content.parts, 'candidates[0].content.parts');
  if (!('item' in part)) return part;

  const text = part.item.text;
  if (text === undefined || text === null) return MISSING;
  if (typeof text !== 'string') return malformed('candidates[0].content.parts[0].text');

  const trimmed = text.trim();
  return trimmed ? { kind: 'text', text: trimmed } : MISSING;
}

/** Answer string for a parsed response body (which may itself be an error object) */
export function answerFromResponse(data: unknown): string {
  if (isRecord(data) && data.error !== undefined && data.error !== null) {
    const err = data.error;
    if (typeof err === 'string') return `Error: ${err}`;
    if (isRecord(err) && typeof err.message === 'string') return `Error: ${err.message}`;
    return UNPARSEABLE_FALLBACK;
  }

  const lookup = findAnswerText(data);
  switch (lookup.kind) {
    case 'text':
      return lookup.text;
    case 'missing':
      return NO_ANSWER_FALLBACK;
    case 'malformed':
      return UNPARSEABLE_FALLBACK;
  }
}

export function extractAnswer(reply: GeminiReply): string {
  if (!reply.ok) return `Error: ${reply.error}`;
  return answerFromResponse(reply.data);
}
