/**
 * Tests for the HTTP server
 * Tests POST /ask, GET /health, GET / and the error handlers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { createApp } from '../server/app.js';
import { formatTimestamp } from '../server/routes/ask.js';
import { createQAPipeline } from '../core/pipeline.js';
import { loadConfig } from '../config.js';
import type { FetchInit } from '../core/gemini.js';
import type { AppConfig, QAPipeline } from '../types.js';

const TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function geminiReturning(status: number, body: unknown) {
  return vi.fn(async (_url: string, _init: FetchInit) => ({
    ok: status >= 200 && status < 300,
    status,
    text: async () => JSON.stringify(body),
  }));
}

function appWith(fetchMock: ReturnType<typeof geminiReturning>): Express {
  const config = loadConfig({ GEMINI_API_KEY: 'test-secret' });
  if (!config.gemini) throw new Error('expected Gemini config');
  const pipeline = createQAPipeline({ gemini: config.gemini, policy: config.policy }, { fetch: fetchMock });
  return createApp({ config, pipeline });
}

describe('POST /ask', () => {
  let fetchMock: ReturnType<typeof geminiReturning>;
  let app: Express;

  beforeEach(() => {
    fetchMock = geminiReturning(200, { candidates: [{ content: { parts: [{ text: '4\n' }] } }] });
    app = appWith(fetchMock);
  });

  it('answers with the original and processed question', async () => {
    const response = await request(app).post('/ask').send({ question: '  What is 2+2?  ' });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      original_question: 'What is 2+2?',
      processed_question: 'what is 2+2?',
      answer: '4',
      model: 'gemini-2.5-flash',
    });
    expect(response.body.timestamp).toMatch(TIMESTAMP);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('returns 400 for a missing question without calling Gemini', async () => {
    const response = await request(app).post('/ask').send({});

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Please enter a question' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns 400 for a blank question', async () => {
    const response = await request(app).post('/ask').send({ question: '   ' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Please enter a question' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns 400 for a non-string question', async () => {
    const response = await request(app).post('/ask').send({ question: 42 });

    expect(response.status).toBe(400);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns 400 when nothing survives normalization', async () => {
    const response = await request(app).post('/ask').send({ question: '###' });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Question has no usable characters' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns the Gemini failure as the answer', async () => {
    app = appWith(geminiReturning(429, { error: { code: 429, message: 'Resource has been exhausted' } }));

    const response = await request(app).post('/ask').send({ question: 'hello' });

    expect(response.status).toBe(200);
    expect(response.body.answer).toBe('Error: Gemini API error: HTTP 429 - Resource has been exhausted');
  });

  it('returns 400 for malformed JSON', async () => {
    const response = await request(app)
      .post('/ask')
      .set('Content-Type', 'application/json')
      .send('{"question":');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Malformed JSON in request body');
    expect(response.body.requestId).toMatch(UUID);
  });
});

describe('POST /ask — failures', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns 500 when no API key is configured', async () => {
    const app = createApp({ config: loadConfig({}) });

    const response = await request(app).post('/ask').send({ question: 'hello' });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'API key not configured.' });
  });

  it('returns 500 when the pipeline throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const pipeline: QAPipeline = {
      model: 'gemini-2.5-flash',
      ask: vi.fn(async () => {
        throw new Error('kaboom');
      }),
    };
    const app = createApp({ config: loadConfig({ GEMINI_API_KEY: 'test-secret' }), pipeline });

    const response = await request(app).post('/ask').send({ question: 'hello' });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'kaboom' });
  });
});

describe('GET /health', () => {
  it('reports a configured API', async () => {
    const config: AppConfig = loadConfig({ GEMINI_API_KEY: 'test-secret', GEMINI_MODEL: 'gemini-test' });
    const response = await request(createApp({ config })).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', model: 'gemini-test', api_configured: true });
  });

  it('reports a missing API key', async () => {
    const response = await request(createApp({ config: loadConfig({}) })).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', model: 'gemini-2.5-flash', api_configured: false });
  });

  it('reports the configured model even without a key', async () => {
    const response = await request(createApp({ config: loadConfig({ GEMINI_MODEL: 'gemini-test' }) })).get('/health');

    expect(response.body).toEqual({ status: 'ok', model: 'gemini-test', api_configured: false });
  });
});

describe('other routes', () => {
  const app = createApp({ config: loadConfig({}) });

  it('serves the question page', async () => {
    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/html');
    expect(response.text).toContain('<title>Ask Gemini</title>');
  });

  it('returns JSON 404 for unknown routes', async () => {
    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('Route not found: GET /nope');
  });

  it('tags every response with a request id', async () => {
    const response = await request(app).get('/health');

    expect(response.headers['x-request-id']).toMatch(UUID);
  });
});

describe('formatTimestamp', () => {
  it('formats local time with zero padding', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });
});
