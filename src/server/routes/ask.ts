/**
 * POST /ask — answer one question through the Gemini pipeline
 */

import { Router, Request, Response } from 'express';
import { EMPTY_QUESTION_MESSAGE } from '../../core/pipeline.js';
import { ValidationError, type QAPipeline } from '../../types.js';

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local time as YYYY-MM-DD HH:mm:ss */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function readQuestion(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('question' in body)) return null;
  const { question } = body;
  if (typeof question !== 'string') return null;
  const trimmed = question.trim();
  return trimmed || null;
}

/**
 * @param pipeline - null when no API key is configured; every request then fails with 500
 */
export function createAskRouter(pipeline: QAPipeline | null): Router {
  const router = Router();

  router.post('/ask', async (req: Request, res: Response) => {
    if (!pipeline) {
      res.status(500).json({ error: 'API key not configured.' });
      return;
    }

    const question = readQuestion(req.body);
    if (!question) {
      res.status(400).json({ error: EMPTY_QUESTION_MESSAGE });
      return;
    }

    try {
      const result = await pipeline.ask(question);
      res.json({
        original_question: result.originalQuestion,
        processed_question: result.processedQuestion,
        answer: result.answer,
        model: result.model,
        timestamp: formatTimestamp(new Date()),
      });
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      console.error('Ask error:', error);
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Failed to answer question',
      });
    }
  });

  return router;
}
