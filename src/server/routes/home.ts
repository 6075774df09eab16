/**
 * GET / — static question form
 */

import { Router, Request, Response } from 'express';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

// Works from both src/ and dist/ (tsc does not copy the html file)
const __dirname_home = dirname(fileURLToPath(import.meta.url));
let _indexHtml: string | null = null;

function getIndexHtml(): string {
  if (_indexHtml !== null) return _indexHtml;
  const candidates = [
    join(__dirname_home, '..', 'public', 'index.html'),
    join(__dirname_home, '..', '..', '..', 'src', 'server', 'public', 'index.html'),
  ];
  for (const candidate of candidates) {
    try {
      _indexHtml = readFileSync(candidate, 'utf-8');
      return _indexHtml;
    } catch {
      // try next
    }
  }
  _indexHtml = '<!doctype html><title>ask-gemini</title><p>POST a JSON body {"question": "..."} to /ask.</p>';
  return _indexHtml;
}

export function createHomeRouter(): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.setHeader(
      'Content-Security-Policy',
      "default-src 'none'; script-src 'unsafe-inline'; style-src 'unsafe-inline'; connect-src 'self'; form-action 'self'; frame-ancestors 'none'"
    );
    res.type('html').send(getIndexHtml());
  });

  return router;
}
