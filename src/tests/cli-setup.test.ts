/**
 * Tests for CLI start-up: missing key, bad config and exit codes
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { askExitCode, loopExitCode, readConfig, requirePipeline, MISSING_KEY_MESSAGE } from '../cli-setup.js';
import { loadConfig } from '../config.js';
import type { QAResult } from '../types.js';

class ExitCalled extends Error {
  constructor(public code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

function trapExit() {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new ExitCalled(code);
  });
  return { errors, exit };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('requirePipeline', () => {
  it('prints the missing key message and exits with 1', () => {
    const { errors, exit } = trapExit();

    expect(() => requirePipeline(loadConfig({}))).toThrow(ExitCalled);
    expect(exit).toHaveBeenCalledWith(1);
    expect(errors).toHaveBeenCalledWith(
      'API key missing! Set GEMINI_API_KEY in your environment or a .env file.'
    );
    expect(MISSING_KEY_MESSAGE).toBe('API key missing! Set GEMINI_API_KEY in your environment or a .env file.');
  });

  it('builds a pipeline when the key is set', () => {
    const { exit } = trapExit();

    const pipeline = requirePipeline(loadConfig({ GEMINI_API_KEY: 'test-secret', GEMINI_MODEL: 'gemini-test' }));

    expect(pipeline.model).toBe('gemini-test');
    expect(exit).not.toHaveBeenCalled();
  });
});

describe('readConfig', () => {
  it('exits with 1 on an invalid setting', () => {
    const { errors, exit } = trapExit();

    expect(() => readConfig({ PORT: 'abc' })).toThrow(ExitCalled);
    expect(exit).toHaveBeenCalledWith(1);
    expect(errors).toHaveBeenCalledWith('✗ Error: PORT must be an integer, got "abc"');
  });

  it('returns the config otherwise', () => {
    trapExit();
    expect(readConfig({ PORT: '8080' }).port).toBe(8080);
  });
});

describe('exit codes', () => {
  it('uses 130 for Ctrl-C and 0 otherwise', () => {
    expect(loopExitCode('interrupted')).toBe(130);
    expect(loopExitCode('quit')).toBe(0);
    expect(loopExitCode('eof')).toBe(0);
  });

  const result = (ok: boolean, answer: string): QAResult => ({
    originalQuestion: 'q',
    processedQuestion: 'q',
    answer,
    model: 'gemini-2.5-flash',
    ok,
  });

  it('follows the reply status, not the answer text', () => {
    expect(askExitCode(result(true, 'Error: this is what the model said'))).toBe(0);
    expect(askExitCode(result(false, 'Error: Gemini API error: HTTP 500 - boom'))).toBe(1);
  });
});
