/**
 * CLI start-up helpers: config loading, key check and exit codes
 */

import { loadConfig, API_KEY_ENV } from './config.js';
import { createQAPipeline } from './core/pipeline.js';
import { ConfigurationError, type AppConfig, type QAPipeline, type QAResult } from './types.js';
import type { LoopExit } from './cli-interactive.js';

export const MISSING_KEY_MESSAGE = `API key missing! Set ${API_KEY_ENV} in your environment or a .env file.`;

export function readConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`✗ Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

/** Pipeline for commands that need the key; exits with a message when it is missing */
export function requirePipeline(config: AppConfig): QAPipeline {
  if (!config.gemini) {
    console.error(MISSING_KEY_MESSAGE);
    process.exit(1);
  }
  return createQAPipeline({ gemini: config.gemini, policy: config.policy });
}

/** 130 is the shell convention for a SIGINT exit */
export function loopExitCode(exit: LoopExit): number {
  return exit === 'interrupted' ? 130 : 0;
}

export function askExitCode(result: QAResult): number {
  return result.ok ? 0 : 1;
}
