#!/usr/bin/env node

/**
 * ask-gemini CLI
 *
 * Usage:
 *   ask-gemini                       - Interactive question loop
 *   ask-gemini ask "question"        - Answer one question and exit
 *   ask-gemini ask "question" --json - Print the full result as JSON
 *   ask-gemini serve [--port 5000]   - Start the HTTP server
 */

import 'dotenv/config';
import { Command } from 'commander';
import ora from 'ora';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { printBanner, runInteractive } from './cli-interactive.js';
import { askExitCode, loopExitCode, readConfig, requirePipeline } from './cli-setup.js';
import { startServer } from './server/app.js';

const program = new Command();

// Read version from package.json dynamically
let cliVersion = '0.0.0';
try {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    cliVersion = pkg.version;
  }
} catch {
  // keep fallback version
}

program
  .name('ask-gemini')
  .description('Ask Google Gemini questions from the terminal or over HTTP')
  .version(cliVersion)
  .action(async () => {
    const pipeline = requirePipeline(readConfig());
    printBanner(process.stdout);
    console.log(`✓ Ready (model: ${pipeline.model})`);
    const exit = await runInteractive({ pipeline, spinner: Boolean(process.stdout.isTTY) });
    process.exit(loopExitCode(exit));
  });

program
  .command('ask <question...>')
  .description('Answer a single question and exit')
  .option('--json', 'Output the full result as JSON')
  .option('-s, --silent', 'No spinner output')
  .action(async (words: string[], options: { json?: boolean; silent?: boolean }) => {
    const pipeline = requirePipeline(readConfig());
    const spinner = options.silent || options.json ? null : ora('Asking Gemini...').start();

    try {
      const result = await pipeline.ask(words.join(' '));
      spinner?.stop();
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(result.answer);
      }
      process.exit(askExitCode(result));
    } catch (error: unknown) {
      spinner?.fail();
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

program
  .command('serve')
  .description('Start the HTTP server (POST /ask, GET /health)')
  .option('-p, --port <port>', 'Port to listen on')
  .action((options: { port?: string }) => {
    const config = readConfig();
    const port = options.port !== undefined ? parseInt(options.port, 10) : config.port;
    if (!Number.isInteger(port) || port < 0 || port > 65_535) {
      console.error(`✗ Error: invalid port "${options.port}"`);
      process.exit(1);
    }
    startServer({ ...config, port });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`\nAn error occurred: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
