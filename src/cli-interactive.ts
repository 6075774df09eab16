/**
 * Interactive question loop (read → ask → print) for the CLI
 */

import * as readline from 'readline';
import ora from 'ora';
import { ValidationError, type QAPipeline } from './types.js';

export const QUESTION_PROMPT = '💬 Your Question: ';
export const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

const RULE = '='.repeat(60);

export interface InteractiveOptions {
  pipeline: QAPipeline;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Show an ora spinner while waiting on Gemini (default: true) */
  spinner?: boolean;
  /** Treat input as a TTY (keypresses, Ctrl-C as SIGINT). Defaults to output.isTTY */
  terminal?: boolean;
}

export type LoopExit = 'quit' | 'interrupted' | 'eof';

export function isExitCommand(line: string): boolean {
  return EXIT_WORDS.has(line.trim().toLowerCase());
}

export function printBanner(output: NodeJS.WritableStream): void {
  output.write(`${RULE}\nLLM QUESTION & ANSWERING SYSTEM\nPowered by Google Gemini\n${RULE}\n`);
  output.write("\nWelcome! Ask me anything, or type 'quit' to exit.\n\n");
}

/**
 * Run the loop until the user quits, presses Ctrl-C or input ends.
 * Errors from a single question are printed and the loop carries on.
 */
export async function runInteractive(options: InteractiveOptions): Promise<LoopExit> {
  const { pipeline } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const print = (text = '') => output.write(`${text}\n`);

  const answerOne = async (question: string): Promise<void> => {
    print(`\n${RULE}\nPROCESSING YOUR QUESTION\n${RULE}`);
    const spinner = options.spinner === false ? null : ora({ text: 'Asking Gemini...', stream: output });
    try {
      const result = await pipeline.ask(question, {
        onNormalized: (normalized) => {
          print(`\n[Preprocessed Question]: ${normalized}`);
          spinner?.start();
        },
      });
      spinner?.stop();
      print(`\n${RULE}\n🤖 ANSWER:\n${RULE}\n${result.answer}\n`);
    } catch (error: unknown) {
      spinner?.stop();
      if (error instanceof ValidationError) {
        print(error.message);
      } else {
        print(`\nAn error occurred: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  };

  const rl = readline.createInterface({ input, output, terminal: options.terminal });
  let closed = false;
  let interrupted = false;
  let quit = false;

  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => {
    interrupted = true;
    rl.close();
  });

  rl.setPrompt(`\n${QUESTION_PROMPT}`);
  rl.prompt();

  try {
    // Breaking out of the iterator closes the interface
    for await (const line of rl) {
      const question = line.trim();

      if (!question) {
        print('Please enter a question.');
      } else if (isExitCommand(question)) {
        quit = true;
        break;
      } else {
        await answerOne(question);
      }

      if (!closed) rl.prompt();
    }
  } finally {
    if (!closed) rl.close();
  }

  if (quit) {
    print('\nThank you for using the Q&A system. Goodbye!');
    return 'quit';
  }
  print('\n\nExiting... Goodbye!');
  return interrupted ? 'interrupted' : 'eof';
}
