#!/usr/bin/env node
import readline from 'readline/promises';
import { config } from './config';
import { logger, setLogLevel } from './lib/logger';
import { AppError } from './utils/app-error';
import {
  CommandContext,
  HELP_TEXT,
  jsonToMdCommand,
  jsonToQmdCommand,
  parseArgs,
  regenerateBibCommand,
} from './commands';

async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

export function createContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    verbose: false,
    interactive: process.stdin.isTTY === true,
    confirm,
    print: (message: string) => console.log(message),
    ...overrides,
  };
}

/**
 * Run one CLI invocation and return the process exit code
 */
export async function run(args: string[], overrides: Partial<CommandContext> = {}): Promise<number> {
  const context = createContext(overrides);

  try {
    const parsed = parseArgs(args);
    context.verbose = context.verbose || parsed.verbose;
    if (context.verbose) {
      setLogLevel('debug');
    }

    switch (parsed.command) {
      case 'help': {
        context.print(HELP_TEXT);
        const requested = args.includes('-h') || args.includes('--help');
        return requested ? 0 : 1;
      }
      case 'version':
        context.print(`report-convert ${config.version}`);
        return 0;
      case 'json-to-qmd':
        await jsonToQmdCommand(parsed.options, context);
        return 0;
      case 'json-to-md':
        await jsonToMdCommand(parsed.options, context);
        return 0;
      case 'regenerate-bib':
        await regenerateBibCommand(parsed.options, context);
        return 0;
    }
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(`❌ ${error.message}`, error);
      return error.exitCode;
    }

    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`❌ Unexpected error: ${err.message}`, err);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
