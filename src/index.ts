#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { ConfigError, LLMResponseError, UserCancelledError, errorMessage } from './utils/errors.js';

function isPromptExit(error: unknown): boolean {
  // @inquirer/prompts rejects with ExitPromptError on Ctrl+C
  return error instanceof Error && error.name === 'ExitPromptError';
}

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof UserCancelledError || isPromptExit(error)) {
    logger.info('Cancelled.');
    process.exitCode = 130;
  } else {
    logger.error(errorMessage(error));
    if (error instanceof ConfigError) {
      logger.dim('Set the values in the environment or in .env; see .env.example.');
    } else if (error instanceof LLMResponseError) {
      logger.debug(`Model answer:\n${error.raw}`);
    } else if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exitCode = 1;
  }
}
