import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: 'dots', isEnabled: process.stdout.isTTY === true });
}

export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  successText?: (result: T) => string,
): Promise<T> {
  const spinner = createSpinner(text);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed(successText ? successText(result) : undefined);
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
