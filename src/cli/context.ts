import type { Services } from '../services/container';
import { describeError } from '../types/errors';

/**
 * What every command needs: lazily built services and an output sink
 */
export interface CliContext {
  services(): Promise<Services>;
  print(text: string): void;
  printError(text: string): void;
}

/**
 * Run a command body; errors are printed and turn into a non-zero exit code
 */
export async function runCommand(context: CliContext, body: (services: Services) => Promise<void>): Promise<void> {
  try {
    await body(await context.services());
  } catch (error) {
    context.printError(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
