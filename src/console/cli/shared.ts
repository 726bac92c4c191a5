/**
 * Helpers shared by CLI commands
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import ora from 'ora';
import { errorMessage, isOutreachError } from '../../common/errors.js';
import { createRuntime, type OutreachRuntime } from '../runtime.js';

export function printHeader(title: string): void {
  console.log(chalk.blue('\n' + '='.repeat(60)));
  console.log(chalk.blue(`OUTREACH KB - ${title}`));
  console.log(chalk.blue('='.repeat(60)));
  console.log('');
}

export function describeError(error: unknown): string {
  return isOutreachError(error) ? `[${error.kind}] ${error.message}` : errorMessage(error);
}

/**
 * Build the runtime, run one command against it, always close it
 *
 * Failures set a non-zero exit code instead of exiting, so the registry
 * is closed cleanly.
 */
export async function runWithRuntime(task: (runtime: OutreachRuntime) => Promise<void>): Promise<void> {
  const spinner = ora('Initializing services...').start();
  let runtime: OutreachRuntime;
  try {
    runtime = createRuntime();
    spinner.succeed('Services initialized');
  } catch (error) {
    spinner.fail(`Failed to initialize: ${errorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  try {
    await task(runtime);
  } catch (error) {
    console.error(chalk.red(`\n${describeError(error)}`));
    process.exitCode = 1;
  } finally {
    runtime.close();
  }
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseSimilarity(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < -1 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between -1 and 1.');
  }
  return parsed;
}

/**
 * "product, company_qa" -> ["product", "company_qa"]
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
