/**
 * Draft Command
 *
 * Usage:
 *   outreach-kb draft leads/jane.json --tenant acme
 *   outreach-kb draft leads/jane.json --tenant acme --template follow_up
 */

import chalk from 'chalk';
import ora from 'ora';
import { readFileSync } from 'node:fs';
import { formatDraft } from '../../../outreach/tools/outreach-tools.js';
import { printHeader, runWithRuntime } from '../shared.js';

interface DraftOptions {
  tenant: string;
  template?: string;
  k?: number;
  budget?: number;
}

export async function draftCommand(leadFile: string, options: DraftOptions): Promise<void> {
  const lead: unknown = JSON.parse(readFileSync(leadFile, 'utf-8'));

  printHeader('Email Draft');
  await runWithRuntime(async runtime => {
    const spinner = ora('Generating draft...').start();
    const outcome = await runtime.orchestrator.generateEmail({
      tenantId: options.tenant,
      lead,
      template: options.template,
      retrieval: { k: options.k, tokenBudget: options.budget },
    });

    if (!outcome.ok) {
      const { failure } = outcome;
      spinner.fail(`Failed at ${failure.step}: [${failure.kind}] ${failure.message}`);
      if (failure.retryable) console.log(chalk.gray('Transient failure, safe to retry.'));
      process.exitCode = 1;
      return;
    }

    const { draft } = outcome;
    if (draft.flaggedForReview) {
      spinner.warn('Draft ready, flagged for review');
    } else {
      spinner.succeed('Draft ready');
    }
    console.log('');
    console.log(formatDraft(draft));
    console.log('');
    console.log(chalk.gray(outcome.history.map(transition => transition.state).join(' -> ')));
  });
}
