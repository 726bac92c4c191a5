/**
 * Retrieve and Ask Commands
 *
 * Usage:
 *   outreach-kb retrieve "pricing for mid-market teams" --tenant acme -k 8
 *   outreach-kb ask "Do we integrate with HubSpot?" --tenant acme
 */

import chalk from 'chalk';
import { resolveSourceTypes } from '../../../common/schemas/index.js';
import { formatContext } from '../../../semantic/retriever.js';
import { runWithRuntime } from '../shared.js';

interface RetrieveOptions {
  tenant: string;
  k?: number;
  budget?: number;
  minSimilarity?: number;
  sourceTypes?: string[];
}

export async function retrieveCommand(query: string, options: RetrieveOptions): Promise<void> {
  const sourceTypes = resolveSourceTypes(options.sourceTypes);
  await runWithRuntime(async runtime => {
    const context = await runtime.retriever.retrieve(options.tenant, query, {
      k: options.k,
      tokenBudget: options.budget,
      minSimilarity: options.minSimilarity,
      sourceTypes,
    });

    console.log('');
    if (context.chunks.length === 0) {
      console.log(chalk.yellow('No relevant knowledge found.'));
    } else {
      console.log(formatContext(context));
    }
    console.log('');
    console.log(
      chalk.gray(
        `${context.chunks.length} chunks, ~${context.totalTokens} tokens | candidates ${context.candidates}, ` +
          `below threshold ${context.belowThreshold}, not ready ${context.notReady}, over budget ${context.overBudget}`
      )
    );
  });
}

interface AskOptions {
  tenant: string;
  k?: number;
  sourceTypes?: string[];
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  const sourceTypes = resolveSourceTypes(options.sourceTypes);
  await runWithRuntime(async runtime => {
    const { answer, context } = await runtime.qa.answer(options.tenant, question, { k: options.k, sourceTypes });
    console.log('');
    console.log(answer);
    if (context.chunks.length > 0) {
      console.log('');
      console.log(chalk.gray(formatContext(context)));
    }
  });
}
