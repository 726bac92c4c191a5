/**
 * Readiness Command
 *
 * Usage:
 *   outreach-kb readiness --tenant acme
 */

import chalk from 'chalk';
import { KnowledgeReadinessSchema } from '../../../common/schemas/index.js';
import { printHeader, runWithRuntime } from '../shared.js';

interface ReadinessOptions {
  tenant: string;
}

function scoreColor(score: number): (text: string) => string {
  if (score >= 70) return chalk.green;
  if (score >= 40) return chalk.yellow;
  return chalk.red;
}

export async function readinessCommand(options: ReadinessOptions): Promise<void> {
  const input = KnowledgeReadinessSchema.parse({ tenant_id: options.tenant });

  printHeader(`Knowledge readiness (${input.tenant_id})`);
  await runWithRuntime(async runtime => {
    const report = await runtime.readiness.knowledgeReadiness(input.tenant_id);
    const { hygiene } = report;

    console.log(`${chalk.bold('Score:')} ${scoreColor(report.score)(`${report.score}/100`)}`);
    console.log(
      chalk.gray(
        `freshness ${hygiene.freshness}, volume ${hygiene.volume}, dedupe ${hygiene.dedupe} ` +
          `(${hygiene.chunks} chunks from ${hygiene.documents} documents)`
      )
    );
    console.log('');
    for (const aspect of report.aspects) {
      const detail = aspect.present ? `${'■'.repeat(aspect.detail)}${'□'.repeat(5 - aspect.detail)}` : chalk.red('missing');
      console.log(`  ${aspect.name.padEnd(16)} ${detail}${aspect.present ? chalk.gray(` ${aspect.chunks} chunks`) : ''}`);
    }
  });
}
