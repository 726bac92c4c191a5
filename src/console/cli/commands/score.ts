/**
 * Score Command
 *
 * Usage:
 *   outreach-kb score draft.txt
 *   outreach-kb score body.txt --subject "Quick question"
 *
 * The file may start with a "Subject:" line. Needs no API keys.
 */

import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { loadEnvConfig } from '../../../common/constants.js';
import { parseDraft } from '../../../outreach/prompt-assembler.js';
import { loadSpamRules, SpamScorer } from '../../../outreach/spam-score.js';
import { formatSpamScore } from '../../../outreach/tools/outreach-tools.js';

interface ScoreOptions {
  subject?: string;
  threshold?: number;
}

export function scoreCommand(file: string, options: ScoreOptions): void {
  const env = loadEnvConfig();
  const scorer = new SpamScorer(loadSpamRules(env.spam.rulesFile));
  const parsed = parseDraft(readFileSync(file, 'utf-8'));
  const subject = options.subject ?? parsed.subject;
  const score = scorer.score(subject, parsed.body);
  const threshold = options.threshold ?? env.spam.threshold ?? 0.5;

  console.log('');
  console.log(formatSpamScore(score));
  console.log('');
  if (score.risk > threshold) {
    console.log(chalk.red(`Over threshold ${threshold}: revise before sending.`));
    process.exitCode = 2;
  } else {
    console.log(chalk.green(`Within threshold ${threshold}.`));
  }
}
