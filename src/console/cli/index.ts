#!/usr/bin/env node
/**
 * outreach-kb CLI - operator commands for the outreach knowledge base
 *
 * Usage:
 *   outreach-kb ingest docs/pricing.md --tenant acme --source-type knowledge_document
 *   outreach-kb status --tenant acme
 *   outreach-kb delete pricing --tenant acme
 *   outreach-kb readiness --tenant acme
 *   outreach-kb retrieve "pricing for mid-market teams" --tenant acme
 *   outreach-kb ask "Do we integrate with HubSpot?" --tenant acme
 *   outreach-kb score draft.txt
 *   outreach-kb draft leads/jane.json --tenant acme
 */

import 'dotenv/config';
import { Command, Option } from 'commander';
import { errorMessage } from '../../common/errors.js';
import { SOURCE_TYPES } from '../../common/types.js';
import { deleteCommand } from './commands/delete.js';
import { draftCommand } from './commands/draft.js';
import { ingestCommand } from './commands/ingest.js';
import { readinessCommand } from './commands/readiness.js';
import { askCommand, retrieveCommand } from './commands/retrieve.js';
import { scoreCommand } from './commands/score.js';
import { statusCommand } from './commands/status.js';
import { parseList, parsePositiveInt, parseSimilarity } from './shared.js';

const program = new Command();

program
  .name('outreach-kb')
  .description('Outreach knowledge base: ingestion, retrieval, spam scoring and drafting')
  .version('0.1.0')
  .option('--verbose', 'Show info-level JSON logs on stderr', false)
  .hook('preAction', command => {
    // JSON logs stay on stderr; keep them quiet unless asked for
    if (!process.env.LOG_LEVEL) {
      process.env.LOG_LEVEL = command.opts().verbose ? 'info' : 'warn';
    }
  });

program
  .command('ingest <file>')
  .description('Ingest a text file, or a JSON document payload (or array of payloads)')
  .requiredOption('--tenant <id>', 'Tenant id')
  .option('--document-id <id>', 'Document id (default: file name without extension)')
  .addOption(
    new Option('--source-type <type>', 'Knowledge source type').choices([...SOURCE_TYPES]).default('uploaded_text')
  )
  .option('--title <title>', 'Title shown in citations')
  .option('--url <url>', 'Source URL shown in citations')
  .action(ingestCommand);

program
  .command('status')
  .description('Show ingestion state of the tenant\'s documents')
  .requiredOption('--tenant <id>', 'Tenant id')
  .option('--document <id>', 'Show one document only')
  .addOption(new Option('--status <status>', 'Only documents in this state').choices(['pending', 'chunked', 'embedded', 'failed']))
  .action(statusCommand);

program
  .command('delete <documentId>')
  .description('Remove a document and all its chunks')
  .requiredOption('--tenant <id>', 'Tenant id')
  .action(deleteCommand);

program
  .command('readiness')
  .description('Score how well the tenant\'s knowledge supports outreach')
  .requiredOption('--tenant <id>', 'Tenant id')
  .action(readinessCommand);

program
  .command('retrieve <query>')
  .description('Show the context retrieval would pack for a query')
  .requiredOption('--tenant <id>', 'Tenant id')
  .option('-k, --k <count>', 'Candidates to fetch', parsePositiveInt)
  .option('--budget <tokens>', 'Token budget for packed context', parsePositiveInt)
  .option('--min-similarity <score>', 'Similarity threshold', parseSimilarity)
  .option('--source-types <list>', 'Comma-separated source types', parseList)
  .action(retrieveCommand);

program
  .command('ask <question>')
  .description('Answer a question from the knowledge base')
  .requiredOption('--tenant <id>', 'Tenant id')
  .option('-k, --k <count>', 'Candidates to fetch', parsePositiveInt)
  .option('--source-types <list>', 'Comma-separated source types', parseList)
  .action(askCommand);

program
  .command('score <file>')
  .description('Spam-score an email file (optional first line "Subject: ...")')
  .option('--subject <subject>', 'Subject line (overrides the file)')
  .option('--threshold <risk>', 'Risk threshold for the exit code', parseFloat)
  .action(scoreCommand);

program
  .command('draft <leadFile>')
  .description('Generate a cold email draft for a lead JSON file')
  .requiredOption('--tenant <id>', 'Tenant id')
  .option('--template <id>', 'Template id (cold_intro, follow_up)')
  .option('-k, --k <count>', 'Candidates to fetch', parsePositiveInt)
  .option('--budget <tokens>', 'Token budget for packed context', parsePositiveInt)
  .action(draftCommand);

program.parseAsync(process.argv).catch(error => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
