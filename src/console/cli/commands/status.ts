/**
 * Status Command
 *
 * Usage:
 *   outreach-kb status --tenant acme
 *   outreach-kb status --tenant acme --status failed
 *   outreach-kb status --tenant acme --document pricing
 */

import chalk from 'chalk';
import { DocumentStatusSchema } from '../../../common/schemas/index.js';
import { formatMetricsSummary } from '../../../common/services/metrics.js';
import type { DocumentRecord, DocumentStatus } from '../../../common/types.js';
import { printHeader, runWithRuntime } from '../shared.js';

interface StatusOptions {
  tenant: string;
  document?: string;
  status?: string;
}

const STATUS_COLORS: Record<DocumentStatus, (text: string) => string> = {
  pending: chalk.gray,
  chunked: chalk.cyan,
  embedded: chalk.green,
  failed: chalk.red,
};

function printRecord(record: DocumentRecord): void {
  const ingested = record.ingestedAt !== undefined ? new Date(record.ingestedAt).toISOString() : '-';
  console.log(
    `${STATUS_COLORS[record.status](record.status.padEnd(9))} ${chalk.bold(record.documentId)} ` +
      chalk.gray(`${record.sourceType}, ${record.chunkCount} chunks, ingested ${ingested}`)
  );
  if (record.error) {
    console.log(chalk.red(`          ${record.error.kind} at ${record.error.step}: ${record.error.message}`));
  }
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const input = DocumentStatusSchema.parse({
    tenant_id: options.tenant,
    document_id: options.document,
    status: options.status,
  });

  printHeader(`Status (${input.tenant_id})`);
  await runWithRuntime(async runtime => {
    if (input.document_id) {
      const record = await runtime.pipeline.getStatus(input.tenant_id, input.document_id);
      if (record) {
        printRecord(record);
      } else {
        console.log(chalk.yellow(`No document "${input.document_id}" for this tenant.`));
      }
      return;
    }

    const records = await runtime.pipeline.listDocuments(input.tenant_id, input.status);
    if (records.length === 0) {
      console.log(chalk.yellow('No documents found.'));
    }
    records.forEach(printRecord);
    console.log('');
    console.log(chalk.gray(formatMetricsSummary()));
  });
}
