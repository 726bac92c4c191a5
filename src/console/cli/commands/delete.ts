/**
 * Delete Command
 *
 * Usage:
 *   outreach-kb delete pricing --tenant acme
 */

import chalk from 'chalk';
import { runWithRuntime } from '../shared.js';

interface DeleteOptions {
  tenant: string;
}

export async function deleteCommand(documentId: string, options: DeleteOptions): Promise<void> {
  await runWithRuntime(async runtime => {
    const { removedChunks, removedRecord } = await runtime.pipeline.deleteDocument(options.tenant, documentId);
    if (!removedRecord && removedChunks === 0) {
      console.log(chalk.yellow(`No document "${documentId}" for this tenant.`));
      return;
    }
    const chunks = removedChunks >= 0 ? `${removedChunks} chunks` : 'all chunks';
    console.log(chalk.green(`✓ Deleted ${documentId} (${chunks})`));
  });
}
