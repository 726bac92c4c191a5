/**
 * Ingest Command
 *
 * Usage:
 *   outreach-kb ingest docs/pricing.md --tenant acme --source-type knowledge_document
 *   outreach-kb ingest records/products.json --tenant acme
 *
 * A .json file holds one document payload or an array of them; any other
 * file is ingested as plain text.
 */

import chalk from 'chalk';
import ora from 'ora';
import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import { runWithRuntime } from '../shared.js';

interface IngestOptions {
  tenant: string;
  documentId?: string;
  sourceType: string;
  title?: string;
  url?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function ingestCommand(file: string, options: IngestOptions): Promise<void> {
  const content = readFileSync(file, 'utf-8');
  const base = basename(file, extname(file));

  await runWithRuntime(async runtime => {
    const ingestOne = async (payload: Record<string, unknown>): Promise<void> => {
      const spinner = ora(`Ingesting ${file}...`).start();
      try {
        const result = await runtime.pipeline.ingest(options.tenant, payload);
        spinner.succeed(
          result.skipped
            ? `Unchanged, skipped: ${chalk.yellow(result.documentId)} (${result.chunkCount} chunks)`
            : `Embedded ${chalk.yellow(result.documentId)}: ${result.chunkCount} chunks`
        );
      } catch (error) {
        spinner.fail(`Ingestion failed for ${file}`);
        throw error;
      }
    };

    if (extname(file).toLowerCase() === '.json') {
      const raw: unknown = JSON.parse(content);
      if (Array.isArray(raw)) {
        const spinner = ora(`Ingesting ${raw.length} documents...`).start();
        const result = await runtime.pipeline.ingestMany(options.tenant, raw);
        spinner.succeed(
          `Embedded ${result.embedded}, unchanged ${result.skipped}, failed ${result.failed} (${result.chunks} chunks)`
        );
        for (const failure of result.failures) {
          console.log(chalk.red(`  ✗ ${failure.documentId}: ${failure.kind} at ${failure.step}: ${failure.message}`));
        }
        if (result.failed > 0) process.exitCode = 1;
        return;
      }
      const payload = { documentId: options.documentId ?? base, sourceType: options.sourceType, ...(isRecord(raw) ? raw : {}) };
      await ingestOne(payload);
      return;
    }

    await ingestOne({
      documentId: options.documentId ?? base,
      sourceType: options.sourceType,
      text: content,
      title: options.title ?? base,
      sourceUrl: options.url,
    });
  });
}
