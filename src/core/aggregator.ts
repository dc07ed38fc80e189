import Table from 'cli-table3';
import { z } from 'zod';
import { DocshiftError } from '../errors/index.js';
import { ApplyPlan, FOOTER_TITLE } from '../generator/generator.js';
import { ApplyResult, ApplySummary } from '../types/results.js';

const errorRecordSchema = z.object({
  db: z.string(),
  collection: z.string().optional(),
  index: z.string().optional(),
  operation: z.enum(['enableSharding', 'createCollection', 'shardCollection', 'createIndex']),
  error: z.string(),
});

const COUNTER_LINES = {
  databases: /^Databases Created: (\d+)$/,
  collections: /^Collections Created: (\d+)$/,
  indexes: /^Indexes Created: (\d+)$/,
  errors: /^Errors: (\d+)$/,
} as const;

export class SummaryParseError extends DocshiftError {}

function readCounter(lines: string[], from: number, pattern: RegExp, label: string): { value: number; line: number } {
  for (let i = from; i < lines.length; i++) {
    const match = pattern.exec(lines[i] ?? '');
    if (match) return { value: Number(match[1]), line: i };
  }
  throw new SummaryParseError(`Summary footer is missing "${label}"`);
}

/**
 * Reads the summary footer printed by a generated apply script.
 * Only the block after the last footer title is considered; the progress transcript before it is ignored.
 */
export function parseApplySummary(stdout: string): ApplySummary {
  const lines = stdout.split(/\r?\n/).map(l => l.trimEnd());
  const start = lines.lastIndexOf(FOOTER_TITLE);
  if (start < 0) {
    throw new SummaryParseError('Apply output has no summary footer', 'The script did not run to completion; check the client output above.');
  }

  const databases = readCounter(lines, start, COUNTER_LINES.databases, 'Databases Created');
  const collections = readCounter(lines, databases.line, COUNTER_LINES.collections, 'Collections Created');
  const indexes = readCounter(lines, collections.line, COUNTER_LINES.indexes, 'Indexes Created');
  const errorCount = readCounter(lines, indexes.line, COUNTER_LINES.errors, 'Errors');

  const errors: ApplyResult[] = [];
  for (let i = errorCount.line + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!line.startsWith('  - ')) break;
    const record = errorRecordSchema.parse(JSON.parse(line.slice(4)));
    errors.push({
      target: { database: record.db, collection: record.collection, index: record.index, operation: record.operation },
      status: 'failed',
      message: record.error,
    });
  }

  if (errors.length !== errorCount.value) {
    throw new SummaryParseError(`Summary footer lists ${errors.length} error records but reports ${errorCount.value}`);
  }

  return { databases: databases.value, collections: collections.value, indexes: indexes.value, skipped: [], errors };
}

/** Folds what the generator already decided (skipped and rejected objects) into the parsed run summary. */
export function mergePlanOutcomes(summary: ApplySummary, plan: ApplyPlan): ApplySummary {
  return {
    ...summary,
    skipped: [...plan.skipped, ...summary.skipped],
    errors: [...plan.rejected, ...summary.errors],
  };
}

export function describeTarget(result: ApplyResult): string {
  const { database, collection, index } = result.target;
  return [database, collection, index].filter(Boolean).join('.');
}

export function renderApplySummary(summary: ApplySummary): string {
  const lines = [
    `Databases: ${summary.databases}`,
    `Collections: ${summary.collections}`,
    `Indexes: ${summary.indexes}`,
    `Skipped: ${summary.skipped.length}`,
    `Errors: ${summary.errors.length}`,
  ];

  if (summary.errors.length > 0) {
    const table = new Table({
      head: ['Target', 'Operation', 'Error'],
      colWidths: [50, 20, 70],
      wordWrap: true,
    });
    summary.errors.forEach(err => table.push([describeTarget(err), err.target.operation, err.message]));
    lines.push('', table.toString());
  }

  return lines.join('\n');
}
