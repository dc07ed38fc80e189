import dayjs from 'dayjs';
import { UnitBatch, UnitRun } from '../core/units.js';
import { assertDatabaseName, literal } from '../generator/identifiers.js';
import { ResultExporter } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';
import { QueryEntry, ToolContext, describeError, firstLine, isFatal } from './common.js';

const EXEC_TIME_MARKER = 'EXEC_TIME:';

export function buildQueryScript(database: string, query: string): string {
  assertDatabaseName(database);
  return [
    `var targetDb = db.getSiblingDB(${literal(database)});`,
    'var startMs = Date.now();',
    `var result = ${query};`,
    'var endMs = Date.now();',
    `print('${EXEC_TIME_MARKER}' + (endMs - startMs));`,
    '',
  ].join('\n');
}

/** Server-side duration in seconds, from the `EXEC_TIME:<ms>` line. */
export function parseExecTime(stdout: string): number | null {
  for (const line of stdout.split(/\r?\n/)) {
    if (line.startsWith(EXEC_TIME_MARKER)) {
      const ms = Number(line.slice(EXEC_TIME_MARKER.length));
      return Number.isFinite(ms) ? ms / 1000 : null;
    }
  }
  return null;
}

export function runColumnName(collection: string, epochSeconds: number): string {
  return `${collection}_${epochSeconds}`;
}

export async function runQueries(entries: QueryEntry[], ctx: ToolContext): Promise<UnitBatch> {
  const batch = new UnitBatch();
  logger.info(`Found ${entries.length} queries to execute`);

  for (const entry of entries) {
    const unit = new UnitRun(entry.description, ctx.clock).start();
    logger.info(entry.description);

    try {
      const output = await ctx.executor.run(buildQueryScript(ctx.database, entry.query), {
        timeoutSeconds: ctx.timeoutSeconds,
      });
      const seconds = output.exitCode === 0 ? parseExecTime(output.stdout) : null;
      if (seconds !== null) {
        batch.add(unit.succeed(seconds));
        logger.info({ query: entry.description, time: Number(seconds.toFixed(3)) }, 'Query executed');
      } else {
        const reason = output.exitCode === 0 ? 'no EXEC_TIME line in client output' : firstLine(output.stderr) || `client exited with code ${output.exitCode}`;
        batch.add(unit.fail(reason));
        logger.error({ query: entry.description, reason }, 'Query failed');
      }
    } catch (error) {
      if (isFatal(error)) throw error;
      batch.add(unit.fail(describeError(error)));
      logger.error({ query: entry.description, error: describeError(error) }, 'Query failed');
    }
  }

  const totals = batch.totals();
  logger.info(`Summary: ${totals.succeeded}/${totals.attempted} queries executed`);
  logger.info(`Total: ${totals.totalTime.toFixed(3)}s | Avg: ${totals.averageTime.toFixed(3)}s`);
  return batch;
}

/** Runs the queries and appends this run as a new column of the timing table. */
export async function runQueriesAndExport(
  entries: QueryEntry[],
  ctx: ToolContext,
  outputFile: string,
  epochSeconds: number = dayjs().unix()
): Promise<UnitBatch> {
  const batch = await runQueries(entries, ctx);
  await ResultExporter.mergeTimings(outputFile, runColumnName(ctx.collection, epochSeconds), batch.all());
  return batch;
}
