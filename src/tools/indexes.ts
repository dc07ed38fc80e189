import { UnitBatch, UnitRun } from '../core/units.js';
import { assertCollectionName, assertDatabaseName, assertIndexName, literal } from '../generator/identifiers.js';
import { logger } from '../utils/logger.js';
import { IndexEntry, ToolContext, describeError, firstLine, isFatal } from './common.js';

export function buildIndexScript(database: string, collection: string, entry: IndexEntry): string {
  assertDatabaseName(database);
  assertCollectionName(collection);
  assertIndexName(entry.name);
  return [
    `var targetDb = db.getSiblingDB(${literal(database)});`,
    `var result = targetDb.getCollection(${literal(collection)}).createIndex(${literal(entry.keys)}, ${literal({ name: entry.name, background: true })});`,
    'print(JSON.stringify(result));',
    '',
  ].join('\n');
}

/** Creates each index in its own client run; a failed index never stops the ones after it. */
export async function createIndexes(entries: IndexEntry[], ctx: ToolContext): Promise<UnitBatch> {
  const batch = new UnitBatch();
  logger.info(`Found ${entries.length} indexes to create`);

  for (const entry of entries) {
    const unit = new UnitRun(entry.name, ctx.clock).start();
    logger.info(`Creating: ${entry.name}`);

    try {
      const output = await ctx.executor.run(buildIndexScript(ctx.database, ctx.collection, entry), {
        timeoutSeconds: ctx.timeoutSeconds,
      });
      if (output.exitCode === 0) {
        const result = batch.add(unit.succeed());
        logger.info({ index: entry.name, time: Number(result.time.toFixed(2)) }, 'Index created');
      } else {
        batch.add(unit.fail(firstLine(output.stderr) || `client exited with code ${output.exitCode}`));
        logger.error({ index: entry.name, stderr: output.stderr }, 'Index creation failed');
      }
    } catch (error) {
      if (isFatal(error)) throw error;
      batch.add(unit.fail(describeError(error)));
      logger.error({ index: entry.name, error: describeError(error) }, 'Index creation failed');
    }
  }

  const totals = batch.totals();
  logger.info(`Summary: ${totals.succeeded}/${totals.attempted} indexes created`);
  return batch;
}
