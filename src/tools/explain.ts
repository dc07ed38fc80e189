import { UnitBatch, UnitRun } from '../core/units.js';
import { ExecutionOutput } from '../engines/interfaces.js';
import { assertDatabaseName, literal } from '../generator/identifiers.js';
import { ExplainMode, UnitResult } from '../types/results.js';
import { logger } from '../utils/logger.js';
import { RULE, THIN_RULE, TranscriptWriter } from '../writer/writer.js';
import { QueryEntry, ToolContext, describeError, isFatal, isTimeout } from './common.js';

export const HIGH_VERBOSITY: ExplainMode = 'allPlansExecution';
export const REDUCED_VERBOSITY: ExplainMode = 'executionStats';

const COUNT_DOCUMENTS = [
  /targetDb\.([\w-]+)\.countDocuments\((.*)\)/,
  /targetDb\.getCollection\((?:"|')([^"']+)(?:"|')\)\.countDocuments\((.*)\)/,
];

/** Rewrites a query expression into the form that returns its explain plan. */
export function transformToExplain(query: string, mode: ExplainMode): string {
  const explainCall = `.explain(${literal(mode)})`;

  if (query.includes('countDocuments(')) {
    for (const pattern of COUNT_DOCUMENTS) {
      const match = pattern.exec(query);
      if (match) {
        const filter = (match[2] ?? '').trim() || '{}';
        return `targetDb.runCommand({explain: {count: ${literal(match[1])}, query: ${filter}}, verbosity: ${literal(mode)}})`;
      }
    }
  }

  if (query.includes('.toArray()')) {
    return query.replaceAll('.toArray()', explainCall);
  }

  return query.trimEnd() + explainCall;
}

export function buildExplainScript(database: string, query: string, mode: ExplainMode): string {
  assertDatabaseName(database);
  return [
    `var targetDb = db.getSiblingDB(${literal(database)});`,
    `var explainResult = ${transformToExplain(query, mode)};`,
    'print(JSON.stringify(explainResult, null, 2));',
    '',
  ].join('\n');
}

type Attempt =
  | { kind: 'output'; output: ExecutionOutput }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string };

export class ExplainCapture {
  constructor(
    private readonly ctx: ToolContext,
    private readonly writer: TranscriptWriter
  ) {}

  async run(entries: QueryEntry[]): Promise<UnitBatch> {
    const batch = new UnitBatch();
    logger.info(`Found ${entries.length} queries to explain`);

    await this.writer.open({ title: 'MongoDB Explain Output', database: this.ctx.database, collection: this.ctx.collection });
    try {
      for (const [i, entry] of entries.entries()) {
        logger.info(`[${i + 1}/${entries.length}] ${entry.description}`);
        await this.writer.write(`Query ${i + 1}: ${entry.description}\n${THIN_RULE}\nOriginal Query: ${entry.query}\n\n`);
        batch.add(await this.explainOne(entry));
        await this.writer.write(`\n${RULE}\n\n`);
      }
    } finally {
      await this.writer.close();
    }

    logger.info(`Explain output saved to: ${this.writer.getFilePath()}`);
    return batch;
  }

  /**
   * High verbosity first. Only a timeout falls back to the reduced mode; any other
   * failure is recorded as the unit's error straight away.
   */
  private async explainOne(entry: QueryEntry): Promise<UnitResult> {
    const unit = new UnitRun(entry.description, this.ctx.clock).start(HIGH_VERBOSITY);

    const first = await this.attempt(entry, HIGH_VERBOSITY);
    if (first.kind !== 'timeout') {
      return this.settle(unit, first, HIGH_VERBOSITY);
    }

    logger.warn({ query: entry.description }, `${HIGH_VERBOSITY} timed out, falling back to ${REDUCED_VERBOSITY}`);
    await this.writer.write(`Note: ${HIGH_VERBOSITY} timed out, using ${REDUCED_VERBOSITY}...\n\n`);
    unit.fallback(REDUCED_VERBOSITY);

    const second = await this.attempt(entry, REDUCED_VERBOSITY);
    if (second.kind === 'timeout') {
      await this.writer.write(`ERROR: ${REDUCED_VERBOSITY} timed out after ${this.ctx.timeoutSeconds} seconds\n`);
      logger.error({ query: entry.description }, 'Explain timed out');
      return unit.fail(`${REDUCED_VERBOSITY} timed out`);
    }
    return this.settle(unit, second, REDUCED_VERBOSITY);
  }

  private async attempt(entry: QueryEntry, mode: ExplainMode): Promise<Attempt> {
    try {
      const output = await this.ctx.executor.run(buildExplainScript(this.ctx.database, entry.query, mode), {
        timeoutSeconds: this.ctx.timeoutSeconds,
      });
      if (output.exitCode !== 0 && /timeout|timed out/i.test(output.stderr)) {
        return { kind: 'timeout' };
      }
      return { kind: 'output', output };
    } catch (error) {
      if (isFatal(error)) throw error;
      if (isTimeout(error)) return { kind: 'timeout' };
      return { kind: 'error', message: describeError(error) };
    }
  }

  private async settle(unit: UnitRun, attempt: Exclude<Attempt, { kind: 'timeout' }>, mode: ExplainMode): Promise<UnitResult> {
    if (attempt.kind === 'error') {
      await this.writer.write(`ERROR: ${attempt.message}\n`);
      logger.error({ query: unit.name, error: attempt.message }, 'Explain failed');
      return unit.fail(attempt.message);
    }

    const { output } = attempt;
    if (output.exitCode === 0) {
      await this.writer.write(`Explain Output (mode: ${mode}):\n${output.stdout}\n`);
      logger.info({ query: unit.name, mode }, 'Explain captured');
      return unit.succeed();
    }

    await this.writer.write(`ERROR:\n${output.stderr}\n`);
    logger.error({ query: unit.name, stderr: output.stderr }, 'Explain failed');
    return unit.fail(output.stderr.trim() || `client exited with code ${output.exitCode}`);
  }
}
