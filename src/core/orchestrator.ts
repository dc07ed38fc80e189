import fs from 'fs-extra';
import path from 'path';
import { AppConfig, requireConnection, resolveTimeout } from '../config/index.js';
import { ClientFailureError, diagnoseConnectivity, looksLikeConnectivityFailure } from '../errors/index.js';
import { EngineFactory } from '../engines/factory.js';
import { ICommandExecutor, ISchemaInspector, IScriptGenerator } from '../engines/interfaces.js';
import { ApplyPlan } from '../generator/generator.js';
import { loadSnapshot, saveSnapshot } from '../schema/codec.js';
import { SchemaSnapshot } from '../types/index.js';
import { ApplySummary } from '../types/results.js';
import { logger } from '../utils/logger.js';
import { maskConnectionString } from '../utils/mask.js';
import { mergePlanOutcomes, parseApplySummary } from './aggregator.js';

export const EXTRACT_TIMEOUT_SECONDS = 120;

export interface OrchestratorDeps {
  inspector?: ISchemaInspector;
  executor?: ICommandExecutor;
  generator?: IScriptGenerator;
}

export interface ApplyOptions {
  /** Where to keep a copy of the generated script. */
  scriptOut?: string;
  /** Generate (and optionally save) the script without contacting the destination. */
  dryRun?: boolean;
}

export interface ApplyOutcome {
  snapshot: SchemaSnapshot;
  plan: ApplyPlan;
  script: string;
  summary?: ApplySummary;
  transcript?: string;
}

export class Orchestrator {
  private generator: IScriptGenerator;

  constructor(private readonly config: AppConfig, private readonly deps: OrchestratorDeps = {}) {
    this.generator = deps.generator ?? EngineFactory.createGenerator();
  }

  async extract(outputPath: string): Promise<SchemaSnapshot> {
    const uri = requireConnection(this.config, 'sourceUri');
    const timeoutSeconds = resolveTimeout(this.config, EXTRACT_TIMEOUT_SECONDS);
    const inspector =
      this.deps.inspector ?? EngineFactory.createInspector(this.config.engine, uri, this.config.client, timeoutSeconds);

    logger.info({ source: maskConnectionString(uri), engine: this.config.engine }, 'Starting schema extraction...');
    try {
      const snapshot = await inspector.extract({
        timeoutSeconds,
        strictShardDetection: this.config.strictShardDetection,
      });
      await saveSnapshot(snapshot, outputPath);
      logger.info(`Schema extracted and saved to: ${outputPath}`);
      return snapshot;
    } finally {
      await inspector.close();
    }
  }

  async apply(schemaPath: string, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const uri = options.dryRun ? undefined : requireConnection(this.config, 'destUri');

    const snapshot = await loadSnapshot(schemaPath);
    logger.info(`Loaded schema: ${schemaPath}`);

    const plan = this.generator.plan(snapshot, this.config.prefix);
    const script = this.generator.render(plan);

    if (options.scriptOut) {
      await fs.ensureDir(path.dirname(options.scriptOut));
      await fs.writeFile(options.scriptOut, script, 'utf-8');
      logger.info(`Apply script written to: ${options.scriptOut}`);
    }

    if (!uri) {
      return { snapshot, plan, script };
    }

    const executor = this.deps.executor ?? EngineFactory.createExecutor(uri, this.config.client);
    logger.info({ destination: executor.target, prefix: this.config.prefix || null }, 'Applying schema to destination...');

    const output = await executor.run(script, { timeoutSeconds: resolveTimeout(this.config, EXTRACT_TIMEOUT_SECONDS) });
    if (output.exitCode !== 0) {
      if (looksLikeConnectivityFailure(output.stderr)) throw diagnoseConnectivity(output.stderr);
      throw new ClientFailureError(output.exitCode, output.stderr);
    }

    const summary = mergePlanOutcomes(parseApplySummary(output.stdout), plan);
    logger.info(
      { databases: summary.databases, collections: summary.collections, indexes: summary.indexes, errors: summary.errors.length },
      'Schema application completed'
    );
    return { snapshot, plan, script, summary, transcript: output.stdout };
  }
}
