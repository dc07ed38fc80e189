#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { AppConfig, loadConfig, loadEnvFile, requireConnection, resolveTimeout } from '../config/index.js';
import { renderApplySummary } from '../core/aggregator.js';
import { Orchestrator } from '../core/orchestrator.js';
import { renderSnapshotSummary } from '../core/report.js';
import { EngineFactory } from '../engines/factory.js';
import { DeserializationError, DocshiftError } from '../errors/index.js';
import { ToolContext, loadIndexEntries, loadQueryEntries } from '../tools/common.js';
import { ExplainCapture } from '../tools/explain.js';
import { createIndexes } from '../tools/indexes.js';
import { runQueriesAndExport } from '../tools/queries.js';
import { countSnapshot } from '../types/index.js';
import { logger, setLogLevel } from '../utils/logger.js';
import { maskConnectionStrings } from '../utils/mask.js';
import { TranscriptWriter } from '../writer/writer.js';

const TOOL_TIMEOUT_SECONDS = 60;

type Options = Record<string, unknown>;

function handleError(error: unknown): never {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid configuration');
  } else if (error instanceof DeserializationError) {
    logger.error({ issues: error.issues, hint: error.hint }, error.message);
  } else if (error instanceof DocshiftError) {
    logger.error({ hint: error.hint }, error.message);
  } else {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    logger.error({ error: maskConnectionStrings(message) }, 'Error during execution');
  }
  process.exit(1);
}

export function buildConfig(program: Command, overrides: Options): AppConfig {
  const globals = program.opts<{ envFile?: string; client?: string; logLevel?: string }>();
  loadEnvFile(globals.envFile);
  const config = loadConfig(process.env, { client: globals.client, logLevel: globals.logLevel, ...overrides });
  setLogLevel(config.logLevel);
  return config;
}

function toolContext(config: AppConfig, timeoutSeconds: number): ToolContext {
  const uri = requireConnection(config, 'uri');
  return {
    executor: EngineFactory.createExecutor(uri, config.client),
    database: config.database,
    collection: config.collection,
    timeoutSeconds,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('docshift')
    .description('Extract MongoDB schema structure and replay it on another server')
    .version('1.0.0')
    .option('--env-file <path>', 'Path to .env file')
    .option('--client <path>', 'Database client binary (MONGOSH_PATH)')
    .option('--log-level <level>', 'Log level (LOG_LEVEL)');

  program
    .command('extract')
    .description('Capture databases, collections, indexes and shard keys from the source server')
    .option('-o, --output <path>', 'Output schema JSON file', 'schema.json')
    .option('-s, --source <uri>', 'Source connection string (SOURCE_MONGODB_CONNECTION_STRING)')
    .option('-e, --engine <engine>', 'Extraction engine: shell or driver (EXTRACT_ENGINE)')
    .option('--strict-shards', 'Record unreadable shard metadata as unknown instead of unsharded')
    .option('-t, --timeout <seconds>', 'Extraction timeout in seconds (TIMEOUT_SECONDS)')
    .action(async (options: Options) => {
      try {
        const config = buildConfig(program, {
          sourceUri: options.source,
          engine: options.engine,
          strictShardDetection: options.strictShards,
          timeoutSeconds: options.timeout,
        });
        const output = String(options.output);
        const snapshot = await new Orchestrator(config).extract(output);

        console.log(`\nSchema extracted and saved to: ${output}\n`);
        console.log(renderSnapshotSummary(snapshot));
        console.log('\nNext steps:');
        console.log(`   1. Review/edit ${output} to remove unwanted databases/collections`);
        console.log(`   2. Run: docshift apply --schema ${output}`);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('apply')
    .description('Recreate the structure described by a schema file on the destination server')
    .option('--schema <path>', 'Input schema JSON file', 'schema.json')
    .option('-d, --dest <uri>', 'Destination connection string (DEST_MONGODB_CONNECTION_STRING)')
    .option('-p, --prefix <prefix>', 'Prefix added to every database name (DATABASE_PREFIX)')
    .option('--script-out <path>', 'Also write the generated script to this file')
    .option('--dry-run', 'Generate the script without contacting the destination')
    .option('-t, --timeout <seconds>', 'Apply timeout in seconds (TIMEOUT_SECONDS)')
    .action(async (options: Options) => {
      try {
        const config = buildConfig(program, {
          destUri: options.dest,
          prefix: options.prefix,
          timeoutSeconds: options.timeout,
        });
        const outcome = await new Orchestrator(config).apply(String(options.schema), {
          scriptOut: typeof options.scriptOut === 'string' ? options.scriptOut : undefined,
          dryRun: options.dryRun === true,
        });

        const totals = countSnapshot(outcome.snapshot);
        console.log(`\nSchema Summary: ${totals.databases} databases, ${totals.collections} collections, ${totals.indexes} indexes, ${totals.shardedCollections} sharded`);

        if (outcome.transcript !== undefined) console.log(`\n${outcome.transcript}`);
        if (outcome.summary) console.log(renderApplySummary(outcome.summary));
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('create-indexes')
    .description('Create the indexes listed in a JSON file on one collection')
    .option('-u, --uri <uri>', 'Connection string (MONGODB_CONNECTION_STRING)')
    .option('--database <name>', 'Database name (MONGODB_DATABASE)')
    .option('--collection <name>', 'Collection name (MONGODB_COLLECTION)')
    .option('-i, --indexes <path>', 'Index list file (INDEXES_FILE)')
    .option('-t, --timeout <seconds>', 'Per-index timeout in seconds (TIMEOUT_SECONDS)')
    .action(async (options: Options) => {
      try {
        const config = buildConfig(program, {
          uri: options.uri,
          database: options.database,
          collection: options.collection,
          indexesFile: options.indexes,
          timeoutSeconds: options.timeout,
        });
        logger.info({ database: config.database, collection: config.collection }, 'MongoDB Index Creator');
        const entries = await loadIndexEntries(config.indexesFile);
        await createIndexes(entries, toolContext(config, resolveTimeout(config, TOOL_TIMEOUT_SECONDS)));
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('run-queries')
    .description('Time the queries listed in a JSON file and merge the results into a table')
    .option('-u, --uri <uri>', 'Connection string (MONGODB_CONNECTION_STRING)')
    .option('--database <name>', 'Database name (MONGODB_DATABASE)')
    .option('--collection <name>', 'Collection name (MONGODB_COLLECTION)')
    .option('-q, --queries <path>', 'Query list file (QUERIES_FILE)')
    .option('-o, --output <path>', 'Timing table, .csv or .xlsx (QUERY_OUTPUT_FILE)')
    .option('-t, --timeout <seconds>', 'Per-query timeout in seconds (TIMEOUT_SECONDS)')
    .action(async (options: Options) => {
      try {
        const config = buildConfig(program, {
          uri: options.uri,
          database: options.database,
          collection: options.collection,
          queriesFile: options.queries,
          queryOutputFile: options.output,
          timeoutSeconds: options.timeout,
        });
        logger.info({ database: config.database, collection: config.collection }, 'MongoDB Query Executor');
        const entries = await loadQueryEntries(config.queriesFile, config.collection);
        await runQueriesAndExport(entries, toolContext(config, resolveTimeout(config, TOOL_TIMEOUT_SECONDS)), config.queryOutputFile);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('explain')
    .description('Capture explain plans for the queries listed in a JSON file')
    .option('-u, --uri <uri>', 'Connection string (MONGODB_CONNECTION_STRING)')
    .option('--database <name>', 'Database name (MONGODB_DATABASE)')
    .option('--collection <name>', 'Collection name (MONGODB_COLLECTION)')
    .option('-q, --queries <path>', 'Query list file (QUERIES_FILE)')
    .option('--out-dir <path>', 'Directory for explain_out_<epoch>.txt (EXPLAIN_OUTPUT_DIR)')
    .option('-t, --explain-timeout <seconds>', 'Per-attempt timeout in seconds (EXPLAIN_TIMEOUT_SECONDS)')
    .action(async (options: Options) => {
      try {
        const config = buildConfig(program, {
          uri: options.uri,
          database: options.database,
          collection: options.collection,
          queriesFile: options.queries,
          explainOutputDir: options.outDir,
          explainTimeoutSeconds: options.explainTimeout,
        });
        logger.info({ database: config.database, collection: config.collection }, 'MongoDB Explain Generator');
        const entries = await loadQueryEntries(config.queriesFile, config.collection);
        const capture = new ExplainCapture(
          toolContext(config, config.explainTimeoutSeconds),
          new TranscriptWriter(config.explainOutputDir)
        );
        await capture.run(entries);
      } catch (error) {
        handleError(error);
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv) {
  await createProgram().parseAsync(argv);
}

const isMain = process.argv[1] !== undefined && fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
  runCli().catch(handleError);
}
