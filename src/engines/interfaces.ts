import { ApplyPlan } from '../generator/generator.js';
import { KeySpec, SchemaSnapshot } from '../types/index.js';

export interface ExecutionOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecuteOptions {
  timeoutSeconds: number;
}

/**
 * Runs command scripts against one target. The shell implementation spawns one client
 * process per call; a driver-backed implementation can stand in without changing callers.
 */
export interface ICommandExecutor {
  readonly target: string;
  run(script: string, options: ExecuteOptions): Promise<ExecutionOutput>;
}

export interface ExtractOptions {
  timeoutSeconds: number;
  strictShardDetection: boolean;
}

export interface ISchemaInspector {
  extract(options: ExtractOptions): Promise<SchemaSnapshot>;
  close(): Promise<void>;
}

export interface IScriptGenerator {
  plan(snapshot: SchemaSnapshot, prefix?: string): ApplyPlan;
  render(plan: ApplyPlan): string;
}

export interface CollectionStats {
  count: number;
  size: number;
  avgObjSize: number;
}

export interface RawIndex {
  name: string;
  key: Record<string, number | string>;
  unique?: boolean;
  sparse?: boolean;
  background?: boolean;
  expireAfterSeconds?: number;
}

/** Read-only view of a server's catalog, as needed by the driver inspector. */
export interface SchemaCatalog {
  listDatabases(): Promise<Array<{ name: string; sizeOnDisk?: number }>>;
  listCollections(database: string): Promise<string[]>;
  collectionStats(database: string, collection: string): Promise<CollectionStats>;
  listIndexes(database: string, collection: string): Promise<RawIndex[]>;
  /** Shard key of `<db>.<collection>` from config.collections, or null when none is registered. */
  findShardKey(namespace: string): Promise<KeySpec | null>;
  close(): Promise<void>;
}
