import {
  ClientFailureError,
  ExecutionTimeout,
  ExtractionTimeout,
  diagnoseConnectivity,
  looksLikeConnectivityFailure,
} from '../../errors/index.js';
import { literal } from '../../generator/identifiers.js';
import { parseSnapshot } from '../../schema/codec.js';
import { SYSTEM_DATABASES, SchemaSnapshot } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { ExecutionOutput, ExtractOptions, ICommandExecutor, ISchemaInspector } from '../interfaces.js';

/**
 * Builds the client-side extraction script. Each collection is inspected inside its own
 * try/catch blocks so one unreadable collection never aborts the snapshot.
 */
export function buildExtractionScript(strictShardDetection: boolean): string {
  return `// Generated by docshift: extracts databases, collections, indexes and shard keys
var strictShards = ${literal(strictShardDetection)};
var systemDatabases = ${literal(SYSTEM_DATABASES)};
var GB = 1024 * 1024 * 1024;

function normalizeKeys(key) {
  var out = {};
  Object.keys(key || {}).forEach(function (field) {
    var dir = key[field];
    out[field] = typeof dir === 'number' || typeof dir === 'string' ? dir : Number(dir);
  });
  return out;
}

var schema = { extracted_at: new Date().toISOString(), databases: [] };
var dbList = db.adminCommand({ listDatabases: 1 }).databases;

dbList.filter(function (info) { return systemDatabases.indexOf(info.name) < 0; }).forEach(function (info) {
  var dbName = info.name;
  var currentDb = db.getSiblingDB(dbName);
  var dbSchema = { database: dbName, size_gb: info.sizeOnDisk ? Number(info.sizeOnDisk) / GB : 0, collections: [] };

  currentDb.getCollectionNames().forEach(function (collName) {
    var stats;
    try {
      stats = currentDb.runCommand({ collStats: collName });
      if (!stats || !stats.ok) stats = { count: 0, size: 0, avgObjSize: 0 };
    } catch (e) {
      stats = { count: 0, size: 0, avgObjSize: 0 };
    }

    var indexes = [];
    try {
      currentDb.getCollection(collName).getIndexes().forEach(function (idx) {
        var entry = {
          name: idx.name,
          keys: normalizeKeys(idx.key),
          unique: !!idx.unique,
          sparse: !!idx.sparse,
          background: !!idx.background
        };
        if (idx.expireAfterSeconds !== undefined && idx.expireAfterSeconds !== null) {
          entry.expireAfterSeconds = Number(idx.expireAfterSeconds);
        }
        indexes.push(entry);
      });
    } catch (e) {
      indexes = [];
    }

    var shardStatus = 'unsharded';
    var shardKey = null;
    try {
      var shardInfo = db.getSiblingDB('config').getCollection('collections').findOne({ _id: dbName + '.' + collName });
      if (shardInfo && !shardInfo.dropped) {
        shardStatus = 'sharded';
        shardKey = normalizeKeys(shardInfo.key);
      }
    } catch (e) {
      if (strictShards) shardStatus = 'unknown';
    }

    var collSchema = {
      name: collName,
      doc_count: Number(stats.count || 0),
      size_gb: stats.size ? Number(stats.size) / GB : 0,
      avg_doc_size: Number(stats.avgObjSize || 0),
      indexes: indexes,
      is_sharded: shardStatus === 'sharded',
      shard_key: shardKey
    };
    if (shardStatus === 'unknown') collSchema.shard_status = 'unknown';
    dbSchema.collections.push(collSchema);
  });

  schema.databases.push(dbSchema);
});

print(JSON.stringify(schema));
`;
}

export class ShellInspector implements ISchemaInspector {
  constructor(private readonly executor: ICommandExecutor) {}

  async extract({ timeoutSeconds, strictShardDetection }: ExtractOptions): Promise<SchemaSnapshot> {
    logger.info({ target: this.executor.target }, 'Extracting schema through client script');

    let output: ExecutionOutput;
    try {
      output = await this.executor.run(buildExtractionScript(strictShardDetection), { timeoutSeconds });
    } catch (error) {
      if (error instanceof ExecutionTimeout) throw new ExtractionTimeout(timeoutSeconds);
      throw error;
    }

    if (output.exitCode !== 0) {
      if (looksLikeConnectivityFailure(output.stderr)) throw diagnoseConnectivity(output.stderr);
      throw new ClientFailureError(output.exitCode, output.stderr);
    }

    const lines = output.stdout.split(/\r?\n/).filter(line => line.trim() !== '');
    return parseSnapshot(lines[lines.length - 1] ?? '');
  }

  async close() {}
}
