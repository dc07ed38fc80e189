import { ExtractionTimeout } from '../../errors/index.js';
import {
  CollectionSchema,
  DatabaseSchema,
  IndexSchema,
  KeySpec,
  SYSTEM_DATABASES,
  SchemaSnapshot,
  ShardStatus,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { CollectionStats, ExtractOptions, ISchemaInspector, RawIndex, SchemaCatalog } from '../interfaces.js';

const GB = 1024 * 1024 * 1024;
const ZERO_STATS: CollectionStats = { count: 0, size: 0, avgObjSize: 0 };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toIndex(raw: RawIndex): IndexSchema {
  return {
    name: raw.name,
    keys: Object.entries(raw.key).map(([field, direction]) => ({ field, direction })),
    unique: raw.unique === true,
    sparse: raw.sparse === true,
    background: raw.background === true,
    ...(raw.expireAfterSeconds !== undefined ? { expireAfterSeconds: raw.expireAfterSeconds } : {}),
  };
}

export class DriverInspector implements ISchemaInspector {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly now: () => Date = () => new Date()
  ) {}

  async extract({ timeoutSeconds, strictShardDetection }: ExtractOptions): Promise<SchemaSnapshot> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExtractionTimeout(timeoutSeconds));
      }, timeoutSeconds * 1000);
    });

    try {
      return await Promise.race([this.inspect(strictShardDetection, controller.signal, timeoutSeconds), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  async close() {
    await this.catalog.close();
  }

  /** Work stops at the next catalog call once the deadline has passed. */
  private async inspect(strict: boolean, signal: AbortSignal, timeoutSeconds: number): Promise<SchemaSnapshot> {
    const checkpoint = () => {
      if (signal.aborted) throw new ExtractionTimeout(timeoutSeconds);
    };
    const extractedAt = this.now().toISOString();
    const databases: DatabaseSchema[] = [];

    checkpoint();
    const all = await this.catalog.listDatabases();
    for (const info of all.filter(d => !SYSTEM_DATABASES.includes(d.name))) {
      logger.info(`Inspecting database: ${info.name}`);
      const collections: CollectionSchema[] = [];
      checkpoint();
      for (const name of await this.catalog.listCollections(info.name)) {
        collections.push(await this.inspectCollection(info.name, name, strict, checkpoint));
      }
      databases.push({ name: info.name, sizeGb: info.sizeOnDisk ? info.sizeOnDisk / GB : 0, collections });
    }

    return { extractedAt, databases };
  }

  private async inspectCollection(
    database: string,
    name: string,
    strict: boolean,
    checkpoint: () => void
  ): Promise<CollectionSchema> {
    const where = { database, collection: name };

    let stats = ZERO_STATS;
    checkpoint();
    try {
      stats = await this.catalog.collectionStats(database, name);
    } catch (error) {
      logger.warn({ ...where, error: describe(error) }, 'Collection stats unavailable, recording zeros');
    }

    let indexes: IndexSchema[] = [];
    checkpoint();
    try {
      indexes = (await this.catalog.listIndexes(database, name)).map(toIndex);
    } catch (error) {
      logger.warn({ ...where, error: describe(error) }, 'Indexes unavailable, recording none');
    }

    let shardStatus: ShardStatus = 'unsharded';
    let shardKey: KeySpec | null = null;
    checkpoint();
    try {
      shardKey = await this.catalog.findShardKey(`${database}.${name}`);
      if (shardKey) shardStatus = 'sharded';
    } catch (error) {
      shardStatus = strict ? 'unknown' : 'unsharded';
      logger.warn({ ...where, error: describe(error), shardStatus }, 'Shard metadata unreadable');
    }

    return {
      name,
      docCount: stats.count,
      sizeGb: stats.size ? stats.size / GB : 0,
      avgDocSize: stats.avgObjSize,
      indexes,
      shardStatus,
      shardKey,
    };
  }
}
