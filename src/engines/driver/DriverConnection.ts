import { MongoClient, MongoServerError } from 'mongodb';
import { AuthError, ConnectivityError, DocshiftError, diagnoseConnectivity, looksLikeConnectivityFailure } from '../../errors/index.js';
import { KeySpec } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { maskConnectionString } from '../../utils/mask.js';
import { CollectionStats, RawIndex, SchemaCatalog } from '../interfaces.js';

const AUTHENTICATION_FAILED = 18;

function toDirection(value: unknown): number | string {
  return typeof value === 'number' || typeof value === 'string' ? value : Number(value);
}

export function normalizeKeys(key: unknown): Record<string, number | string> {
  const out: Record<string, number | string> = {};
  if (key && typeof key === 'object') {
    for (const [field, direction] of Object.entries(key)) out[field] = toDirection(direction);
  }
  return out;
}

function toKeySpec(key: unknown): KeySpec {
  return Object.entries(normalizeKeys(key)).map(([field, direction]) => ({ field, direction }));
}

/** Maps driver failures that mean "cannot talk to this server" onto ConnectivityError; anything else is returned as is. */
export function classifyDriverError(error: unknown): unknown {
  if (error instanceof MongoServerError && error.code === AUTHENTICATION_FAILED) {
    return new AuthError(error.message);
  }
  if (error instanceof Error) {
    const text = `${error.name}: ${error.message}`;
    return looksLikeConnectivityFailure(text) ? diagnoseConnectivity(text) : error;
  }
  return error;
}

interface ShardEntry {
  _id: string;
  key?: Record<string, unknown>;
  dropped?: boolean;
}

export class DriverConnection implements SchemaCatalog {
  private client: MongoClient | null = null;
  private closed = false;

  constructor(private readonly uri: string, private readonly timeoutMs: number) {}

  private async connect(): Promise<MongoClient> {
    if (this.closed) throw new DocshiftError('MongoDB connection is already closed');
    if (this.client) return this.client;

    const client = new MongoClient(this.uri, {
      appName: 'docshift',
      serverSelectionTimeoutMS: this.timeoutMs,
      connectTimeoutMS: this.timeoutMs,
    });

    try {
      await client.connect();
    } catch (error) {
      const classified = classifyDriverError(error);
      logger.error({ target: maskConnectionString(this.uri), error: String(error) }, 'MongoDB connection failed');
      throw classified instanceof ConnectivityError ? classified : diagnoseConnectivity(String(error));
    }

    logger.info({ target: maskConnectionString(this.uri) }, 'Connected to MongoDB');
    this.client = client;
    return client;
  }

  private async call<T>(operation: (client: MongoClient) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      return await operation(client);
    } catch (error) {
      throw classifyDriverError(error);
    }
  }

  listDatabases() {
    return this.call(async client => {
      const result = await client.db('admin').admin().listDatabases();
      return result.databases.map(d => ({ name: d.name, sizeOnDisk: d.sizeOnDisk }));
    });
  }

  listCollections(database: string) {
    return this.call(async client => {
      const infos = await client.db(database).listCollections({}, { nameOnly: true }).toArray();
      return infos.map(info => info.name);
    });
  }

  collectionStats(database: string, collection: string) {
    return this.call(async (client): Promise<CollectionStats> => {
      const stats = await client.db(database).command({ collStats: collection });
      return {
        count: Number(stats.count ?? 0),
        size: Number(stats.size ?? 0),
        avgObjSize: Number(stats.avgObjSize ?? 0),
      };
    });
  }

  listIndexes(database: string, collection: string) {
    return this.call(async (client): Promise<RawIndex[]> => {
      const indexes = await client.db(database).collection(collection).listIndexes().toArray();
      return indexes.map(idx => ({
        name: String(idx.name),
        key: normalizeKeys(idx.key),
        unique: idx.unique === true,
        sparse: idx.sparse === true,
        background: idx.background === true,
        ...(idx.expireAfterSeconds != null ? { expireAfterSeconds: Number(idx.expireAfterSeconds) } : {}),
      }));
    });
  }

  findShardKey(namespace: string) {
    return this.call(async client => {
      const entry = await client.db('config').collection<ShardEntry>('collections').findOne({ _id: namespace });
      return entry && !entry.dropped ? toKeySpec(entry.key) : null;
    });
  }

  async close() {
    this.closed = true;
    if (this.client) {
      await this.client.close();
      this.client = null;
      logger.info('MongoDB connection closed');
    }
  }
}
