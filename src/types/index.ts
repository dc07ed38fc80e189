export type KeyDirection = number | string;

export interface KeyField {
  readonly field: string;
  readonly direction: KeyDirection;
}

/** Ordered field → direction (or special index type) pairs. */
export type KeySpec = readonly KeyField[];

export type ShardKey = KeySpec;

export type ShardStatus = 'sharded' | 'unsharded' | 'unknown';

export interface IndexSchema {
  readonly name: string;
  readonly keys: KeySpec;
  readonly unique: boolean;
  readonly sparse: boolean;
  readonly background: boolean;
  readonly expireAfterSeconds?: number;
}

export interface CollectionSchema {
  readonly name: string;
  readonly docCount: number;
  readonly sizeGb: number;
  readonly avgDocSize: number;
  readonly indexes: readonly IndexSchema[];
  readonly shardStatus: ShardStatus;
  readonly shardKey: ShardKey | null;
}

export interface DatabaseSchema {
  readonly name: string;
  readonly sizeGb: number;
  readonly collections: readonly CollectionSchema[];
}

export interface SchemaSnapshot {
  readonly extractedAt: string;
  readonly databases: readonly DatabaseSchema[];
}

export const IDENTITY_INDEX = '_id_';

export const SYSTEM_DATABASES: readonly string[] = ['admin', 'local', 'config'];

export function isSharded(collection: CollectionSchema): boolean {
  return collection.shardStatus === 'sharded';
}

export interface SnapshotTotals {
  databases: number;
  collections: number;
  indexes: number;
  shardedCollections: number;
}

export function countSnapshot(snapshot: SchemaSnapshot): SnapshotTotals {
  const totals: SnapshotTotals = { databases: snapshot.databases.length, collections: 0, indexes: 0, shardedCollections: 0 };
  for (const db of snapshot.databases) {
    totals.collections += db.collections.length;
    for (const coll of db.collections) {
      totals.indexes += coll.indexes.length;
      if (isSharded(coll)) totals.shardedCollections++;
    }
  }
  return totals;
}
