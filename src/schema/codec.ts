import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, DeserializationError } from '../errors/index.js';
import {
  CollectionSchema,
  DatabaseSchema,
  IndexSchema,
  KeySpec,
  SchemaSnapshot,
  ShardStatus,
} from '../types/index.js';

const keySpecSchema = z
  .record(z.union([z.number(), z.string().min(1)]))
  .refine(keys => Object.keys(keys).length > 0, { message: 'key specification must name at least one field' });

const indexSchema = z.object({
  name: z.string().min(1),
  keys: keySpecSchema,
  unique: z.boolean().default(false),
  sparse: z.boolean().default(false),
  background: z.boolean().default(false),
  expireAfterSeconds: z.number().nonnegative().nullable().optional(),
});

const collectionSchema = z
  .object({
    name: z.string().min(1),
    doc_count: z.number().int().nonnegative().default(0),
    size_gb: z.number().nonnegative().default(0),
    avg_doc_size: z.number().nonnegative().default(0),
    indexes: z.array(indexSchema).default([]),
    is_sharded: z.boolean().default(false),
    shard_key: keySpecSchema.nullable().default(null),
    shard_status: z.literal('unknown').optional(),
  })
  .superRefine((coll, ctx) => {
    if (coll.is_sharded && !coll.shard_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['shard_key'], message: 'sharded collection needs a shard_key' });
    }
    if (!coll.is_sharded && coll.shard_key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['shard_key'], message: 'shard_key is only allowed when is_sharded is true' });
    }
    if (coll.is_sharded && coll.shard_status) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['shard_status'], message: 'a sharded collection cannot have an unknown shard status' });
    }
    addDuplicateIssues(coll.indexes.map(i => i.name), 'indexes', 'index', ctx);
  });

const databaseSchema = z
  .object({
    database: z.string().min(1),
    size_gb: z.number().nonnegative().default(0),
    collections: z.array(collectionSchema).default([]),
  })
  .superRefine((db, ctx) => addDuplicateIssues(db.collections.map(c => c.name), 'collections', 'collection', ctx));

const snapshotSchema = z
  .object({
    extracted_at: z.string().default(''),
    databases: z.array(databaseSchema),
  })
  .superRefine((snap, ctx) => addDuplicateIssues(snap.databases.map(d => d.database), 'databases', 'database', ctx));

export type PersistedSnapshot = z.input<typeof snapshotSchema>;
type ParsedSnapshot = z.output<typeof snapshotSchema>;
type ParsedCollection = z.output<typeof collectionSchema>;

function addDuplicateIssues(names: string[], field: string, kind: string, ctx: z.RefinementCtx) {
  const seen = new Set<string>();
  names.forEach((name, i) => {
    if (seen.has(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field, i, kind === 'database' ? 'database' : 'name'], message: `duplicate ${kind} name "${name}"` });
    }
    seen.add(name);
  });
}

function toKeySpec(keys: Record<string, number | string>): KeySpec {
  return Object.entries(keys).map(([field, direction]) => ({ field, direction }));
}

export function keySpecToObject(keys: KeySpec): Record<string, number | string> {
  const out: Record<string, number | string> = {};
  for (const { field, direction } of keys) out[field] = direction;
  return out;
}

function toShardStatus(coll: ParsedCollection): ShardStatus {
  if (coll.is_sharded) return 'sharded';
  return coll.shard_status === 'unknown' ? 'unknown' : 'unsharded';
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function toModel(parsed: ParsedSnapshot): SchemaSnapshot {
  return deepFreeze({
    extractedAt: parsed.extracted_at,
    databases: parsed.databases.map((db): DatabaseSchema => ({
      name: db.database,
      sizeGb: db.size_gb,
      collections: db.collections.map((coll): CollectionSchema => ({
        name: coll.name,
        docCount: coll.doc_count,
        sizeGb: coll.size_gb,
        avgDocSize: coll.avg_doc_size,
        indexes: coll.indexes.map((idx): IndexSchema => ({
          name: idx.name,
          keys: toKeySpec(idx.keys),
          unique: idx.unique,
          sparse: idx.sparse,
          background: idx.background,
          ...(idx.expireAfterSeconds != null ? { expireAfterSeconds: idx.expireAfterSeconds } : {}),
        })),
        shardStatus: toShardStatus(coll),
        shardKey: coll.shard_key ? toKeySpec(coll.shard_key) : null,
      })),
    })),
  });
}

/**
 * Validates a persisted schema document and converts it into a deeply frozen model.
 * Any structural problem is reported as a DeserializationError listing every offending path.
 */
export function deserializeSnapshot(input: unknown): SchemaSnapshot {
  const result = snapshotSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
    throw new DeserializationError(`Invalid schema document (${issues.length} issue${issues.length === 1 ? '' : 's'})`, issues);
  }
  return toModel(result.data);
}

export function parseSnapshot(text: string): SchemaSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DeserializationError(`Schema document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return deserializeSnapshot(json);
}

export function serializeSnapshot(snapshot: SchemaSnapshot): PersistedSnapshot {
  return {
    extracted_at: snapshot.extractedAt,
    databases: snapshot.databases.map(db => ({
      database: db.name,
      size_gb: db.sizeGb,
      collections: db.collections.map(coll => ({
        name: coll.name,
        doc_count: coll.docCount,
        size_gb: coll.sizeGb,
        avg_doc_size: coll.avgDocSize,
        indexes: coll.indexes.map(idx => ({
          name: idx.name,
          keys: keySpecToObject(idx.keys),
          unique: idx.unique,
          sparse: idx.sparse,
          background: idx.background,
          ...(idx.expireAfterSeconds !== undefined ? { expireAfterSeconds: idx.expireAfterSeconds } : {}),
        })),
        is_sharded: coll.shardStatus === 'sharded',
        shard_key: coll.shardKey ? keySpecToObject(coll.shardKey) : null,
        ...(coll.shardStatus === 'unknown' ? { shard_status: 'unknown' as const } : {}),
      })),
    })),
  };
}

export function stringifySnapshot(snapshot: SchemaSnapshot): string {
  return JSON.stringify(serializeSnapshot(snapshot), null, 2) + '\n';
}

export async function loadSnapshot(filePath: string): Promise<SchemaSnapshot> {
  if (!(await fs.pathExists(filePath))) {
    throw new ConfigurationError(`Schema file not found: ${filePath}`, 'Run "docshift extract" first or pass --schema <path>.');
  }
  return parseSnapshot(await fs.readFile(filePath, 'utf-8'));
}

export async function saveSnapshot(snapshot: SchemaSnapshot, filePath: string) {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, stringifySnapshot(snapshot), 'utf-8');
}
