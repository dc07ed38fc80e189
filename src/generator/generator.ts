import { UnsafeIdentifierError } from '../errors/index.js';
import { keySpecToObject } from '../schema/codec.js';
import { IDENTITY_INDEX, IndexSchema, KeySpec, SchemaSnapshot, isSharded } from '../types/index.js';
import { ApplyResult } from '../types/results.js';
import {
  assertCollectionName,
  assertDatabaseName,
  assertIndexName,
  assertKeySpec,
  assertPrefix,
  literal,
} from './identifiers.js';

export interface IndexOptions {
  name: string;
  unique?: true;
  sparse?: true;
  background?: true;
  expireAfterSeconds?: number;
}

export interface IndexPlan {
  name: string;
  keys: KeySpec;
  options: IndexOptions;
}

export interface CollectionPlan {
  name: string;
  shardKey: KeySpec | null;
  indexes: IndexPlan[];
}

export interface DatabasePlan {
  source: string;
  target: string;
  enableSharding: boolean;
  collections: CollectionPlan[];
}

export interface ApplyPlan {
  prefix: string;
  databases: DatabasePlan[];
  /** Identity indexes, never replayed. */
  skipped: ApplyResult[];
  /** Objects whose names cannot be written into a script safely. */
  rejected: ApplyResult[];
}

export const SEPARATOR = '='.repeat(60);
export const FOOTER_TITLE = 'Schema Application Complete';

export function buildIndexOptions(index: IndexSchema): IndexOptions {
  const options: IndexOptions = { name: index.name };
  if (index.unique) options.unique = true;
  if (index.sparse) options.sparse = true;
  if (index.background) options.background = true;
  if (index.expireAfterSeconds !== undefined) options.expireAfterSeconds = index.expireAfterSeconds;
  return options;
}

function rejection(error: unknown, target: ApplyResult['target']): ApplyResult {
  if (!(error instanceof UnsafeIdentifierError)) throw error;
  return { target, status: 'failed', message: error.message };
}

export class ScriptGenerator {
  plan(snapshot: SchemaSnapshot, prefix = ''): ApplyPlan {
    assertPrefix(prefix);
    const plan: ApplyPlan = { prefix, databases: [], skipped: [], rejected: [] };

    for (const db of snapshot.databases) {
      const target = `${prefix}${db.name}`;
      try {
        assertDatabaseName(target);
      } catch (error) {
        plan.rejected.push(rejection(error, { database: target, operation: 'createDatabase' }));
        continue;
      }

      const dbPlan: DatabasePlan = {
        source: db.name,
        target,
        enableSharding: db.collections.some(isSharded),
        collections: [],
      };

      for (const coll of db.collections) {
        const sharded = isSharded(coll);
        try {
          assertCollectionName(coll.name);
          if (sharded && coll.shardKey) assertKeySpec(coll.shardKey, `shard key of ${coll.name}`);
        } catch (error) {
          plan.rejected.push(rejection(error, { database: target, collection: coll.name, operation: 'createCollection' }));
          continue;
        }

        const collPlan: CollectionPlan = { name: coll.name, shardKey: sharded ? coll.shardKey : null, indexes: [] };

        for (const idx of coll.indexes) {
          if (idx.name === IDENTITY_INDEX) {
            plan.skipped.push({
              target: { database: target, collection: coll.name, index: idx.name, operation: 'createIndex' },
              status: 'skipped',
              message: 'identity index is created with the collection',
            });
            continue;
          }
          try {
            assertIndexName(idx.name);
            assertKeySpec(idx.keys, `index ${idx.name}`);
          } catch (error) {
            plan.rejected.push(rejection(error, { database: target, collection: coll.name, index: idx.name, operation: 'createIndex' }));
            continue;
          }
          collPlan.indexes.push({ name: idx.name, keys: idx.keys, options: buildIndexOptions(idx) });
        }

        dbPlan.collections.push(collPlan);
      }

      plan.databases.push(dbPlan);
    }

    return plan;
  }

  render(plan: ApplyPlan): string {
    const lines: string[] = [
      '// Generated by docshift: recreates databases, collections, indexes and shard keys',
      '',
      `print(${literal(SEPARATOR)});`,
      `print(${literal('Applying Schema to Destination')});`,
      `print(${literal(SEPARATOR)});`,
      `print(${literal(`Total Databases: ${plan.databases.length}`)});`,
      `print(${literal(`Database Prefix: ${plan.prefix || 'None'}`)});`,
      `print(${literal(SEPARATOR)});`,
      '',
      'var results = { databases: 0, collections: 0, indexes: 0, errors: [] };',
      'function errorMessage(e) { return e && e.message ? e.message : String(e); }',
      '',
    ];

    for (const db of plan.databases) {
      lines.push(...this.renderDatabase(db), '');
    }

    lines.push(...this.renderFooter());
    return lines.join('\n');
  }

  generate(snapshot: SchemaSnapshot, prefix = ''): { plan: ApplyPlan; script: string } {
    const plan = this.plan(snapshot, prefix);
    return { plan, script: this.render(plan) };
  }

  private renderDatabase(db: DatabasePlan): string[] {
    const name = literal(db.target);
    const lines = [
      `// Database: ${db.target}`,
      `print(${literal(`\nDatabase: ${db.target}`)});`,
      `var targetDb = db.getSiblingDB(${name});`,
    ];

    if (db.enableSharding) {
      lines.push(
        'try {',
        `  db.adminCommand({ enableSharding: ${name} });`,
        `  print(${literal('   Sharding enabled on database')});`,
        '} catch (e) {',
        "  if ((e && e.codeName === 'AlreadyInitialized') || /already/i.test(errorMessage(e))) {",
        `    print(${literal('   Sharding already enabled: ')} + errorMessage(e));`,
        '  } else {',
        `    print(${literal('   Could not enable sharding: ')} + errorMessage(e));`,
        `    results.errors.push({ db: ${name}, operation: 'enableSharding', error: errorMessage(e) });`,
        '  }',
        '}'
      );
    }

    for (const coll of db.collections) {
      lines.push(...this.renderCollection(db, coll));
    }

    lines.push('results.databases++;');
    return lines;
  }

  private renderCollection(db: DatabasePlan, coll: CollectionPlan): string[] {
    const dbName = literal(db.target);
    const collName = literal(coll.name);
    const lines = [
      `// Collection: ${coll.name}`,
      `print(${literal(`   Collection: ${coll.name}`)});`,
      'try {',
      `  targetDb.createCollection(${collName});`,
      `  print(${literal('      Collection created')});`,
      '  results.collections++;',
      '} catch (e) {',
      `  print(${literal('      Error: ')} + errorMessage(e));`,
      `  results.errors.push({ db: ${dbName}, collection: ${collName}, operation: 'createCollection', error: errorMessage(e) });`,
      '}',
    ];

    if (coll.shardKey) {
      lines.push(
        'try {',
        `  db.adminCommand({ shardCollection: ${literal(`${db.target}.${coll.name}`)}, key: ${literal(keySpecToObject(coll.shardKey))} });`,
        `  print(${literal('      Collection sharded')});`,
        '} catch (e) {',
        `  print(${literal('      Sharding failed: ')} + errorMessage(e));`,
        `  results.errors.push({ db: ${dbName}, collection: ${collName}, operation: 'shardCollection', error: errorMessage(e) });`,
        '}'
      );
    }

    for (const idx of coll.indexes) {
      const idxName = literal(idx.name);
      lines.push(
        'try {',
        `  targetDb.getCollection(${collName}).createIndex(${literal(keySpecToObject(idx.keys))}, ${literal(idx.options)});`,
        `  print(${literal(`      Index: ${idx.name}`)});`,
        '  results.indexes++;',
        '} catch (e) {',
        `  print(${literal(`      Index ${idx.name} failed: `)} + errorMessage(e));`,
        `  results.errors.push({ db: ${dbName}, collection: ${collName}, index: ${idxName}, operation: 'createIndex', error: errorMessage(e) });`,
        '}'
      );
    }

    return lines;
  }

  private renderFooter(): string[] {
    return [
      "print('');",
      `print(${literal(SEPARATOR)});`,
      `print(${literal(FOOTER_TITLE)});`,
      `print(${literal(SEPARATOR)});`,
      "print('Databases Created: ' + results.databases);",
      "print('Collections Created: ' + results.collections);",
      "print('Indexes Created: ' + results.indexes);",
      "print('Errors: ' + results.errors.length);",
      "results.errors.forEach(function (err) { print('  - ' + JSON.stringify(err)); });",
      `print(${literal(SEPARATOR)});`,
      '',
    ];
  }
}
