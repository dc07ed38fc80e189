import Table from 'cli-table3';
import { SchemaSnapshot, countSnapshot, isSharded } from '../types/index.js';
import { keySpecToObject } from '../schema/codec.js';

export function renderSnapshotSummary(snapshot: SchemaSnapshot): string {
  const totals = countSnapshot(snapshot);
  const lines = [
    `Databases: ${totals.databases}`,
    `Collections: ${totals.collections}`,
    `Indexes: ${totals.indexes}`,
    `Sharded Collections: ${totals.shardedCollections}`,
  ];

  if (totals.collections > 0) {
    const table = new Table({
      head: ['Database', 'Size (GB)', 'Collection', 'Documents', 'Indexes', 'Shard Key'],
      colWidths: [25, 12, 35, 14, 10, 40],
      wordWrap: true,
    });

    for (const db of snapshot.databases) {
      for (const coll of db.collections) {
        table.push([
          db.name,
          db.sizeGb.toFixed(3),
          coll.name,
          coll.docCount.toLocaleString('en-US'),
          coll.indexes.length,
          isSharded(coll) && coll.shardKey
            ? JSON.stringify(keySpecToObject(coll.shardKey))
            : coll.shardStatus === 'unknown' ? 'unknown' : '-',
        ]);
      }
    }
    lines.push('', table.toString());
  }

  return lines.join('\n');
}
