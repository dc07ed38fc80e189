import { describe, expect, it } from 'vitest';
import { ApplyPlan, FOOTER_TITLE, SEPARATOR } from '../generator/generator.js';
import { ApplySummary } from '../types/results.js';
import { SummaryParseError, describeTarget, mergePlanOutcomes, parseApplySummary, renderApplySummary } from './aggregator.js';

function footer(counts: [number, number, number, number], errors: string[] = []): string {
  return [
    '',
    SEPARATOR,
    FOOTER_TITLE,
    SEPARATOR,
    `Databases Created: ${counts[0]}`,
    `Collections Created: ${counts[1]}`,
    `Indexes Created: ${counts[2]}`,
    `Errors: ${counts[3]}`,
    ...errors.map(e => `  - ${e}`),
    SEPARATOR,
  ].join('\n');
}

describe('parseApplySummary', () => {
  it('should read the counters and error records', () => {
    const stdout = [
      'Database: shop',
      '   Collection: orders',
      footer([1, 1, 0, 1], ['{"db":"shop","collection":"orders","index":"by_status","operation":"createIndex","error":"bad key"}']),
    ].join('\n');

    expect(parseApplySummary(stdout)).toEqual({
      databases: 1,
      collections: 1,
      indexes: 0,
      skipped: [],
      errors: [
        {
          target: { database: 'shop', collection: 'orders', index: 'by_status', operation: 'createIndex' },
          status: 'failed',
          message: 'bad key',
        },
      ],
    });
  });

  it('should use the last footer when the transcript contains an earlier one', () => {
    const stdout = [footer([9, 9, 9, 0]), footer([2, 4, 6, 0])].join('\n');

    expect(parseApplySummary(stdout)).toMatchObject({ databases: 2, collections: 4, indexes: 6 });
  });

  it('should accept Windows line endings', () => {
    expect(parseApplySummary(footer([1, 2, 3, 0]).replaceAll('\n', '\r\n'))).toMatchObject({ databases: 1, collections: 2, indexes: 3 });
  });

  it('should fail when the footer is missing', () => {
    expect(() => parseApplySummary('Database: shop\n')).toThrow(SummaryParseError);
  });

  it('should fail when a counter is missing', () => {
    const stdout = [FOOTER_TITLE, 'Databases Created: 1', 'Indexes Created: 0', 'Errors: 0'].join('\n');

    expect(() => parseApplySummary(stdout)).toThrow('Summary footer is missing "Collections Created"');
  });

  it('should fail when the error records disagree with the error count', () => {
    expect(() => parseApplySummary(footer([1, 1, 1, 2], ['{"db":"shop","operation":"enableSharding","error":"denied"}']))).toThrow(
      'Summary footer lists 1 error records but reports 2'
    );
  });
});

describe('mergePlanOutcomes', () => {
  it('should put plan-time outcomes ahead of the run results', () => {
    const plan: ApplyPlan = {
      prefix: '',
      databases: [],
      skipped: [{ target: { database: 'shop', collection: 'orders', index: '_id_', operation: 'createIndex' }, status: 'skipped', message: 'identity' }],
      rejected: [{ target: { database: 'bad.db', operation: 'createDatabase' }, status: 'failed', message: 'unsafe' }],
    };
    const summary: ApplySummary = {
      databases: 1,
      collections: 1,
      indexes: 0,
      skipped: [],
      errors: [{ target: { database: 'shop', operation: 'enableSharding' }, status: 'failed', message: 'denied' }],
    };

    const merged = mergePlanOutcomes(summary, plan);

    expect(merged.skipped).toEqual(plan.skipped);
    expect(merged.errors.map(e => e.message)).toEqual(['unsafe', 'denied']);
    expect(merged.indexes).toBe(0);
  });
});

describe('renderApplySummary', () => {
  it('should list counters and describe each failed target', () => {
    const summary: ApplySummary = {
      databases: 2,
      collections: 3,
      indexes: 4,
      skipped: [],
      errors: [{ target: { database: 'shop', collection: 'orders', index: 'by_status', operation: 'createIndex' }, status: 'failed', message: 'bad key' }],
    };

    const text = renderApplySummary(summary);

    expect(text.split('\n').slice(0, 5)).toEqual(['Databases: 2', 'Collections: 3', 'Indexes: 4', 'Skipped: 0', 'Errors: 1']);
    expect(text).toContain('shop.orders.by_status');
    expect(describeTarget(summary.errors[0])).toBe('shop.orders.by_status');
  });

  it('should omit the table when nothing failed', () => {
    expect(renderApplySummary({ databases: 0, collections: 0, indexes: 0, skipped: [], errors: [] })).toBe(
      'Databases: 0\nCollections: 0\nIndexes: 0\nSkipped: 0\nErrors: 0'
    );
  });
});
