import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeExecutor, Responder, failed, ok } from '../../test/fakeExecutor.js';
import { ClientNotFoundError, ExecutionTimeout } from '../errors/index.js';
import { TranscriptWriter } from '../writer/writer.js';
import { ExplainCapture, buildExplainScript, transformToExplain } from './explain.js';

describe('transformToExplain', () => {
  it('should replace toArray with an explain call', () => {
    expect(transformToExplain('targetDb.applications.find({ status: "active" }).toArray()', 'allPlansExecution')).toBe(
      'targetDb.applications.find({ status: "active" }).explain("allPlansExecution")'
    );
  });

  it('should rewrite countDocuments into an explain command on count', () => {
    expect(transformToExplain('targetDb.applications.countDocuments({ region: "eu" })', 'executionStats')).toBe(
      'targetDb.runCommand({explain: {count: "applications", query: { region: "eu" }}, verbosity: "executionStats"})'
    );
    expect(transformToExplain("targetDb.getCollection('apps').countDocuments()", 'allPlansExecution')).toBe(
      'targetDb.runCommand({explain: {count: "apps", query: {}}, verbosity: "allPlansExecution"})'
    );
  });

  it('should append an explain call to any other expression', () => {
    expect(transformToExplain('targetDb.apps.aggregate([{ $match: { a: 1 } }])  ', 'executionStats')).toBe(
      'targetDb.apps.aggregate([{ $match: { a: 1 } }]).explain("executionStats")'
    );
  });

  it('should wrap the rewritten query in a script that prints the plan', () => {
    expect(buildExplainScript('mobile_apps', 'targetDb.apps.find({})', 'executionStats')).toBe(
      [
        'var targetDb = db.getSiblingDB("mobile_apps");',
        'var explainResult = targetDb.apps.find({}).explain("executionStats");',
        'print(JSON.stringify(explainResult, null, 2));',
        '',
      ].join('\n')
    );
  });
});

describe('ExplainCapture', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docshift-explain-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const entries = [{ description: 'Find active apps', query: 'targetDb.applications.find({ status: "active" }).toArray()' }];

  async function capture(respond: Responder) {
    const executor = new FakeExecutor(respond);
    const writer = new TranscriptWriter(dir, 1234);
    const batch = await new ExplainCapture({ executor, database: 'mobile_apps', collection: 'applications', timeoutSeconds: 300 }, writer).run(
      entries
    );
    const transcript = await fs.readFile(writer.getFilePath(), 'utf-8');
    return { executor, batch, transcript, filePath: writer.getFilePath() };
  }

  it('should keep the high verbosity plan when it completes', async () => {
    const { executor, batch, transcript, filePath } = await capture(() => ok('{ "queryPlanner": {} }'));

    expect(filePath).toBe(path.join(dir, 'explain_out_1234.txt'));
    expect(executor.scripts).toHaveLength(1);
    expect(batch.all()[0]).toMatchObject({ name: 'Find active apps', status: 'SUCCESS', mode: 'allPlansExecution' });
    expect(transcript.split('\n').slice(0, 4)).toEqual([
      'MongoDB Explain Output',
      expect.stringMatching(/^Generated: /),
      'Database: mobile_apps',
      'Collection: applications',
    ]);
    expect(transcript).toContain('Query 1: Find active apps\n');
    expect(transcript).toContain('Original Query: targetDb.applications.find({ status: "active" }).toArray()\n');
    expect(transcript).toContain('Explain Output (mode: allPlansExecution):\n{ "queryPlanner": {} }\n');
  });

  it('should fall back to executionStats after a timeout', async () => {
    const { executor, batch, transcript } = await capture(script => {
      if (script.includes('allPlansExecution')) throw new ExecutionTimeout(300);
      return ok('{ "executionStats": {} }');
    });

    expect(executor.scripts).toHaveLength(2);
    expect(executor.scripts[1]).toContain('.explain("executionStats")');
    expect(batch.all()[0]).toMatchObject({ status: 'SUCCESS', mode: 'executionStats' });
    expect(transcript).toContain('Note: allPlansExecution timed out, using executionStats...\n');
    expect(transcript).toContain('Explain Output (mode: executionStats):\n{ "executionStats": {} }\n');
  });

  it('should treat a timeout reported by the server as a timeout', async () => {
    const { executor, batch } = await capture(script =>
      script.includes('allPlansExecution') ? failed('MongoServerError: operation timed out (MaxTimeMSExpired)') : ok('{}')
    );

    expect(executor.scripts).toHaveLength(2);
    expect(batch.all()[0]).toMatchObject({ status: 'SUCCESS', mode: 'executionStats' });
  });

  it('should record an error when the reduced mode times out as well', async () => {
    const { executor, batch, transcript } = await capture(() => {
      throw new ExecutionTimeout(300);
    });

    expect(executor.scripts).toHaveLength(2);
    expect(batch.all()[0]).toMatchObject({ status: 'ERROR', mode: 'executionStats', message: 'executionStats timed out' });
    expect(transcript).toContain('ERROR: executionStats timed out after 300 seconds\n');
  });

  it('should not fall back on errors other than timeouts', async () => {
    const { executor, batch, transcript } = await capture(() => failed('MongoServerError: unknown operator: $regexx\n'));

    expect(executor.scripts).toHaveLength(1);
    expect(batch.all()[0]).toMatchObject({
      status: 'ERROR',
      mode: 'allPlansExecution',
      message: 'MongoServerError: unknown operator: $regexx',
    });
    expect(transcript).toContain('ERROR:\nMongoServerError: unknown operator: $regexx\n');
  });

  it('should close the transcript and rethrow when the client is missing', async () => {
    const executor = new FakeExecutor(() => {
      throw new ClientNotFoundError('mongosh');
    });
    const writer = new TranscriptWriter(dir, 99);

    await expect(
      new ExplainCapture({ executor, database: 'mobile_apps', collection: 'applications', timeoutSeconds: 300 }, writer).run(entries)
    ).rejects.toBeInstanceOf(ClientNotFoundError);
    expect(await fs.readFile(writer.getFilePath(), 'utf-8')).toContain('Query 1: Find active apps');
  });
});
