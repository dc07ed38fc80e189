import fs from 'fs-extra';
import { z } from 'zod';
import { ClientLaunchError, ClientNotFoundError, ConfigurationError, DeserializationError, ExecutionTimeout } from '../errors/index.js';
import { ICommandExecutor } from '../engines/interfaces.js';

export const COLLECTION_PLACEHOLDER = '{{collection}}';

export interface ToolContext {
  executor: ICommandExecutor;
  database: string;
  collection: string;
  timeoutSeconds: number;
  clock?: () => number;
}

const indexEntrySchema = z.object({
  name: z.string().min(1),
  keys: z.record(z.union([z.number(), z.string().min(1)])),
});

const queryEntrySchema = z.object({
  description: z.string().min(1),
  query: z.string().min(1),
});

export type IndexEntry = z.infer<typeof indexEntrySchema>;
export type QueryEntry = z.infer<typeof queryEntrySchema>;

async function readJsonList<T>(filePath: string, schema: z.ZodType<T>, kind: string): Promise<T[]> {
  if (!(await fs.pathExists(filePath))) {
    throw new ConfigurationError(`${kind} file not found: ${filePath}`, `Create ${filePath} or point the tool at another file.`);
  }

  let json: unknown;
  try {
    json = await fs.readJson(filePath);
  } catch (error) {
    throw new DeserializationError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = z.array(schema).safeParse(json);
  if (!result.success) {
    throw new DeserializationError(
      `${filePath} does not contain a valid ${kind.toLowerCase()} list`,
      result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

export function loadIndexEntries(filePath: string): Promise<IndexEntry[]> {
  return readJsonList(filePath, indexEntrySchema, 'Indexes');
}

/** Loads query templates, binding `{{collection}}` to the configured collection. */
export async function loadQueryEntries(filePath: string, collection: string): Promise<QueryEntry[]> {
  const entries = await readJsonList(filePath, queryEntrySchema, 'Queries');
  return entries.map(entry => ({ ...entry, query: entry.query.replaceAll(COLLECTION_PLACEHOLDER, collection) }));
}

/** Errors that end the whole run rather than one unit. */
export function isFatal(error: unknown): boolean {
  return error instanceof ClientNotFoundError || error instanceof ClientLaunchError;
}

export function isTimeout(error: unknown): error is ExecutionTimeout {
  return error instanceof ExecutionTimeout;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}
