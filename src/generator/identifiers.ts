import { UnsafeIdentifierError } from '../errors/index.js';
import { KeySpec } from '../types/index.js';

// Characters that could end a string literal or a statement in the generated script.
const SCRIPT_DELIMITERS = /['"`\\\0\r\n\u2028\u2029]/;
const DATABASE_FORBIDDEN = /[/\\. "$*<>:|?]/;
const MAX_DATABASE_NAME_BYTES = 64;
const INDEX_TYPE = /^[A-Za-z0-9_]+$/;

function check(kind: string, value: string) {
  if (value.length === 0) {
    throw new UnsafeIdentifierError(kind, value, 'name is empty');
  }
  const match = SCRIPT_DELIMITERS.exec(value);
  if (match) {
    throw new UnsafeIdentifierError(kind, value, `contains ${JSON.stringify(match[0])}`);
  }
}

export function assertDatabaseName(name: string) {
  check('database', name);
  const match = DATABASE_FORBIDDEN.exec(name);
  if (match) {
    throw new UnsafeIdentifierError('database', name, `contains ${JSON.stringify(match[0])}`);
  }
  if (Buffer.byteLength(name, 'utf-8') > MAX_DATABASE_NAME_BYTES) {
    throw new UnsafeIdentifierError('database', name, `longer than ${MAX_DATABASE_NAME_BYTES} bytes`);
  }
}

export function assertCollectionName(name: string) {
  check('collection', name);
  if (name.includes('$')) {
    throw new UnsafeIdentifierError('collection', name, 'contains "$"');
  }
}

export function assertIndexName(name: string) {
  check('index', name);
}

export function assertKeySpec(keys: KeySpec, owner: string) {
  if (keys.length === 0) {
    throw new UnsafeIdentifierError('key', owner, 'key specification is empty');
  }
  for (const { field, direction } of keys) {
    if (field.length === 0 || field.includes('\0')) {
      throw new UnsafeIdentifierError('field', field, `invalid field in ${owner}`);
    }
    if (typeof direction === 'number' ? !Number.isFinite(direction) : !INDEX_TYPE.test(direction)) {
      throw new UnsafeIdentifierError('field', field, `invalid direction ${JSON.stringify(direction)} in ${owner}`);
    }
  }
}

/** Prefixes only ever land in database names, so they follow the same character rules. */
export function assertPrefix(prefix: string) {
  if (prefix === '') return;
  check('prefix', prefix);
  const match = DATABASE_FORBIDDEN.exec(prefix);
  if (match) {
    throw new UnsafeIdentifierError('prefix', prefix, `contains ${JSON.stringify(match[0])}`);
  }
}

/** Encodes a value as a script literal. Strings and numbers only ever leave here JSON-quoted. */
export function literal(value: unknown): string {
  return JSON.stringify(value);
}
