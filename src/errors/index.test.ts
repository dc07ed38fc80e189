import { describe, expect, it } from 'vitest';
import {
  AuthError,
  ClientFailureError,
  ConnectivityError,
  DocshiftError,
  ExecutionTimeout,
  ExtractionTimeout,
  diagnoseConnectivity,
  looksLikeConnectivityFailure,
} from './index.js';

describe('diagnoseConnectivity', () => {
  it.each([
    ['MongoServerSelectionError: getaddrinfo ENOTFOUND db.internal', 'dns'],
    ['MongoNetworkError: connect ECONNREFUSED 10.0.0.5:27017', 'refused'],
    ['MongoServerError: Authentication failed.', 'auth'],
    ['MongoServerSelectionError: Server reports maximum wire version 6, but this version of the driver requires at least 7', 'protocol'],
    ['MongoServerSelectionError: Server selection timed out after 30000 ms', 'unknown'],
  ])('should classify %s', (text, kind) => {
    expect(diagnoseConnectivity(text).kind).toBe(kind);
  });

  it('should prefer an authentication failure over other matches', () => {
    const error = diagnoseConnectivity('MongoServerError: Authentication failed.\nwhile resolving getaddrinfo');

    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe('MongoServerError: Authentication failed.');
    expect(error.hint).toBe('Check the username, password and authSource in the connection string.');
  });
});

describe('looksLikeConnectivityFailure', () => {
  it('should separate connection problems from query errors', () => {
    expect(looksLikeConnectivityFailure('MongoNetworkError: socket hang up')).toBe(true);
    expect(looksLikeConnectivityFailure('MongoServerError: E11000 duplicate key error')).toBe(false);
  });
});

describe('error hierarchy', () => {
  it('should name each error after its class', () => {
    expect(new ExtractionTimeout(120).name).toBe('ExtractionTimeout');
    expect(new ClientFailureError(1, 'boom\n').message).toBe('Database client exited with code 1: boom');
  });

  it('should keep timeouts and connectivity failures apart', () => {
    const timeout = new ExtractionTimeout(120);
    const refused = new ConnectivityError('refused', 'refused');

    expect(timeout).toBeInstanceOf(ExecutionTimeout);
    expect(timeout).toBeInstanceOf(DocshiftError);
    expect(timeout).not.toBeInstanceOf(ConnectivityError);
    expect(refused).not.toBeInstanceOf(ExecutionTimeout);
  });
});
