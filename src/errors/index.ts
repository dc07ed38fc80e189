export class DocshiftError extends Error {
  constructor(message: string, public readonly hint?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends DocshiftError {}

export type ConnectivityKind = 'dns' | 'refused' | 'auth' | 'protocol' | 'unknown';

const CONNECTIVITY_HINTS: Record<ConnectivityKind, string> = {
  dns: 'Check the host name in the connection string and that it resolves from this machine.',
  refused: 'Check that the server is running and that the port is reachable (firewall, security group, VPN).',
  auth: 'Check the username, password and authSource in the connection string.',
  protocol: 'The client and server wire versions are incompatible; use a client release that supports this server.',
  unknown: 'Run the client manually with the same connection string to see the full error.',
};

export class ConnectivityError extends DocshiftError {
  constructor(message: string, public readonly kind: ConnectivityKind) {
    super(message, CONNECTIVITY_HINTS[kind]);
  }
}

export class AuthError extends ConnectivityError {
  constructor(message: string) {
    super(message, 'auth');
  }
}

export class ExecutionTimeout extends DocshiftError {
  constructor(public readonly timeoutSeconds: number, message = `Execution timed out after ${timeoutSeconds} seconds`) {
    super(message, 'Increase TIMEOUT_SECONDS or narrow the workload.');
  }
}

export class ExtractionTimeout extends ExecutionTimeout {
  constructor(timeoutSeconds: number) {
    super(timeoutSeconds, `Schema extraction timed out after ${timeoutSeconds} seconds`);
  }
}

export class ClientNotFoundError extends DocshiftError {
  constructor(public readonly client: string) {
    super(`Database client "${client}" was not found`, 'Install mongosh or point MONGOSH_PATH at the binary.');
  }
}

/** Any other failure to start the client. Only the command and errno code are kept; never the arguments. */
export class ClientLaunchError extends DocshiftError {
  constructor(public readonly client: string, public readonly code: string | undefined) {
    super(`Database client "${client}" could not be started${code ? ` (${code})` : ''}`, 'Check that MONGOSH_PATH points at an executable file.');
  }
}

export class ClientFailureError extends DocshiftError {
  constructor(public readonly exitCode: number, public readonly stderr: string) {
    super(`Database client exited with code ${exitCode}: ${stderr.trim()}`);
  }
}

export interface DeserializationIssue {
  path: string;
  message: string;
}

export class DeserializationError extends DocshiftError {
  constructor(message: string, public readonly issues: DeserializationIssue[] = []) {
    super(message, 'Fix the listed fields in the schema file, or extract it again.');
  }
}

export class UnsafeIdentifierError extends DocshiftError {
  constructor(public readonly kind: string, public readonly value: string, reason: string) {
    super(`Unsafe ${kind} name ${JSON.stringify(value)}: ${reason}`);
  }
}

/**
 * Classifies the output of a failed client run or driver error.
 */
export function diagnoseConnectivity(text: string): ConnectivityError {
  const firstLine = text.trim().split('\n')[0] ?? '';
  if (/authentication failed|AuthenticationFailed|auth failed/i.test(text)) {
    return new AuthError(firstLine);
  }
  if (/ENOTFOUND|getaddrinfo|EAI_AGAIN|querySrv/i.test(text)) {
    return new ConnectivityError(firstLine, 'dns');
  }
  if (/ECONNREFUSED|connection refused/i.test(text)) {
    return new ConnectivityError(firstLine, 'refused');
  }
  if (/wire version|protocol version|IncompatibleServer/i.test(text)) {
    return new ConnectivityError(firstLine, 'protocol');
  }
  return new ConnectivityError(firstLine, 'unknown');
}

export function looksLikeConnectivityFailure(text: string): boolean {
  return /MongoServerSelectionError|MongoNetworkError|ECONNREFUSED|ENOTFOUND|getaddrinfo|EAI_AGAIN|querySrv|authentication failed|AuthenticationFailed|wire version|IncompatibleServer/i.test(text);
}
