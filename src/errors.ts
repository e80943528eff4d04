/**
 * Error taxonomy for the watcher.
 *
 * `ConfigError`, `SecurityError` and `AuthError` end the process;
 * `TransportError` and `ProtocolError` send the watcher back through
 * the reconnect backoff.
 */

export class MailbarError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credential file unreadable, malformed port or URL. */
export class ConfigError extends MailbarError {}

/** Connection refused, DNS failure, socket I/O error. */
export class TransportError extends MailbarError {}

/** TLS handshake or certificate failure. */
export class SecurityError extends MailbarError {}

/** Credentials rejected by the server. */
export class AuthError extends MailbarError {}

/** Capability query, select, search or IDLE failure. */
export class ProtocolError extends MailbarError {}

export function isFatal(error: unknown): boolean {
  return error instanceof SecurityError || error instanceof AuthError;
}

export interface Endpoint {
  host: string;
  port: number;
}

const NETWORK_CODES = [
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "ETIMEOUT",
  "CONNECT_TIMEOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "NoConnection",
];

/**
 * Classify an IMAP/network error onto the taxonomy.
 * Inspects the properties ImapFlow and Node.js set on their errors.
 * Messages name the endpoint only, never the account.
 */
export function classifyImapError(
  error: unknown,
  endpoint: Endpoint
): MailbarError {
  if (error instanceof MailbarError) {
    return error;
  }

  const where = `${endpoint.host}:${endpoint.port}`;

  if (!(error instanceof Error)) {
    return new ProtocolError(`IMAP error at ${where}: ${String(error)}`, {
      cause: error,
    });
  }

  const err = error as Error & {
    authenticationFailed?: boolean;
    code?: string;
  };

  if (err.authenticationFailed) {
    return new AuthError(`IMAP authentication failed at ${where}`, {
      cause: error,
    });
  }

  if (err.code?.startsWith("ERR_TLS") || err.code?.startsWith("ERR_SSL")) {
    return new SecurityError(`TLS/SSL error connecting to ${where}: ${err.message}`, {
      cause: error,
    });
  }

  if (err.code === "ECONNREFUSED") {
    return new TransportError(`Cannot reach ${where}: connection refused`, {
      cause: error,
    });
  }

  if (err.code === "ENOTFOUND" || err.code === "EAI_AGAIN") {
    return new TransportError(`Cannot resolve IMAP server hostname '${endpoint.host}'`, {
      cause: error,
    });
  }

  if (err.code && NETWORK_CODES.includes(err.code)) {
    return new TransportError(`Connection to ${where} failed: ${err.message}`, {
      cause: error,
    });
  }

  // After the network codes: a reset mid-handshake mentions TLS in its
  // message but is a connectivity failure.
  if (/tls|ssl|certificate/i.test(err.message)) {
    return new SecurityError(`TLS/SSL error connecting to ${where}: ${err.message}`, {
      cause: error,
    });
  }

  return new ProtocolError(`IMAP error at ${where}: ${err.message}`, {
    cause: error,
  });
}
