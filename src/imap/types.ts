/**
 * The mail-session boundary the watcher drives. Each stage hands back the
 * object for the next one, so a session can only exist after a successful
 * login.
 */

export interface MailTransport {
  /** Open a connection to the server. Network failures reject with `TransportError`. */
  connect(host: string, port: number): Promise<MailConnection>;
}

export interface MailConnection {
  /** Negotiate TLS. Handshake and certificate failures reject with `SecurityError`. */
  secure(servername: string): Promise<SecureConnection>;
}

export interface SecureConnection {
  /** Rejected credentials reject with `AuthError`. */
  login(user: string, pass: string): Promise<MailSession>;
}

export interface MailboxStatus {
  /** Number of messages in the mailbox */
  exists: number;
}

export interface MailSession {
  capabilities(): Promise<ReadonlySet<string>>;
  selectReadonly(mailbox: string): Promise<MailboxStatus>;
  /** Sequence numbers of messages without the \Seen flag */
  searchUnseen(): Promise<number[]>;
  idleBegin(): Promise<IdleHandle>;
  /** Drop the session. Never reused afterwards. */
  close(): Promise<void>;
}

export interface IdleHandle {
  /**
   * Resolves when the server reports a mailbox change or `maxMs` passes,
   * rejects if the connection fails meanwhile.
   */
  wait(maxMs: number): Promise<void>;
  /** Leave IDLE so the session can issue commands again. */
  end(): Promise<void>;
}

export interface ImapTransportOptions {
  /** Reject servers whose certificate does not verify (default true) */
  tlsRejectUnauthorized: boolean;
  /**
   * Socket inactivity limit. Must outlast the poll interval and the IDLE
   * keep-alive ceiling, or ImapFlow drops the connection in between.
   */
  socketTimeoutMs: number;
}
