import { lookup } from "node:dns/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { ImapFlow } from "imapflow";
import {
  ProtocolError,
  TransportError,
  classifyImapError,
  type Endpoint,
  type MailbarError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type {
  IdleHandle,
  ImapTransportOptions,
  MailConnection,
  MailSession,
  MailTransport,
  MailboxStatus,
  SecureConnection,
} from "./types.js";

/** Untagged responses that mean the selected mailbox changed. */
const CHANGE_EVENTS = ["exists", "expunge", "flags"] as const;

/**
 * Opens sessions with ImapFlow.
 *
 * ImapFlow performs TCP, TLS and LOGIN inside a single `connect()`, so the
 * stages map onto it like this: `connect` resolves the host name,
 * `secure` fixes the TLS server name, and `login` runs ImapFlow's
 * `connect()` and classifies whatever it throws.
 */
export class ImapFlowTransport implements MailTransport {
  constructor(
    private readonly options: ImapTransportOptions,
    private readonly log: Logger
  ) {}

  async connect(host: string, port: number): Promise<MailConnection> {
    const endpoint = { host, port };
    try {
      await lookup(host);
    } catch (error) {
      throw classifyImapError(error, endpoint);
    }
    return {
      secure: async (servername) =>
        new ImapFlowLogin(endpoint, servername, this.options, this.log),
    };
  }
}

class ImapFlowLogin implements SecureConnection {
  constructor(
    private readonly endpoint: Endpoint,
    private readonly servername: string,
    private readonly options: ImapTransportOptions,
    private readonly log: Logger
  ) {}

  async login(user: string, pass: string): Promise<MailSession> {
    const tls = {
      servername: this.servername,
      rejectUnauthorized: this.options.tlsRejectUnauthorized,
    };
    const flow = new ImapFlow({
      host: this.endpoint.host,
      port: this.endpoint.port,
      secure: true,
      auth: { user, pass },
      logger: false,
      disableAutoIdle: true,
      socketTimeout: this.options.socketTimeoutMs,
      tls,
    });

    // EventEmitter requires handling "error" events, otherwise Node throws.
    // ImapFlow follows it with "close", which the session reacts to.
    flow.on("error", (error: unknown) => {
      const err = classifyImapError(error, this.endpoint);
      this.log.debug(`IMAP connection error: ${err.message}`);
    });

    try {
      await flow.connect();
    } catch (error) {
      flow.close();
      throw classifyImapError(error, this.endpoint);
    }

    return new ImapFlowSession(flow, this.endpoint);
  }
}

/**
 * A logged-in ImapFlow connection.
 */
export class ImapFlowSession implements MailSession {
  constructor(
    private readonly flow: ImapFlow,
    private readonly endpoint: Endpoint
  ) {}

  async capabilities(): Promise<ReadonlySet<string>> {
    if (!this.flow.usable) {
      throw new TransportError(
        `Connection to ${this.endpoint.host}:${this.endpoint.port} is not usable`
      );
    }
    return new Set(
      [...this.flow.capabilities.keys()].map((name) => name.toUpperCase())
    );
  }

  async selectReadonly(mailbox: string): Promise<MailboxStatus> {
    try {
      const opened = await this.flow.mailboxOpen(mailbox, { readOnly: true });
      return { exists: opened.exists };
    } catch (error) {
      throw classifyImapError(error, this.endpoint);
    }
  }

  async searchUnseen(): Promise<number[]> {
    const ids = await this.flow
      .search({ seen: false })
      .catch((error: unknown) => {
        throw classifyImapError(error, this.endpoint);
      });
    // imapflow reports a failed SEARCH as `false`
    if (!ids) {
      throw new ProtocolError("UNSEEN search failed");
    }
    return ids;
  }

  async idleBegin(): Promise<IdleHandle> {
    if (!this.flow.usable) {
      throw new TransportError(
        `Connection to ${this.endpoint.host}:${this.endpoint.port} is not usable`
      );
    }
    return new ImapFlowIdle(this.flow, this.endpoint);
  }

  async close(): Promise<void> {
    if (this.flow.usable) {
      await this.flow.logout();
    } else {
      this.flow.close();
    }
  }
}

/**
 * One IDLE round. ImapFlow's `idle()` keeps running until another command
 * is issued, so `end()` sends NOOP to break it and then waits for the
 * IDLE command to finish.
 */
class ImapFlowIdle implements IdleHandle {
  private readonly idling: Promise<void>;
  private changed = false;
  private failure: MailbarError | null = null;
  private wake: () => void = () => {};

  private readonly onChange = (): void => {
    this.changed = true;
    this.wake();
  };

  private readonly onClose = (): void => {
    this.failure ??= new TransportError(
      `Connection to ${this.endpoint.host}:${this.endpoint.port} closed while idling`
    );
    this.wake();
  };

  constructor(
    private readonly flow: ImapFlow,
    private readonly endpoint: Endpoint
  ) {
    for (const event of CHANGE_EVENTS) {
      flow.on(event, this.onChange);
    }
    flow.on("close", this.onClose);

    this.idling = flow.idle().then(
      () => {
        this.wake();
      },
      (error: unknown) => {
        this.failure ??= classifyImapError(error, endpoint);
        this.wake();
      }
    );
  }

  async wait(maxMs: number): Promise<void> {
    if (!this.changed && !this.failure) {
      const woken = new Promise<void>((resolve) => {
        this.wake = resolve;
      });
      const timer = new AbortController();
      try {
        await Promise.race([
          woken,
          sleep(maxMs, undefined, { signal: timer.signal }),
        ]);
      } finally {
        timer.abort();
        this.wake = () => {};
      }
    }

    if (this.failure) {
      throw this.failure;
    }
  }

  async end(): Promise<void> {
    try {
      if (!this.failure) {
        try {
          await this.flow.noop();
        } catch (error) {
          throw classifyImapError(error, this.endpoint);
        }
        await this.idling;
      }
    } finally {
      for (const event of CHANGE_EVENTS) {
        this.flow.removeListener(event, this.onChange);
      }
      this.flow.removeListener("close", this.onClose);
    }

    if (this.failure) {
      throw this.failure;
    }
  }
}
