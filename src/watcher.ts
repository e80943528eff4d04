import { setTimeout as delay } from "node:timers/promises";
import { Backoff } from "./backoff.js";
import type { Credentials } from "./credentials.js";
import { TransportError, isFatal } from "./errors.js";
import type { MailConnection, MailSession, MailTransport } from "./imap/index.js";
import type { Logger } from "./logger.js";
import { renderStatus, type Observation, type StatusFormat } from "./status.js";

/** Reconnect delays in seconds; the last one repeats forever. */
export const RECONNECT_DELAYS = [0, 60, 120, 500, 600] as const;

/** Re-check interval for servers without IDLE. */
export const POLL_INTERVAL_MS = 300 * 1000;

/**
 * Longest single IDLE wait. Some middleboxes drop connections that stay
 * silent for half an hour, so IDLE is refreshed before that.
 */
export const KEEP_ALIVE_MS = 1700 * 1000;

/** Socket inactivity limit for the session, longer than any wait above. */
export const SOCKET_TIMEOUT_MS =
  Math.max(POLL_INTERVAL_MS, KEEP_ALIVE_MS) + 5 * 60 * 1000;

export type WatchState =
  | { kind: "disconnected" }
  | { kind: "connecting" }
  | { kind: "authenticating"; connection: MailConnection }
  | { kind: "probingCapabilities"; session: MailSession }
  | { kind: "selectingMailbox"; session: MailSession; canIdle: boolean }
  | {
      kind: "observing";
      session: MailSession;
      canIdle: boolean;
      observation: Observation;
    }
  | { kind: "idling"; session: MailSession }
  | { kind: "polling"; session: MailSession };

export interface WatcherOptions {
  credentials: Credentials;
  transport: MailTransport;
  format: StatusFormat;
  log: Logger;
  mailbox?: string;
  /** Receives each rendered status line (default: stdout) */
  emit?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
  backoff?: Backoff;
  pollIntervalMs?: number;
  keepAliveMs?: number;
}

const DISCONNECTED: WatchState = { kind: "disconnected" };

function sessionOf(state: WatchState): MailSession | undefined {
  return "session" in state ? state.session : undefined;
}

/**
 * Watches one mailbox and reports its unread count.
 *
 * `step()` performs exactly one state transition; `run()` repeats it
 * forever. Only fatal errors (TLS or authentication) escape.
 */
export class MailboxWatcher {
  private readonly credentials: Credentials;
  private readonly transport: MailTransport;
  private readonly format: StatusFormat;
  private readonly log: Logger;
  private readonly mailbox: string;
  private readonly emit: (line: string) => void;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly backoff: Backoff;
  private readonly pollIntervalMs: number;
  private readonly keepAliveMs: number;

  constructor(options: WatcherOptions) {
    this.credentials = options.credentials;
    this.transport = options.transport;
    this.format = options.format;
    this.log = options.log;
    this.mailbox = options.mailbox ?? "INBOX";
    this.emit = options.emit ?? ((line) => process.stdout.write(`${line}\n`));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.backoff = options.backoff ?? new Backoff(RECONNECT_DELAYS);
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.keepAliveMs = options.keepAliveMs ?? KEEP_ALIVE_MS;
  }

  async run(): Promise<never> {
    let state: WatchState = DISCONNECTED;
    for (;;) {
      state = await this.step(state);
    }
  }

  async step(state: WatchState): Promise<WatchState> {
    try {
      return await this.transition(state);
    } catch (error) {
      return this.recover(state, error);
    }
  }

  private async transition(state: WatchState): Promise<WatchState> {
    const { host, port, user, pass } = this.credentials;

    switch (state.kind) {
      case "disconnected":
        await this.sleep(this.backoff.next() * 1000);
        return { kind: "connecting" };

      case "connecting": {
        this.log.debug(`connecting to ${this.credentials}`);
        const connection = await this.transport.connect(host, port);
        return { kind: "authenticating", connection };
      }

      case "authenticating": {
        const secured = await state.connection.secure(host);
        const session = await secured.login(user, pass);
        this.log.debug("logged in successfully");
        return { kind: "probingCapabilities", session };
      }

      case "probingCapabilities": {
        const capabilities = await state.session.capabilities();
        const canIdle = capabilities.has("IDLE");
        this.log.debug(`server can IDLE: ${canIdle}`);
        return { kind: "selectingMailbox", session: state.session, canIdle };
      }

      case "selectingMailbox": {
        const { exists } = await state.session.selectReadonly(this.mailbox);
        const unseen = await state.session.searchUnseen();
        return {
          kind: "observing",
          session: state.session,
          canIdle: state.canIdle,
          observation: { unread: unseen.length, total: exists },
        };
      }

      case "observing":
        this.emit(renderStatus(state.observation, this.format));
        this.backoff.reset();
        return state.canIdle
          ? { kind: "idling", session: state.session }
          : { kind: "polling", session: state.session };

      case "polling":
        await this.sleep(this.pollIntervalMs);
        return { kind: "selectingMailbox", session: state.session, canIdle: false };

      case "idling": {
        this.log.debug("idling");
        const idle = await state.session.idleBegin();
        try {
          await idle.wait(this.keepAliveMs);
        } catch (error) {
          await idle.end().catch((endError: unknown) => {
            this.log.debug(`failed to end idle: ${String(endError)}`);
          });
          throw error;
        }
        await idle.end();
        this.log.debug("done idling");
        return { kind: "selectingMailbox", session: state.session, canIdle: true };
      }
    }
  }

  /**
   * Fatal errors propagate; anything else drops the session and sends the
   * watcher back through the backoff.
   */
  private async recover(state: WatchState, error: unknown): Promise<WatchState> {
    const session = sessionOf(state);

    if (isFatal(error)) {
      if (session) await this.discard(session);
      throw error;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof TransportError) {
      this.log.warn(`error connecting to ${this.credentials}: ${message}`);
    } else {
      this.log.debug(`failure while ${state.kind}: ${message}`);
    }

    if (session) await this.discard(session);
    return DISCONNECTED;
  }

  private async discard(session: MailSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.log.debug(`failed to close session: ${String(error)}`);
    }
  }
}
