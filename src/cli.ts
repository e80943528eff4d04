import { Command, Option } from "commander";
import {
  resolveFromConfigFile,
  resolveFromStream,
  type Credentials,
} from "./credentials.js";
import { ConfigError, isFatal } from "./errors.js";
import type { Logger } from "./logger.js";
import type { StatusFormat } from "./status.js";

export interface CliOptions {
  /** mutt-style credentials file; credentials come from stdin when absent */
  config?: string;
  format: StatusFormat;
  mailbox: string;
  tlsRejectUnauthorized: boolean;
}

const FORMATS: Record<string, StatusFormat | undefined> = {
  "i3-bar-format": "i3bar",
  "waybar-format": "waybar",
};

export const EXIT_CONFIG = 1;
export const EXIT_FATAL = 2;

export function createProgram(): Command {
  return new Command()
    .name("mailbar-status")
    .description(
      "Watch an IMAP mailbox and print its unread count as status bar JSON"
    )
    .version("0.1.0")
    .argument("[config]", "mutt-style config with imap_user, imap_pass and folder")
    .addOption(
      new Option("-f, --format <format>", "output format")
        .choices(Object.keys(FORMATS))
        .default("i3-bar-format")
        .env("MAILBAR_FORMAT")
    )
    .addOption(
      new Option("-m, --mailbox <name>", "mailbox to watch")
        .default("INBOX")
        .env("MAILBAR_MAILBOX")
    )
    .addOption(
      new Option("--insecure", "accept TLS certificates that do not verify").env(
        "MAILBAR_INSECURE"
      )
    );
}

/** Read the options of a program that has already parsed its arguments. */
export function readOptions(program: Command): CliOptions {
  const opts = program.opts<{ format: string; mailbox: string; insecure?: boolean }>();
  const format = FORMATS[opts.format];
  if (!format) {
    throw new ConfigError(`Unknown output format: '${opts.format}'`);
  }

  return {
    config: program.args[0],
    format,
    mailbox: opts.mailbox,
    tlsRejectUnauthorized: !opts.insecure,
  };
}

/**
 * Resolve credentials from the config file when one is given, otherwise
 * from the input stream. A missing host is an error here: without one
 * there is nothing to connect to.
 */
export async function loadCredentials(
  options: Pick<CliOptions, "config">,
  log: Logger,
  input: NodeJS.ReadableStream = process.stdin
): Promise<Credentials> {
  let credentials: Credentials;
  if (options.config) {
    log.debug(`reading credentials from ${options.config}`);
    credentials = await resolveFromConfigFile(options.config);
  } else {
    log.debug("waiting for credentials on stdin");
    credentials = await resolveFromStream(input);
  }

  if (!credentials.host) {
    throw new ConfigError("No IMAP host configured");
  }
  if (!credentials.user || !credentials.pass) {
    log.warn(`user or password is empty for ${credentials}`);
  }
  return credentials;
}

export function exitCodeFor(error: unknown): number {
  return isFatal(error) ? EXIT_FATAL : EXIT_CONFIG;
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
  return `${error.name}: ${error.message}${cause}`;
}
