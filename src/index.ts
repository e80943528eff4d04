#!/usr/bin/env node

import "dotenv/config";
import {
  createProgram,
  describeError,
  exitCodeFor,
  loadCredentials,
  readOptions,
} from "./cli.js";
import { ImapFlowTransport } from "./imap/index.js";
import { logger } from "./logger.js";
import { MailboxWatcher, SOCKET_TIMEOUT_MS } from "./watcher.js";

async function main(): Promise<never> {
  const program = createProgram();
  program.parse(process.argv);
  const options = readOptions(program);

  const credentials = await loadCredentials(options, logger);

  const watcher = new MailboxWatcher({
    credentials,
    transport: new ImapFlowTransport(
      {
        tlsRejectUnauthorized: options.tlsRejectUnauthorized,
        socketTimeoutMs: SOCKET_TIMEOUT_MS,
      },
      logger
    ),
    format: options.format,
    mailbox: options.mailbox,
    log: logger,
  });

  // Runs until the process is killed or a fatal error escapes
  return watcher.run();
}

main().catch((error: unknown) => {
  logger.error(describeError(error));
  process.exit(exitCodeFor(error));
});
