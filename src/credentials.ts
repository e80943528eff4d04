import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { inspect } from "node:util";
import { ConfigError } from "./errors.js";

export const DEFAULT_IMAP_PORT = 993;

/**
 * Account details for the watched mailbox.
 *
 * Every printable form (`toString`, `toJSON`, `util.inspect`) shows host
 * and port only, so passing an instance to a logger cannot leak the user
 * name or password.
 */
export class Credentials {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly pass: string;

  constructor(fields: { host: string; port: number; user: string; pass: string }) {
    this.host = fields.host;
    this.port = fields.port;
    this.user = fields.user;
    this.pass = fields.pass;
    Object.freeze(this);
  }

  toString(): string {
    return `${this.host}:${this.port}`;
  }

  toJSON(): { host: string; port: number } {
    return { host: this.host, port: this.port };
  }

  [inspect.custom](): string {
    return `Credentials { host: '${this.host}', port: ${this.port} }`;
  }
}

/** Runs a shell command and resolves with its standard output. */
export type CommandRunner = (command: string) => Promise<string>;

export const runShellCommand: CommandRunner = (command) =>
  new Promise((resolve, reject) => {
    execFile("/bin/sh", ["-c", command], (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });

export interface ConfigFileOptions {
  runCommand?: CommandRunner;
}

const ASSIGNMENT = /^\s*(?:set\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/;

/**
 * Strip surrounding whitespace, then single quotes, then double quotes,
 * the way mutt users tend to write `set key = 'value'`.
 */
function unquote(raw: string): string {
  return raw.trim().replace(/^'+|'+$/g, "").replace(/^"+|"+$/g, "");
}

function firstLine(text: string): string | undefined {
  const [line] = text.split(/\r?\n/);
  return line === "" ? undefined : line;
}

async function expandPassword(
  value: string,
  runCommand: CommandRunner
): Promise<string> {
  if (!value.startsWith("`")) {
    return value;
  }

  const command = value.replace(/^`+|`+$/g, "");
  let stdout: string;
  try {
    stdout = await runCommand(command);
  } catch (error) {
    throw new ConfigError("Password command failed", { cause: error });
  }

  const pass = firstLine(stdout);
  if (pass === undefined) {
    throw new ConfigError("Password command produced no output");
  }
  return pass;
}

function parseFolderUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new ConfigError(`Malformed folder URL: '${value}'`, { cause: error });
  }
}

/**
 * Read credentials from a mutt-style configuration file.
 *
 * Recognises `imap_pass`, `imap_user` and `folder`. Missing directives
 * leave the defaults in place (empty strings, port 993); only an
 * unreadable file, a malformed folder URL or a failing password command
 * is an error.
 */
export async function resolveFromConfigFile(
  path: string,
  options: ConfigFileOptions = {}
): Promise<Credentials> {
  const runCommand = options.runCommand ?? runShellCommand;

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file '${path}'`, { cause: error });
  }

  let host = "";
  let port = DEFAULT_IMAP_PORT;
  let user = "";
  let pass = "";

  for (const line of text.split(/\r?\n/)) {
    const match = ASSIGNMENT.exec(line);
    if (!match) continue;

    const [, key, raw] = match;
    const value = unquote(raw);

    switch (key) {
      case "imap_pass":
        pass = await expandPassword(value, runCommand);
        break;
      case "imap_user":
        user = value;
        break;
      case "folder": {
        const url = parseFolderUrl(value);
        if (url.hostname) host = url.hostname;
        if (url.port) port = Number(url.port);
        break;
      }
    }
  }

  return new Credentials({ host, port, user, pass });
}

function parsePort(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid port: '${trimmed}'`);
  }
  const port = Number(trimmed);
  if (port > 65535) {
    throw new ConfigError(`Port out of range: ${port}`);
  }
  return port;
}

/**
 * Read credentials from a line stream: the password on the first line,
 * then any number of `user:<name>` and `imap:<host>[:<port>]` lines.
 * Unlike the config file, no shell-command expansion happens here.
 */
export async function resolveFromLines(
  lines: AsyncIterable<string>
): Promise<Credentials> {
  let host = "";
  let port = DEFAULT_IMAP_PORT;
  let user = "";
  let pass = "";
  let first = true;

  for await (const rawLine of lines) {
    const line = rawLine.replace(/\r?\n$/, "");

    if (first) {
      pass = line.trim();
      first = false;
      continue;
    }

    if (line.startsWith("user:")) {
      user = line.slice("user:".length);
    } else if (line.startsWith("imap:")) {
      const target = line.slice("imap:".length);
      const sep = target.indexOf(":");
      if (sep === -1) {
        host = target;
      } else {
        port = parsePort(target.slice(sep + 1));
        host = target.slice(0, sep);
      }
    }
  }

  return new Credentials({ host, port, user, pass });
}

export async function resolveFromStream(
  input: NodeJS.ReadableStream
): Promise<Credentials> {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  try {
    return await resolveFromLines(rl);
  } finally {
    rl.close();
  }
}
