import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { inspect } from "node:util";
import {
  Credentials,
  resolveFromConfigFile,
  resolveFromLines,
  resolveFromStream,
  runShellCommand,
} from "./credentials.js";
import { ConfigError } from "./errors.js";

async function* linesOf(...lines: string[]): AsyncIterable<string> {
  for (const line of lines) yield line;
}

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

describe("resolveFromConfigFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mailbar-creds-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function configWith(contents: string): Promise<string> {
    const path = join(dir, "muttrc");
    await writeFile(path, contents, "utf8");
    return path;
  }

  it("fails with ConfigError when the file does not exist", async () => {
    await expect(
      resolveFromConfigFile(join(dir, "missing"))
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("returns defaults for an empty file", async () => {
    const c = await resolveFromConfigFile(await configWith(""));
    expect(c.host).toBe("");
    expect(c.port).toBe(993);
    expect(c.user).toBe("");
    expect(c.pass).toBe("");
  });

  it("reads bare assignments", async () => {
    const path = await configWith(
      ["imap_user='a'", 'imap_pass="b"', "folder=imaps://example.com:143/"].join("\n")
    );
    const c = await resolveFromConfigFile(path);
    expect({ host: c.host, port: c.port, user: c.user, pass: c.pass }).toEqual({
      host: "example.com",
      port: 143,
      user: "a",
      pass: "b",
    });
  });

  it("reads mutt `set` assignments with padding", async () => {
    const path = await configWith(
      [
        "",
        "  set imap_user = 'my_user'",
        '  set imap_pass = "my_pass"',
        "  set folder    = imaps://host.name:123/",
        "",
      ].join("\n")
    );
    const c = await resolveFromConfigFile(path);
    expect(c.host).toBe("host.name");
    expect(c.port).toBe(123);
    expect(c.user).toBe("my_user");
    expect(c.pass).toBe("my_pass");
  });

  it("keeps the default port when the folder URL has none", async () => {
    const path = await configWith("set folder = 'imaps://mail.example.org/'");
    const c = await resolveFromConfigFile(path);
    expect(c.host).toBe("mail.example.org");
    expect(c.port).toBe(993);
  });

  it("ignores unrelated lines that mention a directive", async () => {
    const path = await configWith(
      [
        "folder-hook . 'set sort=date'",
        "# imap_pass = not-this-one",
        "set imap_user = me",
      ].join("\n")
    );
    const c = await resolveFromConfigFile(path);
    expect(c.user).toBe("me");
    expect(c.pass).toBe("");
    expect(c.host).toBe("");
  });

  it("fails with ConfigError on a malformed folder URL", async () => {
    const path = await configWith("set folder = not a url");
    await expect(resolveFromConfigFile(path)).rejects.toThrow(
      "Malformed folder URL: 'not a url'"
    );
  });

  it("runs a backtick password command and keeps its first line", async () => {
    const runCommand = vi.fn().mockResolvedValue("from-command\nsecond line\n");
    const path = await configWith("set imap_pass = `pass show mail`");

    const c = await resolveFromConfigFile(path, { runCommand });

    expect(runCommand).toHaveBeenCalledWith("pass show mail");
    expect(c.pass).toBe("from-command");
  });

  it("unwraps a quoted backtick password command", async () => {
    const runCommand = vi.fn().mockResolvedValue("test-secret\n");
    const path = await configWith('set imap_pass = "`cat ~/.mailpass`"');

    const c = await resolveFromConfigFile(path, { runCommand });

    expect(runCommand).toHaveBeenCalledWith("cat ~/.mailpass");
    expect(c.pass).toBe("test-secret");
  });

  it("fails with ConfigError when the password command fails", async () => {
    const runCommand = vi.fn().mockRejectedValue(new Error("exit 1"));
    const path = await configWith("set imap_pass = `false`");

    await expect(resolveFromConfigFile(path, { runCommand })).rejects.toThrow(
      "Password command failed"
    );
  });

  it("fails with ConfigError when the password command prints nothing", async () => {
    const runCommand = vi.fn().mockResolvedValue("");
    const path = await configWith("set imap_pass = `true`");

    await expect(
      resolveFromConfigFile(path, { runCommand })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("runs the password command through the shell by default", async () => {
    const path = await configWith("set imap_pass = `printf 'test-secret\\nrest'`");
    const c = await resolveFromConfigFile(path);
    expect(c.pass).toBe("test-secret");
  });
});

describe("runShellCommand", () => {
  it("resolves with the command's standard output", async () => {
    await expect(runShellCommand("printf 'x\\ny'")).resolves.toBe("x\ny");
  });

  it("rejects when the command exits non-zero", async () => {
    await expect(runShellCommand("exit 3")).rejects.toThrow();
  });
});

// ---------------------------------------------------------------------------
// Line stream
// ---------------------------------------------------------------------------

describe("resolveFromLines", () => {
  it("takes the trimmed first line as the password", async () => {
    const c = await resolveFromLines(linesOf("  test-secret  "));
    expect(c.pass).toBe("test-secret");
    expect(c.host).toBe("");
    expect(c.port).toBe(993);
    expect(c.user).toBe("");
  });

  it("returns defaults for an empty stream", async () => {
    const c = await resolveFromLines(linesOf());
    expect(c.pass).toBe("");
    expect(c.port).toBe(993);
  });

  it("reads user and host with port", async () => {
    const c = await resolveFromLines(
      linesOf("test-secret", "user:alice@example.com", "imap:imap.example.com:143")
    );
    expect(c.user).toBe("alice@example.com");
    expect(c.host).toBe("imap.example.com");
    expect(c.port).toBe(143);
  });

  it("keeps the default port when imap: has no port", async () => {
    const c = await resolveFromLines(linesOf("p", "imap:imap.example.com"));
    expect(c.host).toBe("imap.example.com");
    expect(c.port).toBe(993);
  });

  it("does not treat user:/imap: on the first line as a directive", async () => {
    const c = await resolveFromLines(linesOf("user:bob"));
    expect(c.pass).toBe("user:bob");
    expect(c.user).toBe("");
  });

  it("fails with ConfigError on a non-numeric port", async () => {
    await expect(
      resolveFromLines(linesOf("p", "imap:imap.example.com:imaps"))
    ).rejects.toThrow("Invalid port: 'imaps'");
  });

  it("fails with ConfigError on a port above 65535", async () => {
    await expect(
      resolveFromLines(linesOf("p", "imap:imap.example.com:70000"))
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("does not expand backtick passwords", async () => {
    const c = await resolveFromLines(linesOf("`echo hi`"));
    expect(c.pass).toBe("`echo hi`");
  });
});

describe("resolveFromStream", () => {
  it("splits a readable stream into lines", async () => {
    const input = Readable.from(["test-secret\nuser:al", "ice\r\nimap:mx.example.com:10993\n"]);
    const c = await resolveFromStream(input);
    expect(c.pass).toBe("test-secret");
    expect(c.user).toBe("alice");
    expect(c.host).toBe("mx.example.com");
    expect(c.port).toBe(10993);
  });
});

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

describe("Credentials", () => {
  const c = new Credentials({
    host: "imap.example.com",
    port: 993,
    user: "alice",
    pass: "test-secret",
  });

  it("prints host and port only", () => {
    expect(String(c)).toBe("imap.example.com:993");
    expect(JSON.stringify(c)).toBe('{"host":"imap.example.com","port":993}');
    expect(inspect(c)).toBe("Credentials { host: 'imap.example.com', port: 993 }");
  });

  it("is immutable", () => {
    expect(Object.isFrozen(c)).toBe(true);
  });
});
