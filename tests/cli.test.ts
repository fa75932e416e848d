import { spawnSync } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

function runCli(args: string[], options?: { env?: NodeJS.ProcessEnv; input?: string }) {
  const tsxPath = path.join(
    process.cwd(),
    "node_modules",
    ".bin",
    process.platform === "win32" ? "tsx.cmd" : "tsx",
  );
  const cliPath = path.join(process.cwd(), "src", "cli.ts");

  if (!fs.existsSync(tsxPath)) {
    throw new Error(`tsx binary not found at ${tsxPath}`);
  }

  const isolatedConfigHome =
    options?.env?.XDG_CONFIG_HOME ?? fs.mkdtempSync(path.join(os.tmpdir(), "rackops-cli-test-"));
  const result = spawnSync(tsxPath, [cliPath, ...args], {
    encoding: "utf8",
    env: {
      ...process.env,
      NODE_NO_WARNINGS: "1",
      XDG_CONFIG_HOME: isolatedConfigHome,
      RACKOPS_USERNAME: "",
      RACKOPS_PASSWORD: "",
      RACKOPS_NFS_SHARE: "",
      RACKOPS_HTTP_SHARE: "",
      ...options?.env,
    },
    input: options?.input ?? "",
  });

  return {
    status: result.status ?? -1,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
}

const credentials = { RACKOPS_USERNAME: "operator", RACKOPS_PASSWORD: "test-secret" };

describe("rackops cli", () => {
  it("prints the resolved request with the password redacted", () => {
    const result = runCli(["power", "host42", "on", "-r"], { env: credentials });
    expect(result.error).toBeUndefined();
    expect(result.status).toBe(0);
    expect(JSON.parse(result.stdout)).toEqual({
      command: "power",
      identifier: "host42",
      mode: "rack",
      commandArgs: ["on"],
      username: "operator",
      password: "<redacted>",
      force: false,
      wait: false,
      dcim: "netbox",
      verbosity: 0,
    });
    expect(result.stderr.trim()).toBe("");
  });

  it("lets the command line override the environment", () => {
    const result = runCli(["status", "host1", "-u", "alice", "-d", "racktables"], {
      env: { ...credentials, RACKOPS_USERNAME: "bob" },
    });
    expect(result.status).toBe(0);
    expect(JSON.parse(result.stdout)).toMatchObject({ username: "alice", dcim: "racktables" });
  });

  it("reads credentials from the config file", () => {
    const configHome = fs.mkdtempSync(path.join(os.tmpdir(), "rackops-cli-"));
    fs.writeFileSync(
      path.join(configHome, "rackops"),
      "[ipmi]\nusername = carol\npassword = file-secret\n",
      "utf8",
    );
    const result = runCli(["status", "host1"], { env: { XDG_CONFIG_HOME: configHome } });
    expect(result.status).toBe(0);
    expect(JSON.parse(result.stdout)).toMatchObject({ username: "carol", password: "<redacted>" });
  });

  it("exits 1 on conflicting mode flags", () => {
    const result = runCli(["power", "host42", "on", "-r", "-s"], { env: credentials });
    expect(result.status).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr.trim()).toBe("Can't use rack, rack unit and serial flags concurrently");
  });

  it("exits 1 on an invalid verbosity", () => {
    const result = runCli(["status", "host1", "-vvvv"], { env: credentials });
    expect(result.status).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr.trim()).toBe("Invalid verbosity: -v given 4 times, at most 2 supported");
  });

  it("exits 1 on a malformed config file", () => {
    const configHome = fs.mkdtempSync(path.join(os.tmpdir(), "rackops-cli-"));
    const file = path.join(configHome, "rackops");
    fs.writeFileSync(file, "username = carol\n", "utf8");
    const result = runCli(["status", "host1"], { env: { ...credentials, XDG_CONFIG_HOME: configHome } });
    expect(result.status).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr.trim()).toBe(`Invalid configuration file ${file}:1: key outside of any section`);
  });

  it("refuses to prompt when stdin is not a terminal", () => {
    const result = runCli(["status", "host1"]);
    expect(result.status).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr.trim()).toBe("IPMI username required but stdin is not a terminal.");
  });

  it("exits 1 without an identifier", () => {
    const result = runCli(["status"], { env: credentials });
    expect(result.status).toBe(1);
    expect(result.stderr.trim()).toBe(
      "Missing <command> or <identifier>. Usage: rackops <command> <identifier> [command_args..] [options]",
    );
  });
});
