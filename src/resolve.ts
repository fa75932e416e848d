import { CredentialsError } from "./errors.js";
import { DEFAULT_SECTION, getLeaf, getSection } from "./config.js";
import type { Prompter } from "./io.js";
import type { EnvConfig, FileConfig, Mode, RawArguments, ResolvedRequest } from "./types.js";

export const DEFAULT_DCIM = "netbox";

/** Sections searched, in order, for credentials and for general settings. */
export const CREDENTIAL_SECTIONS = ["ipmi", DEFAULT_SECTION] as const;
export const SETTINGS_SECTIONS = ["rackops", DEFAULT_SECTION] as const;

export type ResolveOptions = {
  prompter: Prompter;
};

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

// `-u " "` is a typo more often than a username.
function flagValue(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

function fromFile(config: FileConfig, sections: readonly string[], key: string): string | undefined {
  for (const name of sections) {
    const value = present(getLeaf(getSection(config, name), key));
    if (value !== undefined) return value;
  }
  return undefined;
}

async function ask(
  args: RawArguments,
  label: string,
  read: (label: string) => Promise<string>
): Promise<string> {
  if (!args.input) {
    throw new CredentialsError(`${label} required. Provide it by flag, environment or config file, or drop --no-input.`);
  }
  const answer = await read(label);
  if (answer.length === 0) {
    throw new CredentialsError(`${label} required. Received an empty answer.`);
  }
  return answer;
}

async function resolveUsername(
  args: RawArguments,
  fileConfig: FileConfig,
  envConfig: EnvConfig,
  prompter: Prompter
): Promise<string> {
  const known =
    flagValue(args.username) ?? present(envConfig.username) ?? fromFile(fileConfig, CREDENTIAL_SECTIONS, "username");
  return known ?? ask(args, "IPMI username", prompter.promptText);
}

async function resolvePassword(
  args: RawArguments,
  fileConfig: FileConfig,
  envConfig: EnvConfig,
  prompter: Prompter
): Promise<string> {
  // -p means "ask me", even when the password is stored elsewhere.
  if (args.password) {
    return ask(args, "IPMI password", prompter.promptSecret);
  }
  const known = present(envConfig.password) ?? fromFile(fileConfig, CREDENTIAL_SECTIONS, "password");
  return known ?? ask(args, "IPMI password", prompter.promptSecret);
}

/**
 * Merges command line, environment and config file into the request handed
 * to the dispatcher. Per field the first source that has a value wins:
 * flag, environment, config file, prompt, built-in default.
 */
export async function resolveRequest(
  args: RawArguments,
  mode: Mode,
  fileConfig: FileConfig,
  envConfig: EnvConfig,
  options: ResolveOptions
): Promise<ResolvedRequest> {
  const username = await resolveUsername(args, fileConfig, envConfig, options.prompter);
  const password = await resolvePassword(args, fileConfig, envConfig, options.prompter);
  const dcim = flagValue(args.dcim) ?? fromFile(fileConfig, SETTINGS_SECTIONS, "dcim") ?? DEFAULT_DCIM;
  const nfsShare = present(envConfig.nfs_share) ?? fromFile(fileConfig, SETTINGS_SECTIONS, "nfs_share");
  const httpShare = present(envConfig.http_share) ?? fromFile(fileConfig, SETTINGS_SECTIONS, "http_share");

  const request: ResolvedRequest = {
    command: args.command,
    identifier: args.identifier,
    mode,
    commandArgs: Object.freeze([...args.commandArgs]),
    username,
    password,
    force: args.force,
    wait: args.wait,
    dcim,
    verbosity: args.verbosity,
    ...(nfsShare !== undefined ? { nfsShare } : {}),
    ...(httpShare !== undefined ? { httpShare } : {})
  };
  return Object.freeze(request);
}
