export type LogLevel = "warn" | "info" | "debug";

export type Mode = "rack" | "rack-unit" | "serial" | "none";

export type ModeFlags = {
  readonly rack: boolean;
  readonly rackUnit: boolean;
  readonly serial: boolean;
};

export type RawArguments = ModeFlags & {
  readonly command: string;
  readonly identifier: string;
  readonly commandArgs: readonly string[];
  readonly configPath: string;
  readonly username?: string;
  /** Set by `-p`: ask for the password instead of reading it from env or file. */
  readonly password: boolean;
  readonly force: boolean;
  readonly wait: boolean;
  readonly dcim?: string;
  readonly verbosity: number;
  /** False under `--no-input`. */
  readonly input: boolean;
};

export type ConfigValue =
  | { readonly kind: "leaf"; readonly value: string }
  | { readonly kind: "section"; readonly entries: ConfigSection };

export type ConfigSection = Readonly<Record<string, ConfigValue>>;

export type FileConfig = ConfigSection;

export type EnvConfig = {
  readonly username?: string;
  readonly password?: string;
  readonly nfs_share?: string;
  readonly http_share?: string;
};

export type ResolvedRequest = {
  readonly command: string;
  readonly identifier: string;
  readonly mode: Mode;
  readonly commandArgs: readonly string[];
  readonly username: string;
  readonly password: string;
  readonly force: boolean;
  readonly wait: boolean;
  readonly dcim: string;
  readonly verbosity: number;
  readonly nfsShare?: string;
  readonly httpShare?: string;
};
