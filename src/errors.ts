export type ErrorCode = "E_USAGE" | "E_VERBOSITY" | "E_CONFIG" | "E_MODE" | "E_CREDENTIALS" | "E_DISPATCH" | "E_INTERNAL";

export class CliError extends Error {
  exitCode: number;
  code: ErrorCode;

  constructor(message: string, exitCode = 1, code: ErrorCode = "E_USAGE") {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.code = code;
  }
}

export class UsageError extends CliError {
  constructor(message: string) {
    super(message, 1, "E_USAGE");
  }
}

export class VerbosityError extends CliError {
  constructor(count: number) {
    super(`Invalid verbosity: -v given ${count} times, at most 2 supported`, 1, "E_VERBOSITY");
  }
}

export class ConfigParseError extends CliError {
  file: string;
  line: number;

  constructor(file: string, line: number, detail: string) {
    super(`Invalid configuration file ${file}:${line}: ${detail}`, 1, "E_CONFIG");
    this.file = file;
    this.line = line;
  }
}

export class ModeConflictError extends CliError {
  constructor() {
    super("Can't use rack, rack unit and serial flags concurrently", 1, "E_MODE");
  }
}

export class CredentialsError extends CliError {
  constructor(message: string) {
    super(message, 1, "E_CREDENTIALS");
  }
}

export function errorDetail(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
