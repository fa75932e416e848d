export { parseArguments, USAGE } from "./args.js";
export { getConfigPath, getLeaf, getSection, loadConfig, normalizeConfig, parseConfig } from "./config.js";
export { createPreviewDispatcher, redactRequest } from "./dispatch.js";
export type { DispatchContext, DispatchResult, Dispatcher } from "./dispatch.js";
export { ENV_VARIABLES, readEnvironment } from "./env.js";
export {
  CliError,
  ConfigParseError,
  CredentialsError,
  ModeConflictError,
  UsageError,
  VerbosityError
} from "./errors.js";
export { createTerminalPrompter } from "./io.js";
export type { Prompter } from "./io.js";
export { runCli } from "./main.js";
export type { CliDependencies } from "./main.js";
export { createLogger, resolveLogLevel, setupLogging } from "./output.js";
export type { Logger } from "./output.js";
export { DEFAULT_DCIM, resolveRequest } from "./resolve.js";
export { selectMode } from "./validate.js";
export type * from "./types.js";
