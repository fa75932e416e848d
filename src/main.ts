import { parseArguments } from "./args.js";
import { loadConfig } from "./config.js";
import { createPreviewDispatcher } from "./dispatch.js";
import type { Dispatcher } from "./dispatch.js";
import { readEnvironment } from "./env.js";
import { CliError, errorDetail } from "./errors.js";
import { createTerminalPrompter } from "./io.js";
import type { Prompter } from "./io.js";
import { setupLogging } from "./output.js";
import type { LogSink, Logger } from "./output.js";
import { resolveRequest } from "./resolve.js";
import { selectMode } from "./validate.js";

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  prompter?: Prompter;
  dispatcher?: Dispatcher;
  stderr?: LogSink;
};

const writeStderr: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Runs one invocation and returns the process exit code. Nothing reaches the
 * dispatcher unless parsing, validation and resolution all succeeded.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stderr = deps.stderr ?? writeStderr;
  let logger: Logger | undefined;

  try {
    const args = parseArguments(argv, env);
    if (!args) return 0;

    const mode = selectMode(args);
    logger = setupLogging(args.verbosity, stderr);

    logger.debug(`Reading configuration from ${args.configPath}`);
    const fileConfig = loadConfig(args.configPath, logger);
    const envConfig = readEnvironment(env);
    const envKeys = Object.keys(envConfig);
    logger.debug(`Environment provides: ${envKeys.length > 0 ? envKeys.join(", ") : "nothing"}`);

    const request = await resolveRequest(args, mode, fileConfig, envConfig, {
      prompter: deps.prompter ?? createTerminalPrompter()
    });
    logger.info(`Dispatching ${request.command} for ${request.identifier} (mode: ${mode}, dcim: ${request.dcim})`);

    const dispatcher = deps.dispatcher ?? createPreviewDispatcher();
    const result = await dispatcher.dispatch(request, { fileConfig, envConfig, logger });
    if (!result.success) {
      throw new CliError(result.message ?? `${request.command} failed`, 1, "E_DISPATCH");
    }
    return 0;
  } catch (error) {
    const resolved = error instanceof CliError ? error : new CliError(errorDetail(error), 1, "E_INTERNAL");
    if (logger) {
      logger.error(resolved.message);
    } else {
      stderr(`${resolved.message}\n`);
    }
    return resolved.exitCode;
  }
}
