import yargs from "yargs";
import { CliError, UsageError } from "./errors.js";
import { getConfigPath } from "./config.js";
import type { RawArguments } from "./types.js";

export const USAGE = "rackops <command> <identifier> [command_args..] [options]";

function buildParser(argv: string[], env: NodeJS.ProcessEnv) {
  return yargs(argv)
    .scriptName("rackops")
    .usage(`${USAGE}\n\nRun <command> against the machine named by <identifier>.`)
    .example("rackops power host42 on", "Power on the machine at hostname host42")
    .example("rackops status R12-U3 -a -v", "Look the machine up by rack unit, with INFO logging")
    .example("rackops reboot CZJ1234567 -s -u admin -p", "Look up by serial and prompt for the password")
    .parserConfiguration({ "parse-positional-numbers": false, "duplicate-arguments-array": false })
    .option("config", {
      alias: "c",
      type: "string",
      requiresArg: true,
      default: getConfigPath(env),
      defaultDescription: "$XDG_CONFIG_HOME/rackops or $HOME/.config/rackops",
      describe: "Configuration file path"
    })
    .option("username", { alias: "u", type: "string", requiresArg: true, describe: "IPMI username" })
    .option("password", { alias: "p", type: "boolean", default: false, describe: "Prompt for the IPMI password" })
    .option("force", { alias: "f", type: "boolean", default: false, describe: "Force" })
    .option("wait", { alias: "w", type: "boolean", default: false, describe: "Wait" })
    .option("dcim", {
      alias: "d",
      type: "string",
      requiresArg: true,
      defaultDescription: "netbox",
      describe: "DCIM name"
    })
    .option("rack", { alias: "r", type: "boolean", default: false, describe: "Identifier is a rack name" })
    .option("rack-unit", { alias: "a", type: "boolean", default: false, describe: "Identifier is a rack unit" })
    .option("serial", { alias: "s", type: "boolean", default: false, describe: "Identifier is a serial number" })
    .option("verbose", {
      alias: "v",
      type: "count",
      describe: "Sets logging to INFO for -v and DEBUG for -vv"
    })
    .option("input", { type: "boolean", default: true, describe: "Enable prompts (use --no-input to disable)" })
    .demandCommand(2, "Missing <command> or <identifier>")
    .strictOptions()
    .help()
    .alias("help", "h")
    .version()
    .exitProcess(false)
    .fail((msg, err) => {
      if (err instanceof CliError) throw err;
      const message = msg ?? err?.message ?? "Invalid arguments";
      throw new UsageError(`${message}. Usage: ${USAGE}`);
    });
}

/**
 * Parses command-line tokens (without the node and script entries).
 * Returns null when yargs already answered `--help` or `--version`.
 */
export function parseArguments(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): RawArguments | null {
  const parsed = buildParser([...argv], env).parseSync();
  if (parsed.help === true || parsed.version === true) {
    return null;
  }

  const [command, identifier, ...commandArgs] = parsed._.map((token) => String(token));
  if (command === undefined || identifier === undefined) {
    throw new UsageError(`Missing <command> or <identifier>. Usage: ${USAGE}`);
  }

  const args: RawArguments = {
    command,
    identifier,
    commandArgs,
    configPath: parsed.config,
    ...(parsed.username !== undefined ? { username: parsed.username } : {}),
    password: parsed.password,
    force: parsed.force,
    wait: parsed.wait,
    ...(parsed.dcim !== undefined ? { dcim: parsed.dcim } : {}),
    rack: parsed.rack,
    rackUnit: parsed.rackUnit,
    serial: parsed.serial,
    verbosity: parsed.verbose,
    input: parsed.input
  };
  return Object.freeze(args);
}
