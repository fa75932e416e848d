import { formatPlain, writeOutput } from "./output.js";
import type { Logger } from "./output.js";
import type { EnvConfig, FileConfig, ResolvedRequest } from "./types.js";

export type DispatchContext = {
  fileConfig: FileConfig;
  envConfig: EnvConfig;
  logger: Logger;
};

export type DispatchResult = {
  success: boolean;
  message?: string;
};

/**
 * Executes a resolved request (IPMI power control, DCIM lookups and so on).
 * Errors it throws are reported and turn into a non-zero exit status.
 */
export type Dispatcher = {
  dispatch: (request: ResolvedRequest, context: DispatchContext) => Promise<DispatchResult>;
};

export const REDACTED = "<redacted>";

export function redactRequest(request: ResolvedRequest): ResolvedRequest {
  return { ...request, password: REDACTED };
}

/**
 * Prints the request it would execute, with the password masked.
 */
export function createPreviewDispatcher(write: (content: string) => void = writeOutput): Dispatcher {
  return {
    dispatch: async (request, { logger }) => {
      logger.info(`Previewing ${request.command} for ${request.identifier} (mode: ${request.mode})`);
      write(formatPlain(redactRequest(request)));
      return { success: true };
    }
  };
}
