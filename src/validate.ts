import { ModeConflictError } from "./errors.js";
import type { Mode, ModeFlags } from "./types.js";

/**
 * Picks how the identifier is looked up. At most one of the rack, rack-unit
 * and serial flags may be set; with none the identifier is a hostname or IP.
 */
export function selectMode(flags: ModeFlags): Mode {
  const selected: Mode[] = [];
  if (flags.rack) selected.push("rack");
  if (flags.rackUnit) selected.push("rack-unit");
  if (flags.serial) selected.push("serial");

  if (selected.length > 1) {
    throw new ModeConflictError();
  }
  return selected[0] ?? "none";
}
