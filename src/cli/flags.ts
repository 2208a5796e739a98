import { Option, type Command, type OptionValues } from "commander";

import type { Flag } from "../core/flag.js";
import type { FlagId } from "../core/ids.js";
import { Setting } from "../core/setting.js";

// =============================================================================
// TYPES
// =============================================================================

export type FlagOptionBinding = {
  id: FlagId;
  type: "boolean" | "string";
  /** Key of the parsed value in `command.opts()`. */
  attribute: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Add one option pair per boolean flag (`--x` / `--no-x`) and one
 * `--set-x <value>` option per string flag. Flags whose option names clash
 * with an option the command already has are left out.
 */
export function registerFlagOptions(
  command: Command,
  flags: ReadonlyMap<FlagId, Flag>,
): FlagOptionBinding[] {
  const bindings: FlagOptionBinding[] = [];

  for (const [id, flag] of flags) {
    if (flag.type === "string") {
      const long = `--set-${id}`;
      if (hasOption(command, long)) continue;

      const option = new Option(`${long} <value>`, flagDescription(id, flag, "Set"));
      command.addOption(option);
      bindings.push({ id, type: "string", attribute: option.attributeName() });
      continue;
    }

    const enable = `--${id}`;
    const disable = `--no-${id}`;
    if (hasOption(command, enable) || hasOption(command, disable)) continue;

    const option = new Option(enable, flagDescription(id, flag, "Enable"));
    command.addOption(option);
    command.addOption(new Option(disable, `Disable ${id}`));
    bindings.push({ id, type: "boolean", attribute: option.attributeName() });
  }

  return bindings;
}

/** Setting holding only the flags given on the command line. */
export function readFlagOptions(
  values: OptionValues,
  bindings: readonly FlagOptionBinding[],
): Setting {
  const setting = Setting.empty();

  for (const binding of bindings) {
    const raw: unknown = values[binding.attribute];
    if (binding.type === "string" && typeof raw === "string") {
      setting.setText(binding.id, raw);
    } else if (binding.type === "boolean" && typeof raw === "boolean") {
      setting.setBool(binding.id, raw);
    }
  }

  return setting;
}

// =============================================================================
// INTERNALS
// =============================================================================

function hasOption(command: Command, long: string): boolean {
  return command.options.some((option) => option.long === long);
}

function flagDescription(id: FlagId, flag: Flag, verb: string): string {
  return flag.description ? flag.description : `${verb} ${id}`;
}
