/**
 * roster CLI: commander program with every command registered.
 *
 * Kept apart from the entrypoint (index.ts) so tests can import the
 * program without triggering parseAsync.
 */

import { Command } from "commander";
import { registerAddPersonCommand } from "./commands/add-person.js";
import { registerCheckCommands } from "./commands/check.js";
import { registerDumpCommands } from "./commands/dump.js";
import { DEFAULT_DATA_DIR } from "./load.js";

const program = new Command()
  .name("roster")
  .version("0.1.0")
  .description("Validate and inspect an organization's team membership data")
  .option("--data <dir>", "Data directory", DEFAULT_DATA_DIR);

// --- check, list-checks ---
registerCheckCommands(program);

// --- dump-team, dump-list, dump-permission ---
registerDumpCommands(program);

// --- add-person ---
registerAddPersonCommand(program);

export { program };
