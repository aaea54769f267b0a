import { Command } from "commander";

import { registerCollectionCommand } from "./collection.js";
import { registerKeysCommand } from "./keys.js";
import { registerConfigCommand } from "./config.js";

export function registerAllCommands(program: Command) {
  registerCollectionCommand(program);
  registerKeysCommand(program);
  registerConfigCommand(program);
}
