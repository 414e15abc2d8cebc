import type { Command } from "commander";
import type { CommandContext } from "../commands/context";

export type PluginContext = Pick<CommandContext, "terminal" | "cwd" | "env" | "config" | "verbose">;

/** Contract every plugin module fulfils: add commands to the program it is handed. */
export type AnvilPlugin = {
  name: string;
  register(program: Command, context: PluginContext): void;
};

export type PluginSource = "built-in" | "external";

export type PluginLoadReport =
  | { name: string; source: PluginSource; status: "registered" }
  | { name: string; source: PluginSource; status: "skipped"; reason: string }
  | { name: string; source: PluginSource; status: "failed"; error: string };
