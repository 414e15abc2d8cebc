import fs from "fs";
import { CONFIG_KEYS, configPath, ensureConfig, loadConfig, renderYaml, updateConfigValue } from "../config";
import type { CommandContext, ExitStatus } from "./context";

export function runConfigShow(ctx: CommandContext): ExitStatus {
  const file = configPath(ctx.env);
  ctx.terminal.print(`# ${file}${fs.existsSync(file) ? "" : " (not created yet, showing defaults)"}`, "dim");
  ctx.terminal.write(renderYaml(loadConfig(ctx.env)));
  return 0;
}

export function runConfigInit(ctx: CommandContext): ExitStatus {
  const file = configPath(ctx.env);
  const existed = fs.existsSync(file);
  ensureConfig(ctx.env);
  ctx.terminal.print(existed ? `Config already exists: ${file}` : `✓ Config initialized: ${file}`, existed ? "yellow" : "green");
  return 0;
}

export function runConfigSet(ctx: CommandContext, key: string, value: string): ExitStatus {
  const updated = updateConfigValue(key, value, ctx.env);
  if (!updated) {
    ctx.terminal.error("ANV-0502", `Unknown config key: ${key}. Known keys: ${CONFIG_KEYS.join(", ")}`);
    return 1;
  }
  ctx.terminal.print(`✓ Updated ${key.trim().toLowerCase()} in ${configPath(ctx.env)}`, "green");
  return 0;
}
