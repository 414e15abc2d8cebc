import fs from "fs";
import path from "path";
import { getRepoRoot } from "../paths";
import { resolveCommand, runCommandSync } from "../platform/process-exec";
import type { CommandContext, ExitStatus } from "./context";

export const PACKAGE_NAME = "anvil-cli";

export function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg = JSON.parse(fs.readFileSync(pkgPath, "utf-8")) as { version?: string };
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export function runVersion(ctx: CommandContext): ExitStatus {
  ctx.terminal.print(`anvil ${getVersion()}`);
  return 0;
}

export type CommandRunner = typeof runCommandSync;

export function runUpgrade(ctx: CommandContext, run: CommandRunner = runCommandSync): ExitStatus {
  const { terminal } = ctx;
  const result = run(resolveCommand("npm"), ["install", "-g", `${PACKAGE_NAME}@latest`], { env: ctx.env });
  if (result.error) {
    const code = "code" in result.error ? result.error.code : undefined;
    if (code === "ENOENT") {
      terminal.error("ANV-0801", "npm not found. Please install Node.js and npm first.");
    } else {
      terminal.error("ANV-0802", `Failed to upgrade anvil: ${result.error.message}`);
    }
    return 1;
  }
  if (result.status !== 0) {
    terminal.error("ANV-0802", `Failed to upgrade anvil: ${(result.stderr || "").trim()}`);
    return 1;
  }
  terminal.print("✓ anvil upgraded successfully!", "green");
  if (result.stdout.trim()) {
    terminal.print(result.stdout.trim());
  }
  return 0;
}
