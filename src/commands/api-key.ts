import path from "path";
import {
  type ApiKeyName,
  globalEnvFile,
  maskApiKey,
  projectEnvFile,
  resolveApiKey,
  saveApiKey
} from "../config/env";
import type { CommandContext, ExitStatus } from "./context";

export type KeyTarget = {
  /** `sketch` or `build`: the command group the key belongs to. */
  group: string;
  keyName: ApiKeyName;
  /** Shown in headings, e.g. "v0" or "Anthropic". */
  label: string;
  exampleKey: string;
};

export const V0_KEY: KeyTarget = {
  group: "sketch",
  keyName: "V0_API_KEY",
  label: "v0",
  exampleKey: "v0_xxxxx"
};

export const ANTHROPIC_KEY: KeyTarget = {
  group: "build",
  keyName: "ANTHROPIC_API_KEY",
  label: "Anthropic",
  exampleKey: "sk-ant-xxxxx"
};

export type KeyConfigOptions = {
  setKey?: string;
  global?: boolean;
  show?: boolean;
};

export function printKeyHints(ctx: CommandContext, target: KeyTarget, includeDotenv: boolean): void {
  const { terminal } = ctx;
  terminal.print("\n💡 Set your API key using one of these methods:", "dim");
  terminal.print(`   • anvil ${target.group} config --set-key YOUR_KEY`, "dim");
  terminal.print(`   • anvil ${target.group} config --set-key YOUR_KEY --global`, "dim");
  if (includeDotenv) {
    terminal.print(`   • Create a .env file with: ${target.keyName}=YOUR_KEY`, "dim");
  }
  terminal.print(`   • export ${target.keyName}=YOUR_KEY`, "dim");
}

function printUsage(ctx: CommandContext, target: KeyTarget): void {
  const { terminal } = ctx;
  terminal.print(`🔧 ${target.label} API Key Configuration`, "bold");
  terminal.print("\nAvailable options:");
  terminal.print("  --set-key KEY            Set API key for current project (.env file)");
  terminal.print("  --set-key KEY --global   Set API key globally (~/.anvil/.env)");
  terminal.print("  --show                   Show current API key status");
  terminal.print("\nExamples:");
  terminal.print(`  anvil ${target.group} config --set-key ${target.exampleKey}`, "dim");
  terminal.print(`  anvil ${target.group} config --set-key ${target.exampleKey} --global`, "dim");
  terminal.print(`  anvil ${target.group} config --show`, "dim");
}

export function runKeyConfig(ctx: CommandContext, target: KeyTarget, options: KeyConfigOptions): ExitStatus {
  const { terminal } = ctx;
  if (typeof options.setKey === "string") {
    const value = options.setKey.trim();
    if (!value) {
      terminal.error("ANV-0501", "API key must not be empty.");
      return 1;
    }
    const file = options.global ? globalEnvFile(ctx.env) : projectEnvFile(ctx.cwd);
    saveApiKey(file, target.keyName, value);
    terminal.print(`✅ ${target.label} API key saved to: ${file}`, "green");
    if (!options.global) {
      terminal.print("💡 Tip: Add .env to your .gitignore to keep your API key private", "dim");
    }
    return 0;
  }

  if (options.show) {
    const resolved = resolveApiKey(target.keyName, { cwd: ctx.cwd, env: ctx.env });
    if (!resolved) {
      terminal.print(`❌ No ${target.label} API key found`, "red");
      printKeyHints(ctx, target, false);
      return 0;
    }
    terminal.print(`✅ ${target.label} API key found: ${maskApiKey(resolved.value)}`, "green");
    switch (resolved.source) {
      case "project":
        terminal.print(`📁 Loaded from: ${resolved.file ?? path.join(ctx.cwd, ".env")}`, "dim");
        break;
      case "global":
        terminal.print(`🌍 Loaded from: ${resolved.file ?? globalEnvFile(ctx.env)}`, "dim");
        break;
      case "environment":
        terminal.print("🌍 Loaded from environment variable", "dim");
        break;
    }
    return 0;
  }

  printUsage(ctx, target);
  return 0;
}
