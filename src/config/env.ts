import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { resolveHomeDir } from "../platform/persistence";

export type ApiKeyName = "V0_API_KEY" | "ANTHROPIC_API_KEY";

export type ApiKeySource = "environment" | "project" | "global";

export type ResolvedApiKey = {
  value: string;
  source: ApiKeySource;
  file?: string;
};

export type EnvLookup = {
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export function projectEnvFile(cwd: string): string {
  return path.join(cwd, ".env");
}

export function globalEnvFile(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveHomeDir(env), ".env");
}

function readEnvFile(file: string): Record<string, string> {
  if (!fs.existsSync(file)) {
    return {};
  }
  try {
    return dotenv.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    return {};
  }
}

/**
 * Looks the key up in the process environment, then the project `.env`, then `~/.anvil/.env`.
 * Files are parsed, never loaded into `process.env`.
 */
export function resolveApiKey(name: ApiKeyName, lookup: EnvLookup): ResolvedApiKey | null {
  const fromEnv = lookup.env[name]?.trim();
  if (fromEnv) {
    return { value: fromEnv, source: "environment" };
  }
  const candidates: Array<{ source: ApiKeySource; file: string }> = [
    { source: "project", file: projectEnvFile(lookup.cwd) },
    { source: "global", file: globalEnvFile(lookup.env) }
  ];
  for (const candidate of candidates) {
    const value = readEnvFile(candidate.file)[name]?.trim();
    if (value) {
      return { value, source: candidate.source, file: candidate.file };
    }
  }
  return null;
}

export function saveApiKey(file: string, name: ApiKeyName, value: string): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  let existing = "";
  if (fs.existsSync(file)) {
    existing = fs
      .readFileSync(file, "utf-8")
      .split(/(?<=\n)/)
      .filter((line) => !line.trim().startsWith(`${name}=`))
      .join("");
  }
  const separator = existing && !existing.endsWith("\n") ? "\n" : "";
  fs.writeFileSync(file, `${existing}${separator}${name}=${value}\n`, "utf-8");
  return file;
}

export function maskApiKey(value: string): string {
  if (value.length > 12) {
    return `${value.slice(0, 8)}...${value.slice(-4)}`;
  }
  return "***";
}
