import fs from "fs";
import os from "os";
import path from "path";

export const APP_NAME = "anvil";

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Directory for user-level secrets and plugins (`~/.anvil`). */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = fromEnv(env, "ANVIL_HOME");
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), `.${APP_NAME}`);
}

export function resolveCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = fromEnv(env, "ANVIL_CACHE_DIR");
  if (override) {
    return path.resolve(override);
  }
  if (process.platform === "win32") {
    const localAppData = env.LOCALAPPDATA || path.join(os.homedir(), "AppData", "Local");
    return path.join(localAppData, APP_NAME, "cache");
  }
  const xdg = fromEnv(env, "XDG_CACHE_HOME");
  if (xdg) {
    return path.join(xdg, APP_NAME);
  }
  return path.join(os.homedir(), ".cache", APP_NAME);
}

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}
