import fs from "fs";
import os from "os";
import path from "path";

export type AnvilConfig = {
  sketch: {
    model: string;
    api_url: string;
    timeout_seconds: number;
  };
  build: {
    max_turns: number;
    tools: string[];
    claude_bin: string;
  };
  ui: {
    color: boolean;
  };
  plugins: {
    autoload: boolean;
  };
};

export const CONFIG_KEYS = [
  "sketch.model",
  "sketch.api_url",
  "sketch.timeout_seconds",
  "build.max_turns",
  "build.tools",
  "build.claude_bin",
  "ui.color",
  "plugins.autoload"
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.ANVIL_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  const root = env.APPDATA ? path.join(env.APPDATA, "anvil") : path.join(os.homedir(), ".config", "anvil");
  return path.join(root, "config.yml");
}

export function defaultConfig(): AnvilConfig {
  return {
    sketch: {
      model: "v0-1.0-md",
      api_url: "https://api.v0.dev/v1/chat/completions",
      timeout_seconds: 60
    },
    build: {
      max_turns: 10,
      tools: ["Read", "Write", "Bash", "Edit"],
      claude_bin: "claude"
    },
    ui: {
      color: true
    },
    plugins: {
      autoload: true
    }
  };
}

function parsePositiveInt(value: string, fallback: number): number {
  const raw = Number.parseInt(value.trim(), 10);
  if (!Number.isFinite(raw) || raw <= 0) {
    return fallback;
  }
  return raw;
}

function parseBoolean(value: string, fallback: boolean): boolean {
  const clean = value.trim().toLowerCase();
  if (clean === "true" || clean === "yes" || clean === "1") {
    return true;
  }
  if (clean === "false" || clean === "no" || clean === "0") {
    return false;
  }
  return fallback;
}

export function parseToolList(value: string): string[] {
  return value
    .replace(/^\[|\]$/g, "")
    .split(",")
    .map((tool) => tool.trim().replace(/^["']|["']$/g, ""))
    .filter((tool) => tool.length > 0);
}

function applyValue(config: AnvilConfig, key: ConfigKey, value: string): void {
  switch (key) {
    case "sketch.model":
      config.sketch.model = value.trim() || config.sketch.model;
      break;
    case "sketch.api_url":
      config.sketch.api_url = value.trim() || config.sketch.api_url;
      break;
    case "sketch.timeout_seconds":
      config.sketch.timeout_seconds = parsePositiveInt(value, config.sketch.timeout_seconds);
      break;
    case "build.max_turns":
      config.build.max_turns = parsePositiveInt(value, config.build.max_turns);
      break;
    case "build.tools": {
      const tools = parseToolList(value);
      config.build.tools = tools.length > 0 ? tools : config.build.tools;
      break;
    }
    case "build.claude_bin":
      config.build.claude_bin = value.trim() || config.build.claude_bin;
      break;
    case "ui.color":
      config.ui.color = parseBoolean(value, config.ui.color);
      break;
    case "plugins.autoload":
      config.plugins.autoload = parseBoolean(value, config.plugins.autoload);
      break;
  }
}

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

export function parseSimpleYaml(raw: string): AnvilConfig {
  const config = defaultConfig();
  let section = "";
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.+)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const key = `${section}.${valueMatch[1]}`;
    if (!isConfigKey(key)) {
      continue;
    }
    applyValue(config, key, valueMatch[2].replace(/^["']|["']$/g, ""));
  }
  return config;
}

export function renderYaml(config: AnvilConfig): string {
  return [
    "# anvil configuration",
    "sketch:",
    `  model: ${config.sketch.model}`,
    `  api_url: ${config.sketch.api_url}`,
    `  timeout_seconds: ${config.sketch.timeout_seconds}`,
    "build:",
    `  max_turns: ${config.build.max_turns}`,
    `  tools: ${config.build.tools.join(",")}`,
    `  claude_bin: ${config.build.claude_bin}`,
    "ui:",
    `  color: ${config.ui.color ? "true" : "false"}`,
    "plugins:",
    `  autoload: ${config.plugins.autoload ? "true" : "false"}`,
    ""
  ].join("\n");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnvilConfig {
  const file = configPath(env);
  if (!fs.existsSync(file)) {
    return defaultConfig();
  }
  try {
    return parseSimpleYaml(fs.readFileSync(file, "utf-8"));
  } catch {
    return defaultConfig();
  }
}

export function saveConfig(config: AnvilConfig, env: NodeJS.ProcessEnv = process.env): string {
  const file = configPath(env);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(env: NodeJS.ProcessEnv = process.env): AnvilConfig {
  const existing = loadConfig(env);
  if (!fs.existsSync(configPath(env))) {
    saveConfig(existing, env);
  }
  return existing;
}

export function updateConfigValue(key: string, value: string, env: NodeJS.ProcessEnv = process.env): AnvilConfig | null {
  const normalized = key.trim().toLowerCase();
  if (!isConfigKey(normalized)) {
    return null;
  }
  const current = loadConfig(env);
  const next: AnvilConfig = {
    sketch: { ...current.sketch },
    build: { ...current.build, tools: [...current.build.tools] },
    ui: { ...current.ui },
    plugins: { ...current.plugins }
  };
  applyValue(next, normalized, value);
  saveConfig(next, env);
  return next;
}
