import {
  ChildProcessWithoutNullStreams,
  SpawnSyncOptionsWithStringEncoding,
  SpawnSyncReturns,
  spawn,
  spawnSync
} from "child_process";

type RunSyncArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  timeout?: number;
  encoding?: BufferEncoding;
};

type SpawnCommandArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
};

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function resolveCommand(input: string): string {
  if (process.platform !== "win32") {
    return input;
  }
  const looksLikePath = input.includes("\\") || input.includes("/");
  const hasExt = /\.[A-Za-z0-9]+$/.test(input);
  if (!looksLikePath && !hasExt) {
    return `${input}.cmd`;
  }
  return input;
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    cwd: options.cwd,
    env: options.env,
    shell,
    timeout: options.timeout,
    encoding: options.encoding ?? "utf-8",
    windowsHide: process.platform === "win32"
  };
  return spawnSync(command, args, spawnOptions);
}

export function spawnCommand(command: string, args: string[], options: SpawnCommandArgs = {}): ChildProcessWithoutNullStreams {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  return spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    shell,
    stdio: "pipe",
    windowsHide: process.platform === "win32"
  });
}

export function commandExists(command: string): boolean {
  const probe =
    process.platform === "win32" ? runCommandSync("where", [command]) : runCommandSync("which", [command]);
  return probe.status === 0;
}
