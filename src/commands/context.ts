import type { AnvilConfig } from "../config";
import type { AgentSpawn } from "../providers/claude-code";
import type { FetchFn } from "../providers/v0";
import type { LineReader } from "../ui/prompt";
import type { Terminal } from "../ui/terminal";

/** Everything a command needs from the outside world. Tests swap the I/O members for fakes. */
export type CommandContext = {
  terminal: Terminal;
  cwd: string;
  env: NodeJS.ProcessEnv;
  config: AnvilConfig;
  verbose: boolean;
  fetchImpl?: FetchFn;
  spawnImpl?: AgentSpawn;
  /** Probes `PATH` for the agent executable. */
  agentInstalled?: (bin: string) => boolean;
  lineReader?: LineReader;
};

/** A command's exit status; 0 is success. */
export type ExitStatus = number;
