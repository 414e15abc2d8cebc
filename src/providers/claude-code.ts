import readline from "readline";
import type { Readable } from "stream";
import { commandExists, resolveCommand, spawnCommand } from "../platform/process-exec";

export type AgentTextBlock = { type: "text"; text: string };
export type AgentToolUseBlock = { type: "tool_use"; id: string; name: string; input: Record<string, unknown> };
export type AgentToolResultBlock = { type: "tool_result"; toolUseId: string; content: string; isError: boolean };

export type AgentMessage =
  | { type: "assistant"; content: Array<AgentTextBlock | AgentToolUseBlock> }
  | { type: "user"; content: AgentToolResultBlock[] }
  | { type: "system"; subtype: string }
  | { type: "result"; subtype: string; isError: boolean; result: string; numTurns?: number; costUsd?: number };

export type PermissionMode = "default" | "acceptEdits";

export type AgentProcess = {
  stdout: Readable;
  stderr: Readable;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null) => void): unknown;
};

export type AgentSpawn = (
  command: string,
  args: string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv }
) => AgentProcess;

export type AgentOptions = {
  apiKey: string;
  cwd: string;
  maxTurns: number;
  allowedTools: string[];
  systemPrompt?: string;
  permissionMode?: PermissionMode;
  bin?: string;
  env?: NodeJS.ProcessEnv;
  spawnImpl?: AgentSpawn;
};

export const DEFAULT_AGENT_BIN = "claude";

export class AgentCliNotFoundError extends Error {
  constructor(readonly bin: string) {
    super(`Agent CLI not found: ${bin}`);
    this.name = "AgentCliNotFoundError";
  }
}

export class AgentProcessError extends Error {
  constructor(
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(stderr ? `exited with code ${exitCode}: ${stderr}` : `exited with code ${exitCode}`);
    this.name = "AgentProcessError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function toolResultText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (!Array.isArray(content)) {
    return "";
  }
  return content
    .filter(isRecord)
    .map((part) => asString(part.text))
    .filter(Boolean)
    .join("\n");
}

function contentBlocks(message: unknown): Record<string, unknown>[] {
  if (!isRecord(message) || !Array.isArray(message.content)) {
    return [];
  }
  return message.content.filter(isRecord);
}

function parseAssistant(message: unknown): AgentMessage {
  const content: Array<AgentTextBlock | AgentToolUseBlock> = [];
  for (const block of contentBlocks(message)) {
    if (block.type === "text") {
      content.push({ type: "text", text: asString(block.text) });
    } else if (block.type === "tool_use") {
      content.push({
        type: "tool_use",
        id: asString(block.id),
        name: asString(block.name, "unknown"),
        input: isRecord(block.input) ? block.input : {}
      });
    }
  }
  return { type: "assistant", content };
}

function parseUser(message: unknown): AgentMessage {
  const content: AgentToolResultBlock[] = contentBlocks(message)
    .filter((block) => block.type === "tool_result")
    .map((block) => ({
      type: "tool_result",
      toolUseId: asString(block.tool_use_id),
      content: toolResultText(block.content),
      isError: block.is_error === true
    }));
  return { type: "user", content };
}

/** One line of `--output-format stream-json`; null for blank, malformed or unknown lines. */
export function parseAgentLine(line: string): AgentMessage | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(payload)) {
    return null;
  }
  switch (payload.type) {
    case "assistant":
      return parseAssistant(payload.message);
    case "user":
      return parseUser(payload.message);
    case "system":
      return { type: "system", subtype: asString(payload.subtype) };
    case "result":
      return {
        type: "result",
        subtype: asString(payload.subtype),
        isError: payload.is_error === true,
        result: asString(payload.result),
        numTurns: typeof payload.num_turns === "number" ? payload.num_turns : undefined,
        costUsd: typeof payload.total_cost_usd === "number" ? payload.total_cost_usd : undefined
      };
    default:
      return null;
  }
}

export function buildAgentArgs(prompt: string, options: AgentOptions): string[] {
  const args = ["--print", "--output-format", "stream-json", "--verbose", "--max-turns", String(options.maxTurns)];
  if (options.systemPrompt) {
    args.push("--system-prompt", options.systemPrompt);
  }
  if (options.allowedTools.length > 0) {
    args.push("--allowedTools", options.allowedTools.join(","));
  }
  if (options.permissionMode && options.permissionMode !== "default") {
    args.push("--permission-mode", options.permissionMode);
  }
  args.push("--", prompt);
  return args;
}

export function agentBin(options: Pick<AgentOptions, "bin" | "env">): string {
  const env = options.env ?? process.env;
  return resolveCommand(options.bin?.trim() || env.ANVIL_CLAUDE_BIN?.trim() || DEFAULT_AGENT_BIN);
}

export function isAgentCliInstalled(bin: string = DEFAULT_AGENT_BIN): boolean {
  return commandExists(resolveCommand(bin));
}

/**
 * Runs one agent session and resolves with every message it produced.
 * Messages are passed to `onMessage` while the session is still running.
 */
export function queryAgent(
  prompt: string,
  options: AgentOptions,
  onMessage?: (message: AgentMessage) => void
): Promise<AgentMessage[]> {
  const bin = agentBin(options);
  const spawnImpl: AgentSpawn = options.spawnImpl ?? spawnCommand;
  const env = { ...(options.env ?? process.env), ANTHROPIC_API_KEY: options.apiKey };

  return new Promise((resolve, reject) => {
    let child: AgentProcess;
    try {
      child = spawnImpl(bin, buildAgentArgs(prompt, options), { cwd: options.cwd, env });
    } catch (error) {
      reject(error);
      return;
    }

    const messages: AgentMessage[] = [];
    let stderr = "";
    let settled = false;
    const settle = (error: Error | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (error) {
        reject(error);
      } else {
        resolve(messages);
      }
    };

    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines.on("line", (line) => {
      const message = parseAgentLine(line);
      if (!message) {
        return;
      }
      messages.push(message);
      onMessage?.(message);
    });

    child.once("error", (error) => {
      const code = "code" in error ? error.code : undefined;
      settle(code === "ENOENT" ? new AgentCliNotFoundError(bin) : error);
    });
    child.once("close", (code) => {
      lines.close();
      settle(code === 0 ? null : new AgentProcessError(code, stderr.trim()));
    });
  });
}
