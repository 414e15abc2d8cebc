import fs from "fs";
import path from "path";
import { parseToolList } from "../config";
import { resolveApiKey } from "../config/env";
import { errorMessage } from "../errors";
import {
  AgentCliNotFoundError,
  type AgentMessage,
  type AgentOptions,
  AgentProcessError,
  isAgentCliInstalled,
  queryAgent
} from "../providers/claude-code";
import { createLineReader } from "../ui/prompt";
import type { Panel } from "../ui/terminal";
import { ANTHROPIC_KEY, printKeyHints } from "./api-key";
import type { CommandContext, ExitStatus } from "./context";

export const CHAT_MAX_TURNS = 5;
const TOOL_SUMMARY_LIMIT = 5;
const TOOL_RESULT_PREVIEW = 100;
const INSTALL_HINT = "💡 Install it with: npm install -g @anthropic-ai/claude-code";

const BUILD_SYSTEM_PROMPT =
  "You are a helpful coding assistant. Use the available tools to help build, modify, and improve code projects. Be thorough and explain your actions.";
const CHAT_SYSTEM_PROMPT =
  "You are a helpful coding assistant in an interactive session. Use tools to help with coding tasks and explain your actions clearly.";

export type BuildCreateOptions = {
  tools?: string;
  maxTurns?: string;
  dir?: string;
  verbose?: boolean;
  autoApprove?: boolean;
};

export type BuildChatOptions = {
  tools?: string;
  dir?: string;
  autoApprove?: boolean;
};

type AgentSession = {
  workDir: string;
  tools: string[];
  options: AgentOptions;
};

export function buildPrompt(request: string, workDir: string): string {
  return [
    `I want you to help me build: ${request}`,
    "",
    "Please use the available tools to:",
    "1. Analyze the current directory structure if relevant",
    "2. Create or modify files as needed",
    "3. Set up any necessary configuration",
    "4. Provide clear explanations of what you're doing",
    "",
    `Working directory: ${workDir}`,
    ""
  ].join("\n");
}

function prepareSession(
  ctx: CommandContext,
  options: { tools?: string; dir?: string; autoApprove?: boolean },
  maxTurns: number,
  systemPrompt: string
): AgentSession | null {
  const { terminal } = ctx;
  const resolved = resolveApiKey(ANTHROPIC_KEY.keyName, { cwd: ctx.cwd, env: ctx.env });
  if (!resolved) {
    terminal.error("ANV-0201", "ANTHROPIC_API_KEY not found.");
    printKeyHints(ctx, ANTHROPIC_KEY, true);
    return null;
  }

  const bin = ctx.env.ANVIL_CLAUDE_BIN?.trim() || ctx.config.build.claude_bin;
  const installed = ctx.agentInstalled ?? isAgentCliInstalled;
  if (!installed(bin)) {
    terminal.error("ANV-0202", "Claude Code CLI not found.");
    terminal.print(INSTALL_HINT, "dim");
    return null;
  }

  const workDir = path.resolve(ctx.cwd, options.dir ?? ".");
  if (!fs.existsSync(workDir)) {
    terminal.error("ANV-0203", `Working directory does not exist: ${workDir}`);
    return null;
  }

  const requested = options.tools ? parseToolList(options.tools) : [];
  const tools = requested.length > 0 ? requested : ctx.config.build.tools;
  return {
    workDir,
    tools,
    options: {
      apiKey: resolved.value,
      cwd: workDir,
      maxTurns,
      allowedTools: tools,
      systemPrompt,
      permissionMode: options.autoApprove ? "acceptEdits" : "default",
      bin,
      env: ctx.env,
      spawnImpl: ctx.spawnImpl
    }
  };
}

function preview(text: string): string {
  return text.length > TOOL_RESULT_PREVIEW ? `${text.slice(0, TOOL_RESULT_PREVIEW)}...` : text;
}

/** Streams one agent message into the response panel. */
export function renderAgentMessage(panel: Panel, message: AgentMessage): void {
  switch (message.type) {
    case "assistant":
      for (const block of message.content) {
        if (block.type === "text") {
          panel.append(block.text.endsWith("\n") ? block.text : `${block.text}\n`);
        } else {
          const input = Object.keys(block.input).length > 0 ? `   Input: ${JSON.stringify(block.input)}\n` : "";
          panel.append(`\n🔧 Using tool: ${block.name}\n${input}`);
        }
      }
      break;
    case "user":
      for (const block of message.content) {
        panel.append(`\n📋 Tool result: ${preview(block.content)}\n`);
      }
      break;
    case "system":
    case "result":
      break;
  }
}

export function collectToolUses(messages: AgentMessage[]): string[] {
  const uses: string[] = [];
  for (const message of messages) {
    if (message.type !== "assistant") {
      continue;
    }
    for (const block of message.content) {
      if (block.type === "tool_use") {
        uses.push(`${block.name}: ${JSON.stringify(block.input)}`);
      }
    }
  }
  return uses;
}

function reportAgentError(ctx: CommandContext, error: unknown, verbose: boolean): void {
  const { terminal } = ctx;
  if (error instanceof AgentCliNotFoundError) {
    terminal.error("ANV-0202", "Claude Code CLI not found. Please install it first:");
    terminal.print("   npm install -g @anthropic-ai/claude-code", "dim");
  } else if (error instanceof AgentProcessError) {
    terminal.error("ANV-0204", `Claude Code process error: ${error.message}`);
  } else {
    terminal.error("ANV-0206", `Error during build: ${errorMessage(error)}`);
  }
  if (verbose && error instanceof Error && error.stack) {
    terminal.print(error.stack, "dim");
  }
}

async function runSession(ctx: CommandContext, prompt: string, options: AgentOptions): Promise<AgentMessage[]> {
  ctx.terminal.print("🤖 Starting Claude Code session...", "bold cyan");
  const panel = ctx.terminal.panel("🤖 Claude Response", "cyan");
  try {
    return await queryAgent(prompt, options, (message) => renderAgentMessage(panel, message));
  } finally {
    panel.close();
  }
}

function parseMaxTurns(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isInteger(value) && value > 0 && String(value) === raw.trim() ? value : null;
}

export async function runBuildCreate(ctx: CommandContext, request: string, options: BuildCreateOptions): Promise<ExitStatus> {
  const { terminal } = ctx;
  const verbose = Boolean(options.verbose) || ctx.verbose;
  const maxTurns = parseMaxTurns(options.maxTurns, ctx.config.build.max_turns);
  if (maxTurns === null) {
    terminal.error("ANV-0205", `--max-turns must be a positive integer, got '${options.maxTurns ?? ""}'.`);
    return 1;
  }
  const session = prepareSession(ctx, options, maxTurns, BUILD_SYSTEM_PROMPT);
  if (!session) {
    return 1;
  }

  terminal.print(`🏗️  Building: ${request}`, "bold");
  terminal.print(`📂 Working directory: ${session.workDir}`, "dim");
  terminal.print(`🔧 Allowed tools: ${session.tools.join(", ")}`, "dim");
  if (options.autoApprove) {
    terminal.print("⚡ Auto-approval enabled for file edits", "yellow");
  }
  terminal.print();

  let messages: AgentMessage[];
  try {
    messages = await runSession(ctx, buildPrompt(request, session.workDir), session.options);
  } catch (error) {
    reportAgentError(ctx, error, verbose);
    return 1;
  }
  if (messages.length === 0) {
    terminal.error("ANV-0207", "No response received from Claude");
    return 1;
  }

  terminal.print();
  terminal.rule(50);
  const result = messages.find((message) => message.type === "result");
  const failed = result?.type === "result" && result.isError;
  if (failed) {
    terminal.error("ANV-0208", `Build stopped before finishing (${result.subtype || "error"}).`);
  } else {
    terminal.print("✅ Build completed successfully!", "bold green");
  }

  const toolUses = collectToolUses(messages);
  if (toolUses.length > 0) {
    terminal.print("\n🔧 Tools used:", "bold");
    for (const use of toolUses.slice(-TOOL_SUMMARY_LIMIT)) {
      terminal.print(`  • ${use}`, "dim");
    }
    if (toolUses.length > TOOL_SUMMARY_LIMIT) {
      terminal.print(`  ... and ${toolUses.length - TOOL_SUMMARY_LIMIT} more`, "dim");
    }
  }
  return failed ? 1 : 0;
}

function printChatHelp(ctx: CommandContext): void {
  ctx.terminal.print("\n📚 Available commands:", "bold");
  ctx.terminal.print("  • Any natural language request (e.g., 'create a new file')");
  ctx.terminal.print("  • 'exit' or 'quit' - End the session");
  ctx.terminal.print("  • 'help' - Show this help");
  ctx.terminal.print();
}

export async function runBuildChat(ctx: CommandContext, options: BuildChatOptions): Promise<ExitStatus> {
  const { terminal } = ctx;
  const session = prepareSession(ctx, options, CHAT_MAX_TURNS, CHAT_SYSTEM_PROMPT);
  if (!session) {
    return 1;
  }

  terminal.print("🗣️  Starting Claude Code chat session", "bold cyan");
  terminal.print(`📂 Working directory: ${session.workDir}`, "dim");
  terminal.print("💡 Type 'exit' or 'quit' to end the session", "dim");
  terminal.print("💡 Type 'help' for available commands", "dim");
  terminal.print();

  const reader = ctx.lineReader ?? createLineReader();
  try {
    while (true) {
      const input = await reader.read("You: ");
      if (input.kind !== "line") {
        break;
      }
      const text = input.text.trim();
      if (!text) {
        continue;
      }
      const lowered = text.toLowerCase();
      if (lowered === "exit" || lowered === "quit" || lowered === "bye") {
        break;
      }
      if (lowered === "help") {
        printChatHelp(ctx);
        continue;
      }
      terminal.print();
      try {
        await runSession(ctx, text, session.options);
      } catch (error) {
        reportAgentError(ctx, error, ctx.verbose);
      }
      terminal.print();
    }
  } finally {
    if (!ctx.lineReader) {
      reader.close();
    }
  }
  terminal.print("👋 Chat session ended", "dim");
  return 0;
}
