import { EventEmitter } from "events";
import fs from "fs";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import type { CommandContext } from "../commands/context";
import { defaultConfig } from "../config";
import type { AgentSpawn } from "../providers/claude-code";
import type { LineReader, ReadResult } from "../ui/prompt";
import { Terminal } from "../ui/terminal";

export type CapturedTerminal = {
  terminal: Terminal;
  stdout(): string;
  stderr(): string;
  /** stdout split into lines, without the trailing empty one. */
  lines(): string[];
};

export function captureTerminal(): CapturedTerminal {
  let out = "";
  let err = "";
  const terminal = new Terminal({
    color: false,
    interactive: false,
    stdout: { write: (chunk: string) => (out += chunk) },
    stderr: { write: (chunk: string) => (err += chunk) }
  });
  return {
    terminal,
    stdout: () => out,
    stderr: () => err,
    lines: () => out.replace(/\n$/, "").split("\n")
  };
}

export function makeTempDir(prefix = "anvil-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Environment that keeps every config, key and cache file inside `root`. */
export function isolatedEnv(root: string, extra: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    PATH: process.env.PATH,
    ANVIL_HOME: path.join(root, "home"),
    ANVIL_CONFIG_PATH: path.join(root, "config", "config.yml"),
    ANVIL_CACHE_DIR: path.join(root, "cache"),
    ...extra
  };
}

export type ScriptedReader = LineReader & { prompts: string[]; closed: boolean };

export function scriptedReader(inputs: Array<string | ReadResult>): ScriptedReader {
  const queue = inputs.map((input): ReadResult => (typeof input === "string" ? { kind: "line", text: input } : input));
  const reader: ScriptedReader = {
    prompts: [],
    closed: false,
    read(prompt: string) {
      reader.prompts.push(prompt);
      return Promise.resolve(queue.shift() ?? { kind: "eof" });
    },
    close() {
      reader.closed = true;
    }
  };
  return reader;
}

export function makeContext(terminal: Terminal, cwd: string, overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    terminal,
    cwd,
    env: isolatedEnv(cwd),
    config: defaultConfig(),
    verbose: false,
    ...overrides
  };
}

/** One server-sent event carrying a chat-completion delta. */
export function v0Event(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;
}

export function sseResponse(chunks: string[]): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    }
  });
  return new Response(stream, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

export type SpawnCall = { command: string; args: string[]; options: { cwd?: string; env?: NodeJS.ProcessEnv } };

/** Stands in for the agent CLI: prints `lines` as stream-json output, then exits. */
export function fakeAgent(lines: string[], exit: { code?: number; stderr?: string; error?: NodeJS.ErrnoException } = {}) {
  const calls: SpawnCall[] = [];
  const spawnImpl: AgentSpawn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new EventEmitter();
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const failure = exit.error;
    if (failure) {
      setImmediate(() => child.emit("error", failure));
      return Object.assign(child, { stdout, stderr });
    }
    let open = 2;
    const ended = (): void => {
      open -= 1;
      if (open === 0) {
        setImmediate(() => child.emit("close", exit.code ?? 0));
      }
    };
    stdout.on("end", ended);
    stderr.on("end", ended);
    stderr.end(exit.stderr ?? "");
    stdout.end(lines.map((line) => `${line}\n`).join(""));
    return Object.assign(child, { stdout, stderr });
  };
  return { spawnImpl, calls };
}
