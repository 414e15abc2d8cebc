import fs from "fs";
import path from "path";
import { resolveApiKey } from "../config/env";
import { errorMessage } from "../errors";
import { V0ApiError, V0NetworkError, V0TimeoutError, streamChatCompletion } from "../providers/v0";
import { parseCodeBlocks } from "../sketch/code-blocks";
import { LARGE_CODEBASE_CHARS, codebaseSize, formatCodebaseForApi, readCodebase } from "../sketch/codebase";
import { writeFiles } from "../sketch/file-writer";
import { printKeyHints, V0_KEY } from "./api-key";
import type { CommandContext, ExitStatus } from "./context";

export const DOCTOR_TIMEOUT_SECONDS = 120;

export type SketchCreateOptions = {
  files: boolean;
  dir?: string;
  model?: string;
};

export type SketchDoctorOptions = {
  /** Unset unless `--analysis` or `--no-analysis` was given; only `false` hides the full output. */
  analysis?: boolean;
};

type StreamRequest = {
  apiKey: string;
  prompt: string;
  model?: string;
  banner: string;
  title: string;
  timeoutSeconds: number;
  timeoutHint: string;
};

function requireV0Key(ctx: CommandContext, includeDotenv: boolean): string | null {
  const resolved = resolveApiKey(V0_KEY.keyName, { cwd: ctx.cwd, env: ctx.env });
  if (resolved) {
    return resolved.value;
  }
  ctx.terminal.error("ANV-0101", "V0_API_KEY not found.");
  printKeyHints(ctx, V0_KEY, includeDotenv);
  return null;
}

async function streamIntoPanel(ctx: CommandContext, request: StreamRequest): Promise<string | null> {
  const { terminal } = ctx;
  terminal.print(request.banner, "bold cyan");
  terminal.print();
  const panel = terminal.panel(request.title, "cyan");
  let response: string;
  try {
    response = await streamChatCompletion({
      apiKey: request.apiKey,
      prompt: request.prompt,
      model: request.model ?? ctx.config.sketch.model,
      apiUrl: ctx.config.sketch.api_url,
      timeoutMs: request.timeoutSeconds * 1000,
      onContent: (chunk) => panel.append(chunk),
      fetchImpl: ctx.fetchImpl
    });
  } catch (error) {
    panel.close();
    if (error instanceof V0ApiError) {
      terminal.error("ANV-0102", error.message);
    } else if (error instanceof V0TimeoutError) {
      terminal.error("ANV-0103", `⏱️  ${error.message}. ${request.timeoutHint}`);
    } else if (error instanceof V0NetworkError) {
      terminal.error("ANV-0104", `🌐 Network error: ${error.message}`);
    } else {
      terminal.error("ANV-0105", `Unexpected error: ${errorMessage(error)}`);
    }
    return null;
  }
  panel.close();
  return response;
}

export async function runSketchCreate(
  ctx: CommandContext,
  prompt: string,
  options: SketchCreateOptions
): Promise<ExitStatus> {
  const { terminal } = ctx;
  const apiKey = requireV0Key(ctx, true);
  if (!apiKey) {
    return 1;
  }
  const outputDir = path.resolve(ctx.cwd, options.dir ?? ".");

  terminal.print(`📝 Prompt: ${prompt}`, "bold");
  terminal.print(`📂 Working directory: ${outputDir}`, "dim");
  terminal.print();

  const response = await streamIntoPanel(ctx, {
    apiKey,
    prompt,
    model: options.model,
    banner: "🚀 Calling v0 API...",
    title: "🤖 v0 Response",
    timeoutSeconds: ctx.config.sketch.timeout_seconds,
    timeoutHint: "Please try again."
  });
  if (response === null) {
    return 1;
  }
  if (!response) {
    terminal.error("ANV-0106", "No response received from v0 API");
    return 1;
  }

  terminal.print();
  terminal.rule(50);
  if (!options.files) {
    terminal.print("🔍 File creation skipped (--no-files flag used)", "yellow");
    return 0;
  }
  const results = writeFiles(parseCodeBlocks(response), outputDir, terminal);
  return results.every((result) => result.ok) ? 0 : 1;
}

export async function runSketchDoctor(
  ctx: CommandContext,
  target: string | undefined,
  options: SketchDoctorOptions
): Promise<ExitStatus> {
  const { terminal } = ctx;
  const apiKey = requireV0Key(ctx, false);
  if (!apiKey) {
    return 1;
  }

  const analysisPath = path.resolve(ctx.cwd, target ?? ".");
  if (!fs.existsSync(analysisPath)) {
    terminal.error("ANV-0107", `Path does not exist: ${analysisPath}`);
    return 1;
  }
  if (!fs.statSync(analysisPath).isDirectory()) {
    terminal.error("ANV-0108", `Path is not a directory: ${analysisPath}`);
    return 1;
  }

  terminal.print(`🩺 Analyzing codebase: ${analysisPath}`, "bold");
  terminal.print(`📂 Working directory: ${ctx.cwd}`, "dim");
  terminal.print();
  const reading = terminal.spinner("📖 Reading codebase files...");
  const codebase = readCodebase(analysisPath);
  reading.stop();
  if (codebase.size === 0) {
    terminal.error("ANV-0109", "No suitable files found for analysis.");
    terminal.print("💡 Make sure your directory contains code files (.py, .js, .tsx, etc.)", "dim");
    return 1;
  }
  terminal.print(`✅ Found ${codebase.size} files to analyze`, "green");

  const totalChars = codebaseSize(codebase);
  if (totalChars > LARGE_CODEBASE_CHARS) {
    terminal.print(`⚠️  Large codebase detected (${totalChars.toLocaleString("en-US")} characters)`, "yellow");
    terminal.print("   Analysis may be truncated. Consider analyzing specific subdirectories.", "dim");
  }

  terminal.print("📝 Formatting codebase for analysis...", "cyan");
  const response = await streamIntoPanel(ctx, {
    apiKey,
    prompt: formatCodebaseForApi(codebase),
    banner: "🔍 Sending codebase to v0 for analysis...",
    title: "🩺 v0 Codebase Analysis",
    timeoutSeconds: Math.max(DOCTOR_TIMEOUT_SECONDS, ctx.config.sketch.timeout_seconds),
    timeoutHint: "Your codebase might be too large."
  });
  if (response === null) {
    return 1;
  }
  if (!response) {
    terminal.error("ANV-0110", "No analysis received from v0 API");
    return 1;
  }

  terminal.print();
  terminal.rule(60);
  terminal.print("🎯 Analysis complete!", "bold green");
  if (options.analysis === false) {
    terminal.print("📋 Use --analysis to see the full analysis output", "dim");
  }
  return 0;
}
