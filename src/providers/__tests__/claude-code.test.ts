import { describe, expect, it } from "vitest";
import {
  AgentCliNotFoundError,
  AgentProcessError,
  agentBin,
  buildAgentArgs,
  parseAgentLine,
  queryAgent,
  type AgentMessage,
  type AgentOptions
} from "../claude-code";
import { fakeAgent } from "../../__tests__/helpers";

const baseOptions: AgentOptions = {
  apiKey: "test-secret",
  cwd: "/work",
  maxTurns: 3,
  allowedTools: ["Read", "Write"],
  bin: "fake-claude",
  env: { PATH: "/usr/bin" }
};

const assistantLine = JSON.stringify({
  type: "assistant",
  message: {
    content: [
      { type: "text", text: "Creating the file" },
      { type: "tool_use", id: "tu_1", name: "Write", input: { file_path: "index.html" } }
    ]
  }
});
const toolResultLine = JSON.stringify({
  type: "user",
  message: { content: [{ type: "tool_result", tool_use_id: "tu_1", content: [{ type: "text", text: "ok" }] }] }
});
const resultLine = JSON.stringify({
  type: "result",
  subtype: "success",
  is_error: false,
  result: "Done",
  num_turns: 2,
  total_cost_usd: 0.01
});

describe("parseAgentLine", () => {
  it("maps assistant text and tool use blocks", () => {
    expect(parseAgentLine(assistantLine)).toEqual({
      type: "assistant",
      content: [
        { type: "text", text: "Creating the file" },
        { type: "tool_use", id: "tu_1", name: "Write", input: { file_path: "index.html" } }
      ]
    });
  });

  it("flattens tool result content into text", () => {
    expect(parseAgentLine(toolResultLine)).toEqual({
      type: "user",
      content: [{ type: "tool_result", toolUseId: "tu_1", content: "ok", isError: false }]
    });
  });

  it("reads the final result with turns and cost", () => {
    expect(parseAgentLine(resultLine)).toEqual({
      type: "result",
      subtype: "success",
      isError: false,
      result: "Done",
      numTurns: 2,
      costUsd: 0.01
    });
  });

  it("returns null for blank, malformed and unknown lines", () => {
    expect(parseAgentLine("   ")).toBeNull();
    expect(parseAgentLine("{oops")).toBeNull();
    expect(parseAgentLine("[1,2]")).toBeNull();
    expect(parseAgentLine('{"type":"stream_event"}')).toBeNull();
  });
});

describe("buildAgentArgs", () => {
  it("passes turns, tools and the prompt after a separator", () => {
    expect(buildAgentArgs("make a page", baseOptions)).toEqual([
      "--print",
      "--output-format",
      "stream-json",
      "--verbose",
      "--max-turns",
      "3",
      "--allowedTools",
      "Read,Write",
      "--",
      "make a page"
    ]);
  });

  it("adds the system prompt and a non-default permission mode", () => {
    const args = buildAgentArgs("-x", {
      ...baseOptions,
      allowedTools: [],
      systemPrompt: "Be brief",
      permissionMode: "acceptEdits"
    });
    expect(args.slice(6)).toEqual(["--system-prompt", "Be brief", "--permission-mode", "acceptEdits", "--", "-x"]);
  });
});

describe("agentBin", () => {
  it("prefers the explicit binary, then ANVIL_CLAUDE_BIN, then claude", () => {
    expect(agentBin({ bin: "custom", env: { ANVIL_CLAUDE_BIN: "other" } })).toBe(
      process.platform === "win32" ? "custom.cmd" : "custom"
    );
    expect(agentBin({ env: { ANVIL_CLAUDE_BIN: "/opt/claude" } })).toBe("/opt/claude");
    expect(agentBin({ env: {} })).toBe(process.platform === "win32" ? "claude.cmd" : "claude");
  });
});

describe("queryAgent", () => {
  it("streams parsed messages and resolves with all of them", async () => {
    const { spawnImpl, calls } = fakeAgent([assistantLine, "not json", toolResultLine, resultLine]);
    const seen: AgentMessage[] = [];

    const messages = await queryAgent("make a page", { ...baseOptions, spawnImpl }, (message) => seen.push(message));

    expect(messages.map((message) => message.type)).toEqual(["assistant", "user", "result"]);
    expect(seen).toEqual(messages);
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe(process.platform === "win32" ? "fake-claude.cmd" : "fake-claude");
    expect(calls[0].options.cwd).toBe("/work");
    expect(calls[0].options.env).toEqual({ PATH: "/usr/bin", ANTHROPIC_API_KEY: "test-secret" });
  });

  it("reports a missing binary as AgentCliNotFoundError", async () => {
    const error: NodeJS.ErrnoException = Object.assign(new Error("spawn fake-claude ENOENT"), { code: "ENOENT" });
    const { spawnImpl } = fakeAgent([], { error });

    await expect(queryAgent("x", { ...baseOptions, spawnImpl })).rejects.toBeInstanceOf(AgentCliNotFoundError);
  });

  it("rejects with the exit code and stderr when the process fails", async () => {
    const { spawnImpl } = fakeAgent([], { code: 2, stderr: "invalid api key\n" });

    const failure = queryAgent("x", { ...baseOptions, spawnImpl });

    await expect(failure).rejects.toBeInstanceOf(AgentProcessError);
    await expect(failure).rejects.toThrow("exited with code 2: invalid api key");
  });
});
