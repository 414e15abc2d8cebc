import { describe, expect, it, vi } from "vitest";
import { captureTerminal, scriptedReader } from "../../__tests__/helpers";
import { GOODBYE, INTERRUPT_HINT, PROMPT, runRepl, welcomeLines } from "..";

describe("welcomeLines", () => {
  it("ends with the working directory", () => {
    const lines = welcomeLines("/projects/demo");
    expect(lines).toContain("Welcome to anvilCLI!");
    expect(lines[lines.length - 1]).toBe("cwd: /projects/demo");
  });
});

describe("runRepl", () => {
  it("forwards split command lines and handles slash commands", async () => {
    const { terminal, lines, stderr } = captureTerminal();
    const reader = scriptedReader([
      "",
      "/status",
      `sketch create "a b"`,
      "'oops",
      { kind: "interrupt" },
      "/exit",
      "never read"
    ]);
    const dispatch = vi.fn(async (_args: string[]) => 0);

    const status = await runRepl({ terminal, cwd: "/projects/demo", reader, dispatch });

    expect(status).toBe(0);
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch).toHaveBeenCalledWith(["sketch", "create", "a b"]);
    expect(reader.prompts).toEqual([PROMPT, PROMPT, PROMPT, PROMPT, PROMPT, PROMPT]);
    expect(stderr()).toBe("Error parsing command: No closing quotation\n");

    const output = lines();
    expect(output.some((line) => line.startsWith("│ Welcome to anvilCLI!"))).toBe(true);
    expect(output).toContain("Current Status:");
    expect(output).toContain("  Working Directory: /projects/demo");
    expect(output).toContain(`  Node.js Version: ${process.versions.node}`);
    expect(output).toContain(INTERRUPT_HINT);
    expect(output[output.length - 1]).toBe(GOODBYE);
  });

  it("prints the slash command help", async () => {
    const { terminal, lines } = captureTerminal();
    const dispatch = vi.fn(async (_args: string[]) => 0);

    await runRepl({ terminal, cwd: "/x", reader: scriptedReader(["?"]), dispatch });

    const output = lines();
    const start = output.indexOf("Available slash commands:");
    expect(output.slice(start, start + 7)).toEqual([
      "Available slash commands:",
      "  /help, ?     - Show this help message",
      "  /status      - Show current working directory and Node.js version",
      "  /exit, /quit - Exit the REPL",
      "",
      "Anything else will be forwarded to the normal anvil CLI",
      ""
    ]);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("reports a failing command and keeps reading", async () => {
    const { terminal, stderr } = captureTerminal();
    const dispatch = vi
      .fn(async (_args: string[]) => 0)
      .mockRejectedValueOnce(new Error("boom"));
    const reader = scriptedReader(["version", "version"]);

    await runRepl({ terminal, cwd: "/x", reader, dispatch });

    expect(stderr()).toBe("Error executing command: boom\n");
    expect(dispatch).toHaveBeenCalledTimes(2);
  });

  it("says goodbye when input ends", async () => {
    const { terminal, lines } = captureTerminal();

    await runRepl({ terminal, cwd: "/x", reader: scriptedReader([]), dispatch: async () => 0 });

    expect(lines().slice(-2)).toEqual(["", GOODBYE]);
  });
});
