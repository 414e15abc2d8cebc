import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getVersion } from "../commands/version";
import { defaultConfig } from "../config";
import type { FetchFn } from "../providers/v0";
import { GOODBYE } from "../repl";
import { runCli, scanGlobalFlags, type ProgramOptions } from "../program";
import { captureTerminal, isolatedEnv, makeTempDir, removeDir, scriptedReader, sseResponse, v0Event } from "./helpers";

describe("scanGlobalFlags", () => {
  it("only looks before a double dash", () => {
    expect(scanGlobalFlags(["--verbose", "version"])).toEqual({ verbose: true, noColor: false });
    expect(scanGlobalFlags(["build", "create", "--", "--no-color"])).toEqual({ verbose: false, noColor: false });
  });
});

describe("runCli", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function run(argv: string[], extra: Partial<ProgramOptions> = {}) {
    const captured = captureTerminal();
    const options: ProgramOptions = {
      terminal: captured.terminal,
      cwd: dir,
      env: isolatedEnv(dir),
      config: defaultConfig(),
      pluginRoots: [],
      ...extra
    };
    return runCli(argv, options).then((status) => ({ status, ...captured }));
  }

  it("prints the version", async () => {
    const { status, stdout } = await run(["version"]);
    expect(status).toBe(0);
    expect(stdout()).toBe(`anvil ${getVersion()}\n`);
  });

  it("answers --version without running a command", async () => {
    const { status, stdout } = await run(["--version"]);
    expect(status).toBe(0);
    expect(stdout()).toBe(`${getVersion()}\n`);
  });

  it("logs plugin registration with --verbose", async () => {
    const { stdout } = await run(["--verbose", "version"]);
    expect(stdout()).toBe(`Registered built-in plugin: example\nanvil ${getVersion()}\n`);
  });

  it("round-trips a value through the cache", async () => {
    const stored = await run(["cache", "set", "greeting", "hello world"]);
    expect(stored.stdout()).toBe("✓ Cached greeting\n");

    const read = await run(["cache", "get", "greeting"]);
    expect(read.status).toBe(0);
    expect(read.stdout()).toBe("hello world\n");
    expect(fs.existsSync(path.join(dir, "cache", "cache.db"))).toBe(true);
  });

  it("fails on a cache miss", async () => {
    const { status, stderr } = await run(["cache", "get", "missing"]);
    expect(status).toBe(1);
    expect(stderr()).toBe("[ANV-0401] No cached value for key: missing\n");
  });

  it("rejects an unknown config key", async () => {
    const { status, stderr } = await run(["config", "set", "sketch.colour", "red"]);
    expect(status).toBe(1);
    expect(stderr()).toMatch(/^\[ANV-0502\] Unknown config key: sketch\.colour\. Known keys: sketch\.model, /);
  });

  it("updates a config value", async () => {
    const { status, stdout } = await run(["config", "set", "build.max_turns", "3"]);
    expect(status).toBe(0);
    expect(stdout()).toBe(`✓ Updated build.max_turns in ${path.join(dir, "config", "config.yml")}\n`);
  });

  it("runs commands contributed by the example plugin", async () => {
    const { status, stdout } = await run(["example", "hello"]);
    expect(status).toBe(0);
    expect(stdout()).toBe("👋 Hello World from the example plugin!\n");
  });

  it("exits with 1 on an unknown command", async () => {
    const { status, stderr } = await run(["frobnicate"]);
    expect(status).toBe(1);
    expect(stderr()).toBe("error: unknown command 'frobnicate'\n");
  });

  it("shows help for a bare invocation inside the shell", async () => {
    const { status, stdout } = await run([], { inRepl: true });
    expect(status).toBe(0);
    expect(stdout()).toContain("Usage: anvil [options] [command]");
  });

  it("starts the shell when called without arguments", async () => {
    const reader = scriptedReader(["version", "/exit"]);
    const { status, lines } = await run([], { lineReader: reader });

    expect(status).toBe(0);
    const output = lines();
    expect(output).toContain(`anvil ${getVersion()}`);
    expect(output[output.length - 1]).toBe(GOODBYE);
    expect(reader.closed).toBe(false);
  });

  it("sketches files from a streamed v0 answer", async () => {
    const answer = 'Here is the page:\n```tsx file="app/page.tsx"\nexport default function Page() {}\n```\n';
    const fetchImpl: FetchFn = async () => sseResponse([v0Event(answer), "data: [DONE]\n\n"]);

    const { status, stdout } = await run(["sketch", "create", "a landing page"], {
      env: isolatedEnv(dir, { V0_API_KEY: "test-secret" }),
      fetchImpl
    });

    expect(status).toBe(0);
    expect(fs.readFileSync(path.join(dir, "app", "page.tsx"), "utf-8")).toBe("export default function Page() {}");
    expect(stdout()).toContain(`  ✅ Created: ${path.join(dir, "app", "page.tsx")}\n`);
  });

  it("stops before calling v0 when no key is configured", async () => {
    const { status, stderr, stdout } = await run(["sketch", "create", "x"], {
      fetchImpl: async () => {
        throw new Error("should not be called");
      }
    });

    expect(status).toBe(1);
    expect(stderr()).toBe("[ANV-0101] V0_API_KEY not found.\n");
    expect(stdout()).toContain("   • export V0_API_KEY=YOUR_KEY\n");
  });
});
