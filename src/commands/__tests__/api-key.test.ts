import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { captureTerminal, isolatedEnv, makeContext, makeTempDir, removeDir } from "../../__tests__/helpers";
import { ANTHROPIC_KEY, runKeyConfig, V0_KEY } from "../api-key";

describe("runKeyConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("saves a key to the project .env", () => {
    const { terminal, lines } = captureTerminal();

    expect(runKeyConfig(makeContext(terminal, dir), V0_KEY, { setKey: "test-secret" })).toBe(0);

    const file = path.join(dir, ".env");
    expect(fs.readFileSync(file, "utf-8")).toBe("V0_API_KEY=test-secret\n");
    expect(lines()).toEqual([
      `✅ v0 API key saved to: ${file}`,
      "💡 Tip: Add .env to your .gitignore to keep your API key private"
    ]);
  });

  it("saves a key globally", () => {
    const { terminal, lines } = captureTerminal();

    runKeyConfig(makeContext(terminal, dir), ANTHROPIC_KEY, { setKey: "test-secret", global: true });

    const file = path.join(dir, "home", ".env");
    expect(fs.readFileSync(file, "utf-8")).toBe("ANTHROPIC_API_KEY=test-secret\n");
    expect(lines()).toEqual([`✅ Anthropic API key saved to: ${file}`]);
  });

  it("refuses an empty key", () => {
    const { terminal, stderr } = captureTerminal();

    expect(runKeyConfig(makeContext(terminal, dir), V0_KEY, { setKey: "  " })).toBe(1);
    expect(stderr()).toBe("[ANV-0501] API key must not be empty.\n");
    expect(fs.existsSync(path.join(dir, ".env"))).toBe(false);
  });

  it("shows a masked key and where it came from", () => {
    const { terminal, lines } = captureTerminal();
    const ctx = makeContext(terminal, dir, { env: isolatedEnv(dir, { ANTHROPIC_API_KEY: "sk-ant-test-secret-1234" }) });

    runKeyConfig(ctx, ANTHROPIC_KEY, { show: true });

    expect(lines()).toEqual(["✅ Anthropic API key found: sk-ant-t...1234", "🌍 Loaded from environment variable"]);
  });

  it("shows the project file as the source", () => {
    fs.writeFileSync(path.join(dir, ".env"), "V0_API_KEY=v0-test-secret-abcd\n", "utf-8");
    const { terminal, lines } = captureTerminal();

    runKeyConfig(makeContext(terminal, dir), V0_KEY, { show: true });

    expect(lines()).toEqual(["✅ v0 API key found: v0-test-...abcd", `📁 Loaded from: ${path.join(dir, ".env")}`]);
  });

  it("explains how to set a missing key", () => {
    const { terminal, lines } = captureTerminal();

    expect(runKeyConfig(makeContext(terminal, dir), V0_KEY, { show: true })).toBe(0);

    expect(lines()).toEqual([
      "❌ No v0 API key found",
      "",
      "💡 Set your API key using one of these methods:",
      "   • anvil sketch config --set-key YOUR_KEY",
      "   • anvil sketch config --set-key YOUR_KEY --global",
      "   • export V0_API_KEY=YOUR_KEY"
    ]);
  });

  it("prints usage without options", () => {
    const { terminal, lines } = captureTerminal();

    runKeyConfig(makeContext(terminal, dir), ANTHROPIC_KEY, {});

    expect(lines()[0]).toBe("🔧 Anthropic API Key Configuration");
    expect(lines()).toContain("  anvil build config --set-key sk-ant-xxxxx --global");
  });
});
