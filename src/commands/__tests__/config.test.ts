import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { captureTerminal, makeContext, makeTempDir, removeDir } from "../../__tests__/helpers";
import { defaultConfig, renderYaml } from "../../config";
import { runConfigInit, runConfigSet, runConfigShow } from "../config";

describe("config commands", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir();
    file = path.join(dir, "config", "config.yml");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("shows defaults before the file exists", () => {
    const { terminal, stdout } = captureTerminal();

    expect(runConfigShow(makeContext(terminal, dir))).toBe(0);
    expect(stdout()).toBe(`# ${file} (not created yet, showing defaults)\n${renderYaml(defaultConfig())}`);
  });

  it("initialises the file once", () => {
    const { terminal, lines } = captureTerminal();
    const ctx = makeContext(terminal, dir);

    runConfigInit(ctx);
    runConfigInit(ctx);

    expect(lines()).toEqual([`✓ Config initialized: ${file}`, `Config already exists: ${file}`]);
  });

  it("shows what was set", () => {
    const { terminal, stdout } = captureTerminal();
    const ctx = makeContext(terminal, dir);

    runConfigSet(ctx, "sketch.model", "v0-1.5-md");
    runConfigShow(ctx);

    expect(stdout()).toContain(`# ${file}\n# anvil configuration\nsketch:\n  model: v0-1.5-md\n`);
  });
});
