import fs from "fs";
import path from "path";
import { errorMessage } from "../errors";
import type { Terminal } from "../ui/terminal";

export type FileWriteResult =
  | { filename: string; path: string; ok: true }
  | { filename: string; path: string; ok: false; error: string };

function resolveInside(baseDir: string, filename: string): string | null {
  const root = path.resolve(baseDir);
  const target = path.resolve(root, filename);
  const relative = path.relative(root, target);
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

/**
 * Writes each entry under `baseDir`, creating parent directories and overwriting existing files.
 * One failing entry does not stop the others.
 */
export function writeFiles(files: ReadonlyMap<string, string>, baseDir: string, terminal: Terminal): FileWriteResult[] {
  if (files.size === 0) {
    terminal.print("⚠️  No files found in the response to create.", "yellow");
    return [];
  }

  terminal.print(`\n📁 Creating ${files.size} file(s):`, "bold green");
  const results: FileWriteResult[] = [];
  for (const [filename, content] of files) {
    const target = resolveInside(baseDir, filename);
    if (!target) {
      const error = "path resolves outside the output directory";
      terminal.print(`  ❌ Failed to create ${filename}: ${error}`, "red");
      results.push({ filename, path: path.join(baseDir, filename), ok: false, error });
      continue;
    }
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content, "utf-8");
      terminal.print(`  ✅ Created: ${target}`, "green");
      results.push({ filename, path: target, ok: true });
    } catch (error) {
      const message = errorMessage(error);
      terminal.print(`  ❌ Failed to create ${target}: ${message}`, "red");
      results.push({ filename, path: target, ok: false, error: message });
    }
  }
  return results;
}
