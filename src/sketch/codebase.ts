import fs from "fs";
import path from "path";

export const INCLUDE_EXTENSIONS = new Set([
  ".py", ".js", ".jsx", ".ts", ".tsx", ".css", ".scss", ".sass", ".less",
  ".html", ".htm", ".vue", ".svelte", ".json", ".yaml", ".yml", ".toml",
  ".md", ".mdx", ".txt",
  ".sql", ".graphql", ".gql", ".xml", ".svg"
]);

export const EXCLUDE_DIRS = new Set([
  "node_modules", ".git", ".svn", ".hg", "__pycache__", ".pytest_cache",
  ".mypy_cache", ".ruff_cache", "dist", "build", ".next", ".nuxt",
  "coverage", "htmlcov", ".coverage", ".env", ".venv", "venv", "env",
  ".DS_Store", "Thumbs.db", ".idea", ".vscode"
]);

export const MAX_FILE_BYTES = 100_000;
export const LARGE_CODEBASE_CHARS = 50_000;

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "jsx",
  ".ts": "typescript",
  ".tsx": "tsx",
  ".css": "css",
  ".html": "html",
  ".json": "json",
  ".md": "markdown",
  ".yml": "yaml",
  ".yaml": "yaml",
  ".toml": "toml",
  ".sql": "sql",
  ".graphql": "graphql"
};

export type Codebase = Map<string, string>;

export function shouldIncludeFile(relativePath: string, sizeBytes: number): boolean {
  const parts = relativePath.split(/[\\/]+/).filter(Boolean);
  const fileName = parts[parts.length - 1] ?? "";
  // Dotfiles such as `.env` have no extension and never match.
  if (!INCLUDE_EXTENSIONS.has(path.extname(fileName).toLowerCase())) {
    return false;
  }
  if (parts.slice(0, -1).some((part) => EXCLUDE_DIRS.has(part) || part.endsWith(".egg-info"))) {
    return false;
  }
  return sizeBytes <= MAX_FILE_BYTES;
}

function walk(dir: string, baseDir: string, out: Codebase): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (EXCLUDE_DIRS.has(entry.name) || entry.name.endsWith(".egg-info")) {
        continue;
      }
      walk(full, baseDir, out);
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    const relative = path.relative(baseDir, full).split(path.sep).join("/");
    try {
      const { size } = fs.statSync(full);
      if (!shouldIncludeFile(relative, size)) {
        continue;
      }
      out.set(relative, fs.readFileSync(full, "utf-8"));
    } catch {
      continue;
    }
  }
}

/** Relative path (forward slashes) → file contents for every file worth reviewing. */
export function readCodebase(baseDir: string): Codebase {
  const codebase: Codebase = new Map();
  walk(baseDir, baseDir, codebase);
  return codebase;
}

export function codebaseSize(codebase: Codebase): number {
  let total = 0;
  for (const content of codebase.values()) {
    total += content.length;
  }
  return total;
}

export function languageFor(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? "text";
}

export function formatCodebaseForApi(codebase: Codebase): string {
  const files = [...codebase.keys()].sort();
  const lines: string[] = [
    "# Codebase Analysis",
    "",
    "Please analyze this codebase and offer improvements, suggestions, and best practices.",
    "",
    "## File Structure",
    "",
    ...files.map((file) => `- ${file}`),
    "",
    "## File Contents",
    ""
  ];
  for (const file of files) {
    lines.push(`### ${file}`, "", `\`\`\`${languageFor(file)}`, codebase.get(file) ?? "", "```", "");
  }
  return lines.join("\n");
}
