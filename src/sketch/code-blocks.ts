/**
 * Extracts files from fenced code blocks in a generated markdown answer.
 *
 * Four opening-fence conventions are recognised, in this order:
 *
 *   ```tsx file="app/page.tsx"     attributed
 *   ```tsx:app/page.tsx            colon
 *   ```components/square.tsx       direct filename
 *   ```typescript                  language only, filename from DEFAULT_FILENAMES
 */

const FENCE = "```";

export const FILE_EXTENSIONS = [
  "ts",
  "tsx",
  "js",
  "jsx",
  "py",
  "css",
  "html",
  "json",
  "md",
  "yml",
  "yaml",
  "toml",
  "sh",
  "txt"
] as const;

export const DEFAULT_FILENAMES: ReadonlyMap<string, string> = new Map([
  ["typescript", "index.ts"],
  ["ts", "index.ts"],
  ["tsx", "index.ts"],
  ["javascript", "index.js"],
  ["js", "index.js"],
  ["jsx", "index.js"],
  ["python", "main.py"],
  ["py", "main.py"],
  ["css", "styles.css"],
  ["html", "index.html"],
  ["json", "config.json"],
  ["markdown", "README.md"],
  ["md", "README.md"]
]);

export type BlockHeader =
  | { kind: "attributed"; language: string; filename: string }
  | { kind: "colon"; language: string; filename: string }
  | { kind: "direct"; filename: string }
  | { kind: "language"; language: string };

export type CodeBlock = {
  header: BlockHeader | null;
  body: string;
};

const ATTRIBUTED_HEADER = /^(\w+)\s+file="([^"]+)"$/;
const COLON_HEADER = /^(\w+):(.+)$/;
const LANGUAGE_HEADER = /^\w+$/;
const EXTENSION_SUFFIX = new RegExp(`\\.(?:${FILE_EXTENSIONS.join("|")})$`);

export function hasRecognizedExtension(filename: string): boolean {
  return EXTENSION_SUFFIX.test(filename);
}

/** Returns null for headers that name neither a file nor a language. */
export function classifyHeader(rawHeader: string): BlockHeader | null {
  const header = rawHeader.endsWith("\r") ? rawHeader.slice(0, -1) : rawHeader;
  if (!header) {
    return null;
  }
  const attributed = ATTRIBUTED_HEADER.exec(header);
  if (attributed) {
    return { kind: "attributed", language: attributed[1], filename: attributed[2] };
  }
  const colon = COLON_HEADER.exec(header);
  if (colon && hasRecognizedExtension(colon[2])) {
    return { kind: "colon", language: colon[1], filename: colon[2] };
  }
  if (hasRecognizedExtension(header)) {
    return { kind: "direct", filename: header };
  }
  if (LANGUAGE_HEADER.test(header)) {
    return { kind: "language", language: header };
  }
  return null;
}

/**
 * Splits the document into terminated blocks. An opening fence starts a line;
 * a block's body runs to the next triple backtick, and a block with no closing
 * fence ends the scan.
 */
export function scanCodeBlocks(markdown: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  let cursor = 0;
  while (cursor < markdown.length) {
    const open = markdown.indexOf(FENCE, cursor);
    if (open < 0) {
      break;
    }
    if (open > 0 && markdown[open - 1] !== "\n") {
      cursor = open + FENCE.length;
      continue;
    }
    const headerStart = open + FENCE.length;
    const newline = markdown.indexOf("\n", headerStart);
    if (newline < 0) {
      break;
    }
    const close = markdown.indexOf(FENCE, newline + 1);
    if (close < 0) {
      break;
    }
    blocks.push({
      header: classifyHeader(markdown.slice(headerStart, newline)),
      body: markdown.slice(newline + 1, close).trim()
    });
    cursor = close + FENCE.length;
  }
  return blocks;
}

export function resolveFilename(block: CodeBlock): string | null {
  const { header } = block;
  if (!header) {
    return null;
  }
  switch (header.kind) {
    case "attributed":
    case "colon":
    case "direct":
      return header.filename;
    case "language":
      if (!block.body) {
        return null;
      }
      return DEFAULT_FILENAMES.get(header.language) ?? null;
  }
}

/** Filename → body, in discovery order; a later block with the same filename replaces the earlier body. */
export function parseCodeBlocks(markdown: string): Map<string, string> {
  const files = new Map<string, string>();
  for (const block of scanCodeBlocks(markdown)) {
    const filename = resolveFilename(block);
    if (filename !== null) {
      files.set(filename, block.body);
    }
  }
  return files;
}
