export class CommandLineSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandLineSyntaxError";
  }
}

const DOUBLE_QUOTE_ESCAPES = new Set(["\\", '"', "$", "`", "\n"]);

/**
 * Splits a typed command line the way a POSIX shell would: whitespace separates words,
 * single quotes are literal, double quotes allow `\` escapes of `\ " $ \``.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = "";
        inWord = false;
      }
      i += 1;
      continue;
    }
    inWord = true;
    if (ch === "\\") {
      if (i + 1 >= line.length) {
        throw new CommandLineSyntaxError("No escaped character");
      }
      word += line[i + 1];
      i += 2;
      continue;
    }
    if (ch === "'") {
      const close = line.indexOf("'", i + 1);
      if (close < 0) {
        throw new CommandLineSyntaxError("No closing quotation");
      }
      word += line.slice(i + 1, close);
      i = close + 1;
      continue;
    }
    if (ch === '"') {
      i += 1;
      let closed = false;
      while (i < line.length) {
        const inner = line[i];
        if (inner === '"') {
          closed = true;
          i += 1;
          break;
        }
        if (inner === "\\" && i + 1 < line.length && DOUBLE_QUOTE_ESCAPES.has(line[i + 1])) {
          word += line[i + 1];
          i += 2;
          continue;
        }
        word += inner;
        i += 1;
      }
      if (!closed) {
        throw new CommandLineSyntaxError("No closing quotation");
      }
      continue;
    }
    word += ch;
    i += 1;
  }
  if (inWord) {
    words.push(word);
  }
  return words;
}
