import chalk from "chalk";
import ora from "ora";
import { formatError } from "../errors";

export type Style =
  | "bold"
  | "dim"
  | "red"
  | "green"
  | "yellow"
  | "cyan"
  | "bold cyan"
  | "bold green"
  | "bold yellow";

export type OutputStream = {
  write(chunk: string): unknown;
};

export type TerminalOptions = {
  color: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Spinners and other cursor tricks are only used on interactive terminals. */
  interactive?: boolean;
};

export type Spinner = {
  stop(): void;
};

const PANEL_WIDTH = 60;

export class Panel {
  private text = "";
  private closed = false;

  constructor(
    private readonly terminal: Terminal,
    readonly title: string,
    private readonly style: Style
  ) {
    const label = `╭─ ${title} `;
    const fill = "─".repeat(Math.max(4, PANEL_WIDTH - label.length));
    terminal.print(`${label}${fill}`, style);
  }

  append(chunk: string): void {
    if (!chunk || this.closed) {
      return;
    }
    this.text += chunk;
    this.terminal.write(chunk);
  }

  content(): string {
    return this.text;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.text.length > 0 && !this.text.endsWith("\n")) {
      this.terminal.write("\n");
    }
    this.terminal.print(`╰${"─".repeat(PANEL_WIDTH - 1)}`, this.style);
  }
}

/**
 * Terminal output with colour decided once at construction time.
 * Every command receives the terminal it writes to instead of reaching for a global console.
 */
export class Terminal {
  readonly color: boolean;
  readonly interactive: boolean;
  private readonly out: OutputStream;
  private readonly err: OutputStream;
  private readonly chalk: chalk.Chalk;

  constructor(options: TerminalOptions) {
    this.color = options.color;
    this.out = options.stdout ?? process.stdout;
    this.err = options.stderr ?? process.stderr;
    this.interactive = options.interactive ?? (options.stdout === undefined && Boolean(process.stdout.isTTY));
    this.chalk = new chalk.Instance({ level: options.color ? 1 : 0 });
  }

  withoutColor(): Terminal {
    if (!this.color) {
      return this;
    }
    return new Terminal({ color: false, stdout: this.out, stderr: this.err, interactive: this.interactive });
  }

  paint(text: string, style?: Style): string {
    switch (style) {
      case "bold":
        return this.chalk.bold(text);
      case "dim":
        return this.chalk.dim(text);
      case "red":
        return this.chalk.red(text);
      case "green":
        return this.chalk.green(text);
      case "yellow":
        return this.chalk.yellow(text);
      case "cyan":
        return this.chalk.cyan(text);
      case "bold cyan":
        return this.chalk.bold.cyan(text);
      case "bold green":
        return this.chalk.bold.green(text);
      case "bold yellow":
        return this.chalk.bold.yellow(text);
      default:
        return text;
    }
  }

  write(text: string): void {
    this.out.write(text);
  }

  print(text = "", style?: Style): void {
    this.out.write(`${this.paint(text, style)}\n`);
  }

  writeError(text: string): void {
    this.err.write(text);
  }

  /** Plain failure line on stderr. */
  fail(message: string): void {
    this.err.write(`${this.paint(message, "red")}\n`);
  }

  error(code: string, message: string): void {
    this.err.write(`${this.paint(formatError(code, message), "red")}\n`);
  }

  rule(width = 50): void {
    this.print("=".repeat(width), "dim");
  }

  box(lines: string[], style: Style): void {
    const width = Math.max(...lines.map((line) => line.length), 0);
    this.print(`╭${"─".repeat(width + 2)}╮`, style);
    for (const line of lines) {
      this.print(`│ ${line.padEnd(width)} │`, style);
    }
    this.print(`╰${"─".repeat(width + 2)}╯`, style);
  }

  panel(title: string, style: Style = "cyan"): Panel {
    return new Panel(this, title, style);
  }

  spinner(text: string): Spinner {
    if (!this.interactive) {
      this.print(text, "bold cyan");
      return { stop: () => undefined };
    }
    const instance = ora({ text, color: "cyan" }).start();
    return {
      stop: () => {
        instance.stop();
      }
    };
  }
}

export function createTerminal(options: { color?: boolean; env?: NodeJS.ProcessEnv } = {}): Terminal {
  const env = options.env ?? process.env;
  const noColorEnv = typeof env.NO_COLOR === "string" && env.NO_COLOR.length > 0;
  const color = (options.color ?? true) && !noColorEnv && Boolean(process.stdout.isTTY);
  return new Terminal({ color });
}
