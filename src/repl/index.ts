import { errorMessage } from "../errors";
import type { LineReader } from "../ui/prompt";
import type { Terminal } from "../ui/terminal";
import { splitCommandLine } from "./split-args";

const LOGO = [
  " █████╗ ███╗   ██╗██╗   ██╗██╗██╗",
  "██╔══██╗████╗  ██║██║   ██║██║██║",
  "███████║██╔██╗ ██║██║   ██║██║██║",
  "██╔══██║██║╚██╗██║╚██╗ ██╔╝██║██║",
  "██║  ██║██║ ╚████║ ╚████╔╝ ██║███████╗",
  "╚═╝  ╚═╝╚═╝  ╚═══╝  ╚═══╝  ╚═╝╚══════╝"
];

export const PROMPT = "> ";
export const GOODBYE = "Bye - thanks for forging with Anvil!";
export const INTERRUPT_HINT = "Use /exit or /quit to leave the shell";

export type ReplOptions = {
  terminal: Terminal;
  cwd: string;
  reader: LineReader;
  /** Runs one command line against a fresh command tree and resolves with its exit status. */
  dispatch: (args: string[]) => Promise<number>;
};

export function welcomeLines(cwd: string): string[] {
  return [
    ...LOGO,
    "",
    "Welcome to anvilCLI!",
    "",
    "What can I do?:",
    '  • Sketch a new idea using v0\'s API (sketch create "your prompt")',
    "  • Analyze your codebase for improvements (sketch doctor)",
    '  • Build with an AI coding agent (build create "your idea")',
    "  • Get colour palettes from images (palette <image>)",
    "",
    "/help for help, /status for your current setup",
    "",
    `cwd: ${cwd}`
  ];
}

function showWelcome(terminal: Terminal, cwd: string): void {
  terminal.box(welcomeLines(cwd), "yellow");
  terminal.print(
    "* Tip: Start with small features or bug fixes, ask Anvil to propose a plan, and verify its suggested edits *",
    "dim"
  );
  terminal.print();
}

function showHelp(terminal: Terminal): void {
  terminal.print("Available slash commands:", "bold");
  terminal.print("  /help, ?     - Show this help message");
  terminal.print("  /status      - Show current working directory and Node.js version");
  terminal.print("  /exit, /quit - Exit the REPL");
  terminal.print();
  terminal.print("Anything else will be forwarded to the normal anvil CLI", "dim");
}

function showStatus(terminal: Terminal, cwd: string): void {
  terminal.print("Current Status:", "bold cyan");
  terminal.print(`  Working Directory: ${cwd}`);
  terminal.print(`  Node.js Version: ${process.versions.node}`);
}

/** Interactive shell; resolves once the user leaves or input ends. */
export async function runRepl(options: ReplOptions): Promise<number> {
  const { terminal, cwd, reader } = options;
  showWelcome(terminal, cwd);
  try {
    while (true) {
      const input = await reader.read(terminal.paint(PROMPT, "bold cyan"));
      if (input.kind === "eof") {
        break;
      }
      if (input.kind === "interrupt") {
        terminal.print(`\n${INTERRUPT_HINT}`, "dim");
        terminal.print();
        continue;
      }
      const line = input.text.trim();
      if (!line) {
        continue;
      }
      if (line === "/help" || line === "?") {
        showHelp(terminal);
      } else if (line === "/status") {
        showStatus(terminal, cwd);
      } else if (line === "/exit" || line === "/quit") {
        break;
      } else {
        let args: string[] | null = null;
        try {
          args = splitCommandLine(line);
        } catch (error) {
          terminal.fail(`Error parsing command: ${errorMessage(error)}`);
        }
        if (args && args.length > 0) {
          try {
            await options.dispatch(args);
          } catch (error) {
            terminal.fail(`Error executing command: ${errorMessage(error)}`);
          }
        }
      }
      terminal.print();
    }
  } finally {
    terminal.print(GOODBYE, "dim");
  }
  return 0;
}
