import { Command, CommanderError } from "commander";
import { ANTHROPIC_KEY, runKeyConfig, V0_KEY, type KeyConfigOptions } from "./commands/api-key";
import { runBuildChat, runBuildCreate, type BuildChatOptions, type BuildCreateOptions } from "./commands/build";
import { runCache } from "./commands/cache";
import { runConfigInit, runConfigSet, runConfigShow } from "./commands/config";
import type { CommandContext, ExitStatus } from "./commands/context";
import { runPalette, type PaletteOptions } from "./commands/palette";
import { runSketchCreate, runSketchDoctor, type SketchCreateOptions, type SketchDoctorOptions } from "./commands/sketch";
import { getVersion, runUpgrade, runVersion } from "./commands/version";
import { loadConfig, type AnvilConfig } from "./config";
import { errorMessage } from "./errors";
import { registerPlugins } from "./plugins";
import type { AgentSpawn } from "./providers/claude-code";
import type { FetchFn } from "./providers/v0";
import { runRepl } from "./repl";
import { createLineReader, type LineReader } from "./ui/prompt";
import type { Terminal } from "./ui/terminal";

export type ProgramOptions = {
  terminal: Terminal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  config?: AnvilConfig;
  verbose?: boolean;
  fetchImpl?: FetchFn;
  spawnImpl?: AgentSpawn;
  agentInstalled?: (bin: string) => boolean;
  lineReader?: LineReader;
  /** Set for command lines typed into the shell: a bare invocation prints help instead of nesting a shell. */
  inRepl?: boolean;
  /** Overrides where installed plugins are looked for. */
  pluginRoots?: string[];
};

export type AnvilProgram = {
  program: Command;
  context: CommandContext;
  status(): ExitStatus;
};

export type GlobalFlags = {
  verbose: boolean;
  noColor: boolean;
};

/** Global flags are needed before the command tree exists (colour, plugin logging). */
export function scanGlobalFlags(argv: string[]): GlobalFlags {
  const end = argv.indexOf("--");
  const head = end < 0 ? argv : argv.slice(0, end);
  return { verbose: head.includes("--verbose"), noColor: head.includes("--no-color") };
}

export function createProgram(options: ProgramOptions): AnvilProgram {
  const env = options.env ?? process.env;
  const context: CommandContext = {
    terminal: options.terminal,
    cwd: options.cwd ?? process.cwd(),
    env,
    config: options.config ?? loadConfig(env),
    verbose: Boolean(options.verbose),
    fetchImpl: options.fetchImpl,
    spawnImpl: options.spawnImpl,
    agentInstalled: options.agentInstalled,
    lineReader: options.lineReader
  };
  const { terminal } = context;
  let exitStatus: ExitStatus = 0;
  const settle = (status: ExitStatus): void => {
    exitStatus = status;
  };

  const program = new Command();
  program
    .name("anvil")
    .description("A CLI for creative development workflows")
    .version(getVersion(), "-V, --version")
    .option("--verbose", "Enable verbose output")
    .option("--no-color", "Disable colored output")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => terminal.write(text),
      writeErr: (text) => terminal.writeError(text),
      outputError: (text, write) => write(terminal.paint(text, "red"))
    });

  program.hook("preAction", (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    context.verbose = context.verbose || Boolean(opts.verbose);
  });

  program.action(async () => {
    if (program.args.length > 0) {
      program.error(`error: unknown command '${program.args[0]}'`, { code: "commander.unknownCommand", exitCode: 1 });
    }
    if (options.inRepl) {
      program.outputHelp();
      return;
    }
    const reader = options.lineReader ?? createLineReader();
    try {
      settle(
        await runRepl({
          terminal,
          cwd: context.cwd,
          reader,
          dispatch: (args) =>
            runCli(args, {
              ...options,
              terminal,
              env,
              cwd: context.cwd,
              config: loadConfig(env),
              lineReader: reader,
              inRepl: true
            })
        })
      );
    } finally {
      if (!options.lineReader) {
        reader.close();
      }
    }
  });

  program
    .command("version")
    .description("Show version information")
    .action(() => settle(runVersion(context)));

  program
    .command("upgrade")
    .description("Upgrade anvil to the latest version")
    .action(() => settle(runUpgrade(context)));

  program
    .command("palette")
    .description("Extract the dominant colours of a PNG image into <name>_palette.json")
    .argument("<image>", "Path to the image file")
    .option("--colors <n>", "Number of colours to extract (1-16)")
    .option("--no-cache", "Recompute even if a cached palette exists")
    .action((image: string, opts: PaletteOptions) => settle(runPalette(context, image, opts)));

  const sketch = program.command("sketch").description("Generate UI code from text prompts using the v0 API");
  sketch
    .command("create")
    .description("Stream a v0 answer and write its code blocks as files")
    .argument("<prompt>", "What to sketch")
    .option("--no-files", "Don't create files, just show the response")
    .option("--dir <path>", "Directory the files are written to (defaults to the working directory)")
    .option("--model <name>", "v0 model id")
    .action(async (prompt: string, opts: SketchCreateOptions) => settle(await runSketchCreate(context, prompt, opts)));
  sketch
    .command("doctor")
    .description("Send your codebase to v0 for improvement suggestions")
    .argument("[path]", "Directory to analyze (defaults to the working directory)")
    .option("--analysis", "Include detailed analysis in output")
    .option("--no-analysis", "Only report that the analysis finished")
    .action(async (target: string | undefined, opts: SketchDoctorOptions) =>
      settle(await runSketchDoctor(context, target, opts))
    );
  sketch
    .command("config")
    .description("Manage the v0 API key")
    .option("--set-key <key>", "Set your v0 API key")
    .option("--global", "Save to the global config (~/.anvil/.env)")
    .option("--show", "Show current API key status")
    .action((opts: KeyConfigOptions) => settle(runKeyConfig(context, V0_KEY, opts)));

  const build = program.command("build").description("Build projects with an AI coding agent");
  build
    .command("create")
    .description("Build something from a natural-language request")
    .argument("<prompt>", "What you want the agent to build")
    .option("--tools <list>", "Comma-separated list of allowed tools")
    .option("--max-turns <n>", "Maximum number of conversation turns")
    .option("--dir <path>", "Working directory for the build")
    .option("--verbose", "Enable verbose output")
    .option("--auto-approve", "Auto-approve file edits and tool usage")
    .action(async (prompt: string, opts: BuildCreateOptions) => settle(await runBuildCreate(context, prompt, opts)));
  build
    .command("chat")
    .description("Start an interactive chat session with the agent")
    .option("--dir <path>", "Working directory for the chat")
    .option("--tools <list>", "Comma-separated list of allowed tools")
    .option("--auto-approve", "Auto-approve file edits and tool usage")
    .action(async (opts: BuildChatOptions) => settle(await runBuildChat(context, opts)));
  build
    .command("config")
    .description("Manage the Anthropic API key")
    .option("--set-key <key>", "Set your Anthropic API key")
    .option("--global", "Save to the global config (~/.anvil/.env)")
    .option("--show", "Show current API key status")
    .action((opts: KeyConfigOptions) => settle(runKeyConfig(context, ANTHROPIC_KEY, opts)));

  const cache = program.command("cache").description("Inspect the local key-value cache");
  cache
    .command("get")
    .argument("<key>")
    .description("Print a cached value")
    .action((key: string) => settle(runCache(context, { type: "get", key })));
  cache
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .description("Store a value")
    .action((key: string, value: string) => settle(runCache(context, { type: "set", key, value })));
  cache
    .command("delete")
    .argument("<key>")
    .description("Remove a cached value")
    .action((key: string) => settle(runCache(context, { type: "delete", key })));
  cache
    .command("clear")
    .description("Remove every cached value")
    .action(() => settle(runCache(context, { type: "clear" })));
  cache
    .command("path")
    .description("Print the cache database location")
    .action(() => settle(runCache(context, { type: "path" })));

  const config = program.command("config").description("Show or change anvil configuration");
  config
    .command("show")
    .description("Print the effective configuration")
    .action(() => settle(runConfigShow(context)));
  config
    .command("init")
    .description("Write the default configuration file")
    .action(() => settle(runConfigInit(context)));
  config
    .command("set")
    .argument("<key>", "Dotted key, e.g. sketch.model")
    .argument("<value>")
    .description("Update one configuration value")
    .action((key: string, value: string) => settle(runConfigSet(context, key, value)));

  registerPlugins(program, context, {
    external: context.config.plugins.autoload,
    searchRoots: options.pluginRoots
  });

  return { program, context, status: () => exitStatus };
}

/** Parses and runs one command line; never calls process.exit. */
export async function runCli(argv: string[], options: ProgramOptions): Promise<ExitStatus> {
  const flags = scanGlobalFlags(argv);
  const terminal = flags.noColor ? options.terminal.withoutColor() : options.terminal;
  const { program, status } = createProgram({ ...options, terminal, verbose: Boolean(options.verbose) || flags.verbose });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    terminal.error("ANV-0001", `Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
  return status();
}
