#!/usr/bin/env node
import { loadConfig } from "./config";
import { errorMessage, formatError } from "./errors";
import { runCli } from "./program";
import { createTerminal } from "./ui/terminal";

async function main(): Promise<void> {
  const config = loadConfig();
  const terminal = createTerminal({ color: config.ui.color });
  process.exitCode = await runCli(process.argv.slice(2), { terminal, config });
}

main().catch((error: unknown) => {
  process.stderr.write(`${formatError("ANV-0001", errorMessage(error))}\n`);
  process.exitCode = 1;
});
