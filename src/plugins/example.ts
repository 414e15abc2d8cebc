import type { AnvilPlugin } from "./types";

export const examplePlugin: AnvilPlugin = {
  name: "example",
  register(program, context) {
    const example = program.command("example").description("Example plugin command");
    example
      .command("hello")
      .description("Say hello from the example plugin")
      .argument("[name]", "Name to greet", "World")
      .action((name: string) => {
        context.terminal.print(`👋 Hello ${name} from the example plugin!`);
      });
  }
};
