import { cacheDbPath, withCache } from "../cache";
import { errorMessage } from "../errors";
import type { CommandContext, ExitStatus } from "./context";

export type CacheAction =
  | { type: "get"; key: string }
  | { type: "set"; key: string; value: string }
  | { type: "delete"; key: string }
  | { type: "clear" }
  | { type: "path" };

export function runCache(ctx: CommandContext, action: CacheAction): ExitStatus {
  const { terminal } = ctx;
  const dbPath = cacheDbPath(ctx.env);
  if (action.type === "path") {
    terminal.print(dbPath);
    return 0;
  }
  try {
    return withCache((cache) => {
      switch (action.type) {
        case "get": {
          const value = cache.get(action.key);
          if (value === undefined) {
            terminal.error("ANV-0401", `No cached value for key: ${action.key}`);
            return 1;
          }
          terminal.print(value);
          return 0;
        }
        case "set":
          cache.set(action.key, action.value);
          terminal.print(`✓ Cached ${action.key}`, "green");
          return 0;
        case "delete":
          if (!cache.delete(action.key)) {
            terminal.print(`No cached value for key: ${action.key}`, "yellow");
            return 0;
          }
          terminal.print(`✓ Deleted ${action.key}`, "green");
          return 0;
        case "clear": {
          const removed = cache.clear();
          terminal.print(`✓ Cleared ${removed} cached ${removed === 1 ? "entry" : "entries"}`, "green");
          return 0;
        }
      }
    }, dbPath);
  } catch (error) {
    terminal.error("ANV-0402", `Cache unavailable at ${dbPath}: ${errorMessage(error)}`);
    return 1;
  }
}
