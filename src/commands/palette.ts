import fs from "fs";
import path from "path";
import { Cache, cacheDbPath } from "../cache";
import { errorMessage } from "../errors";
import {
  DEFAULT_COLOR_COUNT,
  MAX_COLOR_COUNT,
  extractColors,
  extractColorsFromPng,
  paletteCacheKey,
  parseCachedPalette
} from "../palette";
import type { CommandContext, ExitStatus } from "./context";

export type PaletteOptions = {
  colors?: string;
  cache: boolean;
};

function parseColorCount(raw: string | undefined): number | null {
  if (raw === undefined) {
    return DEFAULT_COLOR_COUNT;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || String(value) !== raw.trim() || value < 1 || value > MAX_COLOR_COUNT) {
    return null;
  }
  return value;
}

export function paletteOutputPath(imagePath: string): string {
  const parsed = path.parse(imagePath);
  return path.join(parsed.dir, `${parsed.name}_palette.json`);
}

function openCache(ctx: CommandContext): Cache | null {
  try {
    return new Cache(cacheDbPath(ctx.env));
  } catch (error) {
    cacheWarning(ctx, error);
    return null;
  }
}

function cacheWarning(ctx: CommandContext, error: unknown): void {
  if (ctx.verbose) {
    ctx.terminal.print(`⚠️  Palette cache unavailable: ${errorMessage(error)}`, "yellow");
  }
}

function cachedColors(ctx: CommandContext, cache: Cache, key: string): string[] | null {
  try {
    return parseCachedPalette(cache.get(key));
  } catch (error) {
    cacheWarning(ctx, error);
    return null;
  }
}

// A cache that cannot be opened, read or written never fails the command.
function colorsFor(ctx: CommandContext, imagePath: string, count: number, useCache: boolean): string[] {
  if (!useCache) {
    return extractColors(imagePath, count);
  }
  const raw = fs.readFileSync(imagePath);
  const cache = openCache(ctx);
  if (!cache) {
    return extractColorsFromPng(raw, count);
  }
  try {
    const key = paletteCacheKey(raw, count);
    const cached = cachedColors(ctx, cache, key);
    if (cached) {
      if (ctx.verbose) {
        ctx.terminal.print(`♻️  Using cached palette (${key})`, "dim");
      }
      return cached;
    }
    const colors = extractColorsFromPng(raw, count);
    try {
      cache.set(key, JSON.stringify(colors));
    } catch (error) {
      cacheWarning(ctx, error);
    }
    return colors;
  } finally {
    cache.close();
  }
}

export function runPalette(ctx: CommandContext, image: string, options: PaletteOptions): ExitStatus {
  const { terminal } = ctx;
  const count = parseColorCount(options.colors);
  if (count === null) {
    terminal.error("ANV-0303", `--colors must be an integer between 1 and ${MAX_COLOR_COUNT}.`);
    return 1;
  }
  const imagePath = path.resolve(ctx.cwd, image);
  if (!fs.existsSync(imagePath) || !fs.statSync(imagePath).isFile()) {
    terminal.error("ANV-0301", `Image file not found: ${imagePath}`);
    return 1;
  }

  terminal.print(`🎨 Extracting colors from: ${imagePath}`);
  let colors: string[];
  try {
    colors = colorsFor(ctx, imagePath, count, options.cache);
  } catch (error) {
    terminal.error("ANV-0302", `Failed to process image: ${errorMessage(error)}`);
    return 1;
  }

  const json = JSON.stringify(colors, null, 2);
  terminal.print("🌈 Extracted colors:");
  terminal.print(json);

  const outputPath = paletteOutputPath(imagePath);
  try {
    fs.writeFileSync(outputPath, `${json}\n`, "utf-8");
  } catch (error) {
    terminal.error("ANV-0304", `Failed to save palette: ${errorMessage(error)}`);
    return 1;
  }
  terminal.print(`✓ Saved palette to: ${outputPath}`, "green");
  return 0;
}
