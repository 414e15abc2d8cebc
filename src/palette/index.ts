import fs from "fs";
import { createHash } from "crypto";
import { PNG } from "pngjs";

export type Rgb = [number, number, number];

export const DEFAULT_COLOR_COUNT = 5;
export const MAX_COLOR_COUNT = 16;
export const SAMPLE_SIDE = 150;
const MIN_ALPHA = 125;
const PAD_COLOR = "#000000";

type DecodedImage = {
  width: number;
  height: number;
  data: Uint8Array;
};

type ColorBox = {
  pixels: Rgb[];
};

export function toHex([r, g, b]: Rgb): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, "0")).join("")}`;
}

/**
 * Reads every pixel on a grid that is at most SAMPLE_SIDE wide and high.
 * Mostly transparent pixels are skipped unless nothing else is left.
 */
export function samplePixels(image: DecodedImage, maxSide = SAMPLE_SIDE): Rgb[] {
  const stepX = Math.max(1, Math.ceil(image.width / maxSide));
  const stepY = Math.max(1, Math.ceil(image.height / maxSide));
  const opaque: Rgb[] = [];
  const all: Rgb[] = [];
  for (let y = 0; y < image.height; y += stepY) {
    for (let x = 0; x < image.width; x += stepX) {
      const idx = (image.width * y + x) * 4;
      const pixel: Rgb = [image.data[idx], image.data[idx + 1], image.data[idx + 2]];
      all.push(pixel);
      if (image.data[idx + 3] >= MIN_ALPHA) {
        opaque.push(pixel);
      }
    }
  }
  return opaque.length > 0 ? opaque : all;
}

function channelRange(pixels: Rgb[], channel: number): number {
  let min = 255;
  let max = 0;
  for (const pixel of pixels) {
    min = Math.min(min, pixel[channel]);
    max = Math.max(max, pixel[channel]);
  }
  return max - min;
}

function widestChannel(pixels: Rgb[]): { channel: number; range: number } {
  let best = { channel: 0, range: channelRange(pixels, 0) };
  for (const channel of [1, 2]) {
    const range = channelRange(pixels, channel);
    if (range > best.range) {
      best = { channel, range };
    }
  }
  return best;
}

// Cuts at the value boundary nearest the median so equal colours stay in one box.
function splitBox(box: ColorBox): [ColorBox, ColorBox] {
  const { channel } = widestChannel(box.pixels);
  const sorted = [...box.pixels].sort((a, b) => a[channel] - b[channel]);
  const median = Math.floor(sorted.length / 2);
  let cut = -1;
  for (let i = 1; i < sorted.length; i += 1) {
    if (sorted[i][channel] !== sorted[i - 1][channel] && (cut < 0 || Math.abs(i - median) < Math.abs(cut - median))) {
      cut = i;
    }
  }
  return [{ pixels: sorted.slice(0, cut) }, { pixels: sorted.slice(cut) }];
}

function averageColor(pixels: Rgb[]): Rgb {
  const sum = [0, 0, 0];
  for (const pixel of pixels) {
    sum[0] += pixel[0];
    sum[1] += pixel[1];
    sum[2] += pixel[2];
  }
  return [
    Math.round(sum[0] / pixels.length),
    Math.round(sum[1] / pixels.length),
    Math.round(sum[2] / pixels.length)
  ];
}

/** Median-cut quantisation; colours come back most populous first. */
export function quantize(pixels: Rgb[], count: number): Rgb[] {
  if (pixels.length === 0 || count < 1) {
    return [];
  }
  const boxes: ColorBox[] = [{ pixels }];
  while (boxes.length < count) {
    let target = -1;
    for (let i = 0; i < boxes.length; i += 1) {
      if (widestChannel(boxes[i].pixels).range === 0) {
        continue;
      }
      if (target < 0 || boxes[i].pixels.length > boxes[target].pixels.length) {
        target = i;
      }
    }
    if (target < 0) {
      break;
    }
    boxes.splice(target, 1, ...splitBox(boxes[target]));
  }
  return boxes
    .map((box) => ({ color: averageColor(box.pixels), population: box.pixels.length }))
    .sort((a, b) => b.population - a.population)
    .map((entry) => entry.color);
}

export function extractColorsFromPng(raw: Buffer, count = DEFAULT_COLOR_COUNT): string[] {
  const png = PNG.sync.read(raw);
  const colors = quantize(samplePixels(png), count).map(toHex);
  while (colors.length < count) {
    colors.push(PAD_COLOR);
  }
  return colors;
}

export function extractColors(imagePath: string, count = DEFAULT_COLOR_COUNT): string[] {
  return extractColorsFromPng(fs.readFileSync(imagePath), count);
}

export function paletteCacheKey(raw: Buffer, count: number): string {
  return `palette:${createHash("sha1").update(raw).digest("hex")}:${count}`;
}

export function parseCachedPalette(value: string | undefined): string[] | null {
  if (value === undefined) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed) && parsed.every((entry) => typeof entry === "string")) {
      return parsed;
    }
  } catch {
    return null;
  }
  return null;
}
