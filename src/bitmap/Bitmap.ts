import type { Bitmap, ColorMode, PixelRect, Rgb } from "../types";
import { rgbToMono } from "../color/ColorUtils";

export function bytesPerPixel(mode: ColorMode): number {
  return mode === "rgb" ? 3 : 1;
}

/** Allocate a bitmap filled with a single color. */
export function createBitmap(width: number, height: number, mode: ColorMode, fill: Rgb): Bitmap {
  const bitmap: Bitmap = {
    width,
    height,
    mode,
    data: new Uint8ClampedArray(width * height * bytesPerPixel(mode)),
  };
  fillRect(bitmap, { x: 0, y: 0, width, height }, fill);
  return bitmap;
}

/**
 * Check that a value a plugin handed back is a usable bitmap.
 * Returns a short reason when it is not.
 */
export function describeMalformedBitmap(value: unknown): string | null {
  if (typeof value !== "object" || value === null) {
    return "output is not a bitmap";
  }
  if (!("width" in value) || !("height" in value) || !("mode" in value) || !("data" in value)) {
    return "output is not a bitmap";
  }
  const { width, height, mode, data } = value;
  if (typeof width !== "number" || !Number.isInteger(width) || width <= 0) {
    return `invalid bitmap width ${String(width)}`;
  }
  if (typeof height !== "number" || !Number.isInteger(height) || height <= 0) {
    return `invalid bitmap height ${String(height)}`;
  }
  if (mode !== "rgb" && mode !== "mono") {
    return `unknown color mode ${String(mode)}`;
  }
  if (!(data instanceof Uint8ClampedArray)) {
    return "bitmap data is not a Uint8ClampedArray";
  }
  const expected = width * height * bytesPerPixel(mode);
  if (data.length !== expected) {
    return `bitmap data has ${data.length} bytes, expected ${expected}`;
  }
  return null;
}

/** Fill a rectangle, clipped to the bitmap. */
export function fillRect(bitmap: Bitmap, rect: PixelRect, color: Rgb): void {
  const x0 = Math.max(0, rect.x);
  const y0 = Math.max(0, rect.y);
  const x1 = Math.min(bitmap.width, rect.x + rect.width);
  const y1 = Math.min(bitmap.height, rect.y + rect.height);
  if (x1 <= x0 || y1 <= y0) return;

  const { data, width } = bitmap;
  if (bitmap.mode === "mono") {
    const value = rgbToMono(color[0], color[1], color[2]);
    for (let y = y0; y < y1; y++) {
      data.fill(value, y * width + x0, y * width + x1);
    }
    return;
  }

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const i = (y * width + x) * 3;
      data[i] = color[0];
      data[i + 1] = color[1];
      data[i + 2] = color[2];
    }
  }
}

/** Outline a rectangle with a 1-pixel frame drawn inside its bounds. */
export function strokeRect(bitmap: Bitmap, rect: PixelRect, color: Rgb): void {
  const right = rect.x + rect.width - 1;
  const bottom = rect.y + rect.height - 1;
  fillRect(bitmap, { x: rect.x, y: rect.y, width: rect.width, height: 1 }, color);
  fillRect(bitmap, { x: rect.x, y: bottom, width: rect.width, height: 1 }, color);
  fillRect(bitmap, { x: rect.x, y: rect.y, width: 1, height: rect.height }, color);
  fillRect(bitmap, { x: right, y: rect.y, width: 1, height: rect.height }, color);
}

/**
 * Copy `src` onto `dst` with its top-left corner at (dx, dy), overwriting
 * the destination. Both bitmaps must share a color mode.
 */
export function blit(dst: Bitmap, src: Bitmap, dx: number, dy: number): void {
  if (dst.mode !== src.mode) {
    throw new Error(`Cannot blit ${src.mode} bitmap onto ${dst.mode} canvas`);
  }
  const bpp = bytesPerPixel(dst.mode);
  const x0 = Math.max(0, dx);
  const x1 = Math.min(dst.width, dx + src.width);
  if (x1 <= x0) return;

  for (let sy = 0; sy < src.height; sy++) {
    const y = dy + sy;
    if (y < 0 || y >= dst.height) continue;
    const srcStart = (sy * src.width + (x0 - dx)) * bpp;
    const srcEnd = srcStart + (x1 - x0) * bpp;
    dst.data.set(src.data.subarray(srcStart, srcEnd), (y * dst.width + x0) * bpp);
  }
}

/** Read one pixel as an RGB triple (monochrome pixels expand to grey). */
export function getPixel(bitmap: Bitmap, x: number, y: number): Rgb {
  if (bitmap.mode === "mono") {
    const v = bitmap.data[y * bitmap.width + x];
    return [v, v, v];
  }
  const i = (y * bitmap.width + x) * 3;
  return [bitmap.data[i], bitmap.data[i + 1], bitmap.data[i + 2]];
}
