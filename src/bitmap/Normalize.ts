import type { Bitmap, ColorMode } from "../types";
import { bytesPerPixel } from "./Bitmap";
import { MONO_THRESHOLD, rgbToMono } from "../color/ColorUtils";

/**
 * Nearest-neighbour resize. Each destination pixel samples the source pixel
 * under its centre: sx = floor((dx + 0.5) * srcWidth / dstWidth).
 */
export function resizeBitmap(src: Bitmap, width: number, height: number): Bitmap {
  if (src.width === width && src.height === height) return src;

  const bpp = bytesPerPixel(src.mode);
  const out: Bitmap = {
    width,
    height,
    mode: src.mode,
    data: new Uint8ClampedArray(width * height * bpp),
  };

  const srcCols = new Int32Array(width);
  for (let x = 0; x < width; x++) {
    srcCols[x] = Math.min(src.width - 1, Math.floor(((x + 0.5) * src.width) / width));
  }

  for (let y = 0; y < height; y++) {
    const sy = Math.min(src.height - 1, Math.floor(((y + 0.5) * src.height) / height));
    const srcRow = sy * src.width;
    const dstRow = y * width;
    for (let x = 0; x < width; x++) {
      const si = (srcRow + srcCols[x]) * bpp;
      const di = (dstRow + x) * bpp;
      for (let c = 0; c < bpp; c++) {
        out.data[di + c] = src.data[si + c];
      }
    }
  }
  return out;
}

/** Snap mono bytes to 0 or 255. Returns `src` when it is already two-valued. */
function binarizeMono(src: Bitmap): Bitmap {
  if (src.data.every((v) => v === 0 || v === 255)) return src;
  const data = src.data.map((v) => (v >= MONO_THRESHOLD ? 255 : 0));
  return { width: src.width, height: src.height, mode: "mono", data };
}

/**
 * Convert between color modes.
 *   rgb → mono: BT.601 luminance, >= 128 is white, otherwise black (no dithering)
 *   mono → mono: grey bytes are thresholded the same way
 *   mono → rgb: each byte is replicated to grey (0 → black, 255 → white)
 */
export function convertColorMode(src: Bitmap, mode: ColorMode): Bitmap {
  if (src.mode === mode) {
    return mode === "mono" ? binarizeMono(src) : src;
  }

  const pixels = src.width * src.height;
  const data = new Uint8ClampedArray(pixels * bytesPerPixel(mode));

  if (mode === "mono") {
    for (let p = 0; p < pixels; p++) {
      const i = p * 3;
      data[p] = rgbToMono(src.data[i], src.data[i + 1], src.data[i + 2]);
    }
  } else {
    for (let p = 0; p < pixels; p++) {
      const v = src.data[p];
      const i = p * 3;
      data[i] = v;
      data[i + 1] = v;
      data[i + 2] = v;
    }
  }

  return { width: src.width, height: src.height, mode, data };
}

/** Resize, then convert, so the result is exactly width × height in `mode`. */
export function normalizeBitmap(src: Bitmap, width: number, height: number, mode: ColorMode): Bitmap {
  return convertColorMode(resizeBitmap(src, width, height), mode);
}
