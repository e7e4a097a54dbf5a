/**
 * Color utility functions for parsing colors and mapping between the RGB
 * and monochrome canvas modes.
 */

import type { Rgb } from "../types";

export const WHITE: Rgb = [255, 255, 255];
export const BLACK: Rgb = [0, 0, 0];

/** Luminance at or above this maps to white in monochrome. */
export const MONO_THRESHOLD = 128;

// ─── Parsing ───────────────────────────────────────────────

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

/** Parse a hex color string to RGB components (0-255). */
export function hexToRgb(hex: string): Rgb {
  let h = hex.replace(/^#/, "");

  // Expand shorthand (#ABC → #AABBCC)
  if (h.length === 3) {
    h = h[0] + h[0] + h[1] + h[1] + h[2] + h[2];
  }

  const n = parseInt(h, 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

/**
 * Parse a user-supplied color. Anything that is not a 3- or 6-digit hex
 * string yields the fallback.
 */
export function parseColor(value: unknown, fallback: Rgb): Rgb {
  if (typeof value !== "string" || !HEX_PATTERN.test(value.trim())) {
    return [...fallback];
  }
  return hexToRgb(value.trim());
}

// ─── Luminance ──────────────────────────────────────────────

/**
 * Perceived luminance (0-255) of an RGB triple.
 * Uses standard ITU-R BT.601 weights: 0.299*R + 0.587*G + 0.114*B.
 */
export function perceivedLuminance(r: number, g: number, b: number): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

/** Map an RGB triple to a monochrome byte (0 or 255). */
export function rgbToMono(r: number, g: number, b: number): number {
  return perceivedLuminance(r, g, b) >= MONO_THRESHOLD ? 255 : 0;
}
