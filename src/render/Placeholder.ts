import type { Bitmap, ColorMode, Rgb } from "../types";
import { createBitmap, fillRect, strokeRect } from "../bitmap/Bitmap";
import { BLACK, WHITE } from "../color/ColorUtils";
import font from "./placeholder-font.json";

const PLACEHOLDER_COLORS: Record<ColorMode, { fill: Rgb; ink: Rgb }> = {
  rgb: { fill: [255, 200, 200], ink: BLACK },
  mono: { fill: BLACK, ink: WHITE },
};

// 3×5 glyphs, upper case only; rows use '#' for ink.
const GLYPHS: Readonly<Record<string, readonly string[]>> = font.glyphs;
const GLYPH_ADVANCE = font.width + 1;

/** Longest diagnostic kept on a placeholder. */
export const MAX_REASON_LENGTH = 120;

function glyphFor(ch: string): readonly string[] {
  return GLYPHS[ch.toUpperCase()] ?? GLYPHS["?"];
}

/**
 * Draw `text` centred inside the 1 px frame. Characters that do not fit are
 * dropped from the end; nothing is drawn when the tile is too short.
 */
function drawLabel(bitmap: Bitmap, text: string, ink: Rgb): void {
  const innerWidth = bitmap.width - 2;
  if (bitmap.height - 2 < font.height) return;
  const label = text.slice(0, Math.max(0, Math.floor((innerWidth + 1) / GLYPH_ADVANCE)));
  if (label === "") return;

  const textWidth = label.length * GLYPH_ADVANCE - 1;
  const left = Math.floor((bitmap.width - textWidth) / 2);
  const top = Math.floor((bitmap.height - font.height) / 2);

  for (let i = 0; i < label.length; i++) {
    const rows = glyphFor(label[i]);
    for (let row = 0; row < rows.length; row++) {
      for (let col = 0; col < rows[row].length; col++) {
        if (rows[row][col] !== "#") continue;
        fillRect(bitmap, { x: left + i * GLYPH_ADVANCE + col, y: top + row, width: 1, height: 1 }, ink);
      }
    }
  }
}

/** Text drawn on a failed tile. */
export function placeholderLabel(pluginId: string): string {
  return `Error: ${pluginId}`;
}

/** Substitute bitmap for a tile whose plugin produced nothing usable. */
export function createPlaceholderBitmap(width: number, height: number, mode: ColorMode, label = ""): Bitmap {
  const colors = PLACEHOLDER_COLORS[mode];
  const bitmap = createBitmap(width, height, mode, colors.fill);
  strokeRect(bitmap, { x: 0, y: 0, width, height }, colors.ink);
  drawLabel(bitmap, label, colors.ink);
  return bitmap;
}

export function formatReason(pluginId: string, message: string): string {
  const reason = `Error: ${pluginId}: ${message.replace(/\s+/g, " ").trim()}`;
  return reason.length > MAX_REASON_LENGTH ? `${reason.slice(0, MAX_REASON_LENGTH - 1)}…` : reason;
}
