import type { ColorMode, GridSpec, PixelRect, Rgb, TileRecord } from "../types";
import { GridSpecError, MalformedConfigError } from "./TileConfigErrors";
import { WHITE } from "../color/ColorUtils";

export const MIN_GRID_CELLS = 2;
export const MAX_GRID_CELLS = 10;

export interface GridSpecInput {
  rows: number;
  cols: number;
  deviceWidth: number;
  deviceHeight: number;
  colorMode?: ColorMode;
  showBorders?: boolean;
  borderColor?: Rgb;
  backgroundColor?: Rgb;
}

export const DEFAULT_BORDER_COLOR: Rgb = [0xcc, 0xcc, 0xcc];

function requireInteger(field: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new GridSpecError(field, `Grid ${field} must be an integer ${range}, got ${value}`);
  }
}

/**
 * Build a frozen GridSpec. Every cell must be at least one pixel wide and tall.
 */
export function createGridSpec(input: GridSpecInput): GridSpec {
  requireInteger("rows", input.rows, MIN_GRID_CELLS, MAX_GRID_CELLS);
  requireInteger("cols", input.cols, MIN_GRID_CELLS, MAX_GRID_CELLS);
  requireInteger("deviceWidth", input.deviceWidth, input.cols);
  requireInteger("deviceHeight", input.deviceHeight, input.rows);

  return Object.freeze({
    rows: input.rows,
    cols: input.cols,
    deviceWidth: input.deviceWidth,
    deviceHeight: input.deviceHeight,
    cellWidth: input.deviceWidth / input.cols,
    cellHeight: input.deviceHeight / input.rows,
    colorMode: input.colorMode ?? "rgb",
    showBorders: input.showBorders ?? true,
    borderColor: input.borderColor ?? DEFAULT_BORDER_COLOR,
    backgroundColor: input.backgroundColor ?? WHITE,
  });
}

/**
 * Parse a grid size such as "4x4" or "3x2" (columns × rows).
 */
export function parseGridSize(value: string): { cols: number; rows: number } {
  const match = /^\s*(\d+)\s*[x×]\s*(\d+)\s*$/i.exec(value);
  if (!match) {
    throw new MalformedConfigError("gridSize", `Grid size '${value}' is not of the form COLSxROWS`);
  }
  return { cols: Number(match[1]), rows: Number(match[2]) };
}

/**
 * Pixel position of column edge `col` (0..cols). Edges are rounded from the
 * exact fractional position, so spans computed from them tile the canvas
 * with no gaps and no overlaps, and the last edge is the device width.
 */
export function columnEdge(grid: GridSpec, col: number): number {
  return Math.round((col * grid.deviceWidth) / grid.cols);
}

/** Pixel position of row edge `row` (0..rows). */
export function rowEdge(grid: GridSpec, row: number): number {
  return Math.round((row * grid.deviceHeight) / grid.rows);
}

/** Convert a cell rectangle to its pixel rectangle. */
export function cellRectToPixels(
  grid: GridSpec,
  cells: Pick<TileRecord, "x" | "y" | "width" | "height">,
): PixelRect {
  const x0 = columnEdge(grid, cells.x);
  const y0 = rowEdge(grid, cells.y);
  const x1 = columnEdge(grid, cells.x + cells.width);
  const y1 = rowEdge(grid, cells.y + cells.height);
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}
