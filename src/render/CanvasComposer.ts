import type { Bitmap, ComposeResult, GridSpec, RenderResult } from "../types";
import type { ValidatedTileSet } from "../grid/TileSetValidator";
import { columnEdge, rowEdge } from "../grid/GridSpec";
import { blit, createBitmap, fillRect } from "../bitmap/Bitmap";
import { TileRenderer } from "./TileRenderer";
import type { TileRendererOptions } from "./TileRenderer";
import { TileRenderScheduler } from "./TileRenderScheduler";
import { BLACK } from "../color/ColorUtils";

export const DEFAULT_RENDER_CONCURRENCY = 4;

export interface CanvasComposerOptions extends TileRendererOptions {
  /** Tiles rendered at once. */
  concurrency?: number;
}

/**
 * Draw 1-pixel grid lines on every internal cell boundary and around the
 * canvas perimeter. Internal lines sit on the first pixel of the next cell.
 * Mono canvases always get black lines; thresholding a light border colour
 * would turn it white.
 */
export function drawGridBorders(canvas: Bitmap, grid: GridSpec): void {
  const color = canvas.mode === "mono" ? BLACK : grid.borderColor;
  const { width, height } = canvas;

  for (let col = 1; col < grid.cols; col++) {
    fillRect(canvas, { x: columnEdge(grid, col), y: 0, width: 1, height }, color);
  }
  for (let row = 1; row < grid.rows; row++) {
    fillRect(canvas, { x: 0, y: rowEdge(grid, row), width, height: 1 }, color);
  }

  fillRect(canvas, { x: 0, y: 0, width, height: 1 }, color);
  fillRect(canvas, { x: 0, y: height - 1, width, height: 1 }, color);
  fillRect(canvas, { x: 0, y: 0, width: 1, height }, color);
  fillRect(canvas, { x: width - 1, y: 0, width: 1, height }, color);
}

/**
 * Composites a validated tile set into one canvas.
 *
 * Tiles render concurrently but each owns a disjoint rectangle of the
 * canvas, so results are pasted as they arrive. Borders go on last.
 */
export class CanvasComposer {
  private renderer: TileRenderer;
  private concurrency: number;

  constructor(options: CanvasComposerOptions) {
    this.renderer = new TileRenderer(options);
    this.concurrency = options.concurrency ?? DEFAULT_RENDER_CONCURRENCY;
  }

  async compose(tileSet: ValidatedTileSet): Promise<ComposeResult> {
    const { grid, tiles } = tileSet;
    const canvas = createBitmap(grid.deviceWidth, grid.deviceHeight, grid.colorMode, grid.backgroundColor);
    const results = new Map<number, RenderResult>();

    const scheduler = new TileRenderScheduler<number>(
      async (index) => {
        const result = await this.renderer.renderTile(grid, tiles[index]);
        blit(canvas, result.bitmap, result.rect.x, result.rect.y);
        results.set(index, result);
      },
      undefined,
      this.concurrency,
    );
    await scheduler.run(tiles.map((_, index) => index));

    if (grid.showBorders) {
      drawGridBorders(canvas, grid);
    }

    return {
      canvas,
      results: tiles.flatMap((_, index) => {
        const result = results.get(index);
        return result ? [result] : [];
      }),
    };
  }
}
