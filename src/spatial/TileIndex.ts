import RBush from "rbush";
import type { TileRecord } from "../types";

interface TileItem {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  index: number;
}

type CellRect = Pick<TileRecord, "x" | "y" | "width" | "height">;

/**
 * R-tree over tile cell rectangles, used for overlap detection.
 *
 * RBush treats bounds as inclusive, so each tile is stored by its first and
 * last occupied cell: tiles that only share an edge do not intersect.
 */
export class TileIndex {
  private tree = new RBush<TileItem>();

  insert(tile: CellRect, index: number): void {
    this.tree.insert(toItem(tile, index));
  }

  /**
   * Indices of indexed tiles whose cells intersect the given tile,
   * in ascending order.
   */
  queryOverlaps(tile: CellRect): number[] {
    return this.tree
      .search(toItem(tile, -1))
      .map((item) => item.index)
      .sort((a, b) => a - b);
  }
}

function toItem(tile: CellRect, index: number): TileItem {
  return {
    minX: tile.x,
    minY: tile.y,
    maxX: tile.x + tile.width - 1,
    maxY: tile.y + tile.height - 1,
    index,
  };
}
