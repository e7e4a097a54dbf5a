import type { GridSpec, TileRecord } from "../types";
import { TileIndex } from "../spatial/TileIndex";
import {
  MalformedTileError,
  OutOfBoundsError,
  OverlapError,
  SelfReferenceError,
} from "./TileConfigErrors";
import type { TileConfigError } from "./TileConfigErrors";

/** Identifier the layout plugin registers under; tiles may not target it. */
export const HOST_PLUGIN_ID = "tile";

const VALIDATED: unique symbol = Symbol("validated");

/**
 * A tile set that passed validation against `grid`. Only
 * `validateTileSet` produces one, so the composer never sees raw input.
 */
export interface ValidatedTileSet {
  readonly grid: GridSpec;
  readonly tiles: readonly TileRecord[];
  readonly [VALIDATED]: true;
}

export type TileValidationResult =
  | { ok: true; tileSet: ValidatedTileSet }
  | { ok: false; error: TileConfigError };

export interface ValidateOptions {
  hostPluginId?: string;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function checkShape(tile: TileRecord, index: number): TileConfigError | null {
  if (!isNonNegativeInteger(tile.x)) {
    return new MalformedTileError(index, "x", `must be a non-negative integer, got ${tile.x}`);
  }
  if (!isNonNegativeInteger(tile.y)) {
    return new MalformedTileError(index, "y", `must be a non-negative integer, got ${tile.y}`);
  }
  if (!Number.isInteger(tile.width) || tile.width <= 0) {
    return new MalformedTileError(index, "width", `must be a positive integer, got ${tile.width}`);
  }
  if (!Number.isInteger(tile.height) || tile.height <= 0) {
    return new MalformedTileError(index, "height", `must be a positive integer, got ${tile.height}`);
  }
  return null;
}

function checkBounds(grid: GridSpec, tile: TileRecord, index: number): TileConfigError | null {
  if (tile.x + tile.width > grid.cols) {
    return new OutOfBoundsError(
      index,
      `x ${tile.x} + width ${tile.width} exceeds ${grid.cols} columns`,
    );
  }
  if (tile.y + tile.height > grid.rows) {
    return new OutOfBoundsError(
      index,
      `y ${tile.y} + height ${tile.height} exceeds ${grid.rows} rows`,
    );
  }
  return null;
}

function checkTarget(tile: TileRecord, index: number, hostPluginId: string): TileConfigError | null {
  if (tile.pluginId.trim() === "") {
    return new MalformedTileError(index, "pluginId", "must not be empty");
  }
  if (tile.pluginId === hostPluginId) {
    return new SelfReferenceError(index, tile.pluginId);
  }
  return null;
}

/**
 * Validate a tile set against a grid. Per-tile checks run over every tile
 * before the overlap pass; the first failure is returned.
 *
 * Overlap reporting is deterministic: tiles are indexed in order, and the
 * first tile that intersects an earlier one is reported together with the
 * lowest-indexed tile it intersects.
 */
export function validateTileSet(
  grid: GridSpec,
  tiles: readonly TileRecord[],
  options: ValidateOptions = {},
): TileValidationResult {
  const hostPluginId = options.hostPluginId ?? HOST_PLUGIN_ID;

  for (let i = 0; i < tiles.length; i++) {
    const tile = tiles[i];
    const error =
      checkShape(tile, i) ?? checkBounds(grid, tile, i) ?? checkTarget(tile, i, hostPluginId);
    if (error) return { ok: false, error };
  }

  const index = new TileIndex();
  for (let i = 0; i < tiles.length; i++) {
    const hits = index.queryOverlaps(tiles[i]);
    if (hits.length > 0) {
      return { ok: false, error: new OverlapError(hits[0], i) };
    }
    index.insert(tiles[i], i);
  }

  return { ok: true, tileSet: brand(grid, tiles) };
}

function brand(grid: GridSpec, tiles: readonly TileRecord[]): ValidatedTileSet {
  const frozen = Object.freeze(tiles.map((t) => Object.freeze({ ...t })));
  return Object.freeze({ grid, tiles: frozen, [VALIDATED]: true as const });
}
