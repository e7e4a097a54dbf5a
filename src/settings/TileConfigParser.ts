import type { TileRecord } from "../types";
import { MalformedConfigError, MalformedTileError } from "../grid/TileConfigErrors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(entry: Record<string, unknown>, index: number, field: string, fallback: number): number {
  const value = entry[field];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedTileError(index, field, `must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readPluginId(entry: Record<string, unknown>, index: number): string {
  const field = entry.plugin_id !== undefined ? "plugin_id" : "pluginId";
  const value = entry[field];
  if (value === undefined) {
    throw new MalformedTileError(index, "plugin_id", "is required");
  }
  if (typeof value !== "string") {
    throw new MalformedTileError(index, field, `must be a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readSettings(entry: Record<string, unknown>, index: number): Record<string, unknown> {
  const field = entry.settings !== undefined ? "settings" : "plugin_settings";
  const value = entry[field];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new MalformedTileError(index, field, "must be an object");
  }
  return value;
}

/**
 * Parse one loosely-typed tile entry. Missing geometry takes the editor's
 * defaults (x, y = 0; width, height = 1); present fields must have the
 * right type. Range checks are left to the validator.
 */
export function parseTileRecord(entry: unknown, index: number): TileRecord {
  if (!isRecord(entry)) {
    throw new MalformedTileError(index, "entry", "must be an object");
  }
  return {
    x: readNumber(entry, index, "x", 0),
    y: readNumber(entry, index, "y", 0),
    width: readNumber(entry, index, "width", 1),
    height: readNumber(entry, index, "height", 1),
    pluginId: readPluginId(entry, index),
    settings: readSettings(entry, index),
  };
}

/**
 * Parse a tile list from a JSON string or an already-decoded array.
 */
export function parseTileRecords(raw: unknown): TileRecord[] {
  let decoded: unknown = raw;
  if (typeof raw === "string") {
    if (raw.trim() === "") return [];
    try {
      decoded = JSON.parse(raw);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      throw new MalformedConfigError("tilesConfig", `Invalid tiles configuration JSON: ${detail}`);
    }
  }
  if (decoded === undefined || decoded === null) return [];
  if (!Array.isArray(decoded)) {
    throw new MalformedConfigError("tilesConfig", "Tiles configuration must be an array");
  }
  return decoded.map((entry: unknown, index) => parseTileRecord(entry, index));
}
