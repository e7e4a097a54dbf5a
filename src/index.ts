export type * from "./types";
export * from "./grid/TileConfigErrors";
export {
  createGridSpec,
  parseGridSize,
  columnEdge,
  rowEdge,
  cellRectToPixels,
  MIN_GRID_CELLS,
  MAX_GRID_CELLS,
} from "./grid/GridSpec";
export type { GridSpecInput } from "./grid/GridSpec";
export { validateTileSet, HOST_PLUGIN_ID } from "./grid/TileSetValidator";
export type { ValidatedTileSet, TileValidationResult, ValidateOptions } from "./grid/TileSetValidator";
export { parseTileRecord, parseTileRecords } from "./settings/TileConfigParser";
export { DEFAULT_SETTINGS, mergeSettings } from "./settings/TileLayoutSettings";
export type { TileLayoutSettings } from "./settings/TileLayoutSettings";
export { PluginRegistry } from "./plugins/PluginRegistry";
export type { PluginListing } from "./plugins/PluginRegistry";
export { createScopedDeviceConfig } from "./plugins/ScopedDeviceConfig";
export { TileRenderer, DEFAULT_TILE_TIMEOUT_MS } from "./render/TileRenderer";
export type { TileRendererOptions } from "./render/TileRenderer";
export { CanvasComposer, drawGridBorders, DEFAULT_RENDER_CONCURRENCY } from "./render/CanvasComposer";
export type { CanvasComposerOptions } from "./render/CanvasComposer";
export { TileRenderScheduler } from "./render/TileRenderScheduler";
export { createBitmap, getPixel } from "./bitmap/Bitmap";
export { resizeBitmap, convertColorMode, normalizeBitmap } from "./bitmap/Normalize";
export { encodePng } from "./bitmap/PngEncoder";
export { TileLayoutPlugin, renderLayout, buildGridSpec, orientedResolution } from "./TileLayoutPlugin";
export type { LayoutContext } from "./TileLayoutPlugin";
