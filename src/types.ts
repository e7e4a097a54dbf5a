/**
 * Core type definitions for the tile layout compositor
 */

// --- Color ---

export type Rgb = [number, number, number];

/** "mono" stores one byte per pixel (0 = black, 255 = white). */
export type ColorMode = "rgb" | "mono";

export type Orientation = "horizontal" | "vertical";

// --- Bitmaps ---

export interface Bitmap {
  width: number;
  height: number;
  mode: ColorMode;
  data: Uint8ClampedArray;
}

/** Pixel-space rectangle, half-open: [x, x + width) × [y, y + height). */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// --- Grid ---

export interface GridSpec {
  rows: number;
  cols: number;
  deviceWidth: number;
  deviceHeight: number;
  cellWidth: number;
  cellHeight: number;
  colorMode: ColorMode;
  showBorders: boolean;
  borderColor: Rgb;
  backgroundColor: Rgb;
}

export interface TileRecord {
  x: number;
  y: number;
  width: number;
  height: number;
  pluginId: string;
  settings: Readonly<Record<string, unknown>>;
}

// --- Devices ---

/** Device parameters of the physical display the host plugin renders for. */
export interface HostDeviceConfig {
  resolution: [number, number];
  orientation: Orientation;
  colorMode: ColorMode;
  getConfig(key: string): unknown;
}

/**
 * What a hosted plugin sees: a display exactly the size of its tile.
 * `resolution` is already oriented, so `orientation` is always horizontal.
 */
export interface ScopedDeviceConfig extends HostDeviceConfig {
  readonly tile: TileRecord;
}

// --- Plugins ---

export interface RenderFailure {
  error: string;
}

export type PluginOutput = Bitmap | RenderFailure;

export interface RenderablePlugin {
  readonly id: string;
  readonly displayName?: string;
  render(
    device: ScopedDeviceConfig,
    settings: Readonly<Record<string, unknown>>,
  ): PluginOutput | Promise<PluginOutput>;
}

export interface PluginResolver {
  resolve(pluginId: string): RenderablePlugin | undefined;
}

// --- Render results ---

export interface RenderedTile {
  status: "rendered";
  pluginId: string;
  rect: PixelRect;
  bitmap: Bitmap;
}

export interface PlaceholderTile {
  status: "placeholder";
  pluginId: string;
  rect: PixelRect;
  bitmap: Bitmap;
  reason: string;
}

export type RenderResult = RenderedTile | PlaceholderTile;

export interface ComposeResult {
  canvas: Bitmap;
  /** One entry per tile, in tile order. */
  results: RenderResult[];
}

// --- Logging ---

export type Logger = Pick<Console, "info" | "warn">;
