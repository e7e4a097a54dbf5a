import type {
  Bitmap,
  ComposeResult,
  GridSpec,
  HostDeviceConfig,
  Logger,
  PluginResolver,
  RenderablePlugin,
} from "./types";
import { createGridSpec, DEFAULT_BORDER_COLOR, parseGridSize } from "./grid/GridSpec";
import { HOST_PLUGIN_ID, validateTileSet } from "./grid/TileSetValidator";
import { parseTileRecords } from "./settings/TileConfigParser";
import { mergeSettings } from "./settings/TileLayoutSettings";
import type { TileLayoutSettings } from "./settings/TileLayoutSettings";
import { parseColor, WHITE } from "./color/ColorUtils";
import { CanvasComposer } from "./render/CanvasComposer";

export interface LayoutContext {
  device: HostDeviceConfig;
  resolver: PluginResolver;
  hostPluginId?: string;
  logger?: Logger;
}

/** Device resolution with orientation applied: vertical displays swap width and height. */
export function orientedResolution(device: HostDeviceConfig): [number, number] {
  const [width, height] = device.resolution;
  return device.orientation === "vertical" ? [height, width] : [width, height];
}

/** Build the grid for a device from layout settings. */
export function buildGridSpec(settings: TileLayoutSettings, device: HostDeviceConfig): GridSpec {
  const { cols, rows } = parseGridSize(settings.gridSize);
  const [deviceWidth, deviceHeight] = orientedResolution(device);
  return createGridSpec({
    rows,
    cols,
    deviceWidth,
    deviceHeight,
    colorMode: device.colorMode,
    showBorders: settings.showBorders,
    borderColor: parseColor(settings.borderColor, DEFAULT_BORDER_COLOR),
    backgroundColor: parseColor(settings.backgroundColor, WHITE),
  });
}

/**
 * Parse, validate and compose a tile layout. Any configuration error is
 * thrown before a single tile renders; plugin failures end up as
 * placeholders in the returned canvas.
 */
export async function renderLayout(
  rawSettings: Readonly<Record<string, unknown>> | null,
  context: LayoutContext,
): Promise<ComposeResult> {
  const settings = mergeSettings(rawSettings);
  const grid = buildGridSpec(settings, context.device);
  const tiles = parseTileRecords(settings.tilesConfig);

  const validation = validateTileSet(grid, tiles, {
    hostPluginId: context.hostPluginId ?? HOST_PLUGIN_ID,
  });
  if (!validation.ok) {
    throw validation.error;
  }

  const composer = new CanvasComposer({
    resolver: context.resolver,
    hostDevice: context.device,
    timeoutMs: settings.tileTimeoutMs,
    concurrency: settings.renderConcurrency,
    logger: context.logger,
  });
  return composer.compose(validation.tileSet);
}

/**
 * Plugin that lays out other plugins on a grid. It resolves its tiles
 * through the same registry it can be registered in; tiles that target it
 * are rejected at validation.
 */
export class TileLayoutPlugin implements RenderablePlugin {
  readonly id: string;
  readonly displayName = "Tile Layout";
  private resolver: PluginResolver;
  private logger: Logger;

  constructor(resolver: PluginResolver, options: { id?: string; logger?: Logger } = {}) {
    this.id = options.id ?? HOST_PLUGIN_ID;
    this.resolver = resolver;
    this.logger = options.logger ?? console;
  }

  async render(device: HostDeviceConfig, settings: Readonly<Record<string, unknown>>): Promise<Bitmap> {
    const { canvas, results } = await renderLayout(settings, {
      device,
      resolver: this.resolver,
      hostPluginId: this.id,
      logger: this.logger,
    });
    const failed = results.filter((r) => r.status === "placeholder").length;
    this.logger.info(
      `[TileLayoutPlugin] Rendered ${results.length} tile(s) on ${canvas.width}x${canvas.height}` +
        (failed > 0 ? `, ${failed} placeholder(s)` : ""),
    );
    return canvas;
  }
}
