import type {
  Bitmap,
  GridSpec,
  HostDeviceConfig,
  Logger,
  PluginOutput,
  PluginResolver,
  RenderFailure,
  RenderablePlugin,
  RenderResult,
  TileRecord,
} from "../types";
import { cellRectToPixels } from "../grid/GridSpec";
import { createScopedDeviceConfig } from "../plugins/ScopedDeviceConfig";
import { describeMalformedBitmap } from "../bitmap/Bitmap";
import { normalizeBitmap } from "../bitmap/Normalize";
import { createPlaceholderBitmap, formatReason, placeholderLabel } from "./Placeholder";

export const DEFAULT_TILE_TIMEOUT_MS = 30_000;

export interface TileRendererOptions {
  resolver: PluginResolver;
  /** Physical device the layout is rendered for; scoped configs forward lookups to it. */
  hostDevice?: HostDeviceConfig | null;
  /** Per-plugin timeout. 0 disables it. */
  timeoutMs?: number;
  logger?: Logger;
}

class TileTimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms} ms`);
    this.name = "TileTimeoutError";
  }
}

function isRenderFailure(output: unknown): output is RenderFailure {
  return (
    typeof output === "object" &&
    output !== null &&
    "error" in output &&
    typeof output.error === "string" &&
    !("data" in output)
  );
}

/**
 * Renders one tile by delegating to its plugin. Every outcome is a
 * RenderResult sized to the tile's pixel rectangle in the canvas color
 * mode; plugin failures become placeholders and are never re-thrown.
 */
export class TileRenderer {
  private resolver: PluginResolver;
  private hostDevice: HostDeviceConfig | null;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: TileRendererOptions) {
    this.resolver = options.resolver;
    this.hostDevice = options.hostDevice ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TILE_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  async renderTile(grid: GridSpec, tile: TileRecord): Promise<RenderResult> {
    const rect = cellRectToPixels(grid, tile);
    const placeholder = (message: string): RenderResult => {
      const reason = formatReason(tile.pluginId, message);
      this.logger.warn(`[TileRenderer] ${reason}`);
      return {
        status: "placeholder",
        pluginId: tile.pluginId,
        rect,
        bitmap: createPlaceholderBitmap(rect.width, rect.height, grid.colorMode, placeholderLabel(tile.pluginId)),
        reason,
      };
    };

    const plugin = this.resolvePlugin(tile.pluginId);
    if (typeof plugin === "string") {
      return placeholder(plugin);
    }

    const device = createScopedDeviceConfig(this.hostDevice, tile, rect, grid.colorMode);

    let output: PluginOutput;
    try {
      output = await this.withTimeout(async () => plugin.render(device, tile.settings));
    } catch (e) {
      return placeholder(e instanceof Error ? e.message : String(e));
    }

    if (isRenderFailure(output)) {
      return placeholder(output.error);
    }

    const malformed = describeMalformedBitmap(output);
    if (malformed) {
      return placeholder(malformed);
    }

    let bitmap: Bitmap;
    try {
      bitmap = normalizeBitmap(output, rect.width, rect.height, grid.colorMode);
    } catch (e) {
      return placeholder(e instanceof Error ? e.message : String(e));
    }

    return { status: "rendered", pluginId: tile.pluginId, rect, bitmap };
  }

  /** The plugin for `pluginId`, or why it could not be found. */
  private resolvePlugin(pluginId: string): RenderablePlugin | string {
    try {
      return this.resolver.resolve(pluginId) ?? `Plugin '${pluginId}' not found`;
    } catch (e) {
      return e instanceof Error ? e.message : String(e);
    }
  }

  private async withTimeout<T>(run: () => Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) return run();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TileTimeoutError(this.timeoutMs)), this.timeoutMs);
    });
    try {
      return await Promise.race([run(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
