import type { ColorMode, HostDeviceConfig, PixelRect, ScopedDeviceConfig, TileRecord } from "../types";

/**
 * Device config for a single tile: reports the tile's pixel size as the
 * resolution and forwards every other lookup to the host device.
 */
export function createScopedDeviceConfig(
  host: HostDeviceConfig | null,
  tile: TileRecord,
  rect: PixelRect,
  colorMode: ColorMode,
): ScopedDeviceConfig {
  return Object.freeze({
    resolution: [rect.width, rect.height],
    orientation: "horizontal",
    colorMode,
    tile,
    getConfig: (key: string): unknown => {
      switch (key) {
        case "resolution": return [rect.width, rect.height];
        case "orientation": return "horizontal";
        case "color": return colorMode === "mono" ? "bw" : "color";
        default: return host?.getConfig(key);
      }
    },
  } satisfies ScopedDeviceConfig);
}
