import { CanvasComposer, drawGridBorders } from "./CanvasComposer";
import { createGridSpec } from "../grid/GridSpec";
import type { GridSpecInput } from "../grid/GridSpec";
import { validateTileSet } from "../grid/TileSetValidator";
import type { ValidatedTileSet } from "../grid/TileSetValidator";
import { createBitmap, getPixel } from "../bitmap/Bitmap";
import { PluginRegistry } from "../plugins/PluginRegistry";
import type { Bitmap, RenderablePlugin, Rgb, TileRecord } from "../types";
import { makeLogger, solidPlugin, throwingPlugin } from "./__tests__/plugin-fixtures";

const RED: Rgb = [255, 0, 0];
const GREEN: Rgb = [0, 255, 0];
const BLUE: Rgb = [0, 0, 255];
const BORDER: Rgb = [0xcc, 0xcc, 0xcc];

function tile(x: number, y: number, width: number, height: number, pluginId: string): TileRecord {
  return { x, y, width, height, pluginId, settings: {} };
}

function validated(input: GridSpecInput, tiles: TileRecord[]): ValidatedTileSet {
  const result = validateTileSet(createGridSpec(input), tiles);
  if (!result.ok) throw result.error;
  return result.tileSet;
}

function composer(plugins: RenderablePlugin[], concurrency?: number): CanvasComposer {
  return new CanvasComposer({ resolver: new PluginRegistry(plugins), concurrency, logger: makeLogger() });
}

const SCENARIO_TILES = [tile(0, 0, 1, 1, "clock"), tile(1, 0, 1, 1, "weather"), tile(0, 1, 2, 1, "calendar")];
const SCENARIO_PLUGINS = () => [solidPlugin("clock", RED), solidPlugin("weather", GREEN), solidPlugin("calendar", BLUE)];

describe("CanvasComposer", () => {
  it("places each tile at its pixel rectangle", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 200, deviceHeight: 100, showBorders: false }, SCENARIO_TILES);

    const { canvas, results } = await composer(SCENARIO_PLUGINS()).compose(tileSet);

    expect(canvas.width).toBe(200);
    expect(canvas.height).toBe(100);
    expect(results.map((r) => r.rect)).toEqual([
      { x: 0, y: 0, width: 100, height: 50 },
      { x: 100, y: 0, width: 100, height: 50 },
      { x: 0, y: 50, width: 200, height: 50 },
    ]);
    expect(getPixel(canvas, 0, 0)).toEqual(RED);
    expect(getPixel(canvas, 99, 49)).toEqual(RED);
    expect(getPixel(canvas, 100, 0)).toEqual(GREEN);
    expect(getPixel(canvas, 199, 49)).toEqual(GREEN);
    expect(getPixel(canvas, 0, 50)).toEqual(BLUE);
    expect(getPixel(canvas, 199, 99)).toEqual(BLUE);
  });

  it("draws internal and perimeter borders over the tiles", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 200, deviceHeight: 100 }, SCENARIO_TILES);

    const { canvas } = await composer(SCENARIO_PLUGINS()).compose(tileSet);

    expect(getPixel(canvas, 100, 25)).toEqual(BORDER);
    expect(getPixel(canvas, 100, 75)).toEqual(BORDER);
    expect(getPixel(canvas, 50, 50)).toEqual(BORDER);
    expect(getPixel(canvas, 0, 30)).toEqual(BORDER);
    expect(getPixel(canvas, 199, 30)).toEqual(BORDER);
    expect(getPixel(canvas, 30, 0)).toEqual(BORDER);
    expect(getPixel(canvas, 30, 99)).toEqual(BORDER);
    expect(getPixel(canvas, 99, 25)).toEqual(RED);
    expect(getPixel(canvas, 101, 25)).toEqual(GREEN);
    expect(getPixel(canvas, 50, 49)).toEqual(RED);
    expect(getPixel(canvas, 50, 51)).toEqual(BLUE);
  });

  it("fills an empty tile set with the background", async () => {
    const tileSet = validated(
      { rows: 3, cols: 3, deviceWidth: 30, deviceHeight: 30, showBorders: false, backgroundColor: [10, 20, 30] },
      [],
    );

    const { canvas, results } = await composer([]).compose(tileSet);

    expect(results).toEqual([]);
    for (let y = 0; y < 30; y++) {
      for (let x = 0; x < 30; x++) {
        expect(getPixel(canvas, x, y)).toEqual([10, 20, 30]);
      }
    }
  });

  it("leaves uncovered cells as background", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 20, deviceHeight: 20, showBorders: false }, [
      tile(0, 0, 1, 1, "clock"),
    ]);

    const { canvas } = await composer([solidPlugin("clock", RED)]).compose(tileSet);

    expect(getPixel(canvas, 5, 5)).toEqual(RED);
    expect(getPixel(canvas, 15, 5)).toEqual([255, 255, 255]);
    expect(getPixel(canvas, 15, 15)).toEqual([255, 255, 255]);
  });

  it("covers the canvas without gaps when cells do not divide evenly", async () => {
    const tiles: TileRecord[] = [];
    for (let y = 0; y < 3; y++) {
      for (let x = 0; x < 3; x++) tiles.push(tile(x, y, 1, 1, "ink"));
    }
    const tileSet = validated({ rows: 3, cols: 3, deviceWidth: 100, deviceHeight: 100, showBorders: false }, tiles);

    const { canvas, results } = await composer([solidPlugin("ink", [0, 0, 0])]).compose(tileSet);

    expect(canvas.data.every((byte) => byte === 0)).toBe(true);
    const area = results.reduce((sum, r) => sum + r.rect.width * r.rect.height, 0);
    expect(area).toBe(100 * 100);
    expect(results.map((r) => r.rect.width).slice(0, 3)).toEqual([33, 34, 33]);
  });

  it("isolates a failing plugin to its own tile", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 200, deviceHeight: 100, showBorders: false }, SCENARIO_TILES);
    const plugins = [solidPlugin("clock", RED), throwingPlugin("weather", "api down"), solidPlugin("calendar", BLUE)];

    const { canvas, results } = await composer(plugins).compose(tileSet);

    expect(results.map((r) => r.status)).toEqual(["rendered", "placeholder", "rendered"]);
    const failed = results[1];
    if (failed.status === "placeholder") {
      expect(failed.reason).toBe("Error: weather: api down");
    }
    expect(getPixel(canvas, 100, 0)).toEqual([0, 0, 0]);
    expect(getPixel(canvas, 150, 10)).toEqual([255, 200, 200]);
    expect(getPixel(canvas, 122, 22)).toEqual([0, 0, 0]);
    expect(getPixel(canvas, 50, 25)).toEqual(RED);
    expect(getPixel(canvas, 50, 75)).toEqual(BLUE);
  });

  it("is idempotent", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 200, deviceHeight: 100 }, SCENARIO_TILES);
    const instance = composer(SCENARIO_PLUGINS());

    const first = await instance.compose(tileSet);
    const second = await instance.compose(tileSet);

    expect(second.canvas).not.toBe(first.canvas);
    expect(Buffer.from(second.canvas.data).equals(Buffer.from(first.canvas.data))).toBe(true);
  });

  it("composes a mono canvas", async () => {
    const tileSet = validated(
      { rows: 2, cols: 2, deviceWidth: 20, deviceHeight: 10, colorMode: "mono", showBorders: false },
      [tile(0, 0, 1, 2, "clock")],
    );

    const { canvas } = await composer([solidPlugin("clock", [0, 0, 0])]).compose(tileSet);

    expect(canvas.mode).toBe("mono");
    expect(canvas.data).toHaveLength(200);
    expect(canvas.data[0]).toBe(0);
    expect(canvas.data[15]).toBe(255);
  });

  it("draws black borders on a mono canvas with the default border color", async () => {
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 20, deviceHeight: 10, colorMode: "mono" }, [
      tile(0, 0, 1, 2, "paper"),
    ]);

    const { canvas } = await composer([solidPlugin("paper", [255, 255, 255])]).compose(tileSet);

    expect(canvas.data[3 * 20 + 10]).toBe(0);
    expect(canvas.data[5 * 20 + 15]).toBe(0);
    expect(canvas.data[3 * 20 + 15]).toBe(255);
    expect(canvas.data[3 * 20 + 5]).toBe(255);
    expect(canvas.data[5]).toBe(0);
    expect(canvas.data[9 * 20 + 15]).toBe(0);
    expect(canvas.data[3 * 20 + 19]).toBe(0);
  });

  it("lists results in tile order whatever order they finish in", async () => {
    const slow: RenderablePlugin = {
      id: "slow",
      render: (device) =>
        new Promise<Bitmap>((resolve) => {
          setTimeout(() => resolve(createBitmap(device.resolution[0], device.resolution[1], "rgb", RED)), 10);
        }),
    };
    const tileSet = validated({ rows: 2, cols: 2, deviceWidth: 20, deviceHeight: 20 }, [
      tile(0, 0, 1, 1, "slow"),
      tile(1, 0, 1, 1, "fast"),
    ]);

    const { results } = await composer([slow, solidPlugin("fast", GREEN)]).compose(tileSet);

    expect(results.map((r) => r.pluginId)).toEqual(["slow", "fast"]);
  });

  it("renders no more tiles at once than its concurrency", async () => {
    let inFlight = 0;
    let peak = 0;
    const counting: RenderablePlugin = {
      id: "count",
      render: async (device) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await Promise.resolve();
        inFlight--;
        return createBitmap(device.resolution[0], device.resolution[1], "rgb", RED);
      },
    };
    const tiles = [0, 1, 2, 3].map((x) => tile(x, 0, 1, 1, "count"));
    const tileSet = validated({ rows: 2, cols: 4, deviceWidth: 40, deviceHeight: 20 }, tiles);

    const { results } = await composer([counting], 2).compose(tileSet);

    expect(results).toHaveLength(4);
    expect(peak).toBe(2);
  });
});

describe("drawGridBorders", () => {
  it("draws lines at rounded cell edges", () => {
    const grid = createGridSpec({ rows: 3, cols: 3, deviceWidth: 10, deviceHeight: 10, borderColor: [0, 0, 0] });
    const canvas = createBitmap(10, 10, "rgb", [255, 255, 255]);

    drawGridBorders(canvas, grid);

    const row = Array.from({ length: 10 }, (_, x) => getPixel(canvas, x, 5)[0]);
    expect(row).toEqual([0, 255, 255, 0, 255, 255, 255, 0, 255, 0]);
  });

  it("ignores the border color on mono canvases", () => {
    const grid = createGridSpec({
      rows: 2,
      cols: 2,
      deviceWidth: 4,
      deviceHeight: 4,
      colorMode: "mono",
      borderColor: [255, 255, 255],
    });
    const canvas = createBitmap(4, 4, "mono", [255, 255, 255]);

    drawGridBorders(canvas, grid);

    expect(Array.from(canvas.data)).toEqual([
      0, 0, 0, 0,
      0, 255, 0, 0,
      0, 0, 0, 0,
      0, 0, 0, 0,
    ]);
  });
});
