import { PluginRegistry } from "./PluginRegistry";
import { solidPlugin } from "../render/__tests__/plugin-fixtures";
import type { RenderablePlugin } from "../types";

describe("PluginRegistry", () => {
  it("registers plugins passed to the constructor", () => {
    const registry = new PluginRegistry([solidPlugin("clock", [0, 0, 0]), solidPlugin("weather", [0, 0, 0])]);
    expect(registry.size).toBe(2);
    expect(registry.resolve("clock")?.id).toBe("clock");
    expect(registry.resolve("missing")).toBeUndefined();
  });

  it("replaces a plugin registered under the same id", () => {
    const first = solidPlugin("clock", [0, 0, 0]);
    const second = solidPlugin("clock", [255, 255, 255]);
    const registry = new PluginRegistry([first]);
    registry.register(second);
    expect(registry.size).toBe(1);
    expect(registry.resolve("clock")).toBe(second);
  });

  it("rejects an empty id", () => {
    const registry = new PluginRegistry();
    expect(() => registry.register(solidPlugin(" ", [0, 0, 0]))).toThrow("Plugin id must not be empty");
  });

  it("unregisters plugins", () => {
    const registry = new PluginRegistry([solidPlugin("clock", [0, 0, 0])]);
    expect(registry.unregister("clock")).toBe(true);
    expect(registry.unregister("clock")).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("lists display names, falling back to the id", () => {
    const named: RenderablePlugin = { ...solidPlugin("weather", [0, 0, 0]), displayName: "Weather" };
    const registry = new PluginRegistry([solidPlugin("clock", [0, 0, 0]), named]);
    expect(registry.list()).toEqual([
      { id: "clock", displayName: "clock" },
      { id: "weather", displayName: "Weather" },
    ]);
  });

  it("leaves the host out of the hostable list", () => {
    const registry = new PluginRegistry([
      solidPlugin("clock", [0, 0, 0]),
      solidPlugin("tile", [0, 0, 0]),
      solidPlugin("weather", [0, 0, 0]),
    ]);
    expect(registry.listHostable("tile").map((p) => p.id)).toEqual(["clock", "weather"]);
  });
});
