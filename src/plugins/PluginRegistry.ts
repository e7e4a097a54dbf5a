import type { PluginResolver, RenderablePlugin } from "../types";

export interface PluginListing {
  id: string;
  displayName: string;
}

/**
 * In-memory plugin registry keyed by plugin id.
 */
export class PluginRegistry implements PluginResolver {
  private plugins = new Map<string, RenderablePlugin>();

  constructor(plugins: Iterable<RenderablePlugin> = []) {
    for (const plugin of plugins) {
      this.register(plugin);
    }
  }

  /** Register a plugin. Re-registering an id replaces the previous plugin. */
  register(plugin: RenderablePlugin): void {
    if (plugin.id.trim() === "") {
      throw new Error("Plugin id must not be empty");
    }
    this.plugins.set(plugin.id, plugin);
  }

  unregister(pluginId: string): boolean {
    return this.plugins.delete(pluginId);
  }

  resolve(pluginId: string): RenderablePlugin | undefined {
    return this.plugins.get(pluginId);
  }

  list(): PluginListing[] {
    return Array.from(this.plugins.values(), (p) => ({
      id: p.id,
      displayName: p.displayName ?? p.id,
    }));
  }

  /**
   * Plugins a tile may target: every registered plugin except the host,
   * which cannot render inside itself.
   */
  listHostable(hostPluginId: string): PluginListing[] {
    return this.list().filter((p) => p.id !== hostPluginId);
  }

  get size(): number {
    return this.plugins.size;
  }
}
