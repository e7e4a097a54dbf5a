export interface TileLayoutSettings {
  // Grid
  gridSize: string;          // "COLSxROWS", e.g. "4x4"
  showBorders: boolean;
  borderColor: string;       // Hex
  backgroundColor: string;   // Hex

  // Tiles: JSON string as stored by the editor, or a decoded array
  tilesConfig: string | unknown[];

  // Rendering
  renderConcurrency: number; // Tiles rendered at once
  tileTimeoutMs: number;     // Per-plugin render timeout; 0 disables
}

export const DEFAULT_SETTINGS: TileLayoutSettings = {
  gridSize: "4x4",
  showBorders: true,
  borderColor: "#cccccc",
  backgroundColor: "#ffffff",

  tilesConfig: "[]",

  renderConcurrency: 4,
  tileTimeoutMs: 30_000,
};

function pick<T>(value: unknown, guard: (v: unknown) => v is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isCount = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v) && v >= 1;
const isDuration = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v) && v >= 0;
const isTilesConfig = (v: unknown): v is string | unknown[] => typeof v === "string" || Array.isArray(v);

/**
 * Merge loaded data with defaults, ensuring all fields exist.
 * Fields of the wrong type fall back to their defaults, except `tilesConfig`,
 * which is passed through so the parser can report what is wrong with it.
 */
export function mergeSettings(loaded: Readonly<Record<string, unknown>> | null): TileLayoutSettings {
  if (!loaded) return { ...DEFAULT_SETTINGS };
  return {
    gridSize: pick(loaded.gridSize, isString, DEFAULT_SETTINGS.gridSize),
    showBorders: pick(loaded.showBorders, isBoolean, DEFAULT_SETTINGS.showBorders),
    borderColor: pick(loaded.borderColor, isString, DEFAULT_SETTINGS.borderColor),
    backgroundColor: pick(loaded.backgroundColor, isString, DEFAULT_SETTINGS.backgroundColor),
    tilesConfig: loaded.tilesConfig === undefined
      ? DEFAULT_SETTINGS.tilesConfig
      : pick(loaded.tilesConfig, isTilesConfig, JSON.stringify(loaded.tilesConfig)),
    renderConcurrency: pick(loaded.renderConcurrency, isCount, DEFAULT_SETTINGS.renderConcurrency),
    tileTimeoutMs: pick(loaded.tileTimeoutMs, isDuration, DEFAULT_SETTINGS.tileTimeoutMs),
  };
}
