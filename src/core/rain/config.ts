// src/core/rain/config.ts

/**
 * Tunables for the rain simulation, the vertex generator and the frame
 * governor. Pixel values are physical (device) pixels.
 */
export interface RainConfig {
  /** Horizontal distance between initial streak columns. */
  columnSpacing: number;
  /** Vertical distance between consecutive glyphs of a streak. */
  rowHeight: number;
  /** Fixed size of every streak's glyph chain. */
  chainCapacity: number;
  /** Streak length range, `[minLength, maxLength)`. */
  minLength: number;
  maxLength: number;
  /** Fall speed in pixels per frame: U[baseSpeedMin, baseSpeedMax) + U[0, speedBoost). */
  baseSpeedMin: number;
  baseSpeedMax: number;
  speedBoost: number;
  /** Frames between mid-chain glyph mutations. */
  flickerInterval: number;
  /** Frames between head glyph refreshes. */
  headFlickerInterval: number;
  /**
   * Upper bound on streaks; sizes the GPU buffers. Raise it with
   * {@link withColumnsFor} to cover the widest expected surface.
   */
  maxColumns: number;
  /** Rows this far outside the viewport are still emitted. */
  cullPadding: number;
  /** Green intensity lost per row behind the head. */
  fadePerRow: number;
  /** Floor for tail intensity. */
  minTailIntensity: number;
  /** Atlas pixel size to on-screen size factor. */
  glyphScale: number;
  targetFps: number;
  logEveryFrames: number;
}

export const DEFAULT_RAIN_CONFIG: Readonly<RainConfig> = {
  columnSpacing: 20,
  rowHeight: 16,
  chainCapacity: 32,
  minLength: 10,
  maxLength: 30,
  baseSpeedMin: 1.5,
  baseSpeedMax: 3.5,
  speedBoost: 1.5,
  flickerInterval: 6,
  headFlickerInterval: 3,
  maxColumns: 512,
  cullPadding: 32,
  fadePerRow: 0.04,
  minTailIntensity: 0.15,
  glyphScale: 0.5,
  targetFps: 75,
  logEveryFrames: 60,
};

const MIN_SPEED = 0.01;

const finiteOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) ? value : fallback;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Merges overrides over the defaults and clamps every field into a range the
 * simulation can run with.
 */
export function resolveRainConfig(
  overrides: Partial<RainConfig> = {},
): RainConfig {
  const d = DEFAULT_RAIN_CONFIG;
  const pick = (key: keyof RainConfig) => finiteOr(overrides[key], d[key]);

  const chainCapacity = Math.max(1, Math.floor(pick("chainCapacity")));
  const minLength = clamp(Math.floor(pick("minLength")), 1, chainCapacity);
  const maxLength = clamp(
    Math.floor(pick("maxLength")),
    minLength,
    chainCapacity,
  );
  const baseSpeedMin = Math.max(MIN_SPEED, pick("baseSpeedMin"));
  const baseSpeedMax = Math.max(baseSpeedMin, pick("baseSpeedMax"));

  return {
    columnSpacing: Math.max(1, pick("columnSpacing")),
    rowHeight: Math.max(1, pick("rowHeight")),
    chainCapacity,
    minLength,
    maxLength,
    baseSpeedMin,
    baseSpeedMax,
    speedBoost: Math.max(0, pick("speedBoost")),
    flickerInterval: Math.max(1, Math.floor(pick("flickerInterval"))),
    headFlickerInterval: Math.max(1, Math.floor(pick("headFlickerInterval"))),
    maxColumns: Math.max(1, Math.floor(pick("maxColumns"))),
    cullPadding: Math.max(0, pick("cullPadding")),
    fadePerRow: Math.max(0, pick("fadePerRow")),
    minTailIntensity: clamp(pick("minTailIntensity"), 0, 1),
    glyphScale: Math.max(0.01, pick("glyphScale")),
    targetFps: clamp(pick("targetFps"), 1, 240),
    logEveryFrames: Math.max(1, Math.floor(pick("logEveryFrames"))),
  };
}

/**
 * Returns `config` with `maxColumns` raised, if needed, so a surface
 * `widthPx` wide gets one streak per `columnSpacing`.
 */
export function withColumnsFor(config: RainConfig, widthPx: number): RainConfig {
  const width = Number.isFinite(widthPx) ? Math.max(0, widthPx) : 0;
  const needed = Math.ceil(width / config.columnSpacing);
  return { ...config, maxColumns: Math.max(config.maxColumns, needed) };
}

/** Startup options read from the page URL. */
export interface LaunchOptions {
  config: Partial<RainConfig>;
  seed?: number;
  showHud: boolean;
  profile: boolean;
  atlasManifestUrl?: string;
}

/**
 * Reads launch options from a query string such as `?fps=60&spacing=24&hud`.
 * Unparseable numbers are ignored.
 */
export function parseRainQuery(search: string): LaunchOptions {
  const params = new URLSearchParams(search);
  const num = (name: string): number | undefined => {
    const raw = params.get(name);
    if (raw === null || raw.trim() === "") return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
  };

  const config: Partial<RainConfig> = {};
  const fps = num("fps");
  if (fps !== undefined) config.targetFps = fps;
  const spacing = num("spacing");
  if (spacing !== undefined) config.columnSpacing = spacing;
  const scale = num("scale");
  if (scale !== undefined) config.glyphScale = scale;

  const atlas = params.get("atlas");
  return {
    config,
    seed: num("seed"),
    showHud: params.has("hud"),
    profile: params.has("profile"),
    atlasManifestUrl: atlas !== null && atlas !== "" ? atlas : undefined,
  };
}
