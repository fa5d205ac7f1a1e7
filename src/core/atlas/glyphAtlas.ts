// src/core/atlas/glyphAtlas.ts

/**
 * Where a glyph lives in the atlas texture, plus its pixel size.
 * UVs are normalized with v growing downwards.
 */
export interface GlyphMetrics {
  readonly uMin: number;
  readonly vMin: number;
  readonly uMax: number;
  readonly vMax: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Read-only mapping from code point to {@link GlyphMetrics} for one square
 * atlas image. Lookups can miss; callers skip the glyph.
 */
export class GlyphAtlas {
  public readonly size: number;
  private readonly glyphs: ReadonlyMap<number, GlyphMetrics>;

  constructor(size: number, glyphs: ReadonlyMap<number, GlyphMetrics>) {
    this.size = size;
    this.glyphs = glyphs;
  }

  public get glyphCount(): number {
    return this.glyphs.size;
  }

  public lookup(codePoint: number): GlyphMetrics | undefined {
    return this.glyphs.get(codePoint);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

/**
 * Validates a parsed atlas manifest and builds a {@link GlyphAtlas} from it.
 * The manifest shape is
 * `{ "size": 2048, "glyphs": { "ｱ": [uMin, vMin, uMax, vMax, width, height] } }`.
 *
 * @throws If the manifest is not an object, the size is not a positive
 *   number, a key is not exactly one character, or an entry is not six
 *   finite numbers with UVs inside [0, 1].
 */
export function parseGlyphAtlasManifest(data: unknown): GlyphAtlas {
  if (!isRecord(data)) {
    throw new Error("Atlas manifest must be a JSON object.");
  }
  const { size, glyphs } = data;
  if (!isFiniteNumber(size) || size <= 0) {
    throw new Error(`Atlas manifest has invalid size: ${String(size)}`);
  }
  if (!isRecord(glyphs)) {
    throw new Error("Atlas manifest is missing the 'glyphs' object.");
  }

  const map = new Map<number, GlyphMetrics>();
  for (const [char, entry] of Object.entries(glyphs)) {
    const chars = Array.from(char);
    const cp = char.codePointAt(0);
    if (chars.length !== 1 || cp === undefined) {
      throw new Error(`Atlas glyph key must be one character, got "${char}".`);
    }
    if (
      !Array.isArray(entry) ||
      entry.length !== 6 ||
      !entry.every(isFiniteNumber)
    ) {
      throw new Error(`Atlas entry for "${char}" must be six numbers.`);
    }
    const [uMin, vMin, uMax, vMax, width, height] = entry;
    if ([uMin, vMin, uMax, vMax].some((v) => v < 0 || v > 1)) {
      throw new Error(`Atlas entry for "${char}" has UVs outside [0, 1].`);
    }
    map.set(cp, { uMin, vMin, uMax, vMax, width, height });
  }
  return new GlyphAtlas(size, map);
}
