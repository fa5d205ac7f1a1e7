// src/core/atlas/atlasLayout.ts
import { GlyphAtlas, type GlyphMetrics } from "./glyphAtlas";

export interface AtlasLayoutOptions {
  /** Width and height of the square atlas, in pixels. */
  atlasSize: number;
  /** Edge length of one glyph cell. */
  glyphSize: number;
  /** Gap around every cell. */
  padding: number;
}

export const DEFAULT_ATLAS_LAYOUT: Readonly<AtlasLayoutOptions> = {
  atlasSize: 2048,
  glyphSize: 32,
  padding: 4,
};

/** One packed cell: its pixel origin and the code point it holds. */
export interface AtlasCell {
  codePoint: number;
  x: number;
  y: number;
}

export interface AtlasLayout {
  options: AtlasLayoutOptions;
  cells: AtlasCell[];
  /** Code points that did not fit. */
  overflow: number[];
}

/**
 * Packs fixed-size glyph cells left to right, wrapping to a new row when the
 * next cell would cross the right edge. Once a row would cross the bottom
 * edge the remaining code points are reported as overflow.
 */
export function layoutGlyphCells(
  codePoints: readonly number[],
  options: AtlasLayoutOptions = DEFAULT_ATLAS_LAYOUT,
): AtlasLayout {
  const { atlasSize, glyphSize, padding } = options;
  const cells: AtlasCell[] = [];
  const overflow: number[] = [];
  const step = glyphSize + padding;

  let x = padding;
  let y = padding;
  let full = y + step > atlasSize;

  for (const codePoint of codePoints) {
    if (!full && x + step > atlasSize) {
      x = padding;
      y += step;
      full = y + step > atlasSize;
      if (full) {
        console.warn("[Atlas] Atlas full, skipping remaining characters");
      }
    }
    if (full) {
      overflow.push(codePoint);
      continue;
    }
    cells.push({ codePoint, x, y });
    x += step;
  }

  return { options, cells, overflow };
}

/** Normalized metrics for every cell of a layout. */
export function atlasFromLayout(layout: AtlasLayout): GlyphAtlas {
  const { atlasSize, glyphSize } = layout.options;
  const glyphs = new Map<number, GlyphMetrics>();
  for (const cell of layout.cells) {
    glyphs.set(cell.codePoint, {
      uMin: cell.x / atlasSize,
      vMin: cell.y / atlasSize,
      uMax: (cell.x + glyphSize) / atlasSize,
      vMax: (cell.y + glyphSize) / atlasSize,
      width: glyphSize,
      height: glyphSize,
    });
  }
  return new GlyphAtlas(atlasSize, glyphs);
}
