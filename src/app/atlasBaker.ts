// src/app/atlasBaker.ts
import type { GlyphAtlas } from "@/core/atlas/glyphAtlas";
import {
  type AtlasLayoutOptions,
  DEFAULT_ATLAS_LAYOUT,
  atlasFromLayout,
  layoutGlyphCells,
} from "@/core/atlas/atlasLayout";

export interface BakedAtlas {
  image: OffscreenCanvas;
  atlas: GlyphAtlas;
}

const DEFAULT_FONT_FAMILY =
  '"Pleck JP", "MS Gothic", "Osaka-Mono", "Noto Sans Mono CJK JP", monospace';

/**
 * Rasterizes `codePoints` into a square RGBA atlas: white glyphs whose alpha
 * is the font's coverage, on a transparent background.
 */
export function bakeGlyphAtlas(
  codePoints: readonly number[],
  options: AtlasLayoutOptions = DEFAULT_ATLAS_LAYOUT,
  fontFamily = DEFAULT_FONT_FAMILY,
): BakedAtlas {
  const layout = layoutGlyphCells(codePoints, options);
  const image = new OffscreenCanvas(options.atlasSize, options.atlasSize);
  const ctx = image.getContext("2d");
  if (!ctx) {
    throw new Error("OffscreenCanvas 2D context is unavailable.");
  }

  ctx.clearRect(0, 0, options.atlasSize, options.atlasSize);
  ctx.fillStyle = "#ffffff";
  ctx.font = `${options.glyphSize}px ${fontFamily}`;
  ctx.textBaseline = "top";
  ctx.textAlign = "left";

  for (const cell of layout.cells) {
    ctx.save();
    ctx.beginPath();
    ctx.rect(cell.x, cell.y, options.glyphSize, options.glyphSize);
    ctx.clip();
    ctx.fillText(
      String.fromCodePoint(cell.codePoint),
      cell.x,
      cell.y,
      options.glyphSize,
    );
    ctx.restore();
  }

  console.log(
    `[Atlas] Baked ${layout.cells.length} glyphs into ${options.atlasSize}x${options.atlasSize}`,
  );
  return { image, atlas: atlasFromLayout(layout) };
}
