// src/core/rendering/glyphMeshBuilder.ts
import { type Vec4, vec4 } from "wgpu-matrix";
import type { GlyphAtlas } from "../atlas/glyphAtlas";
import type { RainConfig } from "../rain/config";
import type { StreakView } from "../rain/streak";
import {
  GLYPH_VERTEX_FLOATS,
  INDICES_PER_QUAD,
  VERTICES_PER_QUAD,
} from "./glyphVertexLayout";

/** Head glyphs are drawn in full-intensity white. */
export const HEAD_COLOR: Vec4 = vec4.fromValues(1, 1, 1, 1);

export interface Viewport {
  width: number;
  height: number;
}

export type GlyphStyle = Pick<
  RainConfig,
  "rowHeight" | "cullPadding" | "fadePerRow" | "minTailIntensity" | "glyphScale"
>;

/**
 * One frame of glyph geometry. `vertices` and `indices` are views over the
 * builder's storage and are overwritten by the next {@link GlyphMeshBuilder.build}.
 */
export interface GlyphMesh {
  vertices: Float32Array;
  indices: Uint32Array;
  quadCount: number;
  /** Glyphs skipped because the atlas has no entry for them. */
  missCount: number;
  /** Rows skipped because they lie outside the padded viewport. */
  culledCount: number;
  /** Glyphs dropped because the builder was full. */
  overflowCount: number;
}

/**
 * Writes the color of row `row` (0 = head) into `dst`. Tail rows fade through
 * the green channel and never drop below `minTailIntensity`.
 */
export function glyphColor(
  row: number,
  style: Pick<GlyphStyle, "fadePerRow" | "minTailIntensity">,
  dst: Vec4 = vec4.create(),
): Vec4 {
  if (row === 0) return vec4.copy(HEAD_COLOR, dst);
  const green = Math.min(
    1,
    Math.max(style.minTailIntensity, 1 - row * style.fadePerRow),
  );
  return vec4.set(0, green, 0, 1, dst);
}

/**
 * Converts streak snapshots into textured, colored quads in normalized
 * device coordinates.
 *
 * @remarks
 * Storage for `maxQuads` glyphs is allocated once; every build reuses it.
 * Each visible glyph becomes four vertices (bottom-left, bottom-right,
 * top-left, top-right) and the indices `0 1 2, 2 1 3`, both counter-clockwise.
 */
export class GlyphMeshBuilder {
  public readonly maxQuads: number;
  private readonly style: GlyphStyle;
  private readonly vertexData: Float32Array;
  private readonly indexData: Uint32Array;
  private readonly color: Vec4 = vec4.create();

  constructor(maxQuads: number, style: GlyphStyle) {
    this.maxQuads = Math.max(0, Math.floor(maxQuads));
    this.style = style;
    this.vertexData = new Float32Array(
      this.maxQuads * VERTICES_PER_QUAD * GLYPH_VERTEX_FLOATS,
    );
    this.indexData = new Uint32Array(this.maxQuads * INDICES_PER_QUAD);
  }

  public build(
    streaks: readonly StreakView[],
    atlas: GlyphAtlas,
    viewport: Viewport,
  ): GlyphMesh {
    const { rowHeight, cullPadding, glyphScale } = this.style;
    const { width, height } = viewport;
    let quadCount = 0;
    let missCount = 0;
    let culledCount = 0;
    let overflowCount = 0;

    if (width > 0 && height > 0) {
      const sx = 2 / width;
      const sy = 2 / height;
      const minY = -cullPadding;
      const maxY = height + cullPadding;

      for (const streak of streaks) {
        for (let row = 0; row < streak.length; row++) {
          const top = streak.y - row * rowHeight;
          if (top < minY || top > maxY) {
            culledCount++;
            continue;
          }
          const metrics = atlas.lookup(streak.glyphs[row]);
          if (!metrics) {
            missCount++;
            continue;
          }
          if (quadCount >= this.maxQuads) {
            overflowCount++;
            continue;
          }

          const left = streak.x * sx - 1;
          const right = (streak.x + metrics.width * glyphScale) * sx - 1;
          const ndcTop = 1 - top * sy;
          const ndcBottom = 1 - (top + metrics.height * glyphScale) * sy;
          glyphColor(row, this.style, this.color);

          let v = quadCount * VERTICES_PER_QUAD * GLYPH_VERTEX_FLOATS;
          v = this.writeVertex(v, left, ndcBottom, metrics.uMin, metrics.vMax);
          v = this.writeVertex(v, right, ndcBottom, metrics.uMax, metrics.vMax);
          v = this.writeVertex(v, left, ndcTop, metrics.uMin, metrics.vMin);
          this.writeVertex(v, right, ndcTop, metrics.uMax, metrics.vMin);

          const base = quadCount * VERTICES_PER_QUAD;
          const i = quadCount * INDICES_PER_QUAD;
          this.indexData[i] = base;
          this.indexData[i + 1] = base + 1;
          this.indexData[i + 2] = base + 2;
          this.indexData[i + 3] = base + 2;
          this.indexData[i + 4] = base + 1;
          this.indexData[i + 5] = base + 3;
          quadCount++;
        }
      }
    }

    return {
      vertices: this.vertexData.subarray(
        0,
        quadCount * VERTICES_PER_QUAD * GLYPH_VERTEX_FLOATS,
      ),
      indices: this.indexData.subarray(0, quadCount * INDICES_PER_QUAD),
      quadCount,
      missCount,
      culledCount,
      overflowCount,
    };
  }

  private writeVertex(
    offset: number,
    x: number,
    y: number,
    u: number,
    v: number,
  ): number {
    const out = this.vertexData;
    const c = this.color;
    out[offset] = x;
    out[offset + 1] = y;
    out[offset + 2] = u;
    out[offset + 3] = v;
    out[offset + 4] = c[0];
    out[offset + 5] = c[1];
    out[offset + 6] = c[2];
    out[offset + 7] = c[3];
    return offset + GLYPH_VERTEX_FLOATS;
  }
}
