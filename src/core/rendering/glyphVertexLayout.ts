// src/core/rendering/glyphVertexLayout.ts

/**
 * CPU ↔ GPU layout of one glyph vertex. The WGSL `VertexInput` struct in
 * `glyph.wgsl` mirrors these locations.
 *
 * position: vec2<f32> (NDC) | uv: vec2<f32> | color: vec4<f32>
 */
export const GLYPH_VERTEX_FLOATS = 8;
export const GLYPH_VERTEX_BYTES =
  GLYPH_VERTEX_FLOATS * Float32Array.BYTES_PER_ELEMENT;

export const VERTICES_PER_QUAD = 4;
export const INDICES_PER_QUAD = 6;
export const INDEX_BYTES = Uint32Array.BYTES_PER_ELEMENT;

export const GLYPH_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: GLYPH_VERTEX_BYTES,
  stepMode: "vertex",
  attributes: [
    { shaderLocation: 0, offset: 0, format: "float32x2" }, // position
    { shaderLocation: 1, offset: 8, format: "float32x2" }, // uv
    { shaderLocation: 2, offset: 16, format: "float32x4" }, // color
  ],
};

/** Byte sizes of the vertex and index buffers for `maxQuads` glyphs. */
export const glyphBufferSizes = (maxQuads: number) => ({
  vertexBytes: maxQuads * VERTICES_PER_QUAD * GLYPH_VERTEX_BYTES,
  indexBytes: maxQuads * INDICES_PER_QUAD * INDEX_BYTES,
});
