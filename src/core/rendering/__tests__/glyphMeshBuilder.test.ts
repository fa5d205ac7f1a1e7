import assert from "node:assert/strict";
import test from "node:test";
import { GlyphAtlas, type GlyphMetrics } from "../../atlas/glyphAtlas";
import { resolveRainConfig } from "../../rain/config";
import { streakFromText } from "../../rain/streak";
import { GlyphMeshBuilder, glyphColor } from "../glyphMeshBuilder";
import { GLYPH_VERTEX_FLOATS } from "../glyphVertexLayout";

const style = resolveRainConfig();

const CELL: GlyphMetrics = {
  uMin: 0,
  vMin: 0,
  uMax: 0.5,
  vMax: 0.25,
  width: 32,
  height: 32,
};

const atlasOf = (chars: string): GlyphAtlas =>
  new GlyphAtlas(
    64,
    new Map(
      Array.from(chars, (ch): [number, GlyphMetrics] => [
        ch.codePointAt(0) ?? 0,
        CELL,
      ]),
    ),
  );

const assertClose = (actual: ArrayLike<number>, expected: number[]): void => {
  assert.equal(actual.length, expected.length);
  for (let i = 0; i < expected.length; i++) {
    assert.ok(
      Math.abs(actual[i] - expected[i]) < 1e-6,
      `index ${i}: ${actual[i]} !== ${expected[i]}`,
    );
  }
};

test("atlas misses are skipped and counted", () => {
  const builder = new GlyphMeshBuilder(64, style);
  const streak = streakFromText("AB A", 0, 100);
  const mesh = builder.build([streak], atlasOf("A"), {
    width: 200,
    height: 200,
  });

  assert.equal(mesh.quadCount, 2);
  assert.equal(mesh.missCount, 2);
  assert.equal(mesh.vertices.length, 2 * 4 * GLYPH_VERTEX_FLOATS);
  assert.deepEqual(
    Array.from(mesh.indices),
    [0, 1, 2, 2, 1, 3, 4, 5, 6, 6, 5, 7],
  );
});

test("every row of an on-screen streak becomes a quad", () => {
  const builder = new GlyphMeshBuilder(64, style);
  const streak = streakFromText("AAA", 40, 50);
  const mesh = builder.build([streak], atlasOf("A"), {
    width: 100,
    height: 100,
  });
  assert.equal(mesh.quadCount, 3);
  assert.equal(mesh.indices.length, 18);
  assert.equal(mesh.culledCount, 0);
});

test("an empty atlas produces no geometry", () => {
  const builder = new GlyphMeshBuilder(64, style);
  const mesh = builder.build(
    [streakFromText("AAA", 0, 50)],
    new GlyphAtlas(1, new Map()),
    { width: 100, height: 100 },
  );
  assert.equal(mesh.quadCount, 0);
  assert.equal(mesh.missCount, 3);
  assert.equal(mesh.vertices.length, 0);
  assert.equal(mesh.indices.length, 0);
});

test("quad corners map pixels to NDC with head color and atlas UVs", () => {
  const builder = new GlyphMeshBuilder(4, style);
  const mesh = builder.build([streakFromText("A", 50, 20)], atlasOf("A"), {
    width: 200,
    height: 100,
  });

  // 32px cell at glyphScale 0.5 covers x 50..66 and y 20..36.
  assertClose(mesh.vertices, [
    -0.5, 0.28, 0, 0.25, 1, 1, 1, 1, // bottom-left
    -0.34, 0.28, 0.5, 0.25, 1, 1, 1, 1, // bottom-right
    -0.5, 0.6, 0, 0, 1, 1, 1, 1, // top-left
    -0.34, 0.6, 0.5, 0, 1, 1, 1, 1, // top-right
  ]);
});

test("tail rows fade through green", () => {
  const builder = new GlyphMeshBuilder(4, style);
  const mesh = builder.build([streakFromText("AA", 0, 50)], atlasOf("A"), {
    width: 100,
    height: 100,
  });
  const secondQuadColor = mesh.vertices.subarray(
    4 * GLYPH_VERTEX_FLOATS + 4,
    4 * GLYPH_VERTEX_FLOATS + 8,
  );
  assertClose(secondQuadColor, [0, 0.96, 0, 1]);
});

test("every triangle winds counter-clockwise", () => {
  const builder = new GlyphMeshBuilder(64, style);
  const mesh = builder.build(
    [streakFromText("AAAA", 10, 60), streakFromText("AA", 70, 30)],
    atlasOf("A"),
    { width: 160, height: 90 },
  );
  const v = mesh.vertices;
  const at = (i: number) => [
    v[i * GLYPH_VERTEX_FLOATS],
    v[i * GLYPH_VERTEX_FLOATS + 1],
  ];

  assert.equal(mesh.indices.length / 3, 12);
  for (let t = 0; t < mesh.indices.length; t += 3) {
    const [ax, ay] = at(mesh.indices[t]);
    const [bx, by] = at(mesh.indices[t + 1]);
    const [cx, cy] = at(mesh.indices[t + 2]);
    const area = (bx - ax) * (cy - ay) - (cx - ax) * (by - ay);
    assert.ok(area > 0, `triangle ${t / 3} has signed area ${area}`);
  }
});

test("rows outside the padded viewport are culled", () => {
  const builder = new GlyphMeshBuilder(64, style);
  const mesh = builder.build(
    [streakFromText("AAAA", 0, -10), streakFromText("A", 20, 200)],
    atlasOf("A"),
    { width: 100, height: 100 },
  );
  // Rows at -10 and -26 of the first streak survive the 32px pad.
  assert.equal(mesh.quadCount, 2);
  assert.equal(mesh.culledCount, 3);
  assert.equal(mesh.missCount, 0);
});

test("glyphs past the builder capacity are dropped and counted", () => {
  const builder = new GlyphMeshBuilder(1, style);
  const mesh = builder.build([streakFromText("AAA", 0, 50)], atlasOf("A"), {
    width: 100,
    height: 100,
  });
  assert.equal(mesh.quadCount, 1);
  assert.equal(mesh.overflowCount, 2);
});

test("a zero-area viewport yields an empty mesh", () => {
  const builder = new GlyphMeshBuilder(8, style);
  const mesh = builder.build([streakFromText("AAA", 0, 50)], atlasOf("A"), {
    width: 0,
    height: 100,
  });
  assert.equal(mesh.quadCount, 0);
  assert.equal(mesh.culledCount, 0);
});

test("glyphColor: white head, fading green tail with a floor", () => {
  assertClose(glyphColor(0, style), [1, 1, 1, 1]);
  assertClose(glyphColor(5, style), [0, 0.8, 0, 1]);
  assertClose(glyphColor(30, style), [0, 0.15, 0, 1]);

  let previous = 1;
  for (let row = 1; row < 40; row++) {
    const green = glyphColor(row, style)[1];
    assert.ok(green <= previous && green >= style.minTailIntensity - 1e-6);
    previous = green;
  }
});
