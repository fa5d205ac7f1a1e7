// src/core/rain/streak.ts

/**
 * A falling chain of glyphs.
 *
 * @remarks
 * `glyphs` holds code points from the head (index 0) to the tail and always
 * has the pool's fixed capacity; only the first `length` entries are live.
 * Streak records are owned by {@link RainSimulation} and recycled in place.
 */
export interface Streak {
  /** Left edge of the column, in pixels. */
  x: number;
  /** Head row position in pixels; negative while above the viewport. */
  y: number;
  /** Pixels fallen per update, always > 0. */
  speed: number;
  length: number;
  glyphs: Uint32Array;
}

/** The read-only view handed to the vertex generator. */
export interface StreakView {
  readonly x: number;
  readonly y: number;
  readonly speed: number;
  readonly length: number;
  readonly glyphs: Readonly<Uint32Array>;
}

export const createStreak = (capacity: number): Streak => ({
  x: 0,
  y: 0,
  speed: 1,
  length: 0,
  glyphs: new Uint32Array(capacity),
});

/** Pixel position of the tail glyph's row. */
export const tailPosition = (streak: StreakView, rowHeight: number): number =>
  streak.y - streak.length * rowHeight;

/**
 * Builds a standalone streak from a string, one glyph per code point,
 * truncated to `capacity`.
 */
export function streakFromText(
  text: string,
  x: number,
  y: number,
  capacity = 32,
  speed = 1,
): Streak {
  const streak = createStreak(capacity);
  const codePoints = Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
  streak.length = Math.min(codePoints.length, capacity);
  for (let i = 0; i < streak.length; i++) streak.glyphs[i] = codePoints[i];
  streak.x = x;
  streak.y = y;
  streak.speed = speed;
  return streak;
}
