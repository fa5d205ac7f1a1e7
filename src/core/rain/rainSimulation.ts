// src/core/rain/rainSimulation.ts
import { RAIN_CODE_POINTS } from "./charset";
import { type RainConfig, resolveRainConfig } from "./config";
import { type Streak, type StreakView, createStreak, tailPosition } from "./streak";
import {
  type RandomSource,
  mathRandomSource,
  randomInt,
  randomRange,
} from "../utils/prng";

export interface RainSimulationOptions {
  config?: Partial<RainConfig>;
  random?: RandomSource;
  /** Code points streaks draw from. Defaults to {@link RAIN_CODE_POINTS}. */
  codePoints?: readonly number[];
}

/**
 * CPU-side particle simulation for the digital rain.
 *
 * @remarks
 * Owns a pool of {@link Streak} records, one per column slot. Records are
 * created on construction and on {@link resize}; afterwards they are only
 * recycled in place, so the pool never grows past `maxColumns`. When the
 * cap is below one column per `columnSpacing`, the capped pool is spread
 * evenly across the width instead.
 *
 * Every random decision goes through the injected {@link RandomSource}; with
 * a seeded {@link PRNG} a run is reproducible.
 */
export class RainSimulation {
  public readonly config: RainConfig;

  private readonly random: RandomSource;
  private readonly codePoints: readonly number[];
  private pool: Streak[] = [];
  private _width = 0;
  private _height = 0;
  private _frameCount = 0;

  constructor(width: number, height: number, options: RainSimulationOptions = {}) {
    this.config = resolveRainConfig(options.config);
    this.random = options.random ?? mathRandomSource;
    this.codePoints =
      options.codePoints && options.codePoints.length > 0
        ? options.codePoints
        : RAIN_CODE_POINTS;
    this.setSize(width, height);
    this.spawnStreaks();
  }

  public get width(): number {
    return this._width;
  }

  public get height(): number {
    return this._height;
  }

  public get frameCount(): number {
    return this._frameCount;
  }

  /** Current streak state; valid until the next {@link update} or {@link resize}. */
  public get streaks(): readonly StreakView[] {
    return this.pool;
  }

  /** Number of streaks {@link spawnStreaks} creates for a given width. */
  public columnCountFor(width: number): number {
    const w = Math.max(0, Math.floor(width));
    return Math.min(
      this.config.maxColumns,
      Math.ceil(w / this.config.columnSpacing),
    );
  }

  /**
   * Advances the simulation by one frame: moves every head down by its
   * speed, flickers glyphs on their cadences and recycles streaks whose tail
   * has fallen past twice the viewport height.
   */
  public update(): void {
    this._frameCount++;
    const { flickerInterval, headFlickerInterval, rowHeight } = this.config;
    const refreshHead = this._frameCount % headFlickerInterval === 0;
    const mutateBody = this._frameCount % flickerInterval === 0;
    const recycleBelow = this._height * 2;

    for (const streak of this.pool) {
      streak.y += streak.speed;

      if (tailPosition(streak, rowHeight) > recycleBelow) {
        this.recycle(streak);
        continue;
      }

      if (refreshHead && streak.length > 0) {
        streak.glyphs[0] = this.randomCodePoint();
      }
      if (mutateBody) {
        this.mutateVisibleGlyph(streak);
      }
    }
  }

  /** Discards every streak and respawns for the new viewport. */
  public resize(width: number, height: number): void {
    this.setSize(width, height);
    this.pool = [];
    this.spawnStreaks();
  }

  private setSize(width: number, height: number): void {
    this._width = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0;
    this._height = Number.isFinite(height)
      ? Math.max(0, Math.floor(height))
      : 0;
  }

  private spawnStreaks(): void {
    const { columnSpacing } = this.config;
    const count = this.columnCountFor(this._width);
    const capped = count < Math.ceil(this._width / columnSpacing);
    for (let i = 0; i < count; i++) {
      const streak = createStreak(this.config.chainCapacity);
      streak.x = capped
        ? Math.floor((i * this._width) / count)
        : i * columnSpacing;
      this.fillChain(streak);
      // Spread initial heads over three screen heights so the first frames
      // do not start as a synchronized wall.
      streak.y = randomRange(this.random, -2 * this._height, this._height);
      this.pool.push(streak);
    }
  }

  private recycle(streak: Streak): void {
    streak.y = -randomRange(this.random, 0, this._height);
    streak.x = randomInt(this.random, 0, this._width);
    this.fillChain(streak);
  }

  /** Assigns a fresh speed, length and glyph chain. */
  private fillChain(streak: Streak): void {
    const { minLength, maxLength, chainCapacity } = this.config;
    streak.speed = this.randomSpeed();
    streak.length = Math.min(
      chainCapacity,
      randomInt(this.random, minLength, maxLength),
    );
    for (let i = 0; i < streak.length; i++) {
      streak.glyphs[i] = this.randomCodePoint();
    }
    streak.glyphs.fill(0, streak.length);
  }

  private randomSpeed(): number {
    const { baseSpeedMin, baseSpeedMax, speedBoost } = this.config;
    return (
      randomRange(this.random, baseSpeedMin, baseSpeedMax) +
      randomRange(this.random, 0, speedBoost)
    );
  }

  private randomCodePoint(): number {
    return this.codePoints[randomInt(this.random, 0, this.codePoints.length)];
  }

  /**
   * Re-randomizes one body glyph whose row is inside `[0, height)`. Does
   * nothing when no body row is on screen.
   */
  private mutateVisibleGlyph(streak: Streak): void {
    const { rowHeight } = this.config;
    // Row k sits at y - k * rowHeight; visible when 0 <= y - k*rowHeight < height.
    const first = Math.max(
      1,
      Math.floor((streak.y - this._height) / rowHeight) + 1,
    );
    const last = Math.min(streak.length - 1, Math.floor(streak.y / rowHeight));
    if (first > last) return;
    const index = randomInt(this.random, first, last + 1);
    streak.glyphs[index] = this.randomCodePoint();
  }
}
