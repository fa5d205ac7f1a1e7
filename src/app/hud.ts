// src/app/hud.ts
import type { FramePresenterStats } from "@/core/rendering/framePresenter";
import type { SurfaceSize } from "@/core/rendering/surface";

let hud: HTMLDivElement | undefined;

const HUD_UPDATE_INTERVAL_MS = 250;
let lastHudUpdateTime = 0;
let lastHudFrame = 0;

/**
 * Initializes the HUD module.
 * @param hudElement The HTMLDivElement to display the HUD text in.
 */
export function init(hudElement: HTMLDivElement): void {
  hud = hudElement;
  hud.hidden = false;
  hud.textContent = "Initializing...";
  lastHudUpdateTime = 0;
  lastHudFrame = 0;
}

/**
 * Shows frame rate and presenter counters. Throttled to avoid excessive DOM
 * updates; the frame rate is averaged over the throttle window.
 */
export function update(
  nowMs: number,
  stats: Readonly<FramePresenterStats>,
  size: Readonly<SurfaceSize>,
): void {
  if (!hud) return;
  const elapsed = nowMs - lastHudUpdateTime;
  if (elapsed < HUD_UPDATE_INTERVAL_MS) return;

  const frames = stats.frameCount - lastHudFrame;
  const fps = lastHudUpdateTime > 0 && elapsed > 0 ? (frames * 1000) / elapsed : 0;
  lastHudFrame = stats.frameCount;
  lastHudUpdateTime = nowMs;

  hud.textContent =
    `FPS: ${fps.toFixed(1)}  |  Frame: ${stats.frameCount}\n` +
    `Canvas: ${size.width}x${size.height}\n` +
    `Quads: ${stats.lastQuadCount}  |  Misses: ${stats.lastMissCount} (${stats.totalMisses} total)\n` +
    `Surface recreations: ${stats.surfaceRecreations}\n` +
    `F11/F fullscreen, Esc exit`;
}
