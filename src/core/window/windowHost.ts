// src/core/window/windowHost.ts
import type { SurfaceSize } from "@/core/rendering/surface";

export type WindowKey = "escape" | "toggle-fullscreen";

export type WindowEvent =
  | { type: "resized"; size: SurfaceSize }
  | { type: "close-requested" }
  | { type: "redraw-requested" }
  | { type: "key-pressed"; key: WindowKey };

/**
 * The window capabilities the frame governor drives. Events flow the other
 * way, from the host into `FrameGovernor.handleEvent`.
 */
export interface WindowHost {
  /** Current drawable size in physical pixels. */
  size(): SurfaceSize;
  /** Schedules one `redraw-requested` event. */
  requestRedraw(): void;
  isFullscreen(): boolean;
  /** Switches between windowed and borderless fullscreen. */
  setFullscreen(on: boolean): void;
  /** Stops event delivery and releases window resources. */
  exit(): void;
}

/** Monotonic time source used for frame pacing. */
export interface FrameClock {
  /** Milliseconds from an arbitrary origin. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const performanceClock: FrameClock = {
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
