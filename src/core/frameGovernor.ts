// src/core/frameGovernor.ts
import type { RainSimulation } from "@/core/rain/rainSimulation";
import type { FrameResult, FrameSink } from "@/core/rendering/framePresenter";
import { Profiler } from "@/core/utils/profiler";
import {
  type FrameClock,
  type WindowEvent,
  type WindowHost,
  performanceClock,
} from "@/core/window/windowHost";

export type ExitReason = "close-requested" | "escape" | "fatal-surface-error";

export interface FrameGovernorOptions {
  targetFps: number;
  /** Log the frame count and profiler report every this many frames. */
  logEveryFrames: number;
  clock?: FrameClock;
}

/**
 * Drives the rain from window events: paces redraws to `targetFps`, runs one
 * simulation step and one presented frame per redraw, and routes resize,
 * fullscreen and exit requests.
 *
 * @remarks
 * A redraw that arrives while a frame is still pending (sleeping out the
 * pacing interval) is dropped; the pending frame requests the next redraw
 * itself.
 */
export class FrameGovernor {
  private host: WindowHost;
  private simulation: RainSimulation;
  private presenter: FrameSink;
  private clock: FrameClock;
  private logEveryFrames: number;
  private exitListeners = new Set<(reason: ExitReason) => void>();

  public readonly minFrameInterval: number;
  private running = false;
  private framePending = false;
  private lastFrameStart: number | undefined;
  private framesRendered = 0;
  private exitReason: ExitReason | undefined;

  constructor(
    host: WindowHost,
    simulation: RainSimulation,
    presenter: FrameSink,
    options: FrameGovernorOptions,
  ) {
    this.host = host;
    this.simulation = simulation;
    this.presenter = presenter;
    this.clock = options.clock ?? performanceClock;
    Profiler.setClock(this.clock);
    this.logEveryFrames = Math.max(1, Math.floor(options.logEveryFrames));
    this.minFrameInterval = 1000 / options.targetFps;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public get frameCount(): number {
    return this.framesRendered;
  }

  /** Why the loop stopped, once it has. */
  public get stoppedBecause(): ExitReason | undefined {
    return this.exitReason;
  }

  public start(): void {
    if (this.running || this.exitReason) return;
    this.running = true;
    console.log(
      `[Governor] Starting at ${(1000 / this.minFrameInterval).toFixed(0)} FPS`,
    );
    this.host.requestRedraw();
  }

  /**
   * Registers a listener called once when the loop stops.
   * @returns A function that removes the listener.
   */
  public onExit(listener: (reason: ExitReason) => void): () => void {
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  public async handleEvent(event: WindowEvent): Promise<void> {
    switch (event.type) {
      case "redraw-requested":
        await this.redraw();
        return;
      case "resized":
        this.presenter.onResize(event.size);
        this.simulation.resize(event.size.width, event.size.height);
        return;
      case "close-requested":
        this.stop("close-requested");
        return;
      case "key-pressed":
        if (event.key === "escape") {
          if (this.host.isFullscreen()) {
            this.host.setFullscreen(false);
          } else {
            this.stop("escape");
          }
        } else {
          this.host.setFullscreen(!this.host.isFullscreen());
        }
        return;
    }
  }

  public stop(reason: ExitReason): void {
    if (this.exitReason) return;
    this.running = false;
    this.exitReason = reason;
    console.log(
      `[Governor] Stopping (${reason}) after ${this.framesRendered} frames`,
    );
    this.host.exit();
    for (const listener of this.exitListeners) {
      listener(reason);
    }
  }

  private async redraw(): Promise<void> {
    if (!this.running || this.framePending) return;
    this.framePending = true;
    try {
      if (this.lastFrameStart !== undefined) {
        const elapsed = this.clock.now() - this.lastFrameStart;
        if (elapsed < this.minFrameInterval) {
          await this.clock.sleep(this.minFrameInterval - elapsed);
        }
      }
      if (!this.running) return;

      this.lastFrameStart = this.clock.now();
      const result = this.runFrame();
      if (result.status === "fatal") {
        this.stop("fatal-surface-error");
        return;
      }
      this.host.requestRedraw();
    } finally {
      this.framePending = false;
    }
  }

  private runFrame(): FrameResult {
    Profiler.begin("rain.update");
    this.simulation.update();
    Profiler.end("rain.update");

    Profiler.begin("frame.render");
    const result = this.presenter.renderFrame(this.simulation);
    Profiler.end("frame.render");

    this.framesRendered++;
    if (this.framesRendered % this.logEveryFrames === 0) {
      console.log(`[Governor] Frame ${this.framesRendered}`);
      Profiler.logReport(this.logEveryFrames);
    }
    return result;
  }
}
