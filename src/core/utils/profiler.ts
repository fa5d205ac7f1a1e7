// src/core/utils/profiler.ts
import type { FrameClock } from "../window/windowHost";

export interface ProfileTiming {
  name: string;
  duration: number;
  count: number;
}

/**
 * Accumulating section timer for the frame loop. The governor times
 * `rain.update` and `frame.render` and reports every `logEveryFrames`
 * frames, averaged per frame and per call. Disabled by default; enable with
 * `?profile` in the page URL.
 */
export class Profiler {
  private static timings = new Map<string, ProfileTiming>();
  private static startTimes = new Map<string, number>();
  private static enabled = false;
  private static clock: Pick<FrameClock, "now"> = {
    now: () => performance.now(),
  };

  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /** Measures spans on `clock`, normally the governor's frame clock. */
  static setClock(clock: Pick<FrameClock, "now">): void {
    this.clock = clock;
  }

  static begin(name: string): void {
    if (!this.enabled) return;
    this.startTimes.set(name, this.clock.now());
  }

  static end(name: string): void {
    if (!this.enabled) return;
    const startTime = this.startTimes.get(name);
    if (startTime === undefined) return;

    const duration = this.clock.now() - startTime;
    const existing = this.timings.get(name);

    if (existing) {
      existing.duration += duration;
      existing.count++;
    } else {
      this.timings.set(name, { name, duration, count: 1 });
    }

    this.startTimes.delete(name);
  }

  /** Timings since the last reset, slowest first, averaged over `frames`. */
  static getReport(frames: number): string {
    const timings = Array.from(this.timings.values()).sort(
      (a, b) => b.duration - a.duration,
    );
    const perFrame = Math.max(1, frames);

    let report = `=== Frame timings over ${perFrame} frames ===\n`;
    for (const timing of timings) {
      const frameAvg = timing.duration / perFrame;
      const callAvg = timing.duration / timing.count;
      report += `${timing.name}: ${frameAvg.toFixed(2)}ms/frame, ${callAvg.toFixed(2)}ms/call (${timing.count} calls)\n`;
    }

    return report;
  }

  static reset(): void {
    this.timings.clear();
    this.startTimes.clear();
  }

  static logReport(frames: number): void {
    if (!this.enabled) return;
    console.log(this.getReport(frames));
    this.reset();
  }
}
