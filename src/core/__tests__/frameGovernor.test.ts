import assert from "node:assert/strict";
import test from "node:test";
import { type ExitReason, FrameGovernor } from "../frameGovernor";
import { RainSimulation } from "../rain/rainSimulation";
import type { FrameResult, FrameSink } from "../rendering/framePresenter";
import { SurfaceError, type SurfaceSize } from "../rendering/surface";
import { PRNG } from "../utils/prng";
import type { FrameClock, WindowHost } from "../window/windowHost";

class FakeHost implements WindowHost {
  redrawRequests = 0;
  fullscreen = false;
  fullscreenCalls: boolean[] = [];
  exits = 0;

  size(): SurfaceSize {
    return { width: 200, height: 100 };
  }
  requestRedraw(): void {
    this.redrawRequests++;
  }
  isFullscreen(): boolean {
    return this.fullscreen;
  }
  setFullscreen(on: boolean): void {
    this.fullscreenCalls.push(on);
    this.fullscreen = on;
  }
  exit(): void {
    this.exits++;
  }
}

/** Time only moves when a test advances it or the governor sleeps. */
class FakeClock implements FrameClock {
  time = 1000;
  sleeps: number[] = [];
  private release: (() => void) | undefined;
  holdSleeps = false;

  now(): number {
    return this.time;
  }
  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (!this.holdSleeps) {
      this.time += ms;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.release = () => {
        this.time += ms;
        resolve();
      };
    });
  }
  wake(): void {
    const release = this.release;
    this.release = undefined;
    release?.();
  }
}

class FakeSink implements FrameSink {
  frames = 0;
  resizes: SurfaceSize[] = [];
  results: FrameResult[] = [];

  renderFrame(): FrameResult {
    this.frames++;
    return (
      this.results.shift() ?? { status: "presented", quadCount: 0, missCount: 0 }
    );
  }
  onResize(size: SurfaceSize): void {
    this.resizes.push(size);
  }
}

const setup = (targetFps = 50) => {
  const host = new FakeHost();
  const clock = new FakeClock();
  const sink = new FakeSink();
  const simulation = new RainSimulation(200, 100, { random: new PRNG(1) });
  const governor = new FrameGovernor(host, simulation, sink, {
    targetFps,
    logEveryFrames: 10_000,
    clock,
  });
  const exits: ExitReason[] = [];
  governor.onExit((reason) => exits.push(reason));
  return { host, clock, sink, simulation, governor, exits };
};

const redraw = { type: "redraw-requested" } as const;

test("start requests the first redraw", () => {
  const { host, governor } = setup();
  governor.start();
  assert.equal(governor.isRunning, true);
  assert.equal(host.redrawRequests, 1);
  assert.equal(governor.minFrameInterval, 20);
});

test("redraws before start are ignored", async () => {
  const { sink, simulation, governor } = setup();
  await governor.handleEvent(redraw);
  assert.equal(sink.frames, 0);
  assert.equal(simulation.frameCount, 0);
});

test("each redraw runs one update and one render, then requests the next", async () => {
  const { host, clock, sink, simulation, governor } = setup();
  governor.start();
  await governor.handleEvent(redraw);

  assert.equal(simulation.frameCount, 1);
  assert.equal(sink.frames, 1);
  assert.equal(host.redrawRequests, 2);
  assert.deepEqual(clock.sleeps, []);
  assert.equal(governor.frameCount, 1);
});

test("pacing sleeps for the rest of the frame interval", async () => {
  const { clock, sink, governor } = setup(50);
  governor.start();
  await governor.handleEvent(redraw);

  await governor.handleEvent(redraw);
  clock.time += 5;
  await governor.handleEvent(redraw);
  clock.time += 25;
  await governor.handleEvent(redraw);

  assert.deepEqual(clock.sleeps, [20, 15]);
  assert.equal(sink.frames, 4);
});

test("redraws arriving during a pending frame are coalesced", async () => {
  const { clock, sink, simulation, governor } = setup();
  governor.start();
  await governor.handleEvent(redraw);

  clock.holdSleeps = true;
  const pending = governor.handleEvent(redraw);
  await governor.handleEvent(redraw);
  assert.equal(sink.frames, 1);

  clock.wake();
  await pending;
  assert.equal(sink.frames, 2);
  assert.equal(simulation.frameCount, 2);
});

test("a fatal frame stops the loop", async () => {
  const { host, sink, governor, exits } = setup();
  sink.results.push({
    status: "fatal",
    error: new SurfaceError("out-of-memory", "out of memory"),
  });
  governor.start();
  await governor.handleEvent(redraw);

  assert.equal(governor.isRunning, false);
  assert.equal(governor.stoppedBecause, "fatal-surface-error");
  assert.deepEqual(exits, ["fatal-surface-error"]);
  assert.equal(host.exits, 1);
  assert.equal(host.redrawRequests, 1);
});

test("a skipped frame keeps the loop going", async () => {
  const { host, sink, governor } = setup();
  sink.results.push({
    status: "skipped",
    error: new SurfaceError("timeout", "timed out"),
  });
  governor.start();
  await governor.handleEvent(redraw);

  assert.equal(governor.isRunning, true);
  assert.equal(host.redrawRequests, 2);
});

test("close stops the loop and later redraws do nothing", async () => {
  const { sink, governor, exits } = setup();
  governor.start();
  await governor.handleEvent({ type: "close-requested" });
  await governor.handleEvent(redraw);

  assert.deepEqual(exits, ["close-requested"]);
  assert.equal(sink.frames, 0);
});

test("stopping during the pacing sleep drops the frame", async () => {
  const { clock, sink, governor } = setup();
  governor.start();
  await governor.handleEvent(redraw);

  clock.holdSleeps = true;
  const pending = governor.handleEvent(redraw);
  await governor.handleEvent({ type: "close-requested" });
  clock.wake();
  await pending;

  assert.equal(sink.frames, 1);
});

test("escape leaves fullscreen first, then exits", async () => {
  const { host, governor, exits } = setup();
  governor.start();
  host.fullscreen = true;

  await governor.handleEvent({ type: "key-pressed", key: "escape" });
  assert.deepEqual(host.fullscreenCalls, [false]);
  assert.equal(governor.isRunning, true);

  await governor.handleEvent({ type: "key-pressed", key: "escape" });
  assert.equal(governor.isRunning, false);
  assert.deepEqual(exits, ["escape"]);
});

test("the fullscreen key toggles", async () => {
  const { host, governor } = setup();
  governor.start();
  await governor.handleEvent({ type: "key-pressed", key: "toggle-fullscreen" });
  await governor.handleEvent({ type: "key-pressed", key: "toggle-fullscreen" });
  assert.deepEqual(host.fullscreenCalls, [true, false]);
});

test("resize reaches the presenter and respawns the simulation", async () => {
  const { sink, simulation, governor } = setup();
  await governor.handleEvent({
    type: "resized",
    size: { width: 400, height: 300 },
  });

  assert.deepEqual(sink.resizes, [{ width: 400, height: 300 }]);
  assert.equal(simulation.width, 400);
  assert.equal(simulation.height, 300);
  assert.equal(simulation.streaks.length, 20);
});

test("exit listeners fire once and can unsubscribe", () => {
  const { governor, exits } = setup();
  const late: ExitReason[] = [];
  const unsubscribe = governor.onExit((reason) => late.push(reason));
  unsubscribe();

  governor.start();
  governor.stop("escape");
  governor.stop("close-requested");

  assert.deepEqual(exits, ["escape"]);
  assert.deepEqual(late, []);
});
