// src/app/browserWindowHost.ts
import { windowKeyFor } from "@/core/input/keycodes";
import type { SurfaceSize } from "@/core/rendering/surface";
import { ViewportTracker } from "@/core/window/viewportTracker";
import type { WindowEvent, WindowHost } from "@/core/window/windowHost";

export type WindowEventHandler = (event: WindowEvent) => Promise<void>;

/**
 * Window plumbing for a full-page canvas: `ResizeObserver` and the device
 * pixel ratio produce `resized`, `requestAnimationFrame` produces
 * `redraw-requested`, `pagehide` produces `close-requested`, and mapped
 * keys produce `key-pressed`.
 */
export class BrowserWindowHost implements WindowHost {
  private canvas: HTMLCanvasElement;
  private handler: WindowEventHandler | undefined;
  private resizeObserver?: ResizeObserver;
  private viewport: ViewportTracker;
  private rafHandle: number | undefined;
  private closed = false;
  private exitCallbacks: Array<() => void> = [];

  private readonly onKeyDown = (event: KeyboardEvent): void => {
    if (event.repeat) return;
    const key = windowKeyFor(event.code);
    if (!key) return;
    event.preventDefault();
    this.dispatch({ type: "key-pressed", key });
  };

  // Also fires for CSS size changes the ResizeObserver already reported;
  // the tracker drops those.
  private readonly onWindowResize = (): void => {
    const rect = this.canvas.getBoundingClientRect();
    const size = this.viewport.setPixelRatio(
      window.devicePixelRatio || 1,
      rect.width,
      rect.height,
    );
    if (size) this.dispatch({ type: "resized", size });
  };

  private readonly onPageHide = (): void => {
    this.dispatch({ type: "close-requested" });
  };

  constructor(canvas: HTMLCanvasElement) {
    this.canvas = canvas;
    const rect = canvas.getBoundingClientRect();
    this.viewport = new ViewportTracker(
      rect.width,
      rect.height,
      window.devicePixelRatio || 1,
    );
  }

  /** Starts delivering events to `handler`. */
  public attach(handler: WindowEventHandler): void {
    this.handler = handler;

    if (typeof ResizeObserver !== "undefined") {
      this.resizeObserver = new ResizeObserver((entries) => {
        for (const entry of entries) {
          if (entry.target !== this.canvas) continue;
          const cr = entry.contentRect;
          const size = this.viewport.setCssSize(cr.width, cr.height);
          if (size) this.dispatch({ type: "resized", size });
        }
      });
      this.resizeObserver.observe(this.canvas);
    }
    window.addEventListener("resize", this.onWindowResize);
    window.addEventListener("keydown", this.onKeyDown);
    window.addEventListener("pagehide", this.onPageHide);
  }

  /** Registers teardown work to run once on `exit()`. */
  public onExit(callback: () => void): void {
    this.exitCallbacks.push(callback);
  }

  public size(): SurfaceSize {
    return this.viewport.size();
  }

  public requestRedraw(): void {
    if (this.closed || this.rafHandle !== undefined) return;
    this.rafHandle = requestAnimationFrame(() => {
      this.rafHandle = undefined;
      this.dispatch({ type: "redraw-requested" });
    });
  }

  public isFullscreen(): boolean {
    return document.fullscreenElement !== null;
  }

  public setFullscreen(on: boolean): void {
    if (on === this.isFullscreen()) return;
    const request = on
      ? document.documentElement.requestFullscreen()
      : document.exitFullscreen();
    request.catch((e: unknown) => {
      console.warn("[Window] Fullscreen change rejected", e);
    });
  }

  public exit(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.rafHandle !== undefined) {
      cancelAnimationFrame(this.rafHandle);
      this.rafHandle = undefined;
    }
    this.resizeObserver?.disconnect();
    window.removeEventListener("resize", this.onWindowResize);
    window.removeEventListener("keydown", this.onKeyDown);
    window.removeEventListener("pagehide", this.onPageHide);
    for (const callback of this.exitCallbacks) {
      callback();
    }
    this.exitCallbacks = [];
  }

  private dispatch(event: WindowEvent): void {
    if (this.closed || !this.handler) return;
    this.handler(event).catch((e: unknown) => {
      console.error(`[Window] Error handling ${event.type}`, e);
    });
  }
}
