// src/core/window/viewportTracker.ts
import type { SurfaceSize } from "../rendering/surface";

const cssPixels = (value: number): number =>
  Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;

/**
 * CSS size and device pixel ratio of the canvas. Each update returns the new
 * physical size when it changed, or `undefined` when it did not, so a host
 * with several resize sources reports each change once.
 */
export class ViewportTracker {
  private cssWidth: number;
  private cssHeight: number;
  private pixelRatio: number;

  constructor(cssWidth: number, cssHeight: number, pixelRatio: number) {
    this.cssWidth = cssPixels(cssWidth);
    this.cssHeight = cssPixels(cssHeight);
    this.pixelRatio = pixelRatio > 0 ? pixelRatio : 1;
  }

  public size(): SurfaceSize {
    return {
      width: Math.round(this.cssWidth * this.pixelRatio),
      height: Math.round(this.cssHeight * this.pixelRatio),
    };
  }

  public setCssSize(width: number, height: number): SurfaceSize | undefined {
    const w = cssPixels(width);
    const h = cssPixels(height);
    if (w === this.cssWidth && h === this.cssHeight) return undefined;
    this.cssWidth = w;
    this.cssHeight = h;
    return this.size();
  }

  /** Takes both values at once, as read after a pixel ratio change. */
  public setPixelRatio(
    pixelRatio: number,
    cssWidth: number,
    cssHeight: number,
  ): SurfaceSize | undefined {
    const ratio = pixelRatio > 0 ? pixelRatio : 1;
    const sizeChanged = this.setCssSize(cssWidth, cssHeight) !== undefined;
    if (ratio === this.pixelRatio && !sizeChanged) return undefined;
    this.pixelRatio = ratio;
    return this.size();
  }
}
