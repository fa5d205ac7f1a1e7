// src/core/rendering/framePresenter.ts
import type { GlyphAtlas } from "../atlas/glyphAtlas";
import type { RainSimulation } from "../rain/rainSimulation";
import { type GlyphMesh, GlyphMeshBuilder, type GlyphStyle } from "./glyphMeshBuilder";
import {
  type PresentationSurface,
  type SurfaceError,
  type SurfaceFactory,
  type SurfaceSize,
  toSurfaceError,
} from "./surface";

/**
 * Device-side half of the presenter: fixed GPU buffers, the glyph pipeline
 * and the atlas binding. Implemented by `GlyphPass` for WebGPU.
 */
export interface GlyphDrawer<TImage> {
  /** Number of glyph quads the vertex and index buffers can hold. */
  readonly maxQuads: number;
  /** Writes the mesh into the preallocated buffers; empty parts are skipped. */
  upload(mesh: GlyphMesh): void;
  /**
   * Clears `target` to opaque black, draws `indexCount` indices (no draw call
   * when zero) and submits without waiting for completion.
   */
  draw(target: TImage, indexCount: number): void;
}

export type FrameResult =
  | { status: "presented"; quadCount: number; missCount: number }
  | { status: "skipped"; error: SurfaceError }
  | { status: "fatal"; error: SurfaceError };

/** What the frame governor needs from a presenter. */
export interface FrameSink {
  renderFrame(simulation: RainSimulation): FrameResult;
  onResize(size: SurfaceSize): void;
}

export interface FramePresenterStats {
  frameCount: number;
  surfaceRecreations: number;
  totalMisses: number;
  lastQuadCount: number;
  lastMissCount: number;
}

/**
 * Owns the presentation surface and the glyph drawer and turns one
 * simulation snapshot into one presented frame.
 *
 * @remarks
 * Surface failures never escape: a lost or outdated surface is recreated
 * and acquisition retried once, out-of-memory is reported as `fatal`, and
 * anything else skips the frame.
 */
export class FramePresenter<TImage> implements FrameSink {
  private readonly surfaces: SurfaceFactory<TImage>;
  private readonly drawer: GlyphDrawer<TImage>;
  private readonly atlas: GlyphAtlas;
  private readonly builder: GlyphMeshBuilder;
  private surface: PresentationSurface<TImage>;
  private size: SurfaceSize;

  private stats: FramePresenterStats = {
    frameCount: 0,
    surfaceRecreations: 0,
    totalMisses: 0,
    lastQuadCount: 0,
    lastMissCount: 0,
  };

  constructor(
    surfaces: SurfaceFactory<TImage>,
    drawer: GlyphDrawer<TImage>,
    atlas: GlyphAtlas,
    style: GlyphStyle,
    initialSize: SurfaceSize,
  ) {
    this.surfaces = surfaces;
    this.drawer = drawer;
    this.atlas = atlas;
    this.builder = new GlyphMeshBuilder(drawer.maxQuads, style);
    this.size = { ...initialSize };
    this.surface = surfaces.createSurface();
    this.surface.configure(this.configuredSize());
  }

  public getStats(): Readonly<FramePresenterStats> {
    return this.stats;
  }

  public getSize(): Readonly<SurfaceSize> {
    return this.size;
  }

  /**
   * Generates, uploads, draws and presents one frame of `simulation`.
   */
  public renderFrame(simulation: RainSimulation): FrameResult {
    const mesh = this.builder.build(simulation.streaks, this.atlas, {
      width: simulation.width,
      height: simulation.height,
    });
    this.drawer.upload(mesh);

    this.stats.frameCount++;
    this.stats.lastQuadCount = mesh.quadCount;
    this.stats.lastMissCount = mesh.missCount;
    this.stats.totalMisses += mesh.missCount;
    if (mesh.overflowCount > 0) {
      console.warn(
        `[Presenter] Glyph buffer full, dropped ${mesh.overflowCount} glyphs`,
      );
    }

    const acquired = this.acquireWithRecovery();
    if (acquired.status !== "acquired") return acquired;

    this.drawer.draw(acquired.image, mesh.indices.length);
    this.surface.present(acquired.image);
    return {
      status: "presented",
      quadCount: mesh.quadCount,
      missCount: mesh.missCount,
    };
  }

  /**
   * Records the new window size and recreates the surface. Recreating rather
   * than reconfiguring is required: some platforms invalidate the surface on
   * fullscreen transitions without reporting it.
   */
  public onResize(size: SurfaceSize): void {
    this.size = { ...size };
    this.recreateSurface();
  }

  /**
   * Configures the current surface at the current size.
   * @returns The classified failure, if configuring threw.
   */
  public reconfigure(): SurfaceError | undefined {
    try {
      this.surface.configure(this.configuredSize());
      return undefined;
    } catch (e) {
      const error = toSurfaceError(e);
      console.error("[Presenter] Failed to reconfigure surface", error);
      return error;
    }
  }

  /**
   * Replaces the surface with a fresh one from the window. When the window
   * cannot supply one, the previous surface is configured again and kept.
   * @returns The classified failure, if recreation failed.
   */
  public recreateSurface(): SurfaceError | undefined {
    const previous = this.surface;
    previous.release();

    let next: PresentationSurface<TImage> | undefined;
    try {
      next = this.surfaces.createSurface();
      next.configure(this.configuredSize());
    } catch (e) {
      const error = toSurfaceError(e);
      console.error("[Presenter] Failed to recreate surface", error);
      next?.release();
      this.reconfigure();
      return error;
    }

    this.surface = next;
    this.stats.surfaceRecreations++;
    console.log(
      `[Presenter] Surface recreated at ${this.size.width}x${this.size.height}`,
    );
    return undefined;
  }

  private acquireWithRecovery():
    | { status: "acquired"; image: TImage }
    | Exclude<FrameResult, { status: "presented" }> {
    let error: SurfaceError;
    try {
      return { status: "acquired", image: this.surface.acquire() };
    } catch (e) {
      error = toSurfaceError(e);
    }

    if (error.kind === "out-of-memory") {
      console.error("[Presenter] Out of memory acquiring surface image", error);
      return { status: "fatal", error };
    }
    if (!error.recoverable) {
      console.warn(
        `[Presenter] Surface error (${error.kind}), skipping frame`,
        error,
      );
      return { status: "skipped", error };
    }

    console.warn(`[Presenter] Surface ${error.kind}, recreating`);
    const recreateError = this.recreateSurface();
    if (recreateError) {
      return recreateError.kind === "out-of-memory"
        ? { status: "fatal", error: recreateError }
        : { status: "skipped", error: recreateError };
    }
    try {
      return { status: "acquired", image: this.surface.acquire() };
    } catch (e) {
      error = toSurfaceError(e);
    }

    if (error.kind === "out-of-memory") {
      console.error(
        "[Presenter] Out of memory after surface recreation",
        error,
      );
      return { status: "fatal", error };
    }
    if (error.recoverable) {
      const reconfigureError = this.reconfigure();
      if (reconfigureError?.kind === "out-of-memory") {
        return { status: "fatal", error: reconfigureError };
      }
    }
    console.warn(
      `[Presenter] Surface still ${error.kind} after recreation, skipping frame`,
      error,
    );
    return { status: "skipped", error };
  }

  private configuredSize(): SurfaceSize {
    return {
      width: Math.max(1, Math.floor(this.size.width)),
      height: Math.max(1, Math.floor(this.size.height)),
    };
  }
}
