// src/core/rendering/surface.ts

/**
 * Ways acquiring the next presentable image can fail.
 *
 * - `lost`: the surface must be recreated before it can be used again.
 * - `outdated`: the surface no longer matches the window (resize, fullscreen).
 * - `out-of-memory`: fatal; the application shuts down.
 * - `timeout` / `other`: the frame is skipped.
 */
export type SurfaceErrorKind =
  | "lost"
  | "outdated"
  | "out-of-memory"
  | "timeout"
  | "other";

export class SurfaceError extends Error {
  public readonly kind: SurfaceErrorKind;

  constructor(kind: SurfaceErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SurfaceError";
    this.kind = kind;
  }

  /** Lost and outdated surfaces can be recovered by recreating them. */
  public get recoverable(): boolean {
    return this.kind === "lost" || this.kind === "outdated";
  }
}

const OUT_OF_MEMORY = /out[\s-]?of[\s-]?memory/i;

/**
 * Classifies anything thrown while acquiring a surface image.
 *
 * @remarks
 * `GPUCanvasContext.getCurrentTexture()` throws an `InvalidStateError`
 * DOMException when the context is unconfigured or stale, and an
 * `OperationError` when the texture cannot be produced at all.
 */
export function toSurfaceError(error: unknown): SurfaceError {
  if (error instanceof SurfaceError) return error;

  const name =
    typeof error === "object" && error !== null && "name" in error
      ? String(error.name)
      : "";
  const message =
    error instanceof Error
      ? error.message
      : typeof error === "string"
        ? error
        : "Unknown surface error";

  if (OUT_OF_MEMORY.test(message) || name === "GPUOutOfMemoryError") {
    return new SurfaceError("out-of-memory", message, { cause: error });
  }
  if (name === "InvalidStateError") {
    return new SurfaceError("outdated", message, { cause: error });
  }
  if (name === "OperationError") {
    return new SurfaceError("lost", message, { cause: error });
  }
  if (name === "TimeoutError") {
    return new SurfaceError("timeout", message, { cause: error });
  }
  return new SurfaceError("other", message, { cause: error });
}

export interface SurfaceSize {
  width: number;
  height: number;
}

/**
 * A presentable surface bound to one window. `TImage` is whatever the
 * drawer renders into (a `GPUTexture` for a canvas context).
 */
export interface PresentationSurface<TImage> {
  /** Applies the swap chain configuration for the given size. */
  configure(size: SurfaceSize): void;
  /**
   * Returns the next image to render into.
   * @throws {SurfaceError} When no image can be acquired.
   */
  acquire(): TImage;
  present(image: TImage): void;
  /** Releases the surface before it is replaced. */
  release(): void;
}

/** Creates a fresh surface against the window's current handle. */
export interface SurfaceFactory<TImage> {
  createSurface(): PresentationSurface<TImage>;
}
