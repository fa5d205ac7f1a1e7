// src/app/canvasSurface.ts
import {
  type PresentationSurface,
  SurfaceError,
  type SurfaceFactory,
  type SurfaceSize,
  toSurfaceError,
} from "@/core/rendering/surface";

/**
 * A `GPUCanvasContext` seen as a presentation surface. The browser presents
 * the current texture when the task that rendered into it ends, so
 * `present` only records that the frame was handed off.
 */
export class CanvasSurface implements PresentationSurface<GPUTexture> {
  private canvas: HTMLCanvasElement;
  private context: GPUCanvasContext;
  private device: GPUDevice;
  private format: GPUTextureFormat;
  private configured = false;

  constructor(
    canvas: HTMLCanvasElement,
    device: GPUDevice,
    format: GPUTextureFormat,
  ) {
    const context = canvas.getContext("webgpu");
    if (!context) {
      throw new SurfaceError("lost", "Canvas has no WebGPU context");
    }
    this.canvas = canvas;
    this.context = context;
    this.device = device;
    this.format = format;
  }

  public configure(size: SurfaceSize): void {
    if (this.canvas.width !== size.width || this.canvas.height !== size.height) {
      this.canvas.width = size.width;
      this.canvas.height = size.height;
    }
    this.context.configure({
      device: this.device,
      format: this.format,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
      alphaMode: "opaque",
    });
    this.configured = true;
  }

  public acquire(): GPUTexture {
    if (!this.configured) {
      throw new SurfaceError("outdated", "Canvas context is not configured");
    }
    try {
      return this.context.getCurrentTexture();
    } catch (e) {
      throw toSurfaceError(e);
    }
  }

  public present(_image: GPUTexture): void {
    // Presented by the browser at the end of the current task.
  }

  public release(): void {
    if (!this.configured) return;
    this.context.unconfigure();
    this.configured = false;
  }
}

/** Creates canvas surfaces that all render with one device and format. */
export class CanvasSurfaceFactory implements SurfaceFactory<GPUTexture> {
  constructor(
    private canvas: HTMLCanvasElement,
    private device: GPUDevice,
    public readonly format: GPUTextureFormat = navigator.gpu.getPreferredCanvasFormat(),
  ) {}

  public createSurface(): CanvasSurface {
    return new CanvasSurface(this.canvas, this.device, this.format);
  }
}
