// src/core/utils/webgpu.ts

/**
 * Checks if WebGPU is available and requests a GPU adapter.
 *
 * @returns A GPUAdapter promise if available else null.
 * @throws If WebGPU is not supported by the browser.
 */
export const checkWebGPU = async (): Promise<GPUAdapter | null> => {
  if (!navigator.gpu) {
    console.error("[WebGPU] WebGPU is not available.");
    throw new Error("WebGPU support is not available");
  }

  const adapter = await navigator.gpu.requestAdapter({
    powerPreference: "high-performance",
  });
  if (!adapter) {
    console.error("[WebGPU] Couldn't request adapter.");
  }

  return adapter;
};

/**
 * Requests a device with default limits and logs validation errors that
 * escape error scopes.
 *
 * @throws If no adapter is available or the device request fails.
 */
export const requestDevice = async (): Promise<GPUDevice> => {
  const adapter = await checkWebGPU();
  if (!adapter) {
    throw new Error("No suitable GPU adapter found");
  }

  const device = await adapter.requestDevice();
  device.addEventListener("uncapturederror", (event) => {
    console.error("[WebGPU] Uncaptured error:", event.error.message);
  });
  device.lost
    .then((info) => {
      console.error(`[WebGPU] Device lost (${info.reason}): ${info.message}`);
    })
    .catch((e: unknown) => {
      console.error("[WebGPU] Device lost promise rejected", e);
    });
  return device;
};

/**
 * Creates a shader module from WGSL code.
 *
 * @param device - The GPU device used to create the shader.
 * @param code - The WGSL shader code as a string.
 * @returns A GPUShaderModule compiled from the provided code.
 */
export const createShaderModule = (
  device: GPUDevice,
  code: string,
  label?: string,
): GPUShaderModule => {
  return device.createShaderModule({ label, code });
};

/**
 * Uploads a rendered glyph atlas into a sampled `rgba8unorm` texture.
 */
export const createAtlasTexture = (
  device: GPUDevice,
  source: ImageBitmap | OffscreenCanvas,
): GPUTexture => {
  const texture = device.createTexture({
    label: "GLYPH_ATLAS_TEXTURE",
    size: [source.width, source.height],
    format: "rgba8unorm",
    usage:
      GPUTextureUsage.TEXTURE_BINDING |
      GPUTextureUsage.COPY_DST |
      GPUTextureUsage.RENDER_ATTACHMENT,
  });
  device.queue.copyExternalImageToTexture(
    { source },
    { texture, premultipliedAlpha: false },
    [source.width, source.height],
  );
  return texture;
};
