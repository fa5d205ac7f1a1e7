// src/core/rendering/passes/glyphPass.ts
import type { GlyphDrawer } from "@/core/rendering/framePresenter";
import type { GlyphMesh } from "@/core/rendering/glyphMeshBuilder";
import {
  GLYPH_VERTEX_LAYOUT,
  glyphBufferSizes,
} from "@/core/rendering/glyphVertexLayout";
import { createShaderModule } from "@/core/utils/webgpu";
import glyphShaderCode from "@/core/shaders/glyph.wgsl";

/**
 * Draws the rain's glyph quads into a canvas texture.
 *
 * @remarks
 * Vertex and index buffers are sized once for `maxQuads` glyphs and
 * overwritten every frame with `queue.writeBuffer`. The atlas is bound as a
 * single texture and linear sampler; the fragment shader multiplies the
 * sampled texel by the vertex color, so coverage in the atlas alpha decides
 * which pixels of a quad light up.
 */
export class GlyphPass implements GlyphDrawer<GPUTexture> {
  public readonly maxQuads: number;
  private device: GPUDevice;
  private pipeline: GPURenderPipeline;
  private bindGroup: GPUBindGroup;
  private vertexBuffer: GPUBuffer;
  private indexBuffer: GPUBuffer;

  constructor(
    device: GPUDevice,
    canvasFormat: GPUTextureFormat,
    atlasTexture: GPUTexture,
    maxQuads: number,
  ) {
    this.device = device;
    this.maxQuads = maxQuads;

    const module = createShaderModule(device, glyphShaderCode, "GLYPH_SHADER");

    const bindGroupLayout = device.createBindGroupLayout({
      label: "GLYPH_BGL",
      entries: [
        {
          binding: 0,
          visibility: GPUShaderStage.FRAGMENT,
          texture: { sampleType: "float" },
        }, // atlas texture
        {
          binding: 1,
          visibility: GPUShaderStage.FRAGMENT,
          sampler: { type: "filtering" },
        }, // atlas sampler
      ],
    });

    const sampler = device.createSampler({
      label: "GLYPH_ATLAS_SAMPLER",
      magFilter: "linear",
      minFilter: "linear",
      mipmapFilter: "nearest",
      addressModeU: "clamp-to-edge",
      addressModeV: "clamp-to-edge",
    });

    this.bindGroup = device.createBindGroup({
      label: "GLYPH_BG",
      layout: bindGroupLayout,
      entries: [
        { binding: 0, resource: atlasTexture.createView() },
        { binding: 1, resource: sampler },
      ],
    });

    this.pipeline = device.createRenderPipeline({
      label: "GLYPH_RENDER_PIPELINE",
      layout: device.createPipelineLayout({
        label: "GLYPH_PIPELINE_LAYOUT",
        bindGroupLayouts: [bindGroupLayout],
      }),
      vertex: {
        module,
        entryPoint: "vs_main",
        buffers: [GLYPH_VERTEX_LAYOUT],
      },
      fragment: {
        module,
        entryPoint: "fs_main",
        targets: [
          {
            format: canvasFormat,
            blend: {
              color: {
                srcFactor: "src-alpha",
                dstFactor: "one-minus-src-alpha",
                operation: "add",
              },
              alpha: {
                srcFactor: "one",
                dstFactor: "zero",
                operation: "add",
              },
            },
            writeMask: GPUColorWrite.ALL,
          },
        ],
      },
      primitive: {
        topology: "triangle-list",
        frontFace: "ccw",
        cullMode: "back",
      },
    });

    const { vertexBytes, indexBytes } = glyphBufferSizes(maxQuads);
    this.vertexBuffer = device.createBuffer({
      label: "GLYPH_VERTEX_BUFFER",
      size: Math.max(4, vertexBytes),
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
    this.indexBuffer = device.createBuffer({
      label: "GLYPH_INDEX_BUFFER",
      size: Math.max(4, indexBytes),
      usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
    });
  }

  public upload(mesh: GlyphMesh): void {
    if (mesh.vertices.length > 0) {
      this.device.queue.writeBuffer(this.vertexBuffer, 0, mesh.vertices);
    }
    if (mesh.indices.length > 0) {
      this.device.queue.writeBuffer(this.indexBuffer, 0, mesh.indices);
    }
  }

  public draw(target: GPUTexture, indexCount: number): void {
    const encoder = this.device.createCommandEncoder({
      label: "GLYPH_FRAME_ENCODER",
    });
    const pass = encoder.beginRenderPass({
      label: "GLYPH_RENDER_PASS",
      colorAttachments: [
        {
          view: target.createView(),
          clearValue: { r: 0, g: 0, b: 0, a: 1 },
          loadOp: "clear",
          storeOp: "store",
        },
      ],
    });

    if (indexCount > 0) {
      pass.setPipeline(this.pipeline);
      pass.setBindGroup(0, this.bindGroup);
      pass.setVertexBuffer(0, this.vertexBuffer);
      pass.setIndexBuffer(this.indexBuffer, "uint32");
      pass.drawIndexed(indexCount);
    }
    pass.end();

    this.device.queue.submit([encoder.finish()]);
  }

  public destroy(): void {
    this.vertexBuffer.destroy();
    this.indexBuffer.destroy();
  }
}
