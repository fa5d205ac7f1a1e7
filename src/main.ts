// src/main.ts
import "@/style.css";
import { type BakedAtlas, bakeGlyphAtlas } from "@/app/atlasBaker";
import { type LoadedAtlas, loadGlyphAtlas } from "@/app/atlasLoader";
import { BrowserWindowHost } from "@/app/browserWindowHost";
import { CanvasSurfaceFactory } from "@/app/canvasSurface";
import * as hud from "@/app/hud";
import { FrameGovernor } from "@/core/frameGovernor";
import { RAIN_CODE_POINTS } from "@/core/rain/charset";
import {
  parseRainQuery,
  resolveRainConfig,
  withColumnsFor,
} from "@/core/rain/config";
import { RainSimulation } from "@/core/rain/rainSimulation";
import { FramePresenter, type FrameSink } from "@/core/rendering/framePresenter";
import { GlyphPass } from "@/core/rendering/passes/glyphPass";
import { PRNG } from "@/core/utils/prng";
import { Profiler } from "@/core/utils/profiler";
import { createAtlasTexture, requestDevice } from "@/core/utils/webgpu";

const showPanel = (title: string, text: string, details?: string): void => {
  const appContainer = document.querySelector<HTMLDivElement>("#app");
  if (!appContainer) {
    console.error("Fatal: #app container not found in DOM.");
    return;
  }

  const panel = document.createElement("div");
  panel.className = "error";

  const header = document.createElement("h2");
  header.textContent = title;

  const message = document.createElement("p");
  message.textContent = text;
  panel.appendChild(header);
  panel.appendChild(message);

  if (details) {
    const pre = document.createElement("pre");
    pre.textContent = details;
    panel.appendChild(pre);
  }

  // Replace the canvas with the panel
  appContainer.replaceChildren(panel);
};

async function main(): Promise<void> {
  const canvas = document.querySelector<HTMLCanvasElement>("#canvas");
  if (!canvas) {
    throw new Error("Canvas element not found");
  }

  const launch = parseRainQuery(window.location.search);
  // Streak pool and GPU buffers cover the screen's longest side.
  const screenWidth =
    Math.max(window.screen.width, window.screen.height) *
    (window.devicePixelRatio || 1);
  const config = withColumnsFor(resolveRainConfig(launch.config), screenWidth);
  Profiler.setEnabled(launch.profile);

  const device = await requestDevice();
  const { image, atlas }: BakedAtlas | LoadedAtlas = launch.atlasManifestUrl
    ? await loadGlyphAtlas(launch.atlasManifestUrl)
    : bakeGlyphAtlas(RAIN_CODE_POINTS);
  const atlasTexture = createAtlasTexture(device, image);

  const host = new BrowserWindowHost(canvas);
  const surfaces = new CanvasSurfaceFactory(canvas, device);
  const drawer = new GlyphPass(
    device,
    surfaces.format,
    atlasTexture,
    config.maxColumns * config.chainCapacity,
  );
  const size = host.size();
  const presenter = new FramePresenter(surfaces, drawer, atlas, config, size);
  const simulation = new RainSimulation(size.width, size.height, {
    config,
    random: launch.seed !== undefined ? new PRNG(launch.seed) : undefined,
  });

  const hudElement = document.querySelector<HTMLDivElement>("#hud");
  if (launch.showHud && hudElement) {
    hud.init(hudElement);
  }
  const sink: FrameSink = {
    renderFrame: (sim) => {
      const result = presenter.renderFrame(sim);
      if (launch.showHud) {
        hud.update(performance.now(), presenter.getStats(), presenter.getSize());
      }
      return result;
    },
    onResize: (newSize) => presenter.onResize(newSize),
  };

  const governor = new FrameGovernor(host, simulation, sink, {
    targetFps: config.targetFps,
    logEveryFrames: config.logEveryFrames,
  });

  host.onExit(() => {
    drawer.destroy();
    atlasTexture.destroy();
    device.destroy();
  });
  governor.onExit((reason) => {
    if (reason === "fatal-surface-error") {
      showPanel(
        "Rendering Stopped",
        "The GPU ran out of memory while presenting a frame.",
        presenter.getStats().frameCount.toString() + " frames rendered",
      );
    } else {
      showPanel("Rain Stopped", "Reload the page to start again.");
    }
  });

  host.attach((event) => governor.handleEvent(event));
  console.log(
    `[Main] ${simulation.streaks.length} streaks, ${atlas.glyphCount} glyphs, ${size.width}x${size.height}`,
  );
  governor.start();
}

main().catch((error: unknown) => {
  console.error(error);
  showPanel(
    "Error Initializing WebGPU",
    "Could not initialize the graphics engine. Please ensure you are using a modern browser or a browser with modern features.",
    error instanceof Error ? error.message : String(error),
  );
});
