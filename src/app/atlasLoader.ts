// src/app/atlasLoader.ts
import { type GlyphAtlas, parseGlyphAtlasManifest } from "@/core/atlas/glyphAtlas";

export interface LoadedAtlas {
  image: ImageBitmap;
  atlas: GlyphAtlas;
}

/**
 * Resolves the atlas image for a manifest: its `image` field relative to the
 * manifest, or the manifest URL with `.json` replaced by `.png`.
 */
export function atlasImageUrl(manifestUrl: string, manifest: unknown): string {
  const base = new URL(manifestUrl, window.location.href);
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "image" in manifest &&
    typeof manifest.image === "string"
  ) {
    return new URL(manifest.image, base).href;
  }
  return base.href.replace(/\.json(?=$|[?#])/, ".png");
}

/**
 * Fetches a prebuilt atlas manifest and its image.
 *
 * @throws If either request fails or the manifest is malformed.
 */
export async function loadGlyphAtlas(manifestUrl: string): Promise<LoadedAtlas> {
  const response = await fetch(manifestUrl);
  if (!response.ok) {
    throw new Error(
      `Failed to load atlas manifest ${manifestUrl}: ${response.status} ${response.statusText}`,
    );
  }
  const manifest: unknown = await response.json();
  const atlas = parseGlyphAtlasManifest(manifest);

  const imageUrl = atlasImageUrl(manifestUrl, manifest);
  const imageResponse = await fetch(imageUrl);
  if (!imageResponse.ok) {
    throw new Error(
      `Failed to load atlas image ${imageUrl}: ${imageResponse.status} ${imageResponse.statusText}`,
    );
  }
  const image = await createImageBitmap(await imageResponse.blob(), {
    premultiplyAlpha: "none",
    colorSpaceConversion: "none",
  });
  if (image.width !== atlas.size || image.height !== atlas.size) {
    console.warn(
      `[Atlas] Image is ${image.width}x${image.height}, manifest says ${atlas.size}`,
    );
  }
  console.log(`[Atlas] Loaded ${atlas.glyphCount} glyphs from ${manifestUrl}`);
  return { image, atlas };
}
