// src/core/types/assets.d.ts

// WGSL sources are inlined as strings by vite-plugin-glsl.
declare module "*.wgsl" {
  const code: string;
  export default code;
}
