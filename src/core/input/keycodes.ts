// src/core/input/keycodes.ts
import type { WindowKey } from "@/core/window/windowHost";

export const KEY_MAP = new Map<string, WindowKey>([
  ["Escape", "escape"],
  ["F11", "toggle-fullscreen"],
  ["KeyF", "toggle-fullscreen"],
]);

/** Maps a `KeyboardEvent.code` to a window key, if it has a binding. */
export const windowKeyFor = (code: string): WindowKey | undefined =>
  KEY_MAP.get(code);
