// src/tmx/options.ts
import type { DocElement } from "./document.js";
import type { Layer, MapObject, ObjectLayer, TiledMap } from "./model.js";
import type { ImageParams, TextureFilter } from "./render/imageStore.js";

export type WarnFn = (msg: string) => void;

export type ObjectHookContext = Readonly<{
  map: TiledMap;
  layer: ObjectLayer;
}>;

/** Final say over each decoded object: return it (or a replacement), or null to drop it. */
export type ObjectHook = (object: MapObject, context: ObjectHookContext) => MapObject | null;

export type ElementHookContext = Readonly<{
  map: TiledMap;
}>;

/**
 * Sees each top-level map child the loader does not decode itself
 * (`<imagelayer>`, `<group>`, ...), in document order. A returned layer is
 * appended to the map; null skips the element.
 */
export type ElementHook = (element: DocElement, context: ElementHookContext) => Layer | null;

export type TmxLoadOptions = Readonly<{
  /** Store rows and object y-coordinates with the origin at the bottom-left. */
  yUp?: boolean;
  generateMipMaps?: boolean;
  minFilter?: TextureFilter;
  magFilter?: TextureFilter;
  onObject?: ObjectHook;
  onElement?: ElementHook;
  warn?: WarnFn;
}>;

export type ResolvedLoadOptions = Readonly<{
  yUp: boolean;
  image: ImageParams;
  onObject: ObjectHook | undefined;
  onElement: ElementHook | undefined;
  warn: WarnFn;
}>;

export function resolveLoadOptions(opts: TmxLoadOptions = {}): ResolvedLoadOptions {
  return {
    yUp: opts.yUp ?? true,
    image: {
      generateMipMaps: opts.generateMipMaps ?? false,
      minFilter: opts.minFilter ?? "nearest",
      magFilter: opts.magFilter ?? "nearest",
    },
    onObject: opts.onObject,
    onElement: opts.onElement,
    warn: opts.warn ?? (() => {}),
  };
}
