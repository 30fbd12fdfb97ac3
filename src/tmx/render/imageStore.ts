// src/tmx/render/imageStore.ts
import type { WarnFn } from "../options.js";
import type { ImageRegion } from "./imageRegion.js";
import { fullRegion } from "./imageRegion.js";
import { loadPngRgba } from "./png.js";
import type { RgbaImage } from "./rgbaImage.js";

export const TEXTURE_FILTERS = [
  "nearest",
  "linear",
  "mipmap",
  "mipmap-nearest-nearest",
  "mipmap-linear-nearest",
  "mipmap-nearest-linear",
  "mipmap-linear-linear",
] as const;

export type TextureFilter = (typeof TEXTURE_FILTERS)[number];

export function parseTextureFilter(value: string): TextureFilter {
  const found = TEXTURE_FILTERS.find((f) => f === value);
  if (found === undefined) {
    throw new Error(`Unknown texture filter '${value}' (expected ${TEXTURE_FILTERS.join("|")})`);
  }
  return found;
}

/** Passed through to whoever turns images into textures; the decoder ignores them. */
export type ImageParams = Readonly<{
  generateMipMaps: boolean;
  minFilter: TextureFilter;
  magFilter: TextureFilter;
}>;

export type ImageHandle = Readonly<{
  region: ImageRegion;
  release: () => void;
}>;

export interface ImageResolver {
  /** Returns undefined when the image is not available. */
  acquire(path: string): ImageHandle | undefined;
}

/** Serves images the caller already decoded and owns. */
export class DirectImageResolver implements ImageResolver {
  public constructor(private readonly images: ReadonlyMap<string, RgbaImage>) {}

  public acquire(path: string): ImageHandle | undefined {
    const image = this.images.get(path);
    if (!image) return undefined;
    return { region: fullRegion(image), release: () => {} };
  }
}

type StoreEntry = {
  params: ImageParams;
  image: RgbaImage | null;
  refs: number;
  /** Registrations not yet matched by `unregister`. */
  pending: number;
};

/**
 * Deferred resolver: images are registered first, decoded by `loadAll`,
 * then handed out by reference count. A path stays loaded while it has
 * live handles or unmatched registrations; once both reach zero its
 * pixels are dropped and the path must be registered again.
 */
export class ImageStore implements ImageResolver {
  private readonly entries = new Map<string, StoreEntry>();

  public constructor(
    private readonly decode: (path: string) => Promise<RgbaImage> = loadPngRgba,
    private readonly warn: WarnFn = () => {},
  ) {}

  /** Keeps the path loaded until a matching `unregister`. The first registration's params win. */
  public register(path: string, params: ImageParams): void {
    const entry = this.entries.get(path);
    if (entry) {
      entry.pending++;
      return;
    }
    this.entries.set(path, { params, image: null, refs: 0, pending: 1 });
  }

  public unregister(path: string): void {
    const entry = this.entries.get(path);
    if (!entry || entry.pending === 0) return;
    entry.pending--;
    this.evictIfUnused(path, entry);
  }

  public paramsFor(path: string): ImageParams | undefined {
    return this.entries.get(path)?.params;
  }

  public isLoaded(path: string): boolean {
    return this.entries.get(path)?.image != null;
  }

  public refCount(path: string): number {
    return this.entries.get(path)?.refs ?? 0;
  }

  /** Decode every registered image that is not loaded yet. Failures are warned, not thrown. */
  public async loadAll(): Promise<void> {
    const pending = [...this.entries].filter(([, e]) => e.image === null);
    await Promise.all(
      pending.map(async ([path, entry]) => {
        try {
          entry.image = await this.decode(path);
        } catch (err: unknown) {
          const msg = err instanceof Error ? err.message : String(err);
          this.warn(`Failed to load image ${path}: ${msg}`);
        }
      }),
    );
  }

  public acquire(path: string): ImageHandle | undefined {
    const entry = this.entries.get(path);
    if (!entry || !entry.image) return undefined;

    entry.refs++;
    let released = false;
    return {
      region: fullRegion(entry.image),
      release: () => {
        if (released) return;
        released = true;
        entry.refs--;
        this.evictIfUnused(path, entry);
      },
    };
  }

  private evictIfUnused(path: string, entry: StoreEntry): void {
    if (entry.refs === 0 && entry.pending === 0 && this.entries.get(path) === entry) {
      this.entries.delete(path);
    }
  }
}
