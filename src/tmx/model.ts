// src/tmx/model.ts
import type { CellRotation } from "./gid.js";
import { maskGid } from "./gid.js";
import type { Properties } from "./properties.js";
import type { ImageHandle } from "./render/imageStore.js";
import type { ImageRegion } from "./render/imageRegion.js";

export type { Properties, PropertyValue } from "./properties.js";

export type Tile = {
  readonly id: number;
  readonly region: ImageRegion;
  readonly properties: Properties;
};

export type Tileset = {
  readonly name: string;
  readonly firstId: number;
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly margin: number;
  readonly spacing: number;
  readonly imageSource: string;
  readonly imageWidth: number;
  readonly imageHeight: number;
  /** Keyed by global id. */
  readonly tiles: Map<number, Tile>;
  readonly properties: Properties;
};

export type Cell = Readonly<{
  /** Global id of the tile; resolve through {@link TilesetRegistry.getTile}. */
  tileId: number;
  flipH: boolean;
  flipV: boolean;
  rotation: CellRotation;
}>;

type LayerBase = {
  readonly name: string;
  readonly visible: boolean;
  readonly opacity: number;
  readonly properties: Properties;
};

/** Cells are row-major: index = y * width + x. */
export type TileLayer = LayerBase & {
  readonly kind: "tile";
  readonly width: number;
  readonly height: number;
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly cells: Array<Cell | null>;
};

export type ObjectLayer = LayerBase & {
  readonly kind: "object";
  readonly objects: MapObject[];
};

export type Layer = TileLayer | ObjectLayer;

export type Point = Readonly<{ x: number; y: number }>;

type ObjectBase = {
  name: string;
  type: string;
  visible: boolean;
  x: number;
  y: number;
  properties: Properties;
};

export type RectangleObject = ObjectBase & { shape: "rectangle"; width: number; height: number };
export type EllipseObject = ObjectBase & { shape: "ellipse"; width: number; height: number };
export type PolygonObject = ObjectBase & { shape: "polygon"; points: Point[] };
export type PolylineObject = ObjectBase & { shape: "polyline"; points: Point[] };

export type TileStampObject = ObjectBase & {
  shape: "tile";
  gid: number;
  /** Global id of the resolved tile, or null when no tileset has it. */
  tileId: number | null;
  width: number;
  height: number;
  originX: number;
  originY: number;
  /** Radians. */
  rotation: number;
  scaleX: number;
  scaleY: number;
};

export type MapObject =
  | RectangleObject
  | EllipseObject
  | PolygonObject
  | PolylineObject
  | TileStampObject;

export function createTileLayer(
  options: Readonly<{
    name: string;
    width: number;
    height: number;
    tileWidth: number;
    tileHeight: number;
    visible?: boolean;
    opacity?: number;
  }>,
): TileLayer {
  return {
    kind: "tile",
    name: options.name,
    visible: options.visible ?? true,
    opacity: options.opacity ?? 1,
    properties: new Map(),
    width: options.width,
    height: options.height,
    tileWidth: options.tileWidth,
    tileHeight: options.tileHeight,
    cells: new Array<Cell | null>(options.width * options.height).fill(null),
  };
}

export function getCell(layer: TileLayer, x: number, y: number): Cell | null {
  if (x < 0 || x >= layer.width || y < 0 || y >= layer.height) return null;
  return layer.cells[y * layer.width + x] ?? null;
}

/** Out-of-range writes are ignored; the cell array never grows. */
export function setCell(layer: TileLayer, x: number, y: number, cell: Cell | null): void {
  if (x < 0 || x >= layer.width || y < 0 || y >= layer.height) return;
  layer.cells[y * layer.width + x] = cell;
}

/**
 * Tilesets of one map, in the order they were declared. Gid ranges are
 * not checked for overlap; lookups prefer the most recently added tileset.
 */
export class TilesetRegistry implements Iterable<Tileset> {
  private readonly tilesets: Tileset[] = [];

  public add(tileset: Tileset): void {
    this.tilesets.push(tileset);
  }

  public get size(): number {
    return this.tilesets.length;
  }

  public [Symbol.iterator](): Iterator<Tileset> {
    return this.tilesets[Symbol.iterator]();
  }

  public getTile(gid: number): Tile | undefined {
    const id = maskGid(gid);
    for (let i = this.tilesets.length - 1; i >= 0; i--) {
      const tile = this.tilesets[i]!.tiles.get(id);
      if (tile) return tile;
    }
    return undefined;
  }

  public getTilesetForGid(gid: number): Tileset | undefined {
    const id = maskGid(gid);
    for (let i = this.tilesets.length - 1; i >= 0; i--) {
      const ts = this.tilesets[i]!;
      if (ts.tiles.has(id)) return ts;
    }
    return undefined;
  }
}

export type TiledMapInit = Readonly<{
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  orientation: string;
  backgroundColor: string | undefined;
  yUp: boolean;
}>;

export class TiledMap {
  public readonly width: number;
  public readonly height: number;
  public readonly tileWidth: number;
  public readonly tileHeight: number;
  public readonly orientation: string;
  public readonly backgroundColor: string | undefined;
  /** Whether rows and object y-coordinates were stored bottom-up. */
  public readonly yUp: boolean;

  public readonly layers: Layer[] = [];
  public readonly tilesets = new TilesetRegistry();
  public readonly properties: Properties = new Map();

  private readonly handles: ImageHandle[] = [];
  private disposed = false;

  public constructor(init: TiledMapInit) {
    this.width = init.width;
    this.height = init.height;
    this.tileWidth = init.tileWidth;
    this.tileHeight = init.tileHeight;
    this.orientation = init.orientation;
    this.backgroundColor = init.backgroundColor;
    this.yUp = init.yUp;
  }

  public get pixelWidth(): number {
    return this.width * this.tileWidth;
  }

  public get pixelHeight(): number {
    return this.height * this.tileHeight;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  /** Keep an image handle alive until {@link dispose}. */
  public own(handle: ImageHandle): void {
    this.handles.push(handle);
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const h of this.handles.splice(0)) h.release();
  }
}
