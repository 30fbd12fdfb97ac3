// src/tmx/tileset.ts
import type { DocElement } from "./document.js";
import { DocumentError, MissingImageError } from "./errors.js";
import type { Tile, TiledMap, Tileset } from "./model.js";
import type { ResolvedLoadOptions } from "./options.js";
import { resolveRelativePath } from "./paths.js";
import type { Properties, PropertyValue } from "./properties.js";
import { loadChildProperties } from "./properties.js";
import type { ImageRegion } from "./render/imageRegion.js";
import { mirrorY, subRegion } from "./render/imageRegion.js";
import type { ImageResolver } from "./render/imageStore.js";

/** External tileset documents keyed by their resolved path. */
export type ExternalTilesets = ReadonlyMap<string, DocElement>;

export type TilesetDescriptor = Readonly<{
  name: string;
  firstId: number;
  tileWidth: number;
  tileHeight: number;
  spacing: number;
  margin: number;
  imageSource: string;
  imageWidth: number;
  imageHeight: number;
  /** Image path resolved against the document that declared it. */
  imagePath: string;
  /** Element carrying `<tile>` and `<properties>` children (the TSX root for external tilesets). */
  element: DocElement;
}>;

export function externalTilesetPath(element: DocElement, mapPath: string): string | undefined {
  const source = element.attr("source");
  return source === undefined ? undefined : resolveRelativePath(mapPath, source);
}

/**
 * Read a `<tileset>` element of the map. For external tilesets every
 * attribute but `firstgid` comes from the referenced document.
 */
export function readTilesetDescriptor(
  element: DocElement,
  mapPath: string,
  externals: ExternalTilesets,
): TilesetDescriptor {
  const firstId = element.intAttr("firstgid", 1);
  let source = element;
  let basePath = mapPath;

  const tsxPath = externalTilesetPath(element, mapPath);
  if (tsxPath !== undefined) {
    const external = externals.get(tsxPath);
    if (!external) {
      throw new DocumentError(tsxPath, `external tileset (firstgid ${firstId}) was not loaded`);
    }
    source = external;
    basePath = tsxPath;
  }

  const name = source.stringAttr("name", "");
  const image = source.child("image");
  const imageSource = image?.attr("source");
  if (!image || imageSource === undefined) {
    throw new DocumentError(source.path, `tileset '${name}' has no <image source>`);
  }

  return {
    name,
    firstId,
    tileWidth: source.intAttr("tilewidth", 0),
    tileHeight: source.intAttr("tileheight", 0),
    spacing: source.intAttr("spacing", 0),
    margin: source.intAttr("margin", 0),
    imageSource,
    imageWidth: image.intAttr("width", 0),
    imageHeight: image.intAttr("height", 0),
    imagePath: resolveRelativePath(basePath, imageSource),
    element: source,
  };
}

function baselineProperties(desc: TilesetDescriptor): Properties {
  return new Map<string, PropertyValue>([
    ["firstgid", desc.firstId],
    ["imagesource", desc.imageSource],
    ["imagewidth", desc.imageWidth],
    ["imageheight", desc.imageHeight],
    ["tilewidth", desc.tileWidth],
    ["tileheight", desc.tileHeight],
    ["margin", desc.margin],
    ["spacing", desc.spacing],
  ]);
}

/**
 * Carve `image` into tiles. The grid starts at (margin, margin), steps by
 * tile size plus spacing, and keeps only tiles that end inside the margin.
 * Ids run from `firstId` in row-major order.
 */
export function sliceTileset(
  desc: TilesetDescriptor,
  image: ImageRegion,
  yUp: boolean,
  warn: (msg: string) => void = () => {},
): Tileset {
  const { tileWidth: tw, tileHeight: th, margin, spacing } = desc;
  if (tw <= 0 || th <= 0) {
    throw new DocumentError(desc.element.path, `tileset '${desc.name}' has tile size ${tw}x${th}`);
  }

  const tiles = new Map<number, Tile>();
  const stopX = image.width - margin;
  const stopY = image.height - margin;
  let id = desc.firstId;

  for (let y = margin; y + th <= stopY; y += th + spacing) {
    for (let x = margin; x + tw <= stopX; x += tw + spacing) {
      const region = subRegion(image, x, y, tw, th);
      tiles.set(id, { id, region: yUp ? mirrorY(region) : region, properties: new Map() });
      id++;
    }
  }

  for (const tileElement of desc.element.childrenNamed("tile")) {
    const localId = tileElement.intAttr("id", 0);
    const tile = tiles.get(desc.firstId + localId);
    if (!tile) {
      if (tileElement.child("properties")) {
        warn(`Tileset '${desc.name}': <tile id="${localId}"> is outside the sliced image`);
      }
      continue;
    }
    loadChildProperties(tile.properties, tileElement);
  }

  const properties = baselineProperties(desc);
  loadChildProperties(properties, desc.element);

  return {
    name: desc.name,
    firstId: desc.firstId,
    tileWidth: tw,
    tileHeight: th,
    margin,
    spacing,
    imageSource: desc.imageSource,
    imageWidth: desc.imageWidth,
    imageHeight: desc.imageHeight,
    tiles,
    properties,
  };
}

/** Resolve the tileset's image, slice it, and register it with the map. */
export function loadTileset(
  map: TiledMap,
  desc: TilesetDescriptor,
  images: ImageResolver,
  options: ResolvedLoadOptions,
): Tileset {
  const handle = images.acquire(desc.imagePath);
  if (!handle) throw new MissingImageError(desc.name, desc.imagePath);
  map.own(handle);

  const tileset = sliceTileset(desc, handle.region, options.yUp, options.warn);
  map.tilesets.add(tileset);
  return tileset;
}
