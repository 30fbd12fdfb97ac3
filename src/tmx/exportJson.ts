// src/tmx/exportJson.ts
import type { Cell, Layer, MapObject, Properties, PropertyValue, TiledMap, Tileset } from "./model.js";

export type JsonProperties = Record<string, PropertyValue>;

export type MapSummaryJson = Readonly<{
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  orientation: string;
  tilesets: ReadonlyArray<
    Readonly<{ name: string; firstId: number; lastId: number; tileCount: number; image: string }>
  >;
  layers: ReadonlyArray<
    Readonly<{ name: string; kind: Layer["kind"]; visible: boolean; filled: number }>
  >;
}>;

export function propertiesToJson(props: Properties): JsonProperties {
  return Object.fromEntries(props);
}

function lastId(tileset: Tileset): number {
  return tileset.firstId + tileset.tiles.size - 1;
}

/** Sizes, gid ranges, and per-layer counts of non-empty cells or objects. */
export function summarizeMap(map: TiledMap): MapSummaryJson {
  return {
    width: map.width,
    height: map.height,
    tileWidth: map.tileWidth,
    tileHeight: map.tileHeight,
    orientation: map.orientation,
    tilesets: [...map.tilesets].map((ts) => ({
      name: ts.name,
      firstId: ts.firstId,
      lastId: lastId(ts),
      tileCount: ts.tiles.size,
      image: ts.imageSource,
    })),
    layers: map.layers.map((layer) => ({
      name: layer.name,
      kind: layer.kind,
      visible: layer.visible,
      filled: layer.kind === "tile" ? layer.cells.filter((c) => c !== null).length : layer.objects.length,
    })),
  };
}

function cellToJson(cell: Cell | null): Cell | null {
  return cell === null
    ? null
    : { tileId: cell.tileId, flipH: cell.flipH, flipV: cell.flipV, rotation: cell.rotation };
}

function objectToJson(object: MapObject): Record<string, unknown> {
  const { properties, ...rest } = object;
  return { ...rest, properties: propertiesToJson(properties) };
}

function layerToJson(layer: Layer): Record<string, unknown> {
  const base = {
    kind: layer.kind,
    name: layer.name,
    visible: layer.visible,
    opacity: layer.opacity,
    properties: propertiesToJson(layer.properties),
  };
  switch (layer.kind) {
    case "tile":
      return {
        ...base,
        width: layer.width,
        height: layer.height,
        tileWidth: layer.tileWidth,
        tileHeight: layer.tileHeight,
        cells: layer.cells.map(cellToJson),
      };
    case "object":
      return { ...base, objects: layer.objects.map(objectToJson) };
  }
}

/** Plain-JSON view of a decoded map. Tile pixels are left out. */
export function mapToJson(map: TiledMap): Record<string, unknown> {
  return {
    width: map.width,
    height: map.height,
    tileWidth: map.tileWidth,
    tileHeight: map.tileHeight,
    orientation: map.orientation,
    backgroundColor: map.backgroundColor ?? null,
    yUp: map.yUp,
    properties: propertiesToJson(map.properties),
    tilesets: [...map.tilesets].map((ts) => ({
      name: ts.name,
      firstId: ts.firstId,
      tileWidth: ts.tileWidth,
      tileHeight: ts.tileHeight,
      margin: ts.margin,
      spacing: ts.spacing,
      image: ts.imageSource,
      tileCount: ts.tiles.size,
      properties: propertiesToJson(ts.properties),
      tiles: [...ts.tiles.values()]
        .filter((t) => t.properties.size > 0)
        .map((t) => ({ id: t.id, properties: propertiesToJson(t.properties) })),
    })),
    layers: map.layers.map(layerToJson),
  };
}

export function stringifyMapJson(map: TiledMap): string {
  return JSON.stringify(mapToJson(map), null, 2) + "\n";
}
