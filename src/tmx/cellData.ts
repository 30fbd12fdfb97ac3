// src/tmx/cellData.ts
import type { WordReader } from "./binary.js";
import { BinaryReader } from "./binary.js";
import type { DocElement } from "./document.js";
import { DocumentError, MalformedCellDataError, UnsupportedEncodingError } from "./errors.js";
import { cellTransformOf, splitGid } from "./gid.js";
import { InflateReader } from "./inflate.js";
import type { Cell, TileLayer, TiledMap, TilesetRegistry } from "./model.js";
import { createTileLayer, setCell } from "./model.js";
import { loadChildProperties } from "./properties.js";

export type CellDataBlock = Readonly<{
  layer: string;
  width: number;
  height: number;
  encoding: string | undefined;
  compression: string | undefined;
  payload: string;
}>;

const CSV_TOKEN_RE = /^\d+$/;

/** Resolve one packed gid to a cell, or null when no tileset has the tile. */
export function decodeCell(gid: number, tilesets: TilesetRegistry): Cell | null {
  const flags = splitGid(gid);
  if (flags.tileId === 0) return null;
  const tile = tilesets.getTile(flags.tileId);
  if (!tile) return null;
  return { tileId: tile.id, ...cellTransformOf(flags) };
}

function csvReader(layer: string, payload: string, count: number): WordReader {
  const trimmed = payload.trim();
  const tokens = trimmed === "" ? [] : trimmed.split(",").map((t) => t.trim());
  if (tokens.length !== count) {
    throw new MalformedCellDataError(layer, `expected ${count} csv values, found ${tokens.length}`);
  }

  let i = 0;
  return {
    readU32LE(): number {
      const token = tokens[i++]!;
      const v = CSV_TOKEN_RE.test(token) ? Number(token) : Number.NaN;
      if (!Number.isSafeInteger(v) || v > 0xffffffff) {
        throw new Error(`invalid csv value '${token}' at index ${i - 1}`);
      }
      return v;
    },
    assertExhausted(): void {},
  };
}

function base64Reader(
  layer: string,
  payload: string,
  compression: string | undefined,
  count: number,
): WordReader {
  const bytes = Buffer.from(payload.trim(), "base64");
  switch (compression) {
    case undefined:
    case "": {
      if (bytes.length !== count * 4) {
        throw new MalformedCellDataError(
          layer,
          `expected ${count * 4} bytes, decoded ${bytes.length}`,
        );
      }
      return new BinaryReader(bytes);
    }
    case "gzip":
    case "zlib":
      return new InflateReader(bytes, compression);
    default:
      throw new UnsupportedEncodingError(layer, "base64", compression);
  }
}

function openReader(block: CellDataBlock): WordReader {
  const count = block.width * block.height;
  const encoding = block.encoding ?? "xml";

  if (encoding === "csv") {
    if (block.compression !== undefined && block.compression !== "") {
      throw new UnsupportedEncodingError(block.layer, "csv", block.compression);
    }
    return csvReader(block.layer, block.payload, count);
  }
  if (encoding === "base64") {
    return base64Reader(block.layer, block.payload, block.compression, count);
  }
  throw new UnsupportedEncodingError(block.layer, encoding);
}

/**
 * Decode a layer's data block into `width * height` cells. Source row 0 is
 * the top row; with `yUp` it is stored as the last row.
 */
export function decodeCellData(
  block: CellDataBlock,
  tilesets: TilesetRegistry,
  yUp: boolean,
): Array<Cell | null> {
  const { width, height } = block;
  const out = new Array<Cell | null>(width * height).fill(null);
  const reader = openReader(block);

  try {
    for (let y = 0; y < height; y++) {
      const row = yUp ? height - 1 - y : y;
      for (let x = 0; x < width; x++) {
        out[row * width + x] = decodeCell(reader.readU32LE(), tilesets);
      }
    }
    reader.assertExhausted();
  } catch (err: unknown) {
    if (err instanceof MalformedCellDataError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new MalformedCellDataError(block.layer, msg, { cause: err });
  }
  return out;
}

/** Decode a `<layer>` element into a tile layer. */
export function loadTileLayer(map: TiledMap, element: DocElement, yUp: boolean): TileLayer {
  const name = element.stringAttr("name", "");
  const width = element.intAttr("width", 0);
  const height = element.intAttr("height", 0);

  const layer = createTileLayer({
    name,
    width,
    height,
    tileWidth: map.tileWidth,
    tileHeight: map.tileHeight,
    visible: element.intAttr("visible", 1) === 1,
    opacity: Math.max(0, Math.min(1, element.floatAttr("opacity", 1))),
  });

  const data = element.child("data");
  if (!data) throw new DocumentError(element.path, `layer '${name}' has no <data>`);

  const cells = decodeCellData(
    {
      layer: name,
      width,
      height,
      encoding: data.attr("encoding"),
      compression: data.attr("compression"),
      payload: data.text,
    },
    map.tilesets,
    yUp,
  );
  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i]!;
    setCell(layer, i % width, Math.floor(i / width), cell);
  }

  loadChildProperties(layer.properties, element);
  return layer;
}
