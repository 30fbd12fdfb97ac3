// src/tmx/render/mapRenderer.ts
import type { TileLayer, TiledMap } from "../model.js";
import { getCell } from "../model.js";
import { regionPixels } from "./imageRegion.js";
import { writePngRgba } from "./png.js";
import type { RgbaImage } from "./rgbaImage.js";
import { blit, createImage, flipImage, rotateImage } from "./rgbaImage.js";

type Rgba = [number, number, number, number];

const TRANSPARENT: Rgba = [0, 0, 0, 0];

/** Parse `#rrggbb` or `#aarrggbb`. */
export function parseColor(value: string): Rgba {
  const hex = value.startsWith("#") ? value.slice(1) : value;
  if (!/^[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/.test(hex)) {
    throw new Error(`Invalid color: ${value}`);
  }
  const n = (i: number): number => Number.parseInt(hex.slice(i, i + 2), 16);
  return hex.length === 6 ? [n(0), n(2), n(4), 255] : [n(2), n(4), n(6), n(0)];
}

/**
 * Composites the visible tile layers of an orthogonal map. Needs a map
 * loaded with `yUp: false`, so rows and tile regions are top-down.
 */
export class OrthogonalRenderer {
  public renderToImage(map: TiledMap): RgbaImage {
    if (map.yUp) throw new Error("Renderer needs a map loaded with yUp=false");
    if (map.isDisposed) throw new Error("Cannot render a disposed map");
    if (map.orientation !== "orthogonal") {
      throw new Error(`Unsupported orientation: ${map.orientation}`);
    }

    const fill = map.backgroundColor === undefined ? TRANSPARENT : parseColor(map.backgroundColor);
    const out = createImage(map.pixelWidth, map.pixelHeight, fill);

    for (const layer of map.layers) {
      if (layer.kind !== "tile" || !layer.visible || layer.opacity <= 0) continue;
      this.drawLayer(out, map, layer);
    }
    return out;
  }

  public renderToPng(map: TiledMap): Buffer {
    return writePngRgba(this.renderToImage(map));
  }

  private drawLayer(out: RgbaImage, map: TiledMap, layer: TileLayer): void {
    for (let y = 0; y < layer.height; y++) {
      for (let x = 0; x < layer.width; x++) {
        const cell = getCell(layer, x, y);
        if (!cell) continue;
        const tile = map.tilesets.getTile(cell.tileId);
        if (!tile) continue;

        const px = rotateImage(flipImage(regionPixels(tile.region), cell.flipH, cell.flipV), cell.rotation);
        // Oversized tiles hang upwards from the bottom of their cell.
        blit(out, px, x * layer.tileWidth, (y + 1) * layer.tileHeight - px.height, layer.opacity);
      }
    }
  }
}
