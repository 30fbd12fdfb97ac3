// src/tmx/render/png.ts
import { readFile } from "node:fs/promises";
import * as pngjs from "pngjs";
import type { RgbaImage } from "./rgbaImage.js";

const { PNG } = pngjs;

export function decodePngRgba(buf: Buffer): RgbaImage {
  const png = PNG.sync.read(buf);
  const data = new Uint8Array(png.data); // copy view
  return { width: png.width, height: png.height, data };
}

export async function loadPngRgba(path: string): Promise<RgbaImage> {
  return decodePngRgba(await readFile(path));
}

export function writePngRgba(img: RgbaImage): Buffer {
  const png = new PNG({ width: img.width, height: img.height });
  png.data = Buffer.from(img.data);
  return PNG.sync.write(png);
}
