// src/tmx/render/imageRegion.ts
import type { RgbaImage } from "./rgbaImage.js";
import { cropRect, flipImage } from "./rgbaImage.js";

/**
 * A rectangle of a shared image. Regions never own pixels; `flipY` marks a
 * region whose rows are read bottom-up.
 */
export type ImageRegion = Readonly<{
  image: RgbaImage;
  x: number;
  y: number;
  width: number;
  height: number;
  flipY: boolean;
}>;

export function fullRegion(image: RgbaImage): ImageRegion {
  return { image, x: 0, y: 0, width: image.width, height: image.height, flipY: false };
}

/** Carve a sub-rectangle; coordinates are relative to `parent`. */
export function subRegion(
  parent: ImageRegion,
  x: number,
  y: number,
  width: number,
  height: number,
): ImageRegion {
  if (width <= 0 || height <= 0) throw new Error(`Invalid region size ${width}x${height}`);
  if (x < 0 || y < 0 || x + width > parent.width || y + height > parent.height) {
    throw new Error(
      `Region out of bounds: (${x},${y}) ${width}x${height} vs ${parent.width}x${parent.height}`,
    );
  }
  return {
    image: parent.image,
    x: parent.x + x,
    y: parent.y + y,
    width,
    height,
    flipY: parent.flipY,
  };
}

/** Mark a region as vertically mirrored. Applying it twice changes nothing. */
export function mirrorY(region: ImageRegion): ImageRegion {
  return region.flipY ? region : { ...region, flipY: true };
}

/** Copy the region's pixels out, honouring `flipY`. */
export function regionPixels(region: ImageRegion): RgbaImage {
  const px = cropRect(
    region.image,
    region.x,
    region.y,
    region.x + region.width,
    region.y + region.height,
  );
  return flipImage(px, false, region.flipY);
}
