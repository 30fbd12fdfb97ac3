/**
 * Global tile ids as stored in layer data.
 *
 *   bit 31 - horizontal flip
 *   bit 30 - vertical flip
 *   bit 29 - diagonal flip (transpose across the main diagonal)
 *
 * The lower 29 bits hold the raw id looked up in the tileset registry.
 */

export const FLIP_HORIZONTAL = 0x80000000;
export const FLIP_VERTICAL = 0x40000000;
export const FLIP_DIAGONAL = 0x20000000;

export const FLIP_FLAGS_MASK = 0xe0000000;
export const GID_MASK = 0x1fffffff;

export type CellRotation = 0 | 90 | 180 | 270;

export type GidFlags = Readonly<{
  tileId: number;
  flipH: boolean;
  flipV: boolean;
  flipD: boolean;
}>;

export type CellTransform = Readonly<{
  flipH: boolean;
  flipV: boolean;
  rotation: CellRotation;
}>;

/** Strip the three flag bits. */
export function maskGid(gid: number): number {
  return (gid & GID_MASK) >>> 0;
}

export function splitGid(gid: number): GidFlags {
  return {
    tileId: maskGid(gid),
    flipH: (gid & FLIP_HORIZONTAL) !== 0,
    flipV: (gid & FLIP_VERTICAL) !== 0,
    flipD: (gid & FLIP_DIAGONAL) !== 0,
  };
}

export function composeGid(
  tileId: number,
  flipH: boolean = false,
  flipV: boolean = false,
  flipD: boolean = false,
): number {
  let gid = tileId & GID_MASK;
  if (flipH) gid |= FLIP_HORIZONTAL;
  if (flipV) gid |= FLIP_VERTICAL;
  if (flipD) gid |= FLIP_DIAGONAL;
  return gid >>> 0;
}

/**
 * Fold the diagonal flag into a rotation so every cell is expressed as
 * (flipH, flipV, rotation). Rotations are counter-clockwise.
 */
export function cellTransformOf(flags: Pick<GidFlags, "flipH" | "flipV" | "flipD">): CellTransform {
  if (!flags.flipD) return { flipH: flags.flipH, flipV: flags.flipV, rotation: 0 };

  if (flags.flipH && flags.flipV) return { flipH: true, flipV: false, rotation: 270 };
  if (flags.flipH) return { flipH: false, flipV: false, rotation: 270 };
  if (flags.flipV) return { flipH: false, flipV: false, rotation: 90 };
  return { flipH: false, flipV: true, rotation: 270 };
}
