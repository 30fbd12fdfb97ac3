// src/index.ts
export * from "./tmx/errors.js";
export * from "./tmx/gid.js";
export * from "./tmx/model.js";
export * from "./tmx/options.js";
export { getNumberProperty, loadProperties } from "./tmx/properties.js";
export type { DocElement, DocumentProvider } from "./tmx/document.js";
export {
  createFileDocumentProvider,
  createMemoryDocumentProvider,
  parseXmlDocument,
} from "./tmx/document.js";
export { resolveRelativePath } from "./tmx/paths.js";
export { decodeCell, decodeCellData } from "./tmx/cellData.js";
export type { CellDataBlock } from "./tmx/cellData.js";
export { sliceTileset } from "./tmx/tileset.js";
export type { TilesetDescriptor } from "./tmx/tileset.js";
export type { LoadMapOptions, PreparedMap } from "./tmx/mapLoader.js";
export { decodeMapDocument, finishMap, getDependencies, loadMap, prepareMap } from "./tmx/mapLoader.js";
export { mapToJson, stringifyMapJson, summarizeMap } from "./tmx/exportJson.js";
export type { MapSummaryJson } from "./tmx/exportJson.js";
export type { ImageRegion } from "./tmx/render/imageRegion.js";
export { fullRegion, mirrorY, regionPixels, subRegion } from "./tmx/render/imageRegion.js";
export type { ImageHandle, ImageParams, ImageResolver, TextureFilter } from "./tmx/render/imageStore.js";
export { DirectImageResolver, ImageStore, TEXTURE_FILTERS, parseTextureFilter } from "./tmx/render/imageStore.js";
export type { RgbaImage } from "./tmx/render/rgbaImage.js";
export { decodePngRgba, loadPngRgba, writePngRgba } from "./tmx/render/png.js";
export { OrthogonalRenderer } from "./tmx/render/mapRenderer.js";
