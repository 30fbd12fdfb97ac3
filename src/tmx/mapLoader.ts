// src/tmx/mapLoader.ts
import { loadTileLayer } from "./cellData.js";
import type { DocElement, DocumentProvider } from "./document.js";
import { createFileDocumentProvider, parseXmlDocument } from "./document.js";
import { DocumentError } from "./errors.js";
import { TiledMap } from "./model.js";
import { loadObjectLayer } from "./objects.js";
import type { ResolvedLoadOptions, TmxLoadOptions } from "./options.js";
import { resolveLoadOptions } from "./options.js";
import { loadChildProperties } from "./properties.js";
import type { ImageResolver } from "./render/imageStore.js";
import { ImageStore } from "./render/imageStore.js";
import type { ExternalTilesets } from "./tileset.js";
import { externalTilesetPath, loadTileset, readTilesetDescriptor } from "./tileset.js";

/** Everything phase 2 needs: the parsed documents and the images they reference. */
export type PreparedMap = Readonly<{
  path: string;
  root: DocElement;
  externalTilesets: ExternalTilesets;
  /** Resolved tileset image paths, in tileset order, without duplicates. */
  imagePaths: ReadonlyArray<string>;
}>;

function collectImagePaths(root: DocElement, path: string, externals: ExternalTilesets): string[] {
  const seen = new Set<string>();
  for (const element of root.childrenNamed("tileset")) {
    seen.add(readTilesetDescriptor(element, path, externals).imagePath);
  }
  return [...seen];
}

function prepareFromRoot(path: string, root: DocElement, externals: ExternalTilesets): PreparedMap {
  if (root.name !== "map") {
    throw new DocumentError(path, `expected <map> root element, found <${root.name}>`);
  }
  return {
    path,
    root,
    externalTilesets: externals,
    imagePaths: collectImagePaths(root, path, externals),
  };
}

/**
 * Phase 1: read the map and every external tileset it references, and
 * work out which images phase 2 will need. No layer is decoded.
 */
export async function prepareMap(
  path: string,
  documents: DocumentProvider = createFileDocumentProvider(),
): Promise<PreparedMap> {
  const root = await documents.read(path);

  const externals = new Map<string, DocElement>();
  for (const element of root.childrenNamed("tileset")) {
    const tsxPath = externalTilesetPath(element, path);
    if (tsxPath === undefined || externals.has(tsxPath)) continue;

    const firstGid = element.stringAttr("firstgid", "1");
    let tsx: DocElement;
    try {
      tsx = await documents.read(tsxPath);
    } catch (err: unknown) {
      const msg = err instanceof DocumentError ? err.detail : err instanceof Error ? err.message : String(err);
      throw new DocumentError(tsxPath, `external tileset (firstgid ${firstGid}): ${msg}`, { cause: err });
    }
    if (tsx.name !== "tileset") {
      throw new DocumentError(
        tsxPath,
        `external tileset (firstgid ${firstGid}) has root <${tsx.name}>, expected <tileset>`,
      );
    }
    externals.set(tsxPath, tsx);
  }

  return prepareFromRoot(path, root, externals);
}

function assemble(map: TiledMap, prepared: PreparedMap, images: ImageResolver, options: ResolvedLoadOptions): void {
  const { root } = prepared;

  const orientation = root.attr("orientation");
  if (orientation !== undefined) map.properties.set("orientation", orientation);
  map.properties.set("width", map.width);
  map.properties.set("height", map.height);
  map.properties.set("tilewidth", map.tileWidth);
  map.properties.set("tileheight", map.tileHeight);
  if (map.backgroundColor !== undefined) map.properties.set("backgroundcolor", map.backgroundColor);
  loadChildProperties(map.properties, root);

  for (const element of root.childrenNamed("tileset")) {
    const desc = readTilesetDescriptor(element, prepared.path, prepared.externalTilesets);
    loadTileset(map, desc, images, options);
  }

  for (const element of root.children) {
    switch (element.name) {
      case "layer":
        map.layers.push(loadTileLayer(map, element, options.yUp));
        break;
      case "objectgroup":
        map.layers.push(loadObjectLayer(map, element, options));
        break;
      case "tileset":
      case "properties":
        break;
      default: {
        if (options.onElement) {
          const layer = options.onElement(element, { map });
          if (layer) map.layers.push(layer);
        } else if (element.name === "imagelayer") {
          options.warn(`Skipping image layer '${element.stringAttr("name", "")}': image layers are not supported`);
        }
        break;
      }
    }
  }
}

/**
 * Phase 2: build the map from prepared documents and resolved images.
 * Either returns a complete map or throws; on failure every image handle
 * acquired so far is released.
 */
export function finishMap(prepared: PreparedMap, images: ImageResolver, opts: TmxLoadOptions = {}): TiledMap {
  const options = resolveLoadOptions(opts);
  const { root } = prepared;

  const map = new TiledMap({
    width: root.intAttr("width", 0),
    height: root.intAttr("height", 0),
    tileWidth: root.intAttr("tilewidth", 0),
    tileHeight: root.intAttr("tileheight", 0),
    orientation: root.stringAttr("orientation", "orthogonal"),
    backgroundColor: root.attr("backgroundcolor"),
    yUp: options.yUp,
  });

  try {
    assemble(map, prepared, images, options);
  } catch (err: unknown) {
    map.dispose();
    throw err;
  }
  return map;
}

/** Image paths the map needs, resolved against the documents that name them. */
export async function getDependencies(
  path: string,
  documents: DocumentProvider = createFileDocumentProvider(),
): Promise<string[]> {
  const prepared = await prepareMap(path, documents);
  return [...prepared.imagePaths];
}

export type LoadMapOptions = TmxLoadOptions &
  Readonly<{
    documents?: DocumentProvider;
    /** Shared store; a private one decoding PNGs from disk is used when omitted. */
    images?: ImageStore;
  }>;

export async function loadMap(path: string, opts: LoadMapOptions = {}): Promise<TiledMap> {
  const { documents, images, ...loadOptions } = opts;
  const resolved = resolveLoadOptions(loadOptions);
  const store = images ?? new ImageStore(undefined, resolved.warn);

  const prepared = await prepareMap(path, documents);
  for (const imagePath of prepared.imagePaths) store.register(imagePath, resolved.image);
  try {
    await store.loadAll();
    return finishMap(prepared, store, loadOptions);
  } finally {
    // The map's handles keep what it uses; a failed load leaves nothing pinned.
    for (const imagePath of prepared.imagePaths) store.unregister(imagePath);
  }
}

/** Decode a single map document with inline tilesets only. */
export function decodeMapDocument(
  xml: string,
  mapPath: string,
  images: ImageResolver,
  opts: TmxLoadOptions = {},
): TiledMap {
  const root = parseXmlDocument(xml, mapPath);
  return finishMap(prepareFromRoot(mapPath, root, new Map()), images, opts);
}
