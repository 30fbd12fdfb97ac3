import { describe, expect, it, vi } from "vitest";

import { createMemoryDocumentProvider } from "../src/tmx/document.js";
import { DocumentError, MissingImageError, UnsupportedEncodingError } from "../src/tmx/errors.js";
import { mapToJson } from "../src/tmx/exportJson.js";
import { decodeMapDocument, finishMap, getDependencies, loadMap, prepareMap } from "../src/tmx/mapLoader.js";
import { DirectImageResolver, ImageStore } from "../src/tmx/render/imageStore.js";
import type { RgbaImage } from "../src/tmx/render/rgbaImage.js";
import { createImage } from "../src/tmx/render/rgbaImage.js";

const LEVEL = `<?xml version="1.0"?>
<map orientation="orthogonal" width="2" height="2" tilewidth="4" tileheight="4" backgroundcolor="#102030">
  <properties>
    <property name="tilewidth" value="custom"/>
    <property name="music" type="file" value="theme.ogg"/>
  </properties>
  <tileset firstgid="1" source="tiles/ext.tsx"/>
  <tileset firstgid="3" name="inline" tilewidth="4" tileheight="4">
    <image source="inline.png" width="4" height="4"/>
  </tileset>
  <imagelayer name="sky"><image source="sky.png"/></imagelayer>
  <layer name="ground" width="2" height="2" opacity="1.5">
    <data encoding="csv">1,2,3,0</data>
    <properties><property name="z" type="int" value="1"/></properties>
  </layer>
  <group name="ignored"/>
  <objectgroup name="spawns">
    <object name="start" x="4" y="4"/>
  </objectgroup>
  <layer name="hidden" width="2" height="2" visible="0">
    <data encoding="csv">0,0,0,3</data>
  </layer>
</map>`;

const EXT = `<?xml version="1.0"?>
<tileset name="ext" tilewidth="4" tileheight="4">
  <image source="../img/ext.png" width="8" height="4"/>
</tileset>`;

const files = { "maps/level.tmx": LEVEL, "maps/tiles/ext.tsx": EXT };

const pixels = new Map<string, RgbaImage>([
  ["maps/img/ext.png", createImage(8, 4)],
  ["maps/inline.png", createImage(4, 4)],
]);

async function decodeFromMemory(path: string): Promise<RgbaImage> {
  const image = pixels.get(path);
  if (!image) throw new Error(`no such image: ${path}`);
  return image;
}

describe("two-phase load", () => {
  it("prepareMap reads external tilesets and lists image dependencies", async () => {
    const prepared = await prepareMap("maps/level.tmx", createMemoryDocumentProvider(files));
    expect([...prepared.externalTilesets.keys()]).toEqual(["maps/tiles/ext.tsx"]);
    expect(prepared.imagePaths).toEqual(["maps/img/ext.png", "maps/inline.png"]);
  });

  it("getDependencies returns the same list", async () => {
    await expect(getDependencies("maps/level.tmx", createMemoryDocumentProvider(files))).resolves.toEqual([
      "maps/img/ext.png",
      "maps/inline.png",
    ]);
  });

  it("finishMap with direct images equals loadMap through an image store", async () => {
    const documents = createMemoryDocumentProvider(files);
    const prepared = await prepareMap("maps/level.tmx", documents);
    const direct = finishMap(prepared, new DirectImageResolver(pixels));

    const store = new ImageStore(decodeFromMemory);
    const loaded = await loadMap("maps/level.tmx", { documents, images: store });

    expect(mapToJson(loaded)).toEqual(mapToJson(direct));
    expect(store.refCount("maps/img/ext.png")).toBe(1);
    loaded.dispose();
    expect(store.refCount("maps/img/ext.png")).toBe(0);
    expect(store.isLoaded("maps/img/ext.png")).toBe(false);
  });

  it("passes mip-map and filter settings to the image store", async () => {
    const store = new ImageStore(decodeFromMemory);
    const map = await loadMap("maps/level.tmx", {
      documents: createMemoryDocumentProvider(files),
      images: store,
      generateMipMaps: true,
      minFilter: "mipmap-linear-linear",
    });
    expect(store.paramsFor("maps/inline.png")).toEqual({
      generateMipMaps: true,
      minFilter: "mipmap-linear-linear",
      magFilter: "nearest",
    });
    map.dispose();
  });
});

describe("map assembly", () => {
  async function load(warn = vi.fn()) {
    const prepared = await prepareMap("maps/level.tmx", createMemoryDocumentProvider(files));
    return finishMap(prepared, new DirectImageResolver(pixels), { warn });
  }

  it("seeds baseline map properties, then custom ones", async () => {
    const map = await load();
    expect(Object.fromEntries(map.properties)).toEqual({
      orientation: "orthogonal",
      width: 2,
      height: 2,
      tilewidth: "custom",
      tileheight: 4,
      backgroundcolor: "#102030",
      music: "theme.ogg",
    });
    expect(map.tileWidth).toBe(4);
    expect([map.pixelWidth, map.pixelHeight]).toEqual([8, 8]);
  });

  it("loads tilesets in document order and layers in document order", async () => {
    const warn = vi.fn();
    const map = await load(warn);

    expect([...map.tilesets].map((t) => [t.name, t.firstId, t.tiles.size])).toEqual([
      ["ext", 1, 2],
      ["inline", 3, 1],
    ]);
    expect(map.layers.map((l) => `${l.kind}:${l.name}`)).toEqual([
      "tile:ground",
      "object:spawns",
      "tile:hidden",
    ]);
    expect(warn).toHaveBeenCalledWith("Skipping image layer 'sky': image layers are not supported");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("hands unhandled top-level elements to onElement instead of warning", async () => {
    const warn = vi.fn();
    const seen: string[] = [];
    const prepared = await prepareMap("maps/level.tmx", createMemoryDocumentProvider(files));
    let hookMap: unknown;
    const map = finishMap(prepared, new DirectImageResolver(pixels), {
      warn,
      onElement: (element, { map: target }) => {
        hookMap = target;
        seen.push(`${element.name}:${element.stringAttr("name", "")}`);
        if (element.name !== "imagelayer") return null;
        return {
          kind: "object",
          name: element.stringAttr("name", ""),
          visible: true,
          opacity: 1,
          properties: new Map(),
          objects: [],
        };
      },
    });

    expect(seen).toEqual(["imagelayer:sky", "group:ignored"]);
    expect(hookMap).toBe(map);
    expect(map.layers.map((l) => `${l.kind}:${l.name}`)).toEqual([
      "object:sky",
      "tile:ground",
      "object:spawns",
      "tile:hidden",
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("decodes tile layers with clamped opacity and properties", async () => {
    const map = await load();
    const [ground, , hidden] = map.layers;
    if (ground?.kind !== "tile" || hidden?.kind !== "tile") throw new Error("expected tile layers");

    expect(ground.opacity).toBe(1);
    expect(ground.properties.get("z")).toBe(1);
    expect([ground.tileWidth, ground.tileHeight]).toEqual([4, 4]);
    // y-up: source row 0 (1,2) is stored as row 1
    expect(ground.cells.map((c) => c?.tileId ?? 0)).toEqual([3, 0, 1, 2]);
    expect(hidden.visible).toBe(false);
  });

  it("single-document decode rejects plain XML cell data and releases images", async () => {
    const xml = `<map width="2" height="1" tilewidth="4" tileheight="4">
      <tileset firstgid="1" name="inline" tilewidth="4" tileheight="4"><image source="inline.png"/></tileset>
      <layer name="legacy" width="2" height="1"><data><tile gid="1"/><tile gid="0"/></data></layer>
    </map>`;
    const store = new ImageStore(decodeFromMemory);
    store.register("maps/inline.png", { generateMipMaps: false, minFilter: "nearest", magFilter: "nearest" });
    await store.loadAll();

    let caught: unknown;
    try {
      decodeMapDocument(xml, "maps/legacy.tmx", store);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnsupportedEncodingError);
    if (!(caught instanceof UnsupportedEncodingError)) return;
    expect(caught.layer).toBe("legacy");
    expect(caught.encoding).toBe("xml");
    expect(store.refCount("maps/inline.png")).toBe(0);
    store.unregister("maps/inline.png");
    expect(store.isLoaded("maps/inline.png")).toBe(false);
  });

  it("single-document decode cannot follow external tilesets", () => {
    expect(() => decodeMapDocument(LEVEL, "maps/level.tmx", new DirectImageResolver(pixels))).toThrow(
      "maps/tiles/ext.tsx: external tileset (firstgid 1) was not loaded",
    );
  });
});

describe("load failures", () => {
  it("a missing image aborts the load", async () => {
    const prepared = await prepareMap("maps/level.tmx", createMemoryDocumentProvider(files));
    let caught: unknown;
    try {
      finishMap(prepared, new DirectImageResolver(new Map([["maps/img/ext.png", createImage(8, 4)]])));
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MissingImageError);
    if (!(caught instanceof MissingImageError)) return;
    expect(caught.tileset).toBe("inline");
    expect(caught.imagePath).toBe("maps/inline.png");
  });

  it("an image the store failed to decode surfaces as a missing image, with a warning", async () => {
    const warn = vi.fn();
    const store = new ImageStore(async () => {
      throw new Error("bad crc");
    }, warn);
    await expect(
      loadMap("maps/level.tmx", { documents: createMemoryDocumentProvider(files), images: store }),
    ).rejects.toBeInstanceOf(MissingImageError);
    expect(warn).toHaveBeenCalledWith("Failed to load image maps/img/ext.png: bad crc");
  });

  it("an external tileset document with the wrong root is a document error", async () => {
    const documents = createMemoryDocumentProvider({ ...files, "maps/tiles/ext.tsx": "<map/>" });
    await expect(prepareMap("maps/level.tmx", documents)).rejects.toThrow(
      new DocumentError(
        "maps/tiles/ext.tsx",
        "external tileset (firstgid 1) has root <map>, expected <tileset>",
      ),
    );
  });

  it("a missing external tileset document is a document error", async () => {
    const documents = createMemoryDocumentProvider({ "maps/level.tmx": LEVEL });
    await expect(prepareMap("maps/level.tmx", documents)).rejects.toThrow(
      "maps/tiles/ext.tsx: external tileset (firstgid 1): cannot read document: not found",
    );
  });

  it("an unparsable external tileset names the referencing firstgid", async () => {
    const documents = createMemoryDocumentProvider({ ...files, "maps/tiles/ext.tsx": "<tileset><image></tileset>" });
    let caught: unknown;
    try {
      await prepareMap("maps/level.tmx", documents);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DocumentError);
    if (!(caught instanceof DocumentError)) return;
    expect(caught.path).toBe("maps/tiles/ext.tsx");
    expect(caught.detail).toMatch(/^external tileset \(firstgid 1\): XML parse error: /);
    expect(caught.cause).toBeInstanceOf(DocumentError);
  });

  it("malformed XML is a document error", async () => {
    const documents = createMemoryDocumentProvider({ "maps/bad.tmx": "<map><layer></map>" });
    await expect(prepareMap("maps/bad.tmx", documents)).rejects.toBeInstanceOf(DocumentError);
  });

  it("a document that is not a map is rejected", async () => {
    const documents = createMemoryDocumentProvider({ "maps/t.tsx": EXT });
    await expect(prepareMap("maps/t.tsx", documents)).rejects.toThrow(
      "maps/t.tsx: expected <map> root element, found <tileset>",
    );
  });
});
