import { describe, expect, it } from "vitest";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";

import { composeGid } from "../src/tmx/gid.js";
import { decodeMapDocument } from "../src/tmx/mapLoader.js";
import type { TmxLoadOptions } from "../src/tmx/options.js";
import { DirectImageResolver } from "../src/tmx/render/imageStore.js";
import { OrthogonalRenderer, parseColor } from "../src/tmx/render/mapRenderer.js";
import { decodePngRgba } from "../src/tmx/render/png.js";
import type { RgbaImage } from "../src/tmx/render/rgbaImage.js";
import { flipImage, rotateImage } from "../src/tmx/render/rgbaImage.js";
import { makePatternImage, pixelAt } from "./tmxTestUtils.js";

// One 2x2 tile: (0,0)=[0,0] (1,0)=[10,0] (0,1)=[0,10] (1,1)=[10,10]
const sheet = makePatternImage(2, 2, 7);
const images = new DirectImageResolver(new Map([["maps/t.png", sheet]]));

function renderCells(csv: string, width: number, extra = "", opts: TmxLoadOptions = { yUp: false }): RgbaImage {
  const xml = `<map orientation="orthogonal" width="${width}" height="1" tilewidth="2" tileheight="2" ${extra}>
    <tileset firstgid="1" name="t" tilewidth="2" tileheight="2"><image source="t.png"/></tileset>
    <layer name="l" width="${width}" height="1"><data encoding="csv">${csv}</data></layer>
  </map>`;
  const map = decodeMapDocument(xml, "maps/r.tmx", images, opts);
  return new OrthogonalRenderer().renderToImage(map);
}

function quad(img: RgbaImage, ox: number): number[][] {
  return [pixelAt(img, ox, 0), pixelAt(img, ox + 1, 0), pixelAt(img, ox, 1), pixelAt(img, ox + 1, 1)];
}

const P00 = [0, 0, 7, 255];
const P10 = [10, 0, 7, 255];
const P01 = [0, 10, 7, 255];
const P11 = [10, 10, 7, 255];

describe("raster transforms", () => {
  it("rotates counter-clockwise", () => {
    const img = makePatternImage(3, 2);
    const rot = rotateImage(img, 90);
    expect([rot.width, rot.height]).toEqual([2, 3]);
    // top-right corner moves to top-left
    expect(pixelAt(rot, 0, 0)).toEqual(pixelAt(img, 2, 0));
    expect(pixelAt(rot, 1, 2)).toEqual(pixelAt(img, 0, 1));
  });

  it("four quarter turns are the identity", () => {
    const img = makePatternImage(3, 2);
    let cur = img;
    for (let i = 0; i < 4; i++) cur = rotateImage(cur, 90);
    expect(cur).toEqual(img);
    expect(rotateImage(rotateImage(img, 90), 270)).toEqual(img);
  });

  it("flip returns the source when nothing is flipped", () => {
    const img = makePatternImage(2, 2);
    expect(flipImage(img, false, false)).toBe(img);
  });
});

describe("OrthogonalRenderer", () => {
  it("draws plain and horizontally flipped cells", () => {
    const img = renderCells(`1,${composeGid(1, true)}`, 2);
    expect(quad(img, 0)).toEqual([P00, P10, P01, P11]);
    expect(quad(img, 2)).toEqual([P10, P00, P11, P01]);
  });

  it("draws a diagonal flip as a transpose", () => {
    const img = renderCells(`${composeGid(1, false, false, true)}`, 1);
    expect(quad(img, 0)).toEqual([P00, P01, P10, P11]);
  });

  it("draws diagonal+horizontal as a clockwise quarter turn", () => {
    const img = renderCells(`${composeGid(1, true, false, true)}`, 1);
    // clockwise: bottom-left goes to top-left
    expect(quad(img, 0)).toEqual([P01, P00, P11, P10]);
  });

  it("fills empty cells with the background colour", () => {
    const img = renderCells("0,1", 2, `backgroundcolor="#80ff0000"`);
    expect(pixelAt(img, 0, 0)).toEqual([255, 0, 0, 128]);
    expect(pixelAt(img, 2, 0)).toEqual(P00);
  });

  it("applies layer opacity over a transparent canvas", () => {
    const xml = `<map orientation="orthogonal" width="1" height="1" tilewidth="2" tileheight="2">
      <tileset firstgid="1" name="t" tilewidth="2" tileheight="2"><image source="t.png"/></tileset>
      <layer name="half" width="1" height="1" opacity="0.5"><data encoding="csv">1</data></layer>
      <layer name="off" width="1" height="1" visible="0"><data encoding="csv">1</data></layer>
    </map>`;
    const map = decodeMapDocument(xml, "maps/o.tmx", images, { yUp: false });
    const img = new OrthogonalRenderer().renderToImage(map);
    expect(pixelAt(img, 1, 1)).toEqual([10, 10, 7, 128]);
  });

  it("refuses y-up maps and disposed maps", () => {
    const xml = `<map width="1" height="1" tilewidth="2" tileheight="2"/>`;
    const renderer = new OrthogonalRenderer();
    expect(() => renderer.renderToImage(decodeMapDocument(xml, "m.tmx", images))).toThrow(
      "Renderer needs a map loaded with yUp=false",
    );

    const map = decodeMapDocument(xml, "m.tmx", images, { yUp: false });
    map.dispose();
    expect(() => renderer.renderToImage(map)).toThrow("Cannot render a disposed map");
  });

  it("writes a PNG that decodes to the same pixels", async () => {
    const xml = `<map orientation="orthogonal" width="2" height="1" tilewidth="2" tileheight="2">
      <tileset firstgid="1" name="t" tilewidth="2" tileheight="2"><image source="t.png"/></tileset>
      <layer name="l" width="2" height="1"><data encoding="csv">${composeGid(1, false, true)},1</data></layer>
    </map>`;
    const map = decodeMapDocument(xml, "maps/p.tmx", images, { yUp: false });
    const renderer = new OrthogonalRenderer();

    const dir = await mkdtemp(path.join(os.tmpdir(), "tmxtools-"));
    const out = path.join(dir, "p.png");
    await writeFile(out, renderer.renderToPng(map));

    const back = decodePngRgba(await readFile(out));
    expect(back).toEqual(renderer.renderToImage(map));
    expect(quad(back, 0)).toEqual([P01, P11, P00, P10]);
  });
});

describe("parseColor", () => {
  it("reads #rrggbb and #aarrggbb", () => {
    expect(parseColor("#102030")).toEqual([16, 32, 48, 255]);
    expect(parseColor("#80ff0000")).toEqual([255, 0, 0, 128]);
    expect(() => parseColor("red")).toThrow("Invalid color: red");
  });
});
