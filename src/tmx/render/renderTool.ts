// src/tmx/render/renderTool.ts
import path from "node:path";
import { mkdir, readdir, stat, writeFile } from "node:fs/promises";

import { loadMap } from "../mapLoader.js";
import type { TmxLoadOptions } from "../options.js";
import { ImageStore } from "./imageStore.js";
import { OrthogonalRenderer } from "./mapRenderer.js";

export type RenderToolOptions = Readonly<{
  out?: string;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  load?: Omit<TmxLoadOptions, "yUp">;
}>;

function isTmx(p: string): boolean {
  return p.toLowerCase().endsWith(".tmx");
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }
  out.sort();
  return out;
}

function defaultOutFile(inputFile: string): string {
  const ext = path.extname(inputFile);
  return `${inputFile.slice(0, inputFile.length - ext.length)}.png`;
}

function defaultOutDirForDir(inputDir: string): string {
  return `${inputDir}__png`;
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

async function renderOne(
  inputPath: string,
  store: ImageStore,
  renderer: OrthogonalRenderer,
  opts: RenderToolOptions,
): Promise<Buffer> {
  const map = await loadMap(inputPath, { ...opts.load, yUp: false, images: store });
  try {
    return renderer.renderToPng(map);
  } finally {
    map.dispose();
  }
}

/** Render a .tmx file, or every .tmx file under a directory, to PNG. */
export async function runRenderTool(inputPath: string, opts: RenderToolOptions): Promise<void> {
  const renderer = new OrthogonalRenderer();
  const store = new ImageStore(undefined, (m) => console.warn(m));

  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;

  if (!(await isDirectory(inputPath))) {
    const outPath = opts.out ?? defaultOutFile(inputPath);

    if (!overwrite && (await existsPath(outPath))) {
      console.warn(`Skip (exists): ${outPath}`);
      return;
    }
    if (dryRun) {
      console.log(`[dry-run] ${inputPath} -> ${outPath}`);
      return;
    }

    const png = await renderOne(inputPath, store, renderer, opts);
    await ensureParentDir(outPath);
    await writeFile(outPath, png);
    console.log(`${inputPath} -> ${outPath}`);
    return;
  }

  const outDir = opts.out ?? defaultOutDirForDir(inputPath);
  if (!dryRun) await mkdir(outDir, { recursive: true });

  const inDirAbs = path.resolve(inputPath);
  const outDirAbs = path.resolve(outDir);

  for (const f of await listFiles(inputPath, recursive)) {
    if (!isTmx(f)) continue;
    if (path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = path.join(outDir, rel).replace(/\.tmx$/i, ".png");

    if (!overwrite && (await existsPath(dest))) continue;
    if (dryRun) {
      console.log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    const png = await renderOne(f, store, renderer, opts);
    await ensureParentDir(dest);
    await writeFile(dest, png);
  }

  console.log(`Done. out=${outDir}`);
}
