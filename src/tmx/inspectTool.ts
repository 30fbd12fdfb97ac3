// src/tmx/inspectTool.ts
import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";

import { stringifyMapJson, summarizeMap } from "./exportJson.js";
import { getDependencies, loadMap } from "./mapLoader.js";
import type { TmxLoadOptions } from "./options.js";

export type InspectToolOptions = Readonly<{
  out?: string;
  load?: TmxLoadOptions;
}>;

export async function runInfoTool(inputPath: string, opts: InspectToolOptions = {}): Promise<void> {
  const map = await loadMap(inputPath, opts.load);
  try {
    process.stdout.write(JSON.stringify(summarizeMap(map), null, 2) + "\n");
  } finally {
    map.dispose();
  }
}

export async function runDepsTool(inputPath: string): Promise<void> {
  for (const dep of await getDependencies(inputPath)) console.log(dep);
}

/** Write the decoded map as JSON to `opts.out`, or stdout. */
export async function runToJsonTool(inputPath: string, opts: InspectToolOptions = {}): Promise<void> {
  const map = await loadMap(inputPath, opts.load);
  let text: string;
  try {
    text = stringifyMapJson(map);
  } finally {
    map.dispose();
  }

  if (opts.out === undefined) {
    process.stdout.write(text);
    return;
  }
  await mkdir(path.dirname(opts.out), { recursive: true });
  await writeFile(opts.out, text, "utf8");
  console.log(`${inputPath} -> ${opts.out}`);
}
