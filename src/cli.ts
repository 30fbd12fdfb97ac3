#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { runDepsTool, runInfoTool, runToJsonTool } from "./tmx/inspectTool.js";
import type { TmxLoadOptions } from "./tmx/options.js";
import { parseTextureFilter } from "./tmx/render/imageStore.js";
import { runRenderTool } from "./tmx/render/renderTool.js";

type ImageFlags = {
  mipmaps: boolean;
  minFilter: string;
  magFilter: string;
};

type LoadFlags = ImageFlags & { yDown: boolean };

function imageOptionsFrom(flags: ImageFlags): Omit<TmxLoadOptions, "yUp"> {
  return {
    generateMipMaps: flags.mipmaps,
    minFilter: parseTextureFilter(flags.minFilter),
    magFilter: parseTextureFilter(flags.magFilter),
    warn: (m) => console.warn(m),
  };
}

function loadOptionsFrom(flags: LoadFlags): TmxLoadOptions {
  return { ...imageOptionsFrom(flags), yUp: !flags.yDown };
}

function withLoadFlags(cmd: Command): Command {
  return cmd
    .option("--y-down", "Keep rows and object y-coordinates top-down", false)
    .option("--mipmaps", "Request mip-map generation for tileset images", false)
    .option("--min-filter <filter>", "Minification filter for tileset images", "nearest")
    .option("--mag-filter <filter>", "Magnification filter for tileset images", "nearest");
}

const program = new Command();

program
  .name("tmxtools")
  .description("Tiled TMX map tools (inspect, export JSON, render)")
  .version("0.1.0");

withLoadFlags(
  program
    .command("info")
    .description("Print a JSON summary of a map: size, tilesets, layers")
    .argument("<map>", "Path to .tmx file"),
).action(async (input: string, opts: LoadFlags) => {
  await runInfoTool(input, { load: loadOptionsFrom(opts) });
});

program
  .command("deps")
  .description("List the tileset images a map depends on")
  .argument("<map>", "Path to .tmx file")
  .action(async (input: string) => {
    await runDepsTool(input);
  });

withLoadFlags(
  program
    .command("to-json")
    .description("Decode a map and write it as JSON")
    .argument("<map>", "Path to .tmx file")
    .option("-o, --out <path>", "Write JSON to a file (default: stdout)"),
).action(async (input: string, opts: LoadFlags & { out?: string }) => {
  const load = loadOptionsFrom(opts);
  await runToJsonTool(input, opts.out === undefined ? { load } : { load, out: opts.out });
});

program
  .command("render")
  .description("Render a map or folder of maps to PNGs (orthogonal maps only)")
  .argument("<input>", "Path to .tmx OR directory")
  .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
  .option("--recursive", "Recurse into subdirectories (directory input)", false)
  .option("--overwrite", "Overwrite existing PNGs", false)
  .option("--dry-run", "Print planned operations but do not write anything", false)
  .option("--mipmaps", "Request mip-map generation for tileset images", false)
  .option("--min-filter <filter>", "Minification filter for tileset images", "nearest")
  .option("--mag-filter <filter>", "Magnification filter for tileset images", "nearest")
  .action(
    async (
      input: string,
      opts: ImageFlags & {
        out?: string;
        recursive: boolean;
        overwrite: boolean;
        dryRun: boolean;
      },
    ) => {
      const params = {
        recursive: opts.recursive,
        overwrite: opts.overwrite,
        dryRun: opts.dryRun,
        load: imageOptionsFrom(opts),
      };
      await runRenderTool(input, opts.out === undefined ? params : { ...params, out: opts.out });
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
