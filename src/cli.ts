#!/usr/bin/env node
/**
 * Command-line lithophane generator
 * 
 * lithophane --input photo.png --output photo.stl [options] -- <x> <y> <z>
 * 
 * Expressions use the variables x, y (pixel column/row), w and h (image size).
 * Put `--` before them if one starts with a minus sign.
 */

import 'dotenv/config';
import { open, readFile, rm, type FileHandle } from 'fs/promises';
import { parseArgs } from 'util';
import { loadConfig } from './config.js';
import { compileCoordinateExpressions } from './expressions/coordinateExpression.js';
import { decodeGrayscaleImage, readImageDimensions } from './image/decodeImage.js';
import { generateLithophane, generatePreview } from './services/lithophaneService.js';
import { encodeBinaryStl } from './stl/binaryStl.js';
import { error as logError, info, setLogLevel } from './utils/debug.js';
import type { Mesh } from './geometry/types.js';

export const USAGE = `Usage: lithophane --input <image> --output <file.stl> [--white-depth <n>] [--black-depth <n>] [--preview-step <n>] -- <x-expression> <y-expression> <z-expression>`;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseNumberOption(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Run the CLI
 * 
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  const config = loadConfig();

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    logError(describe(error));
    logError(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    info(USAGE);
    return 0;
  }
  if (!values.input || !values.output || positionals.length !== 3) {
    logError(USAGE);
    return 1;
  }
  const input = values.input;
  const output = values.output;

  let whiteDepth: number;
  let blackDepth: number;
  let previewStep: number | undefined;
  try {
    whiteDepth = parseNumberOption('white-depth', values['white-depth'], config.defaultWhiteDepth);
    blackDepth = parseNumberOption('black-depth', values['black-depth'], config.defaultBlackDepth);
    previewStep = values['preview-step'] === undefined
      ? undefined
      : parseNumberOption('preview-step', values['preview-step'], 1);
  } catch (error) {
    logError(describe(error));
    return 1;
  }

  let imageBuffer: Buffer;
  try {
    imageBuffer = await readFile(input);
  } catch (error) {
    logError(`Error opening image file "${input}": ${describe(error)}`);
    return 1;
  }

  // Created before any work so an existing output fails fast
  let outputFile: FileHandle;
  try {
    outputFile = await open(output, 'wx');
  } catch (error) {
    logError(`Error opening output file "${output}": ${describe(error)}`);
    return 1;
  }

  let failure: string | undefined;
  let triangleCount = 0;
  try {
    const [xExpression, yExpression, zExpression] = positionals;
    let mesh: Mesh;
    try {
      const functions = compileCoordinateExpressions({ xExpression, yExpression, zExpression });
      if (previewStep !== undefined) {
        const { width, height } = await readImageDimensions(imageBuffer);
        mesh = generatePreview(functions, width, height, previewStep);
      } else {
        const image = await decodeGrayscaleImage(imageBuffer);
        mesh = generateLithophane(functions, image, { whiteDepth, blackDepth });
      }
    } catch (error) {
      failure = `Error generating lithophane: ${describe(error)}`;
      mesh = [];
    }

    if (failure === undefined) {
      try {
        await outputFile.writeFile(encodeBinaryStl(mesh));
        triangleCount = mesh.length;
      } catch (error) {
        failure = `Error saving lithophane to "${output}": ${describe(error)}`;
      }
    }
  } finally {
    await outputFile.close();
  }

  if (failure !== undefined) {
    logError(failure);
    // Nothing was produced, so don't leave an empty file behind
    await rm(output, { force: true });
    return 1;
  }

  info(`Wrote ${triangleCount} triangles to "${output}"`);
  return 0;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      'white-depth': { type: 'string' },
      'black-depth': { type: 'string' },
      'preview-step': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

if (require.main === module) {
  setLogLevel(loadConfig().logLevel);
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logError('Unexpected failure', err);
      process.exitCode = 1;
    }
  );
}
