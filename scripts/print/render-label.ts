#!/usr/bin/env node

import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import yaml from 'js-yaml';

import {
  InvalidRenderConfigError,
  readRenderConfigInput,
  resolveRenderConfig,
  type RenderConfig,
  type RenderConfigInput,
} from '../../engine/src/config/render-config.ts';
import { createDefaultDesign } from '../../engine/src/layout/default-layout.ts';
import {
  ShippingLabelValidationError,
  parseShippingLabel,
  type ShippingLabel,
} from '../../engine/src/models/shipping-label.ts';
import { renderLabelDesign } from '../../engine/src/printing/design-renderer.ts';
import { renderShippingLabel } from '../../engine/src/printing/shipping-label-renderer.ts';

const USAGE =
  'usage: render-label [--label <size>] [--font-preset <name>] [--design default] <label-file>';

export type RenderLabelIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (filePath: string) => Promise<string>;
  env: Record<string, string | undefined>;
  now?: () => Date;
};

type RenderLabelArgs = {
  labelFile: string;
  overrides: RenderConfigInput;
  useDefaultDesign: boolean;
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseArgs(argv: string[]): RenderLabelArgs {
  const args = [...argv];
  const positional: string[] = [];
  const overrides: RenderConfigInput = {};
  let useDefaultDesign = false;

  const takeValue = (flag: string): string => {
    const value = args.shift();
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  while (args.length > 0) {
    const arg = args.shift() ?? '';
    switch (arg) {
      case '--label':
        overrides.labelConfig = takeValue(arg);
        break;
      case '--font-preset':
        overrides.fontPreset = takeValue(arg);
        break;
      case '--design': {
        const design = takeValue(arg);
        if (design !== 'default') {
          throw new UsageError(`unsupported design ${design}`);
        }
        useDefaultDesign = true;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError('expected exactly one label file');
  }

  return { labelFile: positional[0], overrides, useDefaultDesign };
}

/**
 * Renders a shipping label file (JSON or YAML) to a TSPL program on stdout. Flags
 * override the `LABEL_DESIGNER_*` environment selections. Exit codes: 0 printed,
 * 1 invalid label data, 2 usage or configuration errors.
 */
export async function main(argv: string[], io: RenderLabelIo): Promise<number> {
  let args: RenderLabelArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    io.stderr(`${error.message}\n${USAGE}\n`);
    return 2;
  }

  let config: RenderConfig;
  try {
    config = resolveRenderConfig({ ...readRenderConfigInput(io.env), ...args.overrides });
  } catch (error) {
    if (!(error instanceof InvalidRenderConfigError)) {
      throw error;
    }
    io.stderr(`Invalid render config: ${error.errors.join('; ')}\n`);
    return 2;
  }

  let text: string;
  try {
    text = await io.readFile(args.labelFile);
  } catch (error) {
    if (!isFileNotFound(error)) {
      throw error;
    }
    io.stderr(`label file not found: ${args.labelFile}\n`);
    return 2;
  }

  const now = io.now ?? (() => new Date());
  let label: ShippingLabel;
  try {
    label = parseShippingLabel(yaml.load(text), now);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      io.stderr(`Invalid label file: ${error.reason}\n`);
      return 1;
    }
    if (error instanceof ShippingLabelValidationError) {
      io.stderr(`Invalid shipping label: ${error.issues.join('; ')}\n`);
      return 1;
    }
    throw error;
  }

  const writeLog = (entry: { level: string }): void => {
    if (entry.level === 'warn') {
      io.stderr(`${JSON.stringify(entry)}\n`);
    }
  };

  if (args.useDefaultDesign) {
    const design = createDefaultDesign(config.labelConfig, { now });
    io.stdout(renderLabelDesign(design, { bindings: label, onLog: writeLog }).program);
  } else {
    io.stdout(renderShippingLabel(label, config.labelConfig, config.fontSettings, { onLog: writeLog }).program);
  }

  return 0;
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

const modulePath = fileURLToPath(import.meta.url);
const isMain = process.argv[1] && path.resolve(process.argv[1]) === path.resolve(modulePath);

if (isMain) {
  main(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readFile: (filePath) => fs.readFile(filePath, 'utf8'),
    env: process.env,
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
