import { z } from 'zod';

import {
  DEFAULT_LABEL_CONFIG,
  LABEL_CONFIG_PRESETS,
  labelConfigId,
  type LabelConfig,
} from '../models/label-config.ts';
import type { FontSettings } from '../models/font-settings.ts';
import { FONT_PRESETS, resolveFontPresetName } from '../services/font-settings-service.ts';

export const LABEL_CONFIG_ENV = 'LABEL_DESIGNER_LABEL_CONFIG';
export const FONT_PRESET_ENV = 'LABEL_DESIGNER_FONT_PRESET';

const renderEnvSchema = z.object({
  [LABEL_CONFIG_ENV]: z.string().trim().optional(),
  [FONT_PRESET_ENV]: z.string().trim().optional(),
});

/** Raw selections, before they are matched against presets. */
export type RenderConfigInput = {
  labelConfig?: string;
  fontPreset?: string;
};

export type RenderConfig = {
  labelConfig: LabelConfig;
  fontSettings: FontSettings;
};

export class InvalidRenderConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`invalid render config: ${errors.join('; ')}`);
    this.name = 'InvalidRenderConfigError';
    this.errors = errors;
  }
}

/**
 * Matches a preset by display name (`80mm × 50mm`) or by its id (`80mm-x-50mm`).
 */
export function findLabelConfig(selection: string): LabelConfig | null {
  const wanted = selection.trim();
  return (
    LABEL_CONFIG_PRESETS.find(
      (config) => config.name === wanted || labelConfigId(config) === wanted.toLowerCase()
    ) ?? null
  );
}

export function readRenderConfigInput(env: Record<string, string | undefined>): RenderConfigInput {
  const parsed = renderEnvSchema.parse(env);
  const input: RenderConfigInput = {};
  const labelConfig = parsed[LABEL_CONFIG_ENV];
  const fontPreset = parsed[FONT_PRESET_ENV];

  if (labelConfig) {
    input.labelConfig = labelConfig;
  }

  if (fontPreset) {
    input.fontPreset = fontPreset;
  }

  return input;
}

type RenderConfigLookup = { config: RenderConfig; errors: [] } | { config: null; errors: string[] };

function lookupRenderConfig(input: RenderConfigInput): RenderConfigLookup {
  const errors: string[] = [];

  const labelConfig =
    input.labelConfig === undefined ? DEFAULT_LABEL_CONFIG : findLabelConfig(input.labelConfig);
  if (!labelConfig) {
    errors.push(`labelConfig must name a preset label size, got ${input.labelConfig}`);
  }

  const presetName = input.fontPreset === undefined ? 'Default' : resolveFontPresetName(input.fontPreset);
  if (!presetName) {
    errors.push(`fontPreset must be one of default, small, large, got ${input.fontPreset}`);
  }

  if (!labelConfig || !presetName) {
    return { config: null, errors };
  }

  return { config: { labelConfig, fontSettings: FONT_PRESETS[presetName] }, errors: [] };
}

export function validateRenderConfig(input: RenderConfigInput): string[] {
  return lookupRenderConfig(input).errors;
}

/**
 * Unset selections fall back to the default label size and default fonts.
 *
 * @throws InvalidRenderConfigError when a selection names no known preset.
 */
export function resolveRenderConfig(input: RenderConfigInput): RenderConfig {
  const { config, errors } = lookupRenderConfig(input);
  if (!config) {
    throw new InvalidRenderConfigError(errors);
  }

  return config;
}
