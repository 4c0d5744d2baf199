import {
  DEFAULT_FONT_SETTINGS,
  FontSettingsMapError,
  LARGE_LABEL_FONT_SETTINGS,
  SMALL_LABEL_FONT_SETTINGS,
  describeFontSettings,
  fontSettingsEqual,
  fontSettingsFromMap,
  fontSettingsToMap,
  validateFontSettings,
  type FontSettings,
} from '../models/font-settings.ts';
import { readJsonItem, writeJsonItem, type KeyValueStore, type StoredValueLog } from './key-value-store.ts';

export const FONT_SETTINGS_KEY = 'font_settings';
export const FONT_PRESET_KEY = 'font_settings_preset';

export const FONT_PRESET_NAMES = ['Default', 'Small Label', 'Large Label'] as const;

export type FontPresetName = (typeof FONT_PRESET_NAMES)[number];

export const FONT_PRESETS: Readonly<Record<FontPresetName, FontSettings>> = {
  Default: DEFAULT_FONT_SETTINGS,
  'Small Label': SMALL_LABEL_FONT_SETTINGS,
  'Large Label': LARGE_LABEL_FONT_SETTINGS,
};

// Accepted spellings after lower-casing and removing spaces.
const PRESET_ALIASES: Record<string, FontPresetName> = {
  default: 'Default',
  small: 'Small Label',
  smalllabel: 'Small Label',
  large: 'Large Label',
  largelabel: 'Large Label',
};

export type FontSettingsServiceLog =
  | StoredValueLog
  | { level: 'info'; event: 'font_settings_saved'; settings: string }
  | { level: 'info'; event: 'font_preset_applied'; preset: string; settings: string }
  | { level: 'info'; event: 'font_settings_reset' };

export type FontSettingsServiceDependencies = {
  store: KeyValueStore;
  onLog?: (entry: FontSettingsServiceLog) => void;
};

export class UnknownFontPresetError extends Error {
  readonly presetName: string;

  constructor(presetName: string) {
    super(`unknown font preset ${presetName}`);
    this.name = 'UnknownFontPresetError';
    this.presetName = presetName;
  }
}

export class InvalidFontSettingsError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('font settings are out of range');
    this.name = 'InvalidFontSettingsError';
    this.errors = errors;
  }
}

export function resolveFontPresetName(presetName: string): FontPresetName | null {
  const normalized = presetName.toLowerCase().replaceAll(' ', '');
  return PRESET_ALIASES[normalized] ?? null;
}

export async function getCurrentFontSettings(deps: FontSettingsServiceDependencies): Promise<FontSettings> {
  const stored = await readJsonItem(deps.store, FONT_SETTINGS_KEY, deps.onLog);
  if (stored === null) {
    return DEFAULT_FONT_SETTINGS;
  }

  try {
    return fontSettingsFromMap(stored);
  } catch (error) {
    if (!(error instanceof FontSettingsMapError)) {
      throw error;
    }

    deps.onLog?.({
      level: 'warn',
      event: 'stored_value_invalid',
      key: FONT_SETTINGS_KEY,
      issues: error.issues,
    });
    return DEFAULT_FONT_SETTINGS;
  }
}

/** Saving custom settings clears any remembered preset selection. */
export async function saveFontSettings(
  settings: FontSettings,
  deps: FontSettingsServiceDependencies
): Promise<void> {
  const errors = validateFontSettings(settings);
  if (errors.length > 0) {
    throw new InvalidFontSettingsError(errors);
  }

  await writeJsonItem(deps.store, FONT_SETTINGS_KEY, fontSettingsToMap(settings));
  await deps.store.removeItem(FONT_PRESET_KEY);

  deps.onLog?.({ level: 'info', event: 'font_settings_saved', settings: describeFontSettings(settings) });
}

export async function getCurrentFontPreset(deps: FontSettingsServiceDependencies): Promise<string | null> {
  return deps.store.getItem(FONT_PRESET_KEY);
}

export async function applyFontPreset(
  presetName: string,
  deps: FontSettingsServiceDependencies
): Promise<FontSettings> {
  const resolved = resolveFontPresetName(presetName);
  if (!resolved) {
    throw new UnknownFontPresetError(presetName);
  }

  const settings = FONT_PRESETS[resolved];
  await writeJsonItem(deps.store, FONT_SETTINGS_KEY, fontSettingsToMap(settings));
  await deps.store.setItem(FONT_PRESET_KEY, presetName);

  deps.onLog?.({
    level: 'info',
    event: 'font_preset_applied',
    preset: presetName,
    settings: describeFontSettings(settings),
  });

  return settings;
}

export async function resetFontSettings(deps: FontSettingsServiceDependencies): Promise<void> {
  await deps.store.removeItem(FONT_SETTINGS_KEY);
  await deps.store.removeItem(FONT_PRESET_KEY);
  deps.onLog?.({ level: 'info', event: 'font_settings_reset' });
}

/** Name of the preset the stored settings equal, or null for custom settings. */
export async function detectCurrentFontPreset(
  deps: FontSettingsServiceDependencies
): Promise<FontPresetName | null> {
  const current = await getCurrentFontSettings(deps);
  return FONT_PRESET_NAMES.find((name) => fontSettingsEqual(FONT_PRESETS[name], current)) ?? null;
}
